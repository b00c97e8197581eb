// ─── Layout Types ──────────────────────────────────────────────────────────────
// Pure TypeScript types with no runtime imports.
// Shared by the layout engine, the sync engine and the bar components.

// ─── Sections ─────────────────────────────────────────────────────────────────

export type SectionKind = "leading" | "middle" | "trailing";

/**
 * Where the middle section sits relative to the leading and trailing content.
 * "leading"  — directly after the leading section
 * "center"   — centred between two flexible gaps (default)
 * "trailing" — directly before the trailing section
 */
export type MiddleAlignment = "leading" | "center" | "trailing";

// ─── Action Items ─────────────────────────────────────────────────────────────

/** An icon passed through to the native side untouched. */
export interface SymbolRef {
  readonly name: string;
  /** Point size for the symbol. Used as the item's icon size when it sets none. */
  readonly size?: number;
}

export type IconRef = string | SymbolRef;

export interface ButtonAction {
  readonly kind: "button";
  /** Preferred over `label` when both are set. */
  readonly iconRef?: IconRef;
  readonly label?: string;
  readonly labelSize?: number;
  readonly iconSize?: number;
  /** Horizontal and vertical padding around the control. */
  readonly padding?: number;
  readonly onPressed?: () => void;
}

export interface FixedSpaceAction {
  readonly kind: "fixedSpace";
  /** Total gap width. */
  readonly padding: number;
}

export interface FlexibleSpaceAction {
  readonly kind: "flexibleSpace";
}

export type ActionItem = ButtonAction | FixedSpaceAction | FlexibleSpaceAction;

// ─── Canonical Arrays ─────────────────────────────────────────────────────────

/** Wire marker for a slot. Anything other than "fixed"/"flexible" is a button. */
export type SpacerMarker = "fixed" | "flexible" | "";

/**
 * Parallel per-slot arrays. Index `i` in every array describes the same item.
 * `spacers` is typed as plain strings because payloads read back from the wire
 * may carry markers this version does not know.
 */
export interface CanonicalArrays {
  readonly icons: readonly string[];
  readonly labels: readonly string[];
  readonly paddings: readonly number[];
  readonly labelSizes: readonly number[];
  readonly iconSizes: readonly number[];
  readonly spacers: readonly string[];
}

// ─── Groups & Spacers ─────────────────────────────────────────────────────────

export interface ResolvedButton {
  /** Position of the button in its section's original item list. */
  readonly slot: number;
  readonly padding: number;
  /** Extra space on the leading edge carried over from a fixed spacer. */
  readonly leadingInset: number;
  /** Extra space on the trailing edge taken from a fixed spacer. */
  readonly trailingInset: number;
}

/** Consecutive buttons rendered as one pill. Never empty. */
export interface Group {
  readonly type: "group";
  readonly buttons: readonly ResolvedButton[];
}

export type Spacer =
  | { readonly type: "spacer"; readonly spacer: "flexible" }
  | { readonly type: "spacer"; readonly spacer: "fixed"; readonly width: number };

export type SectionElement = Group | Spacer;

/**
 * How fixed spacers are resolved.
 * "split"  — half the width pads each neighbouring button, same pill
 * "native" — the spacer closes the pill and is emitted as a fixed gap
 */
export type FixedSpacerPolicy = "split" | "native";

// ─── Pill Geometry ────────────────────────────────────────────────────────────

export interface PillMetrics {
  readonly controlWidth: number;
  readonly controlHeight: number;
}

export interface ButtonGeometry {
  readonly slot: number;
  readonly width: number;
  readonly height: number;
}

export interface PillGeometry {
  readonly buttons: readonly ButtonGeometry[];
  readonly width: number;
  readonly height: number;
  readonly cornerRadius: number;
}

// ─── Aligned Bar ──────────────────────────────────────────────────────────────

export interface PlacedGroup {
  readonly type: "group";
  readonly section: SectionKind;
  readonly group: Group;
}

export type BarElement = PlacedGroup | Spacer;

/** The two native item lists: anchored to the leading edge and to the trailing edge. */
export interface AlignedSections {
  readonly leading: readonly BarElement[];
  readonly trailing: readonly BarElement[];
  /** Alignment actually applied after fallback. */
  readonly alignment: MiddleAlignment;
}

// ─── Layout Plan ──────────────────────────────────────────────────────────────

export interface PlannedGroup {
  readonly type: "group";
  readonly section: SectionKind;
  /** Namespaced callback index per button, in render order. */
  readonly tags: readonly number[];
  readonly geometry: PillGeometry;
}

export type PlannedElement = PlannedGroup | Spacer;

export interface BarLayoutPlan {
  readonly leading: readonly PlannedElement[];
  readonly trailing: readonly PlannedElement[];
  readonly alignment: MiddleAlignment;
  /** Title to render, or null when middle items take its place. */
  readonly title: string | null;
}

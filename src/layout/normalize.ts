import type { ActionItem, ButtonAction, CanonicalArrays, IconRef, SpacerMarker } from "./types.ts";

// ─── Item Constructors ───────────────────────────────────────────────────────

export function action(config: Omit<ButtonAction, "kind">): ButtonAction {
  return { kind: "button", ...config };
}

export function fixedSpace(width: number): ActionItem {
  return { kind: "fixedSpace", padding: width };
}

export function flexibleSpace(): ActionItem {
  return { kind: "flexibleSpace" };
}

export function isSpacer(item: ActionItem): boolean {
  return item.kind !== "button";
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function iconName(ref: IconRef | undefined): string {
  if (ref === undefined) return "";
  return typeof ref === "string" ? ref : ref.name;
}

function nonNegative(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value < 0) return 0;
  return value;
}

function spacerMarker(item: ActionItem): SpacerMarker {
  if (item.kind === "flexibleSpace") return "flexible";
  if (item.kind === "fixedSpace") return "fixed";
  return "";
}

export const EMPTY_ARRAYS: CanonicalArrays = {
  icons: [],
  labels: [],
  paddings: [],
  labelSizes: [],
  iconSizes: [],
  spacers: [],
};

// ─── Normalizer ──────────────────────────────────────────────────────────────

/**
 * Flattens a list of actions into parallel per-slot arrays of the same length.
 *
 * A button with both an icon and a label keeps only the icon. Spacer slots get
 * empty/zero sentinels except `paddings`, which holds a fixed spacer's width.
 * Nothing here throws: missing or invalid numbers become 0.
 */
export function normalizeActions(items: readonly ActionItem[] | undefined): CanonicalArrays {
  if (!items || items.length === 0) return EMPTY_ARRAYS;

  const icons: string[] = [];
  const labels: string[] = [];
  const paddings: number[] = [];
  const labelSizes: number[] = [];
  const iconSizes: number[] = [];
  const spacers: SpacerMarker[] = [];

  for (const item of items) {
    spacers.push(spacerMarker(item));
    if (item.kind !== "button") {
      icons.push("");
      labels.push("");
      paddings.push(item.kind === "fixedSpace" ? nonNegative(item.padding) : 0);
      labelSizes.push(0);
      iconSizes.push(0);
      continue;
    }

    const icon = iconName(item.iconRef);
    icons.push(icon);
    labels.push(icon.length > 0 ? "" : (item.label ?? ""));
    paddings.push(nonNegative(item.padding));
    labelSizes.push(nonNegative(item.labelSize));
    const symbolSize = typeof item.iconRef === "object" ? item.iconRef.size : undefined;
    iconSizes.push(nonNegative(item.iconSize ?? symbolSize));
  }

  return { icons, labels, paddings, labelSizes, iconSizes, spacers };
}

/** Number of slots described by a set of arrays, tolerating length mismatches. */
export function slotCount(arrays: CanonicalArrays): number {
  return Math.max(arrays.icons.length, arrays.labels.length, arrays.spacers.length);
}

import type { CanonicalArrays } from "../layout/types.ts";

// ─── Snapshot ────────────────────────────────────────────────────────────────

/** One section's arrays as sent over the bridge. */
export interface SerializedSection extends CanonicalArrays {
  readonly badges?: readonly string[];
  readonly badgeColors?: readonly (number | null)[];
}

export type LayoutValue = string | number | boolean | null;

/**
 * The values last sent to the native side, used as the diff baseline.
 * `layout` holds the bar kind's layout-mode fields (alignment, pill height,
 * split settings, large title).
 */
export interface BarSnapshot {
  readonly title: string;
  readonly tint: number | null;
  readonly backgroundColor: number | null;
  readonly transparent: boolean;
  readonly isDark: boolean;
  readonly sections: Readonly<Record<string, SerializedSection>>;
  readonly layout: Readonly<Record<string, LayoutValue>>;
  readonly selectedIndex: number | null;
}

// ─── Wire keys ───────────────────────────────────────────────────────────────

const ARRAY_SUFFIXES = [
  ["icons", "Icons"],
  ["labels", "Labels"],
  ["paddings", "Paddings"],
  ["labelSizes", "LabelSizes"],
  ["iconSizes", "IconSizes"],
  ["spacers", "Spacers"],
  ["badges", "Badges"],
  ["badgeColors", "BadgeColors"],
] as const satisfies readonly (readonly [keyof SerializedSection, string])[];

/** `{section}Icons`, `{section}Labels`, … for every section. */
export function flattenSections(
  sections: Readonly<Record<string, SerializedSection>>,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [name, section] of Object.entries(sections)) {
    for (const [field, suffix] of ARRAY_SUFFIXES) {
      const value = section[field];
      if (value !== undefined) out[`${name}${suffix}`] = value;
    }
  }
  return out;
}

/** Full construction payload for a snapshot. */
export function toCreationParams(snapshot: BarSnapshot): Record<string, unknown> {
  const params: Record<string, unknown> = {
    title: snapshot.title,
    ...flattenSections(snapshot.sections),
    ...snapshot.layout,
    transparent: snapshot.transparent,
    isDark: snapshot.isDark,
    tint: snapshot.tint,
  };
  if (snapshot.backgroundColor !== null) params["backgroundColor"] = snapshot.backgroundColor;
  if (snapshot.selectedIndex !== null) params["selectedIndex"] = snapshot.selectedIndex;
  return params;
}

// ─── Equality ────────────────────────────────────────────────────────────────

function sameArray<T>(a: readonly T[] | undefined, b: readonly T[] | undefined): boolean {
  if (a === b) return true;
  if (!a || !b || a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!Object.is(a[i], b[i])) return false;
  }
  return true;
}

export function sameSection(a: SerializedSection | undefined, b: SerializedSection | undefined): boolean {
  if (a === b) return true;
  if (!a || !b) return false;
  return ARRAY_SUFFIXES.every(([field]) =>
    sameArray<unknown>(a[field], b[field]),
  );
}

export function sameSections(
  a: Readonly<Record<string, SerializedSection>>,
  b: Readonly<Record<string, SerializedSection>>,
): boolean {
  const names = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const name of names) {
    if (!sameSection(a[name], b[name])) return false;
  }
  return true;
}

export function sameLayout(
  a: Readonly<Record<string, LayoutValue>>,
  b: Readonly<Record<string, LayoutValue>>,
): boolean {
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const key of keys) {
    if (!Object.is(a[key], b[key])) return false;
  }
  return true;
}

// ─── Index Router ────────────────────────────────────────────────────────────
// Every rendered control carries one integer tag so a single native callback
// can tell sections apart: tag = sectionOffset + slot. Offsets are the
// section's position in the namespace times the section capacity, so with the
// default capacity leading = 0, middle = 1000 and trailing = 2000.

export const DEFAULT_SECTION_CAPACITY = 1000;

export type DecodedTag<S extends string = string> = {
  section: S;
  index: number;
};

export interface IndexNamespace<S extends string = string> {
  readonly sections: readonly S[];
  readonly capacity: number;
  offsetOf(section: S): number;
  /** Throws RangeError when `slot` falls outside `[0, capacity)`. */
  encode(section: S, slot: number): number;
  /** Returns null for tags that belong to no section. */
  decode(tag: number): DecodedTag<S> | null;
}

export function createIndexNamespace<S extends string>(
  sections: readonly S[],
  capacity: number = DEFAULT_SECTION_CAPACITY,
): IndexNamespace<S> {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Section capacity must be a positive integer, got ${String(capacity)}`);
  }

  const offsets = new Map<S, number>();
  sections.forEach((section, position) => offsets.set(section, position * capacity));

  function offsetOf(section: S): number {
    const offset = offsets.get(section);
    if (offset === undefined) throw new RangeError(`Unknown section "${section}"`);
    return offset;
  }

  return {
    sections,
    capacity,
    offsetOf,
    encode(section, slot) {
      if (!Number.isInteger(slot) || slot < 0 || slot >= capacity) {
        throw new RangeError(
          `Slot ${String(slot)} in section "${section}" exceeds the section capacity of ${String(capacity)}`,
        );
      }
      return offsetOf(section) + slot;
    },
    decode(tag) {
      if (!Number.isInteger(tag) || tag < 0) return null;
      const section = sections[Math.floor(tag / capacity)];
      if (section === undefined) return null;
      return { section, index: tag - offsetOf(section) };
    },
  };
}

// ─── Dispatch ────────────────────────────────────────────────────────────────

export type RoutedTap<S extends string, T> = DecodedTag<S> & { item: T };

/**
 * Looks up the item a tap refers to. Returns null when the index is outside
 * the section's current item list, which happens when a stale native callback
 * arrives after a rebuild changed the item count.
 */
export function routeTap<S extends string, T>(
  section: S,
  index: number,
  items: Readonly<Partial<Record<S, readonly T[]>>>,
): RoutedTap<S, T> | null {
  if (!Number.isInteger(index) || index < 0) return null;
  const list = items[section];
  if (!list || index >= list.length) return null;
  const item = list[index];
  if (item === undefined) return null;
  return { section, index, item };
}

import type {
  CanonicalArrays,
  FixedSpacerPolicy,
  Group,
  ResolvedButton,
  SectionElement,
} from "./types.ts";

import { slotCount } from "./normalize.ts";

type OpenButton = {
  slot: number;
  padding: number;
  leadingInset: number;
  trailingInset: number;
};

function paddingAt(arrays: CanonicalArrays, slot: number): number {
  const value = arrays.paddings[slot] ?? 0;
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function freeze(open: readonly OpenButton[]): Group {
  return {
    type: "group",
    buttons: open.map(
      (button): ResolvedButton => ({
        slot: button.slot,
        padding: button.padding,
        leadingInset: button.leadingInset,
        trailingInset: button.trailingInset,
      }),
    ),
  };
}

/**
 * Partitions one section's slots into pills and spacers, left to right.
 *
 * - A button joins the open group (starting one if needed).
 * - A flexible spacer closes the open group and is emitted as a spacer.
 * - Under the "split" policy a fixed spacer keeps the group open: half its
 *   width goes to the trailing edge of the last button so far and half is held
 *   as pending space for the leading edge of the next button. Pending space
 *   that never reaches a button is dropped.
 * - Under the "native" policy a fixed spacer closes the group and is emitted
 *   with its full width.
 *
 * Any marker other than "fixed" or "flexible" is a button.
 */
export function resolveGroups(
  arrays: CanonicalArrays,
  policy: FixedSpacerPolicy = "split",
): SectionElement[] {
  const elements: SectionElement[] = [];
  let open: OpenButton[] = [];
  let pending = 0;

  const close = (): void => {
    if (open.length === 0) return;
    elements.push(freeze(open));
    open = [];
  };

  const count = slotCount(arrays);
  for (let slot = 0; slot < count; slot++) {
    const marker = arrays.spacers[slot] ?? "";

    if (marker === "flexible") {
      close();
      elements.push({ type: "spacer", spacer: "flexible" });
      continue;
    }

    if (marker === "fixed") {
      const width = paddingAt(arrays, slot);
      if (policy === "native") {
        close();
        elements.push({ type: "spacer", spacer: "fixed", width });
        continue;
      }
      const half = width / 2;
      // With no button in the open group there is no trailing side; only the
      // leading half survives.
      const last = open[open.length - 1];
      if (last) last.trailingInset += half;
      pending += half;
      continue;
    }

    open.push({
      slot,
      padding: paddingAt(arrays, slot),
      leadingInset: pending,
      trailingInset: 0,
    });
    pending = 0;
  }

  close();
  return elements;
}

import type { BarSnapshot } from "./snapshot.ts";

import { flattenSections, sameLayout, sameSections } from "./snapshot.ts";

// ─── Operations ──────────────────────────────────────────────────────────────

export type StyleArgs = {
  tint?: number;
  transparent?: boolean;
  backgroundColor?: number;
};

export type SyncOperation =
  | { readonly method: "setTitle"; readonly args: { readonly title: string } }
  | { readonly method: "setStyle"; readonly args: Readonly<StyleArgs> }
  | { readonly method: "setBrightness"; readonly args: { readonly isDark: boolean } }
  | { readonly method: "setItems"; readonly args: Readonly<Record<string, unknown>> }
  | { readonly method: "setSelectedIndex"; readonly args: { readonly index: number } }
  | { readonly method: "setLayout"; readonly args: Readonly<Record<string, unknown>> };

export type SyncMethod = SyncOperation["method"];

export interface DiffResult {
  readonly operations: readonly SyncOperation[];
  /** Baseline for the next diff: the candidate, minus values that were not sent. */
  readonly next: BarSnapshot;
}

function withSelection(
  args: Record<string, unknown>,
  selectedIndex: number | null,
): Record<string, unknown> {
  if (selectedIndex !== null) args["selectedIndex"] = selectedIndex;
  return args;
}

/**
 * Computes the operations that move the native side from `previous` to
 * `candidate`, at most one per field group, in dispatch order:
 * setTitle, setStyle, setBrightness, setItems, setSelectedIndex, setLayout.
 *
 * `setItems` always precedes `setLayout` because the native layout pass reads
 * the most recently set items. A null tint or background colour is never sent,
 * so the previous value stays in the baseline.
 */
export function diffSnapshots(previous: BarSnapshot, candidate: BarSnapshot): DiffResult {
  const operations: SyncOperation[] = [];

  if (previous.title !== candidate.title) {
    operations.push({ method: "setTitle", args: { title: candidate.title } });
  }

  const style: StyleArgs = {};
  if (candidate.tint !== null && candidate.tint !== previous.tint) {
    style.tint = candidate.tint;
  }
  if (candidate.transparent !== previous.transparent) {
    style.transparent = candidate.transparent;
  }
  if (candidate.backgroundColor !== null && candidate.backgroundColor !== previous.backgroundColor) {
    style.backgroundColor = candidate.backgroundColor;
  }
  if (Object.keys(style).length > 0) {
    operations.push({ method: "setStyle", args: style });
  }

  if (candidate.isDark !== previous.isDark) {
    operations.push({ method: "setBrightness", args: { isDark: candidate.isDark } });
  }

  const itemsChanged = !sameSections(previous.sections, candidate.sections);
  if (itemsChanged) {
    operations.push({
      method: "setItems",
      args: withSelection(flattenSections(candidate.sections), candidate.selectedIndex),
    });
  } else if (candidate.selectedIndex !== null && candidate.selectedIndex !== previous.selectedIndex) {
    operations.push({ method: "setSelectedIndex", args: { index: candidate.selectedIndex } });
  }

  if (!sameLayout(previous.layout, candidate.layout)) {
    operations.push({
      method: "setLayout",
      args: withSelection({ ...candidate.layout }, candidate.selectedIndex),
    });
  }

  return {
    operations,
    next: {
      ...candidate,
      tint: candidate.tint ?? previous.tint,
      backgroundColor: candidate.backgroundColor ?? previous.backgroundColor,
      selectedIndex: candidate.selectedIndex ?? previous.selectedIndex,
    },
  };
}

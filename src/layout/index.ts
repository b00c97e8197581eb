export type * from "./types.ts";

import type {
  BarElement,
  BarLayoutPlan,
  CanonicalArrays,
  FixedSpacerPolicy,
  MiddleAlignment,
  PillMetrics,
  PlannedElement,
  SectionKind,
} from "./types.ts";

import { createIndexNamespace, type IndexNamespace } from "../routing/index.ts";
import { alignSections, effectiveTitle } from "./alignment.ts";
import { resolveGroups } from "./groups.ts";
import { EMPTY_ARRAYS } from "./normalize.ts";
import { DEFAULT_PILL_METRICS, measurePill } from "./pill.ts";

export { alignSections, effectiveAlignment, effectiveTitle } from "./alignment.ts";
export type { SectionElements } from "./alignment.ts";
export { resolveGroups } from "./groups.ts";
export {
  EMPTY_ARRAYS,
  action,
  fixedSpace,
  flexibleSpace,
  isSpacer,
  normalizeActions,
  slotCount,
} from "./normalize.ts";
export { DEFAULT_PILL_METRICS, measurePill } from "./pill.ts";

export const ACTION_SECTIONS: readonly SectionKind[] = ["leading", "middle", "trailing"];

export interface BarLayoutInput {
  readonly sections: Readonly<Partial<Record<SectionKind, CanonicalArrays>>>;
  readonly title?: string;
  readonly middleAlignment?: MiddleAlignment;
  readonly pillHeight?: number | null;
  readonly metrics?: PillMetrics;
  readonly fixedSpacers?: FixedSpacerPolicy;
  readonly namespace?: IndexNamespace<SectionKind>;
}

/**
 * Runs the whole layout pipeline for one bar: groups each section, aligns the
 * middle section, sizes every pill and tags every control with its namespaced
 * callback index.
 */
export function planBarLayout(input: BarLayoutInput): BarLayoutPlan {
  const policy = input.fixedSpacers ?? "split";
  const metrics = input.metrics ?? DEFAULT_PILL_METRICS;
  const namespace = input.namespace ?? createIndexNamespace(ACTION_SECTIONS);

  const leading = resolveGroups(input.sections.leading ?? EMPTY_ARRAYS, policy);
  const middle = resolveGroups(input.sections.middle ?? EMPTY_ARRAYS, policy);
  const trailing = resolveGroups(input.sections.trailing ?? EMPTY_ARRAYS, policy);
  const aligned = alignSections({ leading, middle, trailing }, input.middleAlignment);

  const plan = (elements: readonly BarElement[]): PlannedElement[] =>
    elements.map((element): PlannedElement => {
      if (element.type === "spacer") return element;
      return {
        type: "group",
        section: element.section,
        tags: element.group.buttons.map((button) => namespace.encode(element.section, button.slot)),
        geometry: measurePill(element.group, metrics, input.pillHeight),
      };
    });

  return {
    leading: plan(aligned.leading),
    trailing: plan(aligned.trailing),
    alignment: aligned.alignment,
    title: effectiveTitle(input.title ?? "", middle),
  };
}

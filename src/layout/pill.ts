import type { ButtonGeometry, Group, PillGeometry, PillMetrics } from "./types.ts";

export const DEFAULT_PILL_METRICS: PillMetrics = {
  controlWidth: 36,
  controlHeight: 36,
};

function validOverride(pillHeight: number | null | undefined): pillHeight is number {
  return typeof pillHeight === "number" && Number.isFinite(pillHeight) && pillHeight > 0;
}

/**
 * Sizes one pill. Each button is `controlWidth + 2 × padding` wide plus any
 * space it took from neighbouring fixed spacers. Every button shares the pill
 * height: the override when given, otherwise the tallest `controlHeight +
 * 2 × padding` in the group. The corner radius is always half the height.
 */
export function measurePill(
  group: Group,
  metrics: PillMetrics = DEFAULT_PILL_METRICS,
  pillHeight?: number | null,
): PillGeometry {
  let height: number;
  if (validOverride(pillHeight)) {
    height = pillHeight;
  } else {
    const maxExtra = group.buttons.reduce((max, button) => Math.max(max, button.padding * 2), 0);
    height = metrics.controlHeight + maxExtra;
  }

  const buttons = group.buttons.map(
    (button): ButtonGeometry => ({
      slot: button.slot,
      width:
        metrics.controlWidth + button.padding * 2 + button.leadingInset + button.trailingInset,
      height,
    }),
  );

  return {
    buttons,
    width: buttons.reduce((sum, button) => sum + button.width, 0),
    height,
    cornerRadius: height / 2,
  };
}

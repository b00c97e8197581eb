import { z } from "zod";

import type { MethodCall } from "../client/index.ts";
import type { IconRef } from "../layout/types.ts";
import type { SyncOperation } from "../sync/diff.ts";
import type { BarSnapshot, SerializedSection } from "../sync/snapshot.ts";
import type { BarControllerOptions, BaseBarProps } from "./bar.ts";
import type { BarColor } from "./color.ts";

import { formatValue } from "../logger.ts";
import { BarController } from "./bar.ts";

export interface TabItem {
  readonly label?: string;
  readonly iconRef?: IconRef;
  /** Numbers above 99 render as "99+". */
  readonly badge?: string | number | null;
  readonly badgeColor?: BarColor;
}

export interface TabBarProps extends BaseBarProps {
  readonly items?: readonly TabItem[];
  readonly selectedIndex?: number;
  readonly onSelect?: (index: number) => void;
  /** Split the last `rightCount` tabs into a separate pill. */
  readonly split?: boolean;
  readonly rightCount?: number;
  readonly splitSpacing?: number;
  readonly backgroundColor?: BarColor;
  readonly iconSize?: number;
}

export const TAB_SECTION = "tabs";

const MAX_BADGE = 99;

export function formatBadge(badge: TabItem["badge"]): string {
  if (badge === undefined || badge === null) return "";
  if (typeof badge === "number" && badge > MAX_BADGE) return `${String(MAX_BADGE)}+`;
  return String(badge);
}

const ValueChangedArgsSchema = z.object({ index: z.number().int().nonnegative() });

/** A tab bar with one `tabs` section, an optional split pill and badges. */
export class TabBar extends BarController<TabBarProps> {
  readonly viewType = "PillbarTabBar";

  constructor(props: TabBarProps = {}, options: BarControllerOptions = {}) {
    super(props, "tabBar", options);
  }

  protected buildSnapshot(): BarSnapshot {
    return {
      title: "",
      tint: this.effectiveTint,
      backgroundColor: this.resolveColor(this.props.backgroundColor),
      transparent: false,
      isDark: this.isDark,
      sections: { [TAB_SECTION]: this.serializeTabs() },
      layout: {
        split: this.props.split ?? false,
        rightCount: this.props.rightCount ?? 1,
        splitSpacing: this.props.splitSpacing ?? 8,
      },
      selectedIndex: this.props.selectedIndex ?? null,
    };
  }

  protected override shouldRemeasure(operations: readonly SyncOperation[]): boolean {
    return operations.some((op) => op.method === "setItems" || op.method === "setLayout");
  }

  protected handleMethodCall(call: MethodCall): void {
    if (call.method !== "valueChanged") {
      this.logger.debug(`Ignoring unknown method ${call.method}`);
      return;
    }
    const parsed = ValueChangedArgsSchema.safeParse(call.args);
    if (!parsed.success) {
      this.logger.debug(`Ignoring valueChanged ${formatValue(call.args)}`);
      return;
    }

    const { index } = parsed.data;
    if (index === this.snapshot?.selectedIndex) return;
    // Native already shows the new tab.
    this.acknowledge({ selectedIndex: index });
    this.props.onSelect?.(index);
    this.emit({ type: "valueChanged", index });
  }

  private serializeTabs(): SerializedSection {
    const items = this.props.items ?? [];
    return {
      icons: items.map((item) => iconName(item.iconRef)),
      labels: items.map((item) => item.label ?? ""),
      paddings: items.map(() => 0),
      labelSizes: items.map(() => 0),
      iconSizes: items.map((item) => iconSize(this.props.iconSize, item.iconRef)),
      spacers: items.map(() => ""),
      badges: items.map((item) => formatBadge(item.badge)),
      badgeColors: items.map((item) => this.resolveColor(item.badgeColor)),
    };
  }
}

function iconName(ref: IconRef | undefined): string {
  if (ref === undefined) return "";
  return typeof ref === "string" ? ref : ref.name;
}

function iconSize(barSize: number | undefined, ref: IconRef | undefined): number {
  const size = barSize ?? (typeof ref === "object" ? ref.size : undefined);
  return size !== undefined && Number.isFinite(size) && size > 0 ? size : 0;
}

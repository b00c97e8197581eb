import { z } from "zod";

import type { MethodCall } from "../client/index.ts";
import type { BarKind } from "../config.ts";
import type {
  ActionItem,
  BarLayoutPlan,
  FixedSpacerPolicy,
  MiddleAlignment,
  SectionKind,
} from "../layout/types.ts";
import type { IndexNamespace } from "../routing/index.ts";
import type { SyncOperation } from "../sync/diff.ts";
import type { BarSnapshot, LayoutValue, SerializedSection } from "../sync/snapshot.ts";
import type { BarControllerOptions, BaseBarProps } from "./bar.ts";

import { ACTION_SECTIONS, planBarLayout } from "../layout/index.ts";
import { normalizeActions } from "../layout/normalize.ts";
import { formatValue } from "../logger.ts";
import { createIndexNamespace, routeTap } from "../routing/index.ts";
import { BarController } from "./bar.ts";

export type SectionItems = Partial<Record<SectionKind, readonly ActionItem[]>>;

export interface ActionBarProps extends BaseBarProps {
  readonly leading?: readonly ActionItem[];
  readonly trailing?: readonly ActionItem[];
  /** Use a fully transparent background (no blur). */
  readonly transparent?: boolean;
}

const TapArgsSchema = z.object({ index: z.number().int() });
const ControlTapArgsSchema = z.object({ tag: z.number().int() });

const TAP_METHODS: Readonly<Record<string, SectionKind>> = {
  leadingTapped: "leading",
  middleTapped: "middle",
  trailingTapped: "trailing",
};

/**
 * Shared base for bars built from leading / middle / trailing action lists:
 * normalizes each section, plans pills and alignment, and routes taps back to
 * the tapped item's `onPressed`.
 */
export abstract class ActionBarController<P extends ActionBarProps> extends BarController<P> {
  protected readonly namespace: IndexNamespace<SectionKind>;

  constructor(props: P, kind: BarKind, options: BarControllerOptions = {}) {
    super(props, kind, options);
    this.namespace = createIndexNamespace(ACTION_SECTIONS, this.config.sectionCapacity);
  }

  /** Sections this bar renders, in wire order. */
  protected abstract readonly sectionKinds: readonly SectionKind[];

  protected abstract rawSections(): SectionItems;

  protected abstract title(): string;

  /** Layout-mode fields; a change emits setLayout. */
  protected abstract layoutFields(): Record<string, LayoutValue>;

  protected middleAlignment(): MiddleAlignment {
    return "center";
  }

  protected pillHeight(): number | null {
    return null;
  }

  protected fixedSpacerPolicy(): FixedSpacerPolicy {
    return "split";
  }

  protected defaultTransparent(): boolean {
    return false;
  }

  /** Section item lists, cut to the section capacity. */
  protected sectionItems(): SectionItems {
    const capacity = this.config.sectionCapacity;
    const raw = this.rawSections();
    const out: SectionItems = {};
    for (const kind of this.sectionKinds) {
      const items = raw[kind] ?? [];
      if (items.length > capacity) {
        this.logger.warnOnce(
          `${this.viewType}: ${kind} has ${String(items.length)} items; ` +
            `only the first ${String(capacity)} are rendered`,
        );
        out[kind] = items.slice(0, capacity);
      } else {
        out[kind] = items;
      }
    }
    return out;
  }

  /** Grouping, alignment and pill geometry for the current props. */
  get plan(): BarLayoutPlan {
    return this.planFor(this.serializeSections(this.sectionItems()));
  }

  protected buildSnapshot(): BarSnapshot {
    return {
      title: this.title(),
      tint: this.effectiveTint,
      backgroundColor: null,
      transparent: this.props.transparent ?? this.defaultTransparent(),
      isDark: this.isDark,
      sections: this.serializeSections(this.sectionItems()),
      layout: this.layoutFields(),
      selectedIndex: null,
    };
  }

  protected override extraCreationParams(): Record<string, unknown> {
    return { layout: this.plan };
  }

  protected override decorate(operation: SyncOperation): SyncOperation {
    if (operation.method === "setItems" || operation.method === "setLayout") {
      return { method: operation.method, args: { ...operation.args, layout: this.plan } };
    }
    return operation;
  }

  protected handleMethodCall(call: MethodCall): void {
    if (call.method === "controlTapped") {
      const parsed = ControlTapArgsSchema.safeParse(call.args);
      const decoded = parsed.success ? this.namespace.decode(parsed.data.tag) : null;
      if (!decoded) {
        this.logger.debug(`Ignoring controlTapped ${formatValue(call.args)}`);
        return;
      }
      this.dispatchTap(decoded.section, decoded.index);
      return;
    }

    const section = TAP_METHODS[call.method];
    if (section === undefined) {
      this.logger.debug(`Ignoring unknown method ${call.method}`);
      return;
    }
    const parsed = TapArgsSchema.safeParse(call.args);
    if (!parsed.success) {
      this.logger.debug(`Ignoring ${call.method} ${formatValue(call.args)}`);
      return;
    }
    this.dispatchTap(section, parsed.data.index);
  }

  private dispatchTap(section: SectionKind, index: number): void {
    const routed = routeTap(section, index, this.sectionItems());
    if (!routed || routed.item.kind !== "button") {
      this.logger.debug(`Ignoring stale tap ${section}[${String(index)}]`);
      return;
    }
    routed.item.onPressed?.();
    this.emit({ type: `${section}Tapped` as const, index });
  }

  private serializeSections(items: SectionItems): Record<string, SerializedSection> {
    const sections: Record<string, SerializedSection> = {};
    for (const kind of this.sectionKinds) {
      sections[kind] = normalizeActions(items[kind]);
    }
    return sections;
  }

  private planFor(sections: Readonly<Record<string, SerializedSection>>): BarLayoutPlan {
    return planBarLayout({
      sections: {
        leading: sections["leading"],
        middle: sections["middle"],
        trailing: sections["trailing"],
      },
      title: this.title(),
      middleAlignment: this.middleAlignment(),
      pillHeight: this.pillHeight(),
      metrics: this.config.metrics,
      fixedSpacers: this.fixedSpacerPolicy(),
      namespace: this.namespace,
    });
  }
}

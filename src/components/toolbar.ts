import type { MiddleAlignment, SectionKind } from "../layout/types.ts";
import type { LayoutValue } from "../sync/snapshot.ts";
import type { ActionBarProps, SectionItems } from "./action-bar.ts";
import type { BarControllerOptions } from "./bar.ts";

import { ActionBarController } from "./action-bar.ts";

export interface ToolbarProps extends ActionBarProps {
  readonly middle?: ActionBarProps["leading"];
  /** Defaults to "center". Falls back when the anchoring section is empty. */
  readonly middleAlignment?: MiddleAlignment;
  /** Overrides the pill height computed from padding. */
  readonly pillHeight?: number;
}

/**
 * A bottom toolbar with leading, middle and trailing action sections.
 *
 * @example
 * const toolbar = new Toolbar({
 *   leading: [action({ iconRef: "square.and.pencil", onPressed: compose })],
 *   trailing: [action({ label: "Done", onPressed: close })],
 * })
 */
export class Toolbar extends ActionBarController<ToolbarProps> {
  readonly viewType = "PillbarToolbar";
  protected readonly sectionKinds: readonly SectionKind[] = ["leading", "middle", "trailing"];

  constructor(props: ToolbarProps = {}, options: BarControllerOptions = {}) {
    super(props, "toolbar", options);
  }

  protected rawSections(): SectionItems {
    return {
      leading: this.props.leading,
      middle: this.props.middle,
      trailing: this.props.trailing,
    };
  }

  protected title(): string {
    return "";
  }

  protected override middleAlignment(): MiddleAlignment {
    return this.props.middleAlignment ?? "center";
  }

  protected override pillHeight(): number | null {
    return this.props.pillHeight ?? null;
  }

  protected layoutFields(): Record<string, LayoutValue> {
    return {
      middleAlignment: this.middleAlignment(),
      pillHeight: this.pillHeight(),
    };
  }
}

import type { BarKind } from "../config.ts";
import type { SectionKind } from "../layout/types.ts";
import type { LayoutValue } from "../sync/snapshot.ts";
import type { ActionBarProps, SectionItems } from "./action-bar.ts";
import type { BarControllerOptions } from "./bar.ts";

import { ActionBarController } from "./action-bar.ts";

export interface NavigationBarProps extends ActionBarProps {
  readonly title?: string;
  /** Render the title in the large style. */
  readonly largeTitle?: boolean;
}

/** A top navigation bar: a title between leading and trailing actions. */
export class NavigationBar extends ActionBarController<NavigationBarProps> {
  readonly viewType: string = "PillbarNavigationBar";
  protected readonly sectionKinds: readonly SectionKind[] = ["leading", "trailing"];

  constructor(
    props: NavigationBarProps = {},
    options: BarControllerOptions = {},
    kind: BarKind = "navigationBar",
  ) {
    super(props, kind, options);
  }

  protected rawSections(): SectionItems {
    return { leading: this.props.leading, trailing: this.props.trailing };
  }

  protected title(): string {
    return this.props.title ?? "";
  }

  protected override defaultTransparent(): boolean {
    return true;
  }

  protected layoutFields(): Record<string, LayoutValue> {
    return { largeTitle: this.props.largeTitle ?? false };
  }
}

import type { FixedSpacerPolicy } from "../layout/types.ts";
import type { BarControllerOptions } from "./bar.ts";
import type { NavigationBarProps } from "./navigation-bar.ts";

import { NavigationBar } from "./navigation-bar.ts";

/**
 * Navigation bar hosted above a scroll view. The native side lays fixed
 * spacers out itself, so they end a pill instead of padding its buttons.
 */
export class ScrollableNavigationBar extends NavigationBar {
  override readonly viewType: string = "PillbarScrollableNavigationBar";

  constructor(props: NavigationBarProps = {}, options: BarControllerOptions = {}) {
    super(props, options, "scrollableNavigationBar");
  }

  protected override fixedSpacerPolicy(): FixedSpacerPolicy {
    return "native";
  }
}

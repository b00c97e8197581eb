export { ActionBarController } from "./action-bar.ts";
export type { ActionBarProps, SectionItems } from "./action-bar.ts";
export { BarController } from "./bar.ts";
export type {
  BarControllerOptions,
  BarEvent,
  BarEventListener,
  BarSize,
  BarTheme,
  BaseBarProps,
  Unsubscribe,
} from "./bar.ts";
export { packColor } from "./color.ts";
export type { BarColor, ColorResolver } from "./color.ts";
export { NavigationBar } from "./navigation-bar.ts";
export type { NavigationBarProps } from "./navigation-bar.ts";
export { ScrollableNavigationBar } from "./scrollable-navigation-bar.ts";
export { TAB_SECTION, TabBar, formatBadge } from "./tab-bar.ts";
export type { TabBarProps, TabItem } from "./tab-bar.ts";
export { Toolbar } from "./toolbar.ts";
export type { ToolbarProps } from "./toolbar.ts";

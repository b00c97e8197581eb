export { diffSnapshots } from "./diff.ts";
export type { DiffResult, StyleArgs, SyncMethod, SyncOperation } from "./diff.ts";
export { SyncEngine } from "./engine.ts";
export type { OperationDecorator, SyncState } from "./engine.ts";
export { IntrinsicSizeNegotiator } from "./intrinsic-size.ts";
export type { IntrinsicSize, IntrinsicSizeNegotiatorOptions } from "./intrinsic-size.ts";
export {
  flattenSections,
  sameLayout,
  sameSection,
  sameSections,
  toCreationParams,
} from "./snapshot.ts";
export type { BarSnapshot, LayoutValue, SerializedSection } from "./snapshot.ts";

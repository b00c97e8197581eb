// ─── Public API ──────────────────────────────────────────────────────────────

export { PillbarConfigSchema, defineConfig, resolveConfig } from "./config.ts";
export type { BarKind, PillbarConfig, PillbarUserConfig } from "./config.ts";

export * from "./layout/index.ts";
export * from "./routing/index.ts";
export * from "./sync/index.ts";
export * from "./components/index.ts";

export { createBridge, detectTransport, getDefaultBridge } from "./client/index.ts";
export type {
  Bridge,
  BridgeTransport,
  MethodCall,
  MethodCallHandler,
  MethodChannel,
} from "./client/index.ts";

export { createPillbarLogger, formatValue } from "./logger.ts";
export type { LogLevel, LogOptions, PillbarLogger } from "./logger.ts";

// ─── Bridge Message Protocol ─────────────────────────────────────────────────
// Wire format between JS and the native host. Exported for custom transports;
// bar components only ever see method channels.

/** @internal */
export type BridgeCallMessage = {
  /** null for fire-and-forget messages (setTitle, setItems, …). */
  id: string | null;
  type: "call";
  /** Channel name, e.g. "PillbarToolbar_3". */
  namespace: string;
  method: string;
  args: unknown;
};

/** @internal */
export type BridgeEventMessage = {
  id: null;
  type: "event";
  /** Channel the event belongs to. */
  namespace: string;
  /** Inbound method, e.g. "trailingTapped" or "valueChanged". */
  event: string;
  data: unknown;
};

/** @internal */
export type JsToNativeMessage = BridgeCallMessage;

/** @internal */
export type NativeToJsMessage = BridgeEventMessage;

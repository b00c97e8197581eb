import type { Bridge, MethodCall, MethodChannel } from "../client/index.ts";
import type { BarKind, PillbarConfig, PillbarUserConfig } from "../config.ts";
import type { PillbarLogger } from "../logger.ts";
import type { SyncOperation } from "../sync/diff.ts";
import type { SyncState } from "../sync/engine.ts";
import type { BarSnapshot } from "../sync/snapshot.ts";
import type { BarColor, ColorResolver } from "./color.ts";

import { getDefaultBridge } from "../client/index.ts";
import { resolveConfig } from "../config.ts";
import { createPillbarLogger } from "../logger.ts";
import { SyncEngine } from "../sync/engine.ts";
import { IntrinsicSizeNegotiator } from "../sync/intrinsic-size.ts";
import { toCreationParams } from "../sync/snapshot.ts";
import { packColor } from "./color.ts";

// ─── Public types ────────────────────────────────────────────────────────────

export type BarEvent =
  | { readonly type: "leadingTapped"; readonly index: number }
  | { readonly type: "middleTapped"; readonly index: number }
  | { readonly type: "trailingTapped"; readonly index: number }
  | { readonly type: "valueChanged"; readonly index: number };

export type BarEventListener = (event: BarEvent) => void;

/** A function returned by subscriptions to remove the listener. */
export type Unsubscribe = () => void;

export interface BarTheme {
  readonly isDark?: boolean;
  /** Tint used when a bar sets none. */
  readonly primaryColor?: BarColor;
  readonly resolveColor?: ColorResolver;
}

export interface BarSize {
  readonly height: number;
  readonly width: number | null;
}

export interface BarControllerOptions {
  bridge?: Bridge;
  config?: PillbarUserConfig;
  logger?: PillbarLogger;
  theme?: BarTheme;
  /** Called when the native side reports a new intrinsic size. */
  onLayout?: (size: BarSize) => void;
}

export interface BaseBarProps {
  readonly tint?: BarColor;
  /** Fixed height. Disables intrinsic size negotiation. */
  readonly height?: number;
}

const LOG_TAGS: Record<BarKind, string> = {
  toolbar: "toolbar",
  navigationBar: "navbar",
  scrollableNavigationBar: "navbar",
  tabBar: "tabbar",
};

// ─── BarController ───────────────────────────────────────────────────────────

/**
 * Owns one native bar view: builds its construction payload, keeps it in sync
 * on every rebuild and routes its inbound events.
 *
 * Lifecycle: construct → `creationParams` handed to the host → `attach(viewId)`
 * once the native view exists → `update(props)` / `setBrightness()` on every
 * rebuild → `dispose()` on teardown.
 */
export abstract class BarController<P extends BaseBarProps> {
  abstract readonly viewType: string;
  readonly kind: BarKind;

  protected props: P;
  protected isDark: boolean;
  protected readonly config: PillbarConfig;
  protected readonly logger: PillbarLogger;

  private readonly bridge: Bridge;
  private readonly theme: BarTheme;
  private readonly engine: SyncEngine;
  private readonly negotiator: IntrinsicSizeNegotiator;
  private readonly listeners = new Set<BarEventListener>();
  private channel: MethodChannel | null = null;
  /** Snapshot behind the last `creationParams` read; the baseline on attach. */
  private constructionSnapshot: BarSnapshot | null = null;

  constructor(props: P, kind: BarKind, options: BarControllerOptions = {}) {
    this.props = props;
    this.kind = kind;
    this.theme = options.theme ?? {};
    this.isDark = this.theme.isDark ?? false;
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? createPillbarLogger(LOG_TAGS[kind], this.config.logLevel);
    this.bridge = options.bridge ?? getDefaultBridge();
    this.engine = new SyncEngine(this.logger);
    this.negotiator = new IntrinsicSizeNegotiator({
      logger: this.logger,
      onResolved: () => options.onLayout?.(this.size),
    });
  }

  // ─── Subclass hooks ──────────────────────────────────────────────────────

  /** Candidate snapshot for the current props and brightness. */
  protected abstract buildSnapshot(): BarSnapshot;

  protected abstract handleMethodCall(call: MethodCall): void;

  /** Adds derived payload to outgoing operations. */
  protected decorate(operation: SyncOperation): SyncOperation {
    return operation;
  }

  protected extraCreationParams(): Record<string, unknown> {
    return {};
  }

  /** Whether the native size may have changed after these operations. */
  protected shouldRemeasure(_operations: readonly SyncOperation[]): boolean {
    return false;
  }

  // ─── State ───────────────────────────────────────────────────────────────

  get state(): SyncState {
    return this.engine.state;
  }

  /** Last values sent to native, or null before attach / after dispose. */
  get snapshot(): BarSnapshot | null {
    return this.engine.snapshot;
  }

  get size(): BarSize {
    const measured = this.negotiator.size;
    return {
      height: this.props.height ?? measured.height ?? this.config.defaultHeights[this.kind],
      width: measured.width,
    };
  }

  /** Payload the host passes to the native view factory. */
  get creationParams(): Record<string, unknown> {
    const snapshot = this.buildSnapshot();
    this.constructionSnapshot = snapshot;
    return { ...toCreationParams(snapshot), ...this.extraCreationParams() };
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────────

  /** Binds to the native view once it exists. Later calls are ignored. */
  attach(viewId: number): void {
    if (this.channel || this.engine.state !== "uninitialized") return;
    const channel = this.bridge.channel(`${this.viewType}_${String(viewId)}`);
    channel.setMethodCallHandler((call) => this.handleMethodCall(call));
    this.channel = channel;
    // Props may have changed since construction; the next sync sends the delta.
    this.engine.create(channel, this.constructionSnapshot ?? this.buildSnapshot());
    this.constructionSnapshot = null;
    this.measure();
  }

  update(props: P): readonly SyncOperation[] {
    this.props = props;
    return this.sync();
  }

  setBrightness(isDark: boolean): readonly SyncOperation[] {
    this.isDark = isDark;
    return this.sync();
  }

  on(listener: BarEventListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.channel?.setMethodCallHandler(null);
    this.channel = null;
    this.constructionSnapshot = null;
    this.engine.dispose();
    this.negotiator.cancel();
    this.listeners.clear();
  }

  // ─── Helpers for subclasses ──────────────────────────────────────────────

  protected resolveColor(color: BarColor | undefined): number | null {
    return (this.theme.resolveColor ?? packColor)(color);
  }

  protected get effectiveTint(): number | null {
    return this.resolveColor(this.props.tint ?? this.theme.primaryColor);
  }

  protected acknowledge(patch: Partial<BarSnapshot>): void {
    this.engine.acknowledge(patch);
  }

  protected emit(event: BarEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private sync(): readonly SyncOperation[] {
    const operations = this.engine.sync(this.buildSnapshot(), (operation) =>
      this.decorate(operation),
    );
    if (this.shouldRemeasure(operations)) this.measure();
    return operations;
  }

  private measure(): void {
    if (this.props.height !== undefined || !this.channel) return;
    // request() handles channel failures itself.
    void this.negotiator.request(this.channel);
  }
}

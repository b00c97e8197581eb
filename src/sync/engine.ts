import type { MethodChannel } from "../client/index.ts";
import type { PillbarLogger } from "../logger.ts";
import type { SyncOperation } from "./diff.ts";
import type { BarSnapshot } from "./snapshot.ts";

import { formatValue } from "../logger.ts";
import { diffSnapshots } from "./diff.ts";

/**
 * uninitialized → created (first construction acknowledged)
 * created → synced (first rebuild after construction)
 * any → disposed (teardown)
 */
export type SyncState = "uninitialized" | "created" | "synced" | "disposed";

/** Adds payload that is derived from the snapshot but not diffed itself. */
export type OperationDecorator = (operation: SyncOperation) => SyncOperation;

/**
 * Keeps the last snapshot sent to one native view and sends only what changed.
 *
 * Dispatch is fire-and-forget: the baseline moves to the candidate as soon as
 * the operations are handed to the channel. A dropped message leaves native
 * behind until that field changes again.
 */
export class SyncEngine {
  private _state: SyncState = "uninitialized";
  private _snapshot: BarSnapshot | null = null;
  private channel: MethodChannel | null = null;

  constructor(private readonly logger: PillbarLogger) {}

  get state(): SyncState {
    return this._state;
  }

  get snapshot(): BarSnapshot | null {
    return this._snapshot;
  }

  /** Seeds the baseline from the values sent at construction; nothing is diffed. */
  create(channel: MethodChannel, initial: BarSnapshot): void {
    if (this._state !== "uninitialized") {
      this.logger.debug(`Ignoring create on ${channel.name}: engine is ${this._state}`);
      return;
    }
    this.channel = channel;
    this._snapshot = initial;
    this._state = "created";
  }

  /**
   * Diffs the candidate against the baseline and dispatches the result in
   * order. Without a channel (not yet created, or disposed) this is a no-op
   * and returns no operations; the next rebuild after creation sends the
   * full delta.
   */
  sync(candidate: BarSnapshot, decorate?: OperationDecorator): readonly SyncOperation[] {
    const channel = this.channel;
    const previous = this._snapshot;
    if (!channel || !previous) {
      this.logger.debug(`Skipping sync: channel unavailable (${this._state})`);
      return [];
    }

    const { operations, next } = diffSnapshots(previous, candidate);
    const sent = decorate ? operations.map(decorate) : operations;
    for (const operation of sent) {
      this.logger.debug(`${channel.name} ← ${operation.method} ${formatValue(operation.args)}`);
      channel.invokeMethod(operation.method, operation.args);
    }

    this._snapshot = next;
    this._state = "synced";
    return sent;
  }

  /**
   * Records a change the native side made on its own (e.g. the user picked a
   * tab), so the next diff does not resend it.
   */
  acknowledge(patch: Partial<BarSnapshot>): void {
    if (!this._snapshot) return;
    this._snapshot = { ...this._snapshot, ...patch };
  }

  dispose(): void {
    this.channel = null;
    this._snapshot = null;
    this._state = "disposed";
  }
}

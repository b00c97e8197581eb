import { z } from "zod";

import type { MethodChannel } from "../client/index.ts";
import type { PillbarLogger } from "../logger.ts";

import { formatValue } from "../logger.ts";

export interface IntrinsicSize {
  readonly height: number | null;
  readonly width: number | null;
}

const IntrinsicSizeReplySchema = z
  .object({
    height: z.number().optional(),
    width: z.number().optional(),
  })
  .passthrough();

function usable(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

export interface IntrinsicSizeNegotiatorOptions {
  logger: PillbarLogger;
  /** Called once per reply that changed the cached size. */
  onResolved?: (size: IntrinsicSize) => void;
}

/**
 * Asks the native view for its natural size and caches the answer.
 *
 * The request never blocks a rebuild: callers render at a provisional size and
 * re-lay out from `onResolved`. Replies that arrive after `cancel()` are
 * ignored, as are replies without a positive height or width.
 */
export class IntrinsicSizeNegotiator {
  private current: IntrinsicSize = { height: null, width: null };
  private generation = 0;
  private cancelled = false;

  constructor(private readonly options: IntrinsicSizeNegotiatorOptions) {}

  get size(): IntrinsicSize {
    return this.current;
  }

  async request(channel: MethodChannel): Promise<IntrinsicSize> {
    if (this.cancelled) return this.current;
    const generation = ++this.generation;

    let reply: unknown;
    try {
      reply = await channel.callMethod("getIntrinsicSize");
    } catch (error) {
      if (this.isStale(generation)) return this.current;
      this.options.logger.warn(
        `getIntrinsicSize failed on ${channel.name}: ${formatValue(error)}`,
        error instanceof Error ? { error } : undefined,
      );
      return this.current;
    }

    if (this.isStale(generation)) return this.current;

    const parsed = IntrinsicSizeReplySchema.safeParse(reply);
    if (!parsed.success) {
      this.options.logger.debug(`Ignoring intrinsic size reply ${formatValue(reply)}`);
      return this.current;
    }

    const { height, width } = parsed.data;
    const next: IntrinsicSize = {
      height: usable(height) ? height : this.current.height,
      width: usable(width) ? width : this.current.width,
    };
    if (next.height !== this.current.height || next.width !== this.current.width) {
      this.current = next;
      this.options.onResolved?.(next);
    }
    return this.current;
  }

  cancel(): void {
    this.cancelled = true;
  }

  private isStale(generation: number): boolean {
    // A newer request supersedes this one.
    return this.cancelled || generation !== this.generation;
  }
}

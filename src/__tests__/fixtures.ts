import { vi } from "vitest";

import type { PillbarLogger } from "../logger.ts";

/** Logger that records calls and prints nothing. */
export function silentLogger(): PillbarLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    warnOnce: vi.fn(),
    error: vi.fn(),
    hasErrorLogged: () => false,
  };
}

import { z } from "zod";

import { DEFAULT_SECTION_CAPACITY } from "./routing/index.ts";

// ─── Config Schema ────────────────────────────────────────────────────────────

const positive = z.number().finite().positive();

export const PillbarConfigSchema = z
  .object({
    logLevel: z.enum(["silent", "error", "warn", "info", "debug"]).default("warn"),
    /** Base size of a single control before padding. */
    metrics: z
      .object({
        controlWidth: positive.default(36),
        controlHeight: positive.default(36),
      })
      .strict()
      .default({}),
    /** Heights used until the native side reports an intrinsic size. */
    defaultHeights: z
      .object({
        toolbar: positive.default(44),
        navigationBar: positive.default(44),
        scrollableNavigationBar: positive.default(44),
        tabBar: positive.default(50),
      })
      .strict()
      .default({}),
    /**
     * Callback-index stride between sections. Also the maximum number of items
     * a single section can carry; items past it are dropped with a warning.
     */
    sectionCapacity: z.number().int().min(1).default(DEFAULT_SECTION_CAPACITY),
  })
  .strict();

export type PillbarUserConfig = z.input<typeof PillbarConfigSchema>;
export type PillbarConfig = z.output<typeof PillbarConfigSchema>;

export type BarKind = keyof PillbarConfig["defaultHeights"];

/**
 * Identity helper for type inference.
 *
 * @example
 * import { defineConfig } from "pillbar"
 * export default defineConfig({ logLevel: "debug", metrics: { controlWidth: 40 } })
 */
export function defineConfig<T extends PillbarUserConfig>(config: T): T {
  return config;
}

/** Parses and fills defaults. Throws the ZodError for invalid input. */
export function resolveConfig(config: PillbarUserConfig = {}): PillbarConfig {
  return PillbarConfigSchema.parse(config);
}

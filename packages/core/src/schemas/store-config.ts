import { z } from "zod";

export const DEFAULTS = {
  index: {
    readConcurrency: 32,
  },
  watch: {
    enabled: true,
    debounceMs: 2_000,
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
};

export const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug"]);

/**
 * The store path default depends on where the config lives, so the schema
 * is built per root. Everything else has a fixed default.
 */
export function createStoreConfigSchema(defaultStorePath: string) {
  return z.object({
    store: z
      .object({
        path: z.string().min(1).default(defaultStorePath),
      })
      .default({ path: defaultStorePath }),
    index: z
      .object({
        readConcurrency: z
          .number()
          .int()
          .min(1)
          .max(1024)
          .default(DEFAULTS.index.readConcurrency),
      })
      .default(DEFAULTS.index),
    watch: z
      .object({
        enabled: z.boolean().default(DEFAULTS.watch.enabled),
        debounceMs: z.number().int().min(10).default(DEFAULTS.watch.debounceMs),
      })
      .default(DEFAULTS.watch),
    logging: z
      .object({
        level: LogLevel.default(DEFAULTS.logging.level),
        pretty: z.boolean().default(DEFAULTS.logging.pretty),
      })
      .default(DEFAULTS.logging),
  });
}

export type StoreConfig = z.infer<ReturnType<typeof createStoreConfigSchema>>;
export type IndexConfig = StoreConfig["index"];
export type WatchConfig = StoreConfig["watch"];
export type LoggingConfig = StoreConfig["logging"];

import { z } from "zod";

export const DEFAULTS = {
  storage: {
    dir: "snippets",
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  watcher: {
    enabled: true,
    debounceMs: 100,
  },
  server: {
    host: "127.0.0.1",
    port: 7821,
    maxBodyBytes: 10 * 1024 * 1024,
  },
};

export const SnipkeepConfigSchema = z.object({
  storage: z
    .object({
      dir: z
        .string()
        .min(1)
        .default(DEFAULTS.storage.dir)
        .describe("Snippet directory; relative paths resolve against the root path"),
    })
    .default(DEFAULTS.storage),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  watcher: z
    .object({
      enabled: z.boolean().default(DEFAULTS.watcher.enabled),
      debounceMs: z
        .number()
        .int()
        .min(0)
        .max(60_000)
        .default(DEFAULTS.watcher.debounceMs),
    })
    .default(DEFAULTS.watcher),
  server: z
    .object({
      host: z.string().min(1).default(DEFAULTS.server.host),
      port: z.number().int().min(1).max(65535).default(DEFAULTS.server.port),
      maxBodyBytes: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.server.maxBodyBytes),
    })
    .default(DEFAULTS.server),
});

export type SnipkeepConfig = z.infer<typeof SnipkeepConfigSchema>;
export type LoggingConfig = SnipkeepConfig["logging"];
export type WatcherConfig = SnipkeepConfig["watcher"];
export type HttpServerConfig = SnipkeepConfig["server"];

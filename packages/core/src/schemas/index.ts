export {
  DEFAULTS,
  SnipkeepConfigSchema,
  type SnipkeepConfig,
  type LoggingConfig,
  type WatcherConfig,
  type HttpServerConfig,
} from "./config.js";

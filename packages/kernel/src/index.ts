// @sealwire/kernel: Foundation layer
// Configuration, logging, and timeouts shared by every package

// Configuration
export {
  ConfigManager,
  ConfigSchema,
  LoggingConfigSchema,
  IdentityConfigSchema,
  SseConfigSchema,
  SseServerConfigSchema,
  WebSocketConfigSchema,
  TransportConfigSchema,
  SecurityConfigSchema,
  defineConfig,
  loadConfig,
  loadEnvConfig,
  createConfigManager,
  type Config,
  type ConfigInput,
  type IdentityConfigInput,
  type SseConfigInput,
  type SseServerConfigInput,
  type WebSocketConfigInput,
  type SecurityConfigInput,
  type LoggingConfig,
  type IdentityConfig,
  type SseConfig,
  type SseServerConfig,
  type WebSocketConfig,
  type TransportConfig,
  type SecurityConfig,
} from "./config.js";

// Logging
export {
  initLogger,
  createLogger,
  type Logger,
  type LogContext,
  type CreateLoggerOptions,
  type LogLevel,
} from "./logger.js";

// Timeouts
export {
  createTimeoutController,
  createIdleTimer,
  type IdleTimer,
} from "./timeout.js";

export { createListener } from "./lib/types.js";
export type { Listener, Message, MessageAttribute, MessageHandler } from "./lib/types.js";

export { ListenerClientBuilder } from "./lib/builder.js";
export type { CredentialsOptions } from "./lib/builder.js";
export type { ListenerClient, ListenerStatus } from "./lib/listener-client.js";

export {
  CONFIG_DEFAULTS,
  ConfigFileSchema,
  MAX_CHECK_INTERVAL_MS,
  configFromEnv,
  createConfig,
  loadConfigFile,
  resolveConfig,
  toListenerConfig,
} from "./lib/config.js";
export type {
  ConfigFile,
  ConfigOptions,
  EmptyReceivePolicy,
  ListenerConfig,
  ResolvedSettings,
} from "./lib/config.js";

export { createLogger, createNoopLogger } from "./lib/logger.js";
export type { LogFields, Logger, LoggerOptions, LogLevel } from "./lib/logger.js";

export { ListenerError, isListenerError } from "./lib/errors/types.js";
export type { ErrorCode } from "./lib/errors/types.js";

export type { Clock, QueueService, ReceiveResult, SignalHandler, TimerService } from "./lib/ports/index.js";
export {
  createProcessSignalHandler,
  createSqsQueueService,
  realTimerService,
  systemClock,
  toMessage,
} from "./lib/adapters/index.js";

import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { invalidConfig, invalidEnvironment } from "./errors/catalog.js";
import { toError } from "./errors/types.js";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/**
 * What to do when a receive call answers without any message list.
 * - `error`: treat it as a failed receive (logged, cycle ends)
 * - `empty`: treat it as a batch of zero messages
 */
export type EmptyReceivePolicy = "error" | "empty";

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  checkIntervalMs: 5000,
  autoAck: true,
  emptyReceive: "error",
  logLevel: "info",
  logJson: false,
} as const;

/** Longest accepted check interval: one hour */
export const MAX_CHECK_INTERVAL_MS = 3_600_000;

// ---------------------------------------------------------------------------
// Listener Config
// ---------------------------------------------------------------------------

export interface ListenerConfig {
  /** Delay between the end of one cycle and the start of the next */
  readonly checkIntervalMs: number;
  /**
   * Delete every dispatched message at the end of the cycle.
   * When disabled, call `acknowledge()` on the client yourself or the
   * message is redelivered once its visibility timeout expires.
   */
  readonly autoAck: boolean;
  readonly emptyReceive: EmptyReceivePolicy;
}

export type ConfigOptions = Partial<ListenerConfig>;

function clampInterval(ms: number | undefined): number {
  if (ms === undefined || Number.isNaN(ms)) return CONFIG_DEFAULTS.checkIntervalMs;
  return Math.min(Math.max(0, ms), MAX_CHECK_INTERVAL_MS);
}

/**
 * Build a listener config. Every field has a default, so this never fails.
 * The interval is clamped to `0..MAX_CHECK_INTERVAL_MS`; NaN falls back to
 * the default.
 */
export function createConfig(options: ConfigOptions = {}): ListenerConfig {
  return Object.freeze({
    checkIntervalMs: clampInterval(options.checkIntervalMs),
    autoAck: options.autoAck ?? CONFIG_DEFAULTS.autoAck,
    emptyReceive: options.emptyReceive ?? CONFIG_DEFAULTS.emptyReceive,
  });
}

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const EmptyReceiveSchema = z.enum(["error", "empty"]);

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  queue: z
    .object({
      url: z.string().min(1).optional(),
      region: z.string().min(1).optional(),
    })
    .optional(),
  polling: z
    .object({
      checkIntervalMs: z.number().int().min(0).max(MAX_CHECK_INTERVAL_MS).optional(),
      autoAck: z.boolean().optional(),
      emptyReceive: EmptyReceiveSchema.optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(LOG_LEVEL_NAMES).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Environment variables understood by `configFromEnv` */
const EnvSchema = z.object({
  SQS_LISTENER_QUEUE_URL: z.string().min(1).optional(),
  AWS_REGION: z.string().min(1).optional(),
  SQS_LISTENER_CHECK_INTERVAL_MS: z
    .string()
    .min(1)
    .pipe(z.coerce.number().int().min(0).max(MAX_CHECK_INTERVAL_MS))
    .optional(),
  SQS_LISTENER_AUTO_ACK: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
  SQS_LISTENER_EMPTY_RECEIVE: EmptyReceiveSchema.optional(),
  SQS_LISTENER_LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).optional(),
});

/** Settings with all defaults applied */
export interface ResolvedSettings {
  queueUrl?: string;
  region?: string;
  checkIntervalMs: number;
  autoAck: boolean;
  emptyReceive: EmptyReceivePolicy;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
}

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws a CONFIG_INVALID error if the file exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`Cannot read file: ${toError(err).message}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`Invalid YAML: ${toError(err).message}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(path, formatIssues(result.error));
  }

  return result.data;
}

/**
 * Read listener settings from environment variables.
 * Unset variables stay undefined so they don't override other sources.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ResolvedSettings> {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw invalidEnvironment(formatIssues(result.error));
  }

  const vars = result.data;
  return {
    queueUrl: vars.SQS_LISTENER_QUEUE_URL,
    region: vars.AWS_REGION,
    checkIntervalMs: vars.SQS_LISTENER_CHECK_INTERVAL_MS,
    autoAck: vars.SQS_LISTENER_AUTO_ACK,
    emptyReceive: vars.SQS_LISTENER_EMPTY_RECEIVE,
    logLevel: vars.SQS_LISTENER_LOG_LEVEL,
  };
}

/**
 * Merge configuration sources with proper precedence:
 * Overrides (code or environment) > Config file > Defaults
 */
export function resolveConfig(
  overrides: Partial<ResolvedSettings> = {},
  file: ConfigFile | undefined = undefined
): ResolvedSettings {
  return {
    queueUrl: overrides.queueUrl ?? file?.queue?.url,
    region: overrides.region ?? file?.queue?.region,
    checkIntervalMs:
      overrides.checkIntervalMs ??
      file?.polling?.checkIntervalMs ??
      CONFIG_DEFAULTS.checkIntervalMs,
    autoAck: overrides.autoAck ?? file?.polling?.autoAck ?? CONFIG_DEFAULTS.autoAck,
    emptyReceive:
      overrides.emptyReceive ??
      file?.polling?.emptyReceive ??
      CONFIG_DEFAULTS.emptyReceive,
    logLevel: overrides.logLevel ?? file?.logging?.level ?? CONFIG_DEFAULTS.logLevel,
    logJson: overrides.logJson ?? file?.logging?.json ?? CONFIG_DEFAULTS.logJson,
  };
}

/**
 * Pick the polling fields out of resolved settings.
 */
export function toListenerConfig(settings: ResolvedSettings): ListenerConfig {
  return createConfig({
    checkIntervalMs: settings.checkIntervalMs,
    autoAck: settings.autoAck,
    emptyReceive: settings.emptyReceive,
  });
}

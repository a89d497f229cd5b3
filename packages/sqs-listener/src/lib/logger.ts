export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

/**
 * Structured fields attached to a log line. `queueUrl` and `messageId`
 * identify what the line is about and get a place of their own in the
 * human-readable output; everything else is printed as trailing JSON.
 */
export interface LogFields {
  queueUrl?: string;
  messageId?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  /** Name printed with every line, e.g. "sqs-listener" */
  name?: string;
}

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Logger that adds `fields` to every line, e.g. one bound to a queue */
  child(fields: LogFields): Logger;
}

interface LogRecord {
  timestamp: string;
  level: LogLevel;
  logger?: string;
  queueUrl?: string;
  messageId?: string;
  message: string;
  extra: Record<string, unknown>;
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** "https://sqs.us-east-1.amazonaws.com/000000000000/orders" -> "orders" */
function queueName(queueUrl: string): string {
  return queueUrl.slice(queueUrl.lastIndexOf("/") + 1) || queueUrl;
}

function renderJson(record: LogRecord): string {
  const { extra, ...known } = record;
  return JSON.stringify({ ...known, ...extra });
}

/** `[timestamp] LEVEL name/queue/messageId: message {extra}` */
function renderText(record: LogRecord): string {
  const scope = [
    record.logger,
    record.queueUrl && queueName(record.queueUrl),
    record.messageId,
  ].filter(Boolean);

  let line = `[${record.timestamp}] ${record.level.toUpperCase().padEnd(5)}`;
  if (scope.length > 0) line += ` ${scope.join("/")}:`;
  line += ` ${record.message}`;
  if (Object.keys(record.extra).length > 0) line += ` ${JSON.stringify(record.extra)}`;
  return line;
}

/**
 * Console logger. debug/info go to stdout, warn/error to stderr, one line
 * per entry.
 */
export function createLogger(options: LoggerOptions): Logger {
  const threshold = SEVERITY[options.level];
  const render = options.json ? renderJson : renderText;

  function bind(bound: LogFields): Logger {
    const at =
      (level: LogLevel) =>
      (message: string, fields?: LogFields): void => {
        if (SEVERITY[level] < threshold) return;

        const { queueUrl, messageId, ...extra } = { ...bound, ...fields };
        const line = render({
          timestamp: new Date().toISOString(),
          level,
          logger: options.name,
          queueUrl,
          messageId,
          message,
          extra,
        });

        if (SEVERITY[level] >= SEVERITY.warn) console.error(line);
        else console.log(line);
      };

    return {
      debug: at("debug"),
      info: at("info"),
      warn: at("warn"),
      error: at("error"),
      child: (fields) => bind({ ...bound, ...fields }),
    };
  }

  return bind({});
}

export function createNoopLogger(): Logger {
  const ignore = (): void => undefined;
  const silent: Logger = {
    debug: ignore,
    info: ignore,
    warn: ignore,
    error: ignore,
    child: () => silent,
  };
  return silent;
}

/**
 * Flatten an error into log fields: its message, its `code` when it has
 * one and the message of its cause.
 */
export function errorMeta(error: unknown): LogFields {
  if (!(error instanceof Error)) {
    return { error: String(error) };
  }

  const meta: LogFields = { error: error.message };
  if ("code" in error && typeof error.code === "string") {
    meta.code = error.code;
  }
  if (error.cause instanceof Error) {
    meta.cause = error.cause.message;
  }
  return meta;
}

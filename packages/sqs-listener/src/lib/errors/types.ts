/**
 * Error codes for every failure the listener reports.
 * Each code maps to one failure scenario with predefined messaging.
 */
export type ErrorCode =
  // Receiving
  | "RECEIVE_MESSAGES"
  | "UNKNOWN_RECEIVE_MESSAGES"
  // Acknowledging
  | "ACK_MESSAGE"
  | "NO_MESSAGE_HANDLE"
  // Lifecycle
  | "LISTENER_STOPPED"
  | "LISTENER_ALREADY_STARTED"
  // Construction
  | "BUILDER_VALIDATION"
  | "CONFIG_INVALID";

/**
 * Error raised by the listener, carrying a code and, when another library
 * failed first, the original error as `cause`.
 */
export class ListenerError extends Error {
  readonly code: ErrorCode;
  readonly queueUrl?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      queueUrl?: string;
      details?: string;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "ListenerError";
    this.code = code;
    this.queueUrl = options?.queueUrl;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a ListenerError.
 */
export function isListenerError(error: unknown): error is ListenerError {
  return error instanceof ListenerError;
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

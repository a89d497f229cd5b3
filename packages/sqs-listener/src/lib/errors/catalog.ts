import { ListenerError } from "./types.js";

/**
 * Error catalog - factory functions for creating ListenerErrors.
 * Keeps messages consistent wherever the same failure is raised.
 */

// ============================================================================
// Receive Errors
// ============================================================================

export function receiveMessagesFailed(queueUrl: string, cause: Error): ListenerError {
  return new ListenerError("RECEIVE_MESSAGES", `Unable to receive messages: ${cause.message}`, {
    queueUrl,
    cause,
  });
}

export function unknownReceiveMessages(queueUrl: string): ListenerError {
  return new ListenerError("UNKNOWN_RECEIVE_MESSAGES", "Unable to receive messages", {
    queueUrl,
    details: "The receive response did not contain a message list",
  });
}

// ============================================================================
// Acknowledge Errors
// ============================================================================

export function ackMessageFailed(queueUrl: string, cause: Error): ListenerError {
  return new ListenerError("ACK_MESSAGE", `Unable to acknowledge message: ${cause.message}`, {
    queueUrl,
    cause,
  });
}

export function noMessageHandle(messageId: string): ListenerError {
  return new ListenerError(
    "NO_MESSAGE_HANDLE",
    "Message did not contain a receipt handle to use for acknowledging",
    { details: messageId ? `messageId=${messageId}` : undefined }
  );
}

// ============================================================================
// Lifecycle Errors
// ============================================================================

export function listenerStopped(): ListenerError {
  return new ListenerError("LISTENER_STOPPED", "Listener has stopped");
}

export function listenerAlreadyStarted(): ListenerError {
  return new ListenerError("LISTENER_ALREADY_STARTED", "Listener has already been started", {
    details: "A listener client can only be started once; build a new one instead",
  });
}

// ============================================================================
// Construction Errors
// ============================================================================

export function missingBuilderField(field: string): ListenerError {
  return new ListenerError("BUILDER_VALIDATION", `\`${field}\` must be initialized`);
}

function listIssues(issues: string[]): string {
  return issues.length > 1 ? issues.map((i) => `- ${i}`).join("\n") : issues[0];
}

export function invalidConfig(path: string, issues: string[]): ListenerError {
  return new ListenerError("CONFIG_INVALID", `Config file ${path} has errors`, {
    details: listIssues(issues),
  });
}

export function invalidEnvironment(issues: string[]): ListenerError {
  return new ListenerError("CONFIG_INVALID", "Environment variables have errors", {
    details: listIssues(issues),
  });
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export interface MessageAttribute {
  dataType: string;
  stringValue?: string;
  binaryValue?: Uint8Array;
}

/**
 * A single delivery fetched from the queue.
 * Body and attributes are passed through untouched.
 */
export interface Message {
  /** Service-assigned message id */
  id: string;
  /** Raw message body */
  body: string;
  /**
   * Handle identifying this delivery; required to acknowledge it.
   * Absent for invalid or expired deliveries.
   */
  receiptHandle?: string;
  /** System attributes such as SentTimestamp or ApproximateReceiveCount */
  attributes: Record<string, string>;
  /** Attributes set by the producer */
  messageAttributes: Record<string, MessageAttribute>;
}

// ---------------------------------------------------------------------------
// Listener
// ---------------------------------------------------------------------------

/**
 * Called once per received message. The return value is ignored and the
 * handler is expected to finish quickly: a slow handler delays the whole
 * polling cadence. An async handler is not awaited; if its promise rejects,
 * the rejection is logged.
 */
export type MessageHandler = (message: Message) => void;

export interface Listener {
  /** Url of the queue to listen to */
  readonly queueUrl: string;
  /** Function to call when a new message is received */
  readonly handler: MessageHandler;
}

/**
 * Bind a queue url to the handler that processes its messages.
 */
export function createListener(queueUrl: string, handler: MessageHandler): Listener {
  return Object.freeze({ queueUrl, handler });
}

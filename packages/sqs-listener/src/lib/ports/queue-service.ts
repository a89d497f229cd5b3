import type { Message } from "../types.js";

/**
 * Result of one receive call. `messages` is absent when the service
 * answered without a message list at all.
 */
export interface ReceiveResult {
  messages?: Message[];
}

/**
 * The two queue operations the poller needs.
 * Network latency, retries and credentials belong to the implementation.
 */
export interface QueueService {
  /** Fetch one batch of pending messages, using the service's defaults */
  receive(queueUrl: string): Promise<ReceiveResult>;
  /** Delete a single delivery by its receipt handle */
  deleteMessage(queueUrl: string, receiptHandle: string): Promise<void>;
}

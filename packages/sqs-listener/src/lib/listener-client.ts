import type { Clock } from "./ports/clock.js";
import type { QueueService } from "./ports/queue-service.js";
import type { TimerService } from "./ports/timer.js";
import type { ListenerConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type { Listener, Message } from "./types.js";
import { createPoller } from "./poller.js";
import { listenerAlreadyStarted, listenerStopped } from "./errors/catalog.js";

export type ListenerStatus = "created" | "running" | "stopped";

export interface ListenerClientOptions {
  service: QueueService;
  listener: Listener;
  config: ListenerConfig;
  logger: Logger;
  timers?: TimerService;
  clock?: Clock;
}

/**
 * Handle to a single queue listener.
 */
export interface ListenerClient {
  /**
   * Start polling. The returned promise settles only when the listener
   * stops, so awaiting it runs the listener for the life of the process.
   * Rejects with LISTENER_ALREADY_STARTED on a second call.
   */
  start(): Promise<void>;
  /** Stop polling. Safe to call more than once. */
  stop(): void;
  isRunning(): boolean;
  getStatus(): ListenerStatus;
  /**
   * Delete a message from the queue so it is not redelivered.
   *
   * Only needed when `autoAck` is disabled; otherwise every dispatched
   * message is acknowledged at the end of its cycle. Rejects with
   * NO_MESSAGE_HANDLE, ACK_MESSAGE or LISTENER_STOPPED.
   */
  acknowledge(message: Message): Promise<void>;
}

export function createListenerClient(options: ListenerClientOptions): ListenerClient {
  const poller = createPoller(options);
  let status: ListenerStatus = "created";

  function start(): Promise<void> {
    if (status === "running") {
      return Promise.reject(listenerAlreadyStarted());
    }
    if (status === "stopped") {
      return Promise.reject(listenerStopped());
    }

    status = "running";
    return poller.run();
  }

  function stop(): void {
    status = "stopped";
    poller.stop();
  }

  function acknowledge(message: Message): Promise<void> {
    if (status !== "running") {
      return Promise.reject(listenerStopped());
    }
    return poller.acknowledge(message);
  }

  return {
    start,
    stop,
    isRunning: () => status === "running",
    getStatus: () => status,
    acknowledge,
  };
}

import type { Clock } from "./ports/clock.js";
import type { QueueService, ReceiveResult } from "./ports/queue-service.js";
import type { TimerService } from "./ports/timer.js";
import type { ListenerConfig } from "./config.js";
import type { Listener, Message } from "./types.js";
import { errorMeta, type Logger } from "./logger.js";
import { createMailbox } from "./mailbox.js";
import { createScheduler } from "./scheduler.js";
import { systemClock } from "./adapters/system-clock.js";
import { realTimerService } from "./adapters/real-timers.js";
import { toError } from "./errors/types.js";
import {
  ackMessageFailed,
  listenerStopped,
  noMessageHandle,
  receiveMessagesFailed,
  unknownReceiveMessages,
} from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PollerState =
  | "idle"
  | "fetching"
  | "dispatching"
  | "acknowledging"
  | "stopped";

interface Reply {
  resolve: () => void;
  reject: (error: unknown) => void;
}

/** Letters the worker loop receives */
export type Letter =
  | { kind: "tick" }
  | { kind: "ack"; message: Message; reply: Reply };

type AckLetter = Extract<Letter, { kind: "ack" }>;

export interface PollerOptions {
  service: QueueService;
  listener: Listener;
  config: ListenerConfig;
  logger: Logger;
  timers?: TimerService;
  clock?: Clock;
}

export interface Poller {
  /**
   * Run the worker loop: arm the scheduler and process letters until
   * `stop()` is called. Resolves once stopped and any cycle in flight
   * has finished.
   */
  run(): Promise<void>;
  /**
   * Run one fetch/dispatch/ack cycle now. Never rejects; failures are
   * logged. Joins the cycle already in flight instead of starting another.
   */
  runCycle(): Promise<void>;
  /** Delete one delivery, reporting failures to the caller */
  acknowledge(message: Message): Promise<void>;
  /** Stop polling. Pending acknowledgements are rejected, nothing is drained. */
  stop(): void;
  getState(): PollerState;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create the worker that owns a listener's polling loop.
 *
 * Scheduler wake-ups and acknowledge requests both arrive as letters in a
 * mailbox. Ticks start a cycle; the scheduler is only re-armed when that
 * cycle ends, so at most one cycle is ever in flight. Ack letters are
 * handled as they arrive and may overlap a running cycle.
 */
export function createPoller(options: PollerOptions): Poller {
  const {
    service,
    listener,
    config,
    timers = realTimerService,
    clock = systemClock,
  } = options;
  const { queueUrl } = listener;
  const log = options.logger.child({ queueUrl });

  const mailbox = createMailbox<Letter>();
  const scheduler = createScheduler(() => {
    mailbox.post({ kind: "tick" });
  }, timers);

  let state: PollerState = "idle";
  let inFlight: Promise<void> | null = null;
  let running: Promise<void> | null = null;

  function setState(next: PollerState): void {
    if (state !== "stopped") state = next;
  }

  // -------------------------------------------------------------------------
  // Cycle
  // -------------------------------------------------------------------------

  async function fetchMessages(): Promise<Message[]> {
    setState("fetching");

    let result: ReceiveResult;
    try {
      result = await service.receive(queueUrl);
    } catch (error) {
      throw receiveMessagesFailed(queueUrl, toError(error));
    }

    if (result.messages) {
      log.debug("Received messages", { count: result.messages.length });
      return result.messages;
    }
    if (config.emptyReceive === "empty") {
      return [];
    }
    throw unknownReceiveMessages(queueUrl);
  }

  function dispatch(messages: Message[]): void {
    setState("dispatching");

    for (const message of messages) {
      const fail = (error: unknown): void => {
        log.error("Handler failed", { messageId: message.id, ...errorMeta(error) });
      };
      try {
        // async handlers are not awaited; their rejections are only logged
        const outcome: unknown = listener.handler(message);
        if (outcome instanceof Promise) void outcome.catch(fail);
      } catch (error) {
        fail(error);
      }
    }
  }

  async function acknowledgeAll(messages: Message[]): Promise<void> {
    setState("acknowledging");

    const targets: Array<{ id: string; receiptHandle: string }> = [];
    for (const message of messages) {
      if (!message.receiptHandle) {
        log.warn("Skipping auto-ack for message without receipt handle", {
          messageId: message.id,
        });
        continue;
      }
      targets.push({ id: message.id, receiptHandle: message.receiptHandle });
    }

    const results = await Promise.allSettled(
      targets.map(async (target) => service.deleteMessage(queueUrl, target.receiptHandle))
    );

    results.forEach((result, i) => {
      if (result.status === "rejected") {
        log.warn("Auto-ack failed", { messageId: targets[i].id, ...errorMeta(result.reason) });
      }
    });
  }

  async function cycle(): Promise<void> {
    const startedAt = clock.now();

    try {
      const messages = await fetchMessages();
      dispatch(messages);
      if (config.autoAck) {
        await acknowledgeAll(messages);
      }
      log.debug("Cycle complete", {
        count: messages.length,
        durationMs: clock.now() - startedAt,
      });
    } catch (error) {
      log.error("Error when handling messages", errorMeta(error));
    } finally {
      if (state !== "stopped") {
        state = "idle";
        // only the run loop drains ticks
        if (running) scheduler.arm(config.checkIntervalMs);
      }
    }
  }

  function runCycle(): Promise<void> {
    if (inFlight) return inFlight;
    if (state === "stopped") return Promise.resolve();

    inFlight = cycle().finally(() => {
      inFlight = null;
    });
    return inFlight;
  }

  // -------------------------------------------------------------------------
  // Manual acknowledgement
  // -------------------------------------------------------------------------

  async function deleteDelivery(message: Message): Promise<void> {
    if (!message.receiptHandle) {
      throw noMessageHandle(message.id);
    }

    try {
      await service.deleteMessage(queueUrl, message.receiptHandle);
    } catch (error) {
      throw ackMessageFailed(queueUrl, toError(error));
    }
    log.debug("Message acknowledged", { messageId: message.id });
  }

  async function handleAck(letter: AckLetter): Promise<void> {
    try {
      await deleteDelivery(letter.message);
      letter.reply.resolve();
    } catch (error) {
      letter.reply.reject(error);
    }
  }

  function acknowledge(message: Message): Promise<void> {
    return new Promise((resolve, reject) => {
      const posted = mailbox.post({ kind: "ack", message, reply: { resolve, reject } });
      if (!posted) reject(listenerStopped());
    });
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async function work(): Promise<void> {
    if (mailbox.isClosed()) return;

    log.info("Listener started", {
      checkIntervalMs: config.checkIntervalMs,
      autoAck: config.autoAck,
    });
    scheduler.arm(config.checkIntervalMs);

    for await (const letter of mailbox) {
      if (letter.kind === "tick") {
        void runCycle();
      } else {
        void handleAck(letter);
      }
    }

    await inFlight;
    log.info("Listener stopped");
  }

  function run(): Promise<void> {
    if (!running) running = work();
    return running;
  }

  function stop(): void {
    if (state === "stopped") return;
    state = "stopped";
    scheduler.cancel();

    for (const letter of mailbox.close()) {
      if (letter.kind === "ack") letter.reply.reject(listenerStopped());
    }
  }

  return {
    run,
    runCycle,
    acknowledge,
    stop,
    getState: () => state,
  };
}

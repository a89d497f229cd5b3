import type { TimerService } from "./ports/timer.js";
import { realTimerService } from "./adapters/real-timers.js";

/** Largest delay `setTimeout` honours; longer ones fire after 1 ms */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface Scheduler {
  /**
   * Schedule exactly one wake-up after `delayMs`.
   * Re-arming while a wake-up is pending replaces it. The delay is
   * clamped to `0..MAX_TIMER_DELAY_MS`.
   */
  arm(delayMs: number): void;
  /** Drop the pending wake-up, if any */
  cancel(): void;
  /** Check if a wake-up is pending */
  isArmed(): boolean;
}

/**
 * One-shot scheduler. It never repeats on its own: the owner re-arms it
 * after each wake-up, so the cadence is the delay plus however long the
 * owner's work took.
 */
export function createScheduler(
  onFire: () => void,
  timers: TimerService = realTimerService
): Scheduler {
  let pending: NodeJS.Timeout | null = null;

  function cancel(): void {
    if (pending) {
      timers.clearTimeout(pending);
      pending = null;
    }
  }

  function arm(delayMs: number): void {
    cancel();
    pending = timers.setTimeout(() => {
      pending = null;
      onFire();
    }, Math.min(Math.max(0, delayMs), MAX_TIMER_DELAY_MS));
  }

  return {
    arm,
    cancel,
    isArmed: () => pending !== null,
  };
}

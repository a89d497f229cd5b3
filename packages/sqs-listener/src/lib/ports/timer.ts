/**
 * Abstraction for one-shot timers.
 * The scheduler arms these; tests swap in fake timers.
 */
export interface TimerService {
  setTimeout(fn: () => void, ms: number): NodeJS.Timeout;
  clearTimeout(id: NodeJS.Timeout): void;
}

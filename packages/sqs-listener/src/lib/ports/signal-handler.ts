/**
 * Abstraction for process signal handling.
 * Lets a long-running listener be stopped on SIGTERM/SIGINT.
 */
export interface SignalHandler {
  /** Register a callback for shutdown signals (SIGTERM, SIGINT) */
  onShutdown(callback: () => Promise<void>): void;
  /** Remove all registered handlers */
  removeAll(): void;
}

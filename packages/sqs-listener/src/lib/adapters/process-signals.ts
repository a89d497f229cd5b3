import type { SignalHandler } from "../ports/signal-handler.js";

const SHUTDOWN_SIGNALS = ["SIGTERM", "SIGINT"] as const;

/** The parts of `process` the handler touches */
export interface SignalTarget {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
  exit(code?: number): void;
}

export interface ProcessSignalOptions {
  /** Exit the process once every shutdown callback has settled (default: true) */
  exitOnShutdown?: boolean;
  /** Process to attach to; tests pass a stand-in */
  target?: SignalTarget;
}

/**
 * Create a signal handler for process shutdown signals.
 * A second signal while callbacks are still running is ignored.
 */
export function createProcessSignalHandler(
  options: ProcessSignalOptions = {}
): SignalHandler {
  const { exitOnShutdown = true } = options;
  const target: SignalTarget = options.target ?? process;
  const handlers: Array<() => Promise<void>> = [];
  let isHandling = false;

  const handleSignal = async () => {
    if (isHandling) return;
    isHandling = true;
    await Promise.allSettled(handlers.map((h) => h()));
    if (exitOnShutdown) {
      target.exit(0);
    }
  };

  const listener = () => {
    void handleSignal();
  };

  return {
    onShutdown(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        for (const signal of SHUTDOWN_SIGNALS) target.on(signal, listener);
      }
    },
    removeAll() {
      handlers.length = 0;
      for (const signal of SHUTDOWN_SIGNALS) target.off(signal, listener);
    },
  };
}

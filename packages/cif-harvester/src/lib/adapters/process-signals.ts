import type { SignalHandler } from "../ports/signal-handler.js";

/** Exit code for a run cut short by SIGINT/SIGTERM */
export const INTERRUPTED_EXIT_CODE = 130;

/**
 * Create a signal handler for process interruption.
 * The first signal runs the registered callbacks and lets the process
 * wind down on its own; the second one exits straight away.
 */
export function createProcessSignalHandler(
  exit: (code: number) => void = (code) => process.exit(code)
): SignalHandler {
  const handlers: Array<() => void> = [];
  let signalled = false;

  const handleSignal = () => {
    if (signalled) {
      exit(INTERRUPTED_EXIT_CODE);
      return;
    }
    signalled = true;
    for (const handler of handlers) {
      handler();
    }
  };

  return {
    onInterrupt(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        process.on("SIGTERM", handleSignal);
        process.on("SIGINT", handleSignal);
      }
    },
    removeAll() {
      handlers.length = 0;
      process.off("SIGTERM", handleSignal);
      process.off("SIGINT", handleSignal);
    },
  };
}

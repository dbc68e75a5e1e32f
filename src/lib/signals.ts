export interface StopSignal {
  signal: AbortSignal;
  /** Removes the listeners; a later signal gets Node's default handling. */
  cleanup: () => void;
}

const STOP_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/** The first SIGINT or SIGTERM aborts the returned signal. */
export function createStopSignalHandler(onSignal?: (signal: NodeJS.Signals) => void): StopSignal {
  const controller = new AbortController();
  const listeners = new Map<NodeJS.Signals, () => void>();

  const cleanup = (): void => {
    for (const [name, listener] of listeners) process.off(name, listener);
    listeners.clear();
  };

  for (const name of STOP_SIGNALS) {
    const listener = (): void => {
      cleanup();
      controller.abort(name);
      onSignal?.(name);
    };
    listeners.set(name, listener);
    process.on(name, listener);
  }

  return { signal: controller.signal, cleanup };
}

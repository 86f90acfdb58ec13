export const STOP_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export type SignalSource = {
  once: (event: NodeJS.Signals, listener: () => void) => unknown;
  off: (event: NodeJS.Signals, listener: () => void) => unknown;
};

export type FlowStopHandler = {
  signal: AbortSignal;
  /** Detaches the listeners; safe to call more than once. */
  dispose: () => void;
  stoppedBy: () => NodeJS.Signals | null;
};

/**
 * Turns the first stop signal into an abort. The flow checks it between steps, so the
 * step running when the signal arrives is allowed to finish.
 */
export function createFlowStopHandler(
  opts: {
    onSignal?: (signal: NodeJS.Signals) => void;
    source?: SignalSource;
    signals?: readonly NodeJS.Signals[];
  } = {},
): FlowStopHandler {
  const source: SignalSource = opts.source ?? process;
  const signals = opts.signals ?? STOP_SIGNALS;
  const controller = new AbortController();
  const listeners = new Map<NodeJS.Signals, () => void>();
  let received: NodeJS.Signals | null = null;

  const dispose = (): void => {
    for (const [name, listener] of listeners) {
      source.off(name, listener);
    }
    listeners.clear();
  };

  for (const name of signals) {
    const listener = (): void => {
      received = name;
      dispose();
      try {
        opts.onSignal?.(name);
      } finally {
        controller.abort(name);
      }
    };
    listeners.set(name, listener);
    source.once(name, listener);
  }

  return {
    signal: controller.signal,
    dispose,
    stoppedBy: () => received,
  };
}

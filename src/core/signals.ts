export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

type SignalListener = (signal: NodeJS.Signals) => void;

/** The slice of `process` used to listen for signals. */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: SignalListener): unknown;
  off(signal: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface ShutdownSignal {
  /** Resolves with the first SIGINT or SIGTERM received. */
  received: Promise<NodeJS.Signals>;
  /** Remove the handlers; a later signal gets the default behavior again. */
  dispose(): void;
}

/** Install SIGINT/SIGTERM handlers now. The first signal resolves `received`. */
export function listenForShutdownSignal(source: SignalSource = process): ShutdownSignal {
  let onSignal: SignalListener = () => undefined;
  const received = new Promise<NodeJS.Signals>((resolve) => {
    onSignal = (signal) => {
      dispose();
      resolve(signal);
    };
  });

  for (const signal of SHUTDOWN_SIGNALS) source.on(signal, onSignal);

  function dispose(): void {
    for (const signal of SHUTDOWN_SIGNALS) source.off(signal, onSignal);
  }

  return { received, dispose };
}

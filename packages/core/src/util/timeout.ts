export interface TimeoutOptions {
  timeoutMs: number;
  /** Aborting this also aborts the operation. */
  signal?: AbortSignal;
  onTimeout: () => Error;
}

/**
 * Runs an abortable operation with a deadline. On expiry the operation's
 * signal is aborted and the returned promise rejects with `onTimeout()`.
 * A non-positive timeout disables the deadline.
 */
export const withTimeout = <T>(
  run: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, signal, onTimeout }: TimeoutOptions
): Promise<T> => {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener('abort', forwardAbort, { once: true });
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            if (settled) return;
            settled = true;
            controller.abort();
            reject(onTimeout());
          }, timeoutMs)
        : null;

    const finish = () => {
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    };

    run(controller.signal).then(
      (value) => {
        if (settled) return;
        finish();
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        finish();
        reject(error);
      }
    );
  });
};

export const delay = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });

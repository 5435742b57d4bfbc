import { AnalysisAbortedError } from '../errors';

export const sleep = (ms: number, signal?: AbortSignal | null): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AnalysisAbortedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AnalysisAbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Signal that fires when the caller aborts or `timeoutMs` elapses.
 * `dispose` must be called once the guarded work settles.
 */
export const withTimeoutSignal = (
  timeoutMs: number,
  parent?: AbortSignal | null,
): { signal: AbortSignal; timedOut: () => boolean; dispose: () => void } => {
  const controller = new AbortController();
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);
  const onParentAbort = () => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }
  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
};

/** Settles with `promise`, or rejects as soon as `signal` aborts. */
export const raceAbort = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> => {
  if (signal.aborted) {
    return Promise.reject(new AnalysisAbortedError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AnalysisAbortedError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
};

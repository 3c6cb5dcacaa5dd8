/** Generic timeout wrapper. Rejects with TimeoutError if the promise doesn't settle within ms. */

/** Custom error class for timeout detection via instanceof. */
export class TimeoutError extends Error {
  constructor(message = 'Timed out') {
    super(message);
    this.name = 'TimeoutError';
  }
}

export interface WithTimeoutOptions {
  /** Aborted on timeout so the request behind the promise is torn down too. */
  abortController?: AbortController;
  message?: string;
}

export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  options?: WithTimeoutOptions,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      options?.abortController?.abort();
      reject(new TimeoutError(options?.message));
    }, ms);
    promise.then(
      (val) => { clearTimeout(timer); resolve(val); },
      (err: unknown) => { clearTimeout(timer); reject(err); },
    );
  });
}

/** True for the rejection an aborted fetch or AbortSignal-aware wait produces. */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'CanceledError');
}

/**
 * Waits for a promise unless the signal fires first, in which case the
 * returned promise rejects with the signal's reason (an AbortError by default).
 */
export function waitWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortReason(signal));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (val) => { signal.removeEventListener('abort', onAbort); resolve(val); },
      (err: unknown) => { signal.removeEventListener('abort', onAbort); reject(err); },
    );
  });
}

function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const err = new Error('The operation was aborted');
  err.name = 'AbortError';
  return err;
}

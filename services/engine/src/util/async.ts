/** Raised when a caller-supplied signal fires before an awaited operation settles. */
export class AbortedError extends Error {
  constructor(message = 'operation aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new AbortedError());
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race a promise against an AbortSignal. The underlying work keeps running
 * when the signal fires; its eventual result is dropped.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new AbortedError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AbortedError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

export interface ScopedSignal {
  signal: AbortSignal;
  /** True once the timeout (not the parent) fired. */
  timedOut(): boolean;
  dispose(): void;
}

/** A signal that aborts after `timeoutMs` or when `parent` aborts, whichever comes first. */
export function scopedSignal(timeoutMs: number, parent?: AbortSignal): ScopedSignal {
  const controller = new AbortController();
  let didTimeOut = false;

  const onParentAbort = () => controller.abort();
  if (parent?.aborted) controller.abort();
  else parent?.addEventListener('abort', onParentAbort, { once: true });

  const timer = setTimeout(() => {
    didTimeOut = true;
    controller.abort();
  }, Math.max(0, timeoutMs));

  return {
    signal: controller.signal,
    timedOut: () => didTimeOut,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

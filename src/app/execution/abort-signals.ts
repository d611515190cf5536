/**
 * Abort helpers shared by the provider call, the confirmation prompt and the executor.
 */

export class AbortError extends Error {
  constructor(message: string = 'Operation was aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

/**
 * Check if an error is an abort error (ours, fetch's DOMException, or a timeout signal's)
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new AbortError(describeAbortReason(signal));
  }
}

export function describeAbortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (typeof reason === 'string' && reason) {
    return reason;
  }
  if (reason instanceof Error && reason.message) {
    return reason.message;
  }
  return 'Operation was aborted';
}

/**
 * Race a promise against an abort signal.
 * The underlying work is not cancelled; callers that own resources must listen to the signal themselves.
 */
export function withAbortSignal<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new AbortError(describeAbortReason(signal)));
      return;
    }

    const abortHandler = () => {
      reject(new AbortError(describeAbortReason(signal)));
    };
    signal.addEventListener('abort', abortHandler, { once: true });

    promise
      .then((value) => {
        signal.removeEventListener('abort', abortHandler);
        resolve(value);
      })
      .catch((error: unknown) => {
        signal.removeEventListener('abort', abortHandler);
        reject(error);
      });
  });
}

export interface LinkedAbortSignal {
  signal: AbortSignal;
  /** True once the timeout fired (as opposed to a parent abort) */
  timedOut(): boolean;
  dispose(): void;
}

/**
 * Derive a signal that aborts when the parent aborts or the timeout elapses.
 * Always call dispose() to clear the timer and parent listener.
 */
export function linkAbortSignal(parent: AbortSignal | undefined, timeoutMs?: number): LinkedAbortSignal {
  const controller = new AbortController();
  let didTimeOut = false;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const onParentAbort = () => {
    controller.abort(parent?.reason);
  };

  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  if (timeoutMs && timeoutMs > 0 && !controller.signal.aborted) {
    timeoutId = setTimeout(() => {
      didTimeOut = true;
      controller.abort(`Timed out after ${timeoutMs}ms`);
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    timedOut: () => didTimeOut,
    dispose: () => {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

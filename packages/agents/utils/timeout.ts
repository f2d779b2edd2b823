// Run an abortable task against a deadline

export interface TimeoutOptions {
  timeoutMs: number;
  /** Aborts the task together with the deadline. */
  signal?: AbortSignal;
  onTimeout: () => Error;
  /** Rejection used when `signal` aborts. Default: the abort reason. */
  onAbort?: (reason: unknown) => Error;
}

function abortError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(`Aborted: ${String(reason)}`);
}

/**
 * Resolves with the task's value or rejects with `onTimeout()` once the deadline
 * passes. The task's signal is aborted on timeout so it can stop early. An abort
 * of the parent signal rejects at once, whether or not the task stops.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions,
): Promise<T> {
  const controller = new AbortController();
  const parent = options.signal;

  let rejectAborted: (error: Error) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAborted = reject;
  });
  const onParentAbort = (): void => {
    const reason: unknown = parent?.reason;
    controller.abort(reason);
    rejectAborted((options.onAbort ?? abortError)(reason));
  };
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = options.onTimeout();
      controller.abort(error);
      reject(error);
    }, options.timeoutMs);
  });

  const work = Promise.resolve().then(() => task(controller.signal));

  return Promise.race([aborted, work, deadline]).finally(() => {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  });
}

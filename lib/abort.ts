export class OperationTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "OperationTimeoutError";
  }
}

export class OperationCancelledError extends Error {
  readonly code = "ABORT_ERR";

  constructor(label: string) {
    super(`${label} was cancelled`);
    this.name = "OperationCancelledError";
  }
}

export function isCancellation(error: unknown): boolean {
  return error instanceof OperationCancelledError;
}

export function throwIfCancelled(signal: AbortSignal | undefined, label: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(label);
  }
}

/**
 * Runs `operation` with a signal that aborts when either `timeoutMs` elapses or
 * `parent` aborts. The returned promise settles at that moment even if the
 * operation ignores its signal.
 */
export async function runWithTimeout<T>(input: {
  label: string;
  timeoutMs: number;
  signal?: AbortSignal;
  operation: (signal: AbortSignal) => Promise<T>;
}): Promise<T> {
  throwIfCancelled(input.signal, input.label);

  const controller = new AbortController();
  let timedOut = false;

  const abortError = (): Error =>
    timedOut ? new OperationTimeoutError(input.label, input.timeoutMs) : new OperationCancelledError(input.label);

  let rejectAborted: (error: Error) => void = () => undefined;
  const aborted = new Promise<never>((_resolve, reject) => {
    rejectAborted = reject;
  });

  const onAbort = (): void => rejectAborted(abortError());
  const onParentAbort = (): void => controller.abort();

  controller.signal.addEventListener("abort", onAbort, { once: true });
  input.signal?.addEventListener("abort", onParentAbort, { once: true });

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, input.timeoutMs);

  try {
    return await Promise.race([input.operation(controller.signal), aborted]);
  } catch (error) {
    if (controller.signal.aborted) {
      throw abortError();
    }

    throw error;
  } finally {
    clearTimeout(timer);
    controller.signal.removeEventListener("abort", onAbort);
    input.signal?.removeEventListener("abort", onParentAbort);
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError("sleep"));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new OperationCancelledError("sleep"));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

import { OperationTimeoutError } from '@bugtrail/agent-contracts';

/**
 * Run `task` with a signal that aborts after `timeoutMs` or when `parent`
 * aborts. Rejects with OperationTimeoutError on timeout even if the task
 * ignores its signal.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const onParentAbort = (): void => controller.abort(parent?.reason);

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new OperationTimeoutError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });
  const cancelled = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(abortReason(controller.signal, operation)), { once: true });
  });

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  try {
    return await Promise.race([task(controller.signal), expired, cancelled]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function abortReason(signal: AbortSignal, operation: string): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error(`${operation} aborted`);
}

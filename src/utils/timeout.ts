import { TransportUnavailableError } from '../errors/sync-error.js';

/**
 * Run `task` with an abort signal that fires after `timeoutMs`. The returned
 * promise rejects with TransportUnavailableError on timeout even if the task
 * ignores the signal.
 *
 * Aborting `parent` cancels the deadline, aborts the task's signal and
 * rejects at once.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    if (parent?.aborted) {
      reject(new TransportUnavailableError(`${operation} aborted`, { operation }));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      controller.abort();
      reject(new TransportUnavailableError(`${operation} aborted`, { operation }));
    };
    const settle = (): void => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    };

    const timer = setTimeout(() => {
      parent?.removeEventListener('abort', onAbort);
      controller.abort();
      reject(
        new TransportUnavailableError(`${operation} timed out after ${timeoutMs}ms`, {
          operation,
          timeoutMs,
        })
      );
    }, timeoutMs);
    parent?.addEventListener('abort', onAbort, { once: true });

    task(controller.signal).then(
      (value) => {
        settle();
        resolve(value);
      },
      (err: unknown) => {
        settle();
        reject(err);
      }
    );
  });
}

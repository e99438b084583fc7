import { AuthError } from '../errors/auth-error.js';

/**
 * Fail fast if the caller's deadline has already passed
 */
export function ensureActive(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw AuthError.deadlineExceeded(operation);
  }
}

/**
 * Marks the start of an operation's state-changing writes
 *
 * Throws deadline_exceeded if the deadline has already passed. Once it
 * returns, the deadline no longer applies and the operation runs to
 * completion.
 */
export type Commit = () => void;

/**
 * Run `task`, rejecting with deadline_exceeded as soon as `signal` aborts
 * before the task has called `commit`
 *
 * The task receives the same signal so drivers that accept one can cancel
 * their own reads. Writes issued after `commit` must not be given the
 * signal.
 */
export function withDeadline<T>(
  signal: AbortSignal | undefined,
  operation: string,
  task: (signal: AbortSignal | undefined, commit: Commit) => Promise<T>
): Promise<T> {
  if (!signal) {
    return task(undefined, () => {});
  }

  if (signal.aborted) {
    return Promise.reject(AuthError.deadlineExceeded(operation));
  }

  return new Promise<T>((resolve, reject) => {
    let committed = false;

    const onAbort = (): void => {
      if (!committed) {
        reject(AuthError.deadlineExceeded(operation));
      }
    };
    signal.addEventListener('abort', onAbort, { once: true });

    const commit: Commit = () => {
      ensureActive(signal, operation);
      committed = true;
    };

    task(signal, commit).then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(AuthError.wrap(operation, error));
      }
    );
  });
}

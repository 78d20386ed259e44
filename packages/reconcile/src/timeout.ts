import { ReconcileError } from './errors/index.js';

/**
 * Race a promise against a timer. The underlying work is not cancelled;
 * the caller only stops waiting for it.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  makeTimeoutError: () => Error
): Promise<T> {
  if (!timeoutMs) return promise;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;

  let timeout: NodeJS.Timeout | null = null;
  const timeoutPromise = new Promise<T>((_resolve, reject) => {
    timeout = setTimeout(() => reject(makeTimeoutError()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeout) clearTimeout(timeout);
  }
}

/**
 * Reject a timeout that is set but not a positive number of milliseconds
 */
export function assertTimeout(name: string, timeoutMs: number | undefined): void {
  if (timeoutMs === undefined) return;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ReconcileError({
      code: 'INVALID_OPTIONS',
      message: `${name} must be a positive number of milliseconds, got ${timeoutMs}`,
    });
  }
}

import { TimeoutError } from '../errors.js';

/**
 * Races `promise` against a timer. The timer is always cleared, so a settled
 * call leaves no handle keeping the process alive.
 *
 * @throws {TimeoutError} when `timeoutMs` elapses first
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}

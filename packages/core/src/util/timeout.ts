import { TimeoutError } from '../errors.js';

/**
 * Run `task` with a deadline. The task receives an AbortSignal that fires
 * when the deadline passes; the returned promise rejects with TimeoutError
 * at that moment even if the task ignores the signal. The timer is always
 * cleared.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(label, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Timing helpers shared by the bus, the task pool and the tool executor.
 */

export type TimedOutcome<T> =
  | { readonly timedOut: false; readonly value: T }
  | { readonly timedOut: true };

/**
 * Race a promise against a deadline.
 * The deadline timer is always cleared, and a rejection of `promise` propagates.
 */
export async function raceWithTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
): Promise<TimedOutcome<T>> {
  let timeoutId: NodeJS.Timeout | undefined;
  const deadline = new Promise<TimedOutcome<T>>((resolve) => {
    timeoutId = setTimeout(() => resolve({ timedOut: true }), timeoutMs);
  });

  try {
    return await Promise.race([
      promise.then((value): TimedOutcome<T> => ({ timedOut: false, value })),
      deadline,
    ]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Resolve once `signal` aborts. Resolves immediately if it already has. */
export function whenAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/** Sleep for `ms`, waking early (without error) if `signal` aborts. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

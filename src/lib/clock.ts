/**
 * Time source for the polling loops. Tests substitute a clock whose
 * `sleep` advances `now` instantly.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export type Bounded<T> =
  | { state: 'fulfilled'; value: T }
  | { state: 'rejected'; reason: unknown }
  | { state: 'expired' };

/**
 * Wait at most `ms` of wall-clock time for `promise`. On expiry the promise keeps
 * running and its outcome is dropped.
 */
export async function settleWithin<T>(promise: Promise<T>, ms: number): Promise<Bounded<T>> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<Bounded<T>>((resolve) => {
    timer = setTimeout(() => resolve({ state: 'expired' }), ms);
  });
  const settled = promise.then(
    (value): Bounded<T> => ({ state: 'fulfilled', value }),
    (reason: unknown): Bounded<T> => ({ state: 'rejected', reason }),
  );

  try {
    return await Promise.race([settled, expired]);
  } finally {
    clearTimeout(timer);
  }
}

import { PollTimeout } from "../models/errors.js";

export interface PollPolicy {
  /** Fixed wait between attempts, in milliseconds */
  intervalMs: number;
  maxAttempts: number;
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface PollSuccess<T> {
  observation: T;
  attempts: number;
}

/**
 * Poll `observe` until `predicate` holds.
 *
 * Returns on the first satisfying observation. After `maxAttempts` misses it
 * throws a PollTimeout carrying the last observation. Errors thrown by
 * `observe` are not retried.
 */
export async function awaitCondition<T>(
  observe: () => Promise<T>,
  predicate: (observation: T) => boolean,
  policy: PollPolicy,
  clock: Clock = systemClock,
): Promise<PollSuccess<T>> {
  let last: T | undefined;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    last = await observe();
    if (predicate(last)) {
      return { observation: last, attempts: attempt };
    }
    if (attempt < policy.maxAttempts) {
      await clock.sleep(policy.intervalMs);
    }
  }

  throw new PollTimeout(policy.maxAttempts, last);
}

/** Upper bound on the time a policy may spend waiting */
export function pollBudgetMs(policy: PollPolicy): number {
  return policy.intervalMs * policy.maxAttempts;
}

import type { PipelineError } from "../errors";

/**
 * Suspends for the given number of milliseconds. Injected everywhere a policy
 * delay is needed so tests can run without real sleeps.
 */
export type Sleep = (ms: number) => Promise<void>;

/**
 * Sleeps for the specified number of milliseconds.
 *
 * @param ms - Milliseconds to sleep
 * @returns A promise that resolves after the delay
 */
export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * What a single attempt decided.
 * `retry` carries the delay to wait before the next attempt.
 */
export type AttemptResult<T> =
  | { type: "done"; value: T }
  | { type: "retry"; error: PipelineError; delayMs: number }
  | { type: "stop"; error: PipelineError };

export type RetryResult<T> =
  | { type: "done"; value: T; attempts: number }
  | { type: "failed"; error: PipelineError; attempts: number }
  /** `canProceed` turned false before an attempt could be issued. */
  | { type: "halted"; attempts: number; lastError?: PipelineError };

export interface RetryOptions {
  maxAttempts: number;
  sleep: Sleep;
  /**
   * Checked before every attempt, including the first.
   * Returning false ends the loop without issuing another attempt.
   */
  canProceed?: () => boolean;
}

/**
 * Runs `attempt` in a bounded loop. Attempt numbers are 1-based.
 * No delay is taken after the final attempt.
 *
 * @example
 * ```typescript
 * const result = await executeWithRetry(
 *   async (n) => (n < 2 ? { type: "retry", error, delayMs: 10 } : { type: "done", value: n }),
 *   { maxAttempts: 3, sleep }
 * );
 * ```
 */
export async function executeWithRetry<T>(
  attempt: (attemptNumber: number) => Promise<AttemptResult<T>>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const { maxAttempts, canProceed } = options;
  let lastError: PipelineError | undefined;

  for (let attemptNumber = 1; attemptNumber <= maxAttempts; attemptNumber++) {
    if (canProceed && !canProceed()) {
      return { type: "halted", attempts: attemptNumber - 1, lastError };
    }

    const result = await attempt(attemptNumber);
    if (result.type === "done") {
      return { type: "done", value: result.value, attempts: attemptNumber };
    }
    if (result.type === "stop") {
      return { type: "failed", error: result.error, attempts: attemptNumber };
    }

    lastError = result.error;
    if (attemptNumber < maxAttempts && result.delayMs > 0) {
      await options.sleep(result.delayMs);
    }
  }

  if (lastError === undefined) {
    throw new RangeError(`maxAttempts must be at least 1, got ${maxAttempts}`);
  }
  return { type: "failed", error: lastError, attempts: maxAttempts };
}

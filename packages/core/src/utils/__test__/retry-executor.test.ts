import { describe, test } from "node:test";
import * as assert from "node:assert";
import { executeWithRetry, type AttemptResult } from "../retry-executor";
import { RateLimitedError, UnauthorizedError } from "../../errors";

function recorder() {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

describe("executeWithRetry", () => {
  test("should return the value of the first successful attempt", async () => {
    const { sleep, delays } = recorder();

    const result = await executeWithRetry(
      async (attempt): Promise<AttemptResult<string>> =>
        attempt < 2
          ? { type: "retry", error: new RateLimitedError(429), delayMs: 100 * attempt }
          : { type: "done", value: `attempt ${attempt}` },
      { maxAttempts: 3, sleep }
    );

    assert.deepStrictEqual(result, { type: "done", value: "attempt 2", attempts: 2 });
    assert.deepStrictEqual(delays, [100]);
  });

  test("should not sleep after the final attempt", async () => {
    const { sleep, delays } = recorder();
    const error = new RateLimitedError(429);

    const result = await executeWithRetry(
      async (attempt): Promise<AttemptResult<never>> => ({
        type: "retry",
        error,
        delayMs: 10 * attempt,
      }),
      { maxAttempts: 3, sleep }
    );

    assert.deepStrictEqual(result, { type: "failed", error, attempts: 3 });
    assert.deepStrictEqual(delays, [10, 20]);
  });

  test("should stop at once on a stop result", async () => {
    const { sleep, delays } = recorder();
    let calls = 0;
    const error = new UnauthorizedError();

    const result = await executeWithRetry(
      async (): Promise<AttemptResult<never>> => {
        calls++;
        return { type: "stop", error };
      },
      { maxAttempts: 5, sleep }
    );

    assert.deepStrictEqual(result, { type: "failed", error, attempts: 1 });
    assert.strictEqual(calls, 1);
    assert.deepStrictEqual(delays, []);
  });

  test("should halt before an attempt when it may not proceed", async () => {
    const { sleep } = recorder();
    let allowed = true;
    const error = new RateLimitedError(403);

    const result = await executeWithRetry(
      async (): Promise<AttemptResult<never>> => {
        allowed = false;
        return { type: "retry", error, delayMs: 0 };
      },
      { maxAttempts: 3, sleep, canProceed: () => allowed }
    );

    assert.deepStrictEqual(result, { type: "halted", attempts: 1, lastError: error });
  });

  test("should halt without calling when blocked from the start", async () => {
    const { sleep } = recorder();
    let calls = 0;

    const result = await executeWithRetry(
      async (): Promise<AttemptResult<number>> => {
        calls++;
        return { type: "done", value: 1 };
      },
      { maxAttempts: 3, sleep, canProceed: () => false }
    );

    assert.deepStrictEqual(result, { type: "halted", attempts: 0, lastError: undefined });
    assert.strictEqual(calls, 0);
  });

  test("should reject a non-positive attempt cap", async () => {
    const { sleep } = recorder();

    await assert.rejects(
      executeWithRetry(async (): Promise<AttemptResult<number>> => ({ type: "done", value: 1 }), {
        maxAttempts: 0,
        sleep,
      }),
      RangeError
    );
  });
});

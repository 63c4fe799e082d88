import { describe, test } from "node:test";
import * as assert from "node:assert";
import { runWithConcurrencyLimit } from "../concurrency-pool";

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("runWithConcurrencyLimit", () => {
  test("should return results in submission order", async () => {
    const results = await runWithConcurrencyLimit(
      [30, 5, 15].map((delay, index) => async () => {
        await wait(delay);
        return index;
      }),
      3
    );

    assert.deepStrictEqual(results, [0, 1, 2]);
  });

  test("should never run more than the limit at once", async () => {
    let running = 0;
    let peak = 0;

    await runWithConcurrencyLimit(
      Array.from({ length: 8 }, () => async () => {
        running++;
        peak = Math.max(peak, running);
        await wait(5);
        running--;
      }),
      3
    );

    assert.strictEqual(peak, 3);
  });

  test("should resolve an empty list", async () => {
    assert.deepStrictEqual(await runWithConcurrencyLimit([], 2), []);
  });

  test("should reject with the first error", async () => {
    await assert.rejects(
      runWithConcurrencyLimit(
        [
          async () => 1,
          async () => {
            throw new Error("second failed");
          },
        ],
        1
      ),
      /second failed/
    );
  });

  test("should reject an invalid limit", async () => {
    await assert.rejects(runWithConcurrencyLimit([async () => 1], 0), RangeError);
    await assert.rejects(runWithConcurrencyLimit([async () => 1], 1.5), RangeError);
  });
});

/**
 * Executes promise factories with a concurrency limit.
 * At most `limit` factories run at once; a new one starts whenever one settles.
 * Results are written to the slot of their factory, so the returned array is in
 * submission order whatever the completion order was.
 *
 * @param factories - Functions that start the work when called
 * @param limit - Maximum number of concurrently running factories (must be > 0)
 * @returns A promise that resolves to all results, or rejects with the first error
 */
export function runWithConcurrencyLimit<T>(
  factories: ReadonlyArray<() => Promise<T>>,
  limit: number
): Promise<T[]> {
  if (!Number.isInteger(limit) || limit <= 0) {
    return Promise.reject(
      new RangeError("Concurrency limit must be a positive integer")
    );
  }
  if (factories.length === 0) {
    return Promise.resolve([]);
  }

  const results: T[] = new Array<T>(factories.length);
  let nextIndex = 0;
  let completedCount = 0;
  let failed = false;

  return new Promise<T[]>((resolve, reject) => {
    const startNext = (): void => {
      // Nothing new once a factory has failed or all have started
      if (failed || nextIndex >= factories.length) {
        return;
      }

      const index = nextIndex++;
      factories[index]()
        .then((result) => {
          // Slot by submission index, not completion order
          results[index] = result;
          completedCount++;
          if (completedCount === factories.length) {
            resolve(results);
          } else {
            startNext();
          }
        })
        .catch((error: unknown) => {
          failed = true;
          reject(error);
        });
    };

    // Fill the pool; each settled factory starts the next one
    for (let i = 0; i < Math.min(limit, factories.length); i++) {
      startNext();
    }
  });
}

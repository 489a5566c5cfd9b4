/**
 * Promise helpers shared by the executor and the timed blocks
 */

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run task factories with at most `limit` of them in flight.
 * Results keep the order of `tasks`; a rejected task rejects the whole batch
 * once every started task has settled.
 */
export async function runWithConcurrency<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  limit: number
): Promise<T[]> {
  const results: T[] = new Array<T>(tasks.length);
  const failures: unknown[] = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const current = next++;
      try {
        results[current] = await tasks[current]();
      } catch (error) {
        failures.push(error);
      }
    }
  };

  const workerCount = Math.max(1, Math.min(limit, tasks.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}

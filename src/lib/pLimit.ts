/**
 * Run async thunks with at most `concurrency` in flight.
 */
export function pLimit(concurrency: number) {
  if (!(Number.isInteger(concurrency) && concurrency > 0)) {
    throw new TypeError("Expected `concurrency` to be a positive integer");
  }

  const queue: (() => void)[] = [];
  let activeCount = 0;

  const next = () => {
    activeCount--;
    const nextFn = queue.shift();
    if (nextFn) nextFn();
  };

  return async <T>(fn: () => Promise<T>): Promise<T> => {
    const execute = async () => {
      activeCount++;
      try {
        return await fn();
      } finally {
        next();
      }
    };

    if (activeCount < concurrency) return execute();

    return new Promise<T>((resolve, reject) => {
      queue.push(() => {
        execute().then(resolve, reject);
      });
    });
  };
}

export type Limit = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Bounded task runner. Tasks start in submission order; at most
 * `concurrency` of them are in flight at once.
 *
 *   const limit = createLimiter(2);
 *   const results = await Promise.all(chunks.map((c) => limit(() => send(c))));
 */
export const createLimiter = (concurrency: number): Limit => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const waiting: Array<() => void> = [];

  const release = () => {
    active -= 1;
    const start = waiting.shift();
    if (start) start();
  };

  return <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      const start = () => {
        active += 1;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(release);
      };

      if (active < concurrency) {
        start();
      } else {
        waiting.push(start);
      }
    });
};

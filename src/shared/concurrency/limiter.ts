/**
 * A tiny concurrency limiter.
 * Usage:
 *   const limit = createLimiter(4);
 *   await Promise.all(jobs.map((job) => limit(() => poll(job))));
 */
export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error('concurrency must be an integer >= 1');
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const fn = queue.shift();
    if (!fn) return;
    active += 1;
    fn();
  };

  return <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => {
        task()
          .then(resolve, reject)
          .finally(() => {
            active -= 1;
            next();
          });
      });
      next();
    });
};

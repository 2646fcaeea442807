/**
 * Fixed-size pool of cooperatively scheduled tasks.
 *
 * At most `concurrency` tasks run at once; the rest wait for a slot. Each
 * task's result is handed to `onComplete` exactly once, when the task
 * settles. Aborting the signal stops new tasks from starting; running tasks
 * are left to finish and `run` resolves once they have.
 */
export class WorkerPool {
  readonly concurrency: number;

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  run<T, R>(
    items: readonly T[],
    task: (item: T, index: number) => Promise<R>,
    onComplete: (item: T, result: R, index: number) => void,
    signal?: AbortSignal
  ): Promise<void> {
    let currentIndex = 0;
    let activeCount = 0;
    let failure: { error: unknown } | undefined;

    return new Promise((resolve, reject) => {
      const processNext = () => {
        const stopped = failure !== undefined || signal?.aborted === true;

        if ((stopped || currentIndex === items.length) && activeCount === 0) {
          if (failure) {
            reject(failure.error);
          } else {
            resolve();
          }
          return;
        }

        while (!stopped && activeCount < this.concurrency && currentIndex < items.length) {
          const index = currentIndex++;
          const item = items[index];
          activeCount++;

          void task(item, index)
            .then(result => {
              onComplete(item, result, index);
            })
            .catch(error => {
              // first failure is the one reported
              failure ??= { error };
            })
            .finally(() => {
              activeCount--;
              processNext();
            });
        }
      };

      processNext();
    });
  }
}

import { WorkerPool } from '../../utils/worker-pool';

const tick = () => new Promise(resolve => setImmediate(resolve));

describe('WorkerPool', () => {
  it('should reject invalid concurrency', () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
    expect(() => new WorkerPool(1.5)).toThrow(RangeError);
    expect(() => new WorkerPool(-2)).toThrow('Concurrency must be a positive integer, got -2');
  });

  it('should run every item and hand each result over once', async () => {
    const pool = new WorkerPool(3);
    const completed: Array<[number, number]> = [];

    await pool.run(
      [1, 2, 3, 4, 5, 6, 7],
      async item => {
        await tick();
        return item * 10;
      },
      (item, result) => completed.push([item, result])
    );

    expect(completed).toHaveLength(7);
    expect(new Map(completed).get(4)).toBe(40);
  });

  it('should never exceed the concurrency limit', async () => {
    const pool = new WorkerPool(2);
    let active = 0;
    let peak = 0;

    await pool.run(
      ['a', 'b', 'c', 'd', 'e'],
      async () => {
        active++;
        peak = Math.max(peak, active);
        await tick();
        active--;
      },
      () => undefined
    );

    expect(peak).toBe(2);
  });

  it('should resolve immediately for no items', async () => {
    const onComplete = jest.fn();

    await new WorkerPool(4).run([], async () => 1, onComplete);

    expect(onComplete).not.toHaveBeenCalled();
  });

  it('should reject with the first task failure after running tasks settle', async () => {
    const pool = new WorkerPool(2);
    const started: string[] = [];

    const run = pool.run(
      ['ok', 'bad', 'late'],
      async item => {
        started.push(item);
        await tick();
        if (item === 'bad') throw new Error('task failed');
        return item;
      },
      () => undefined
    );

    await expect(run).rejects.toThrow('task failed');
    expect(started).toEqual(['ok', 'bad', 'late']);
  });

  it('should stop starting tasks once aborted', async () => {
    const controller = new AbortController();
    const pool = new WorkerPool(1);
    const completed: number[] = [];

    await pool.run(
      [1, 2, 3, 4],
      async item => {
        await tick();
        if (item === 2) controller.abort();
        return item;
      },
      item => completed.push(item),
      controller.signal
    );

    expect(completed).toEqual([1, 2]);
  });
});

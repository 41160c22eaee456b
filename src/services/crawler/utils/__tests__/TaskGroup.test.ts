import { TaskCancelledError, TaskGroup } from '../TaskGroup';

const deferred = <T>() => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
};

describe('TaskGroup', () => {
  it('should reject a concurrency below one', () => {
    expect(() => new TaskGroup(0)).toThrow(RangeError);
    expect(() => new TaskGroup(1.5)).toThrow(RangeError);
  });

  it('should return results in input order', async () => {
    const group = new TaskGroup(3);
    const results = await group.run([
      async () => {
        await new Promise(resolve => setTimeout(resolve, 5));
        return 'slow';
      },
      async () => 'fast',
      async () => 'instant'
    ]);

    expect(results).toEqual([
      { status: 'fulfilled', value: 'slow' },
      { status: 'fulfilled', value: 'fast' },
      { status: 'fulfilled', value: 'instant' }
    ]);
  });

  it('should never run more tasks than the concurrency limit', async () => {
    const group = new TaskGroup(2);
    let running = 0;
    let peak = 0;
    const task = async (): Promise<number> => {
      running++;
      peak = Math.max(peak, running);
      await new Promise(resolve => setTimeout(resolve, 1));
      running--;
      return running;
    };

    await group.run([task, task, task, task, task]);

    expect(peak).toBe(2);
  });

  it('should settle failing tasks without rejecting', async () => {
    const group = new TaskGroup(2);
    const failure = new Error('boom');

    const results = await group.run<number>([
      async () => 1,
      async () => {
        throw failure;
      }
    ]);

    expect(results).toEqual([
      { status: 'fulfilled', value: 1 },
      { status: 'rejected', reason: failure }
    ]);
  });

  it('should return an empty array for no tasks', async () => {
    await expect(new TaskGroup(4).run([])).resolves.toEqual([]);
  });

  describe('cancel', () => {
    it('should abort the signal passed to running tasks', async () => {
      const group = new TaskGroup(1);
      const gate = deferred<void>();
      let aborted = false;

      const running = group.run([
        async signal => {
          signal.addEventListener('abort', () => {
            aborted = true;
          });
          await gate.promise;
          return 'done';
        }
      ]);

      group.cancel();
      gate.resolve();
      const results = await running;

      expect(aborted).toBe(true);
      expect(group.cancelled).toBe(true);
      expect(group.signal.reason).toBeInstanceOf(TaskCancelledError);
      expect(results).toEqual([{ status: 'fulfilled', value: 'done' }]);
    });

    it('should keep pending tasks from starting', async () => {
      const group = new TaskGroup(1);
      const started: string[] = [];

      const results = await group.run([
        async () => {
          started.push('first');
          group.cancel();
          return 'first';
        },
        async () => {
          started.push('second');
          return 'second';
        }
      ]);

      expect(started).toEqual(['first']);
      expect(results[0]).toEqual({ status: 'fulfilled', value: 'first' });
      expect(results[1].status).toBe('rejected');
    });

    it('should be idempotent', () => {
      const group = new TaskGroup(1);
      group.cancel();
      const reason: unknown = group.signal.reason;
      group.cancel();

      expect(group.signal.reason).toBe(reason);
    });
  });
});

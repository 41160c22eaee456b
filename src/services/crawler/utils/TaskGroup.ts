import { AppError } from '../../../utils/errors';

export type GroupTask<T> = (signal: AbortSignal) => Promise<T>;

export class TaskCancelledError extends AppError {
  constructor() {
    super('Task group was cancelled', 'TASK_CANCELLED');
  }
}

/**
 * Runs a batch of tasks with bounded concurrency and joins them.
 *
 * Tasks receive the group's abort signal; cancelling the group aborts running
 * tasks and keeps the pending ones from starting. `run` never rejects: every
 * task settles into the returned array, in input order.
 */
export class TaskGroup {
  private readonly controller = new AbortController();

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Task group concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(): void {
    if (!this.cancelled) {
      this.controller.abort(new TaskCancelledError());
    }
  }

  async run<T>(tasks: Array<GroupTask<T>>): Promise<Array<PromiseSettledResult<T>>> {
    const results: Array<PromiseSettledResult<T>> = new Array(tasks.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < tasks.length) {
        const index = next++;
        if (this.cancelled) {
          results[index] = { status: 'rejected', reason: new TaskCancelledError() };
          continue;
        }
        try {
          results[index] = { status: 'fulfilled', value: await tasks[index](this.signal) };
        } catch (error) {
          results[index] = { status: 'rejected', reason: error };
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, tasks.length) }, () => worker());
    await Promise.all(workers);
    return results;
  }
}

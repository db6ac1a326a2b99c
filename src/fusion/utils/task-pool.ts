/**
 * Task Pool
 *
 * Bounded-concurrency execution in bulk-synchronous batches: up to
 * `concurrency` tasks run together and the whole batch is joined before the
 * next one starts. Workers are expected to be pure; results are handed to the
 * caller one batch at a time so a single writer can merge them.
 */

export type BatchHandler<R> = (results: R[], batchIndex: number) => Promise<void> | void;

export class TaskPool {
  readonly concurrency: number;

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer (got ${concurrency})`);
    }
    this.concurrency = concurrency;
  }

  /**
   * Runs `worker` over lazily produced tasks and passes each joined batch to
   * `onBatch`.
   *
   * @returns Number of batches run
   */
  async forEachBatch<T, R>(
    tasks: Iterable<T>,
    worker: (task: T) => Promise<R> | R,
    onBatch: BatchHandler<R>
  ): Promise<number> {
    let batch: T[] = [];
    let batchIndex = 0;

    const flush = async (): Promise<void> => {
      const results = await Promise.all(batch.map(async (task) => worker(task)));
      batch = [];
      await onBatch(results, batchIndex);
      batchIndex++;
    };

    for (const task of tasks) {
      batch.push(task);
      if (batch.length === this.concurrency) await flush();
    }
    if (batch.length > 0) await flush();
    return batchIndex;
  }

  /**
   * Maps every task, preserving input order.
   */
  async map<T, R>(tasks: readonly T[], worker: (task: T) => Promise<R> | R): Promise<R[]> {
    const out: R[] = [];
    await this.forEachBatch(tasks, worker, (results) => {
      out.push(...results);
    });
    return out;
  }
}

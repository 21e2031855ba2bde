/**
 * Bounded task pool. Runs at most `limit` tasks at a time and reports every
 * outcome in task order once the whole batch has settled.
 */

export type PoolTask<T> = () => Promise<T>;

export type PoolEntry<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; error: Error };

export interface PoolResult<T> {
  results: PoolEntry<T>[];
}

export async function runWithConcurrency<T>(
  tasks: ReadonlyArray<PoolTask<T>>,
  limit: number
): Promise<PoolResult<T>> {
  const results: PoolEntry<T>[] = new Array(tasks.length);
  const workerCount = Math.max(1, Math.min(Math.floor(limit) || 1, tasks.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await tasks[index]() };
      } catch (error) {
        results[index] = {
          status: 'rejected',
          error: error instanceof Error ? error : new Error(String(error))
        };
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return { results };
}

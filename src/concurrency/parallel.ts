export type ParallelOptions = {
  enabled: boolean;
  maxParallelism: number;
  /** Above this many items a shared queue replaces contiguous batches. */
  queueThreshold: number;
};

export const DEFAULT_PARALLEL_OPTIONS: ParallelOptions = {
  enabled: true,
  maxParallelism: 4,
  queueThreshold: 20,
};

type Processor<T, R> = (item: T, index: number) => R | Promise<R>;

async function runSequential<T, R>(items: readonly T[], processor: Processor<T, R>): Promise<R[]> {
  const results: R[] = [];
  for (const [index, item] of items.entries()) {
    results.push(await processor(item, index));
  }
  return results;
}

async function runBatches<T, R>(
  items: readonly T[],
  processor: Processor<T, R>,
  workers: number,
  results: R[]
): Promise<void> {
  const batchSize = Math.ceil(items.length / workers);
  const batches: Promise<void>[] = [];
  for (let start = 0; start < items.length; start += batchSize) {
    const end = Math.min(items.length, start + batchSize);
    batches.push(
      (async () => {
        for (const [offset, item] of items.slice(start, end).entries()) {
          results[start + offset] = await processor(item, start + offset);
        }
      })()
    );
  }
  await Promise.all(batches);
}

async function runQueue<T, R>(
  items: readonly T[],
  processor: Processor<T, R>,
  workers: number,
  results: R[]
): Promise<void> {
  const queue = [...items.entries()];
  let next = 0;
  const worker = async (): Promise<void> => {
    for (let entry = queue[next]; entry; entry = queue[next]) {
      next += 1;
      const [index, item] = entry;
      results[index] = await processor(item, index);
    }
  };
  await Promise.all(Array.from({ length: workers }, () => worker()));
}

/**
 * Maps `processor` over `items` with bounded concurrency. The result order always matches the
 * input order. Workers interleave only at `await` points, so a processor that mutates a shared
 * document must not yield halfway through a mutation.
 */
export async function parallelProcessNodes<T, R>(
  items: readonly T[],
  processor: Processor<T, R>,
  options: Partial<ParallelOptions> = {}
): Promise<R[]> {
  const resolved = { ...DEFAULT_PARALLEL_OPTIONS, ...options };
  const maxParallelism = Math.max(1, Math.floor(resolved.maxParallelism));
  if (!resolved.enabled || items.length <= 1 || maxParallelism === 1) {
    return runSequential(items, processor);
  }

  const results = new Array<R>(items.length);
  if (items.length <= resolved.queueThreshold) {
    await runBatches(items, processor, Math.min(maxParallelism, items.length), results);
  } else {
    await runQueue(items, processor, maxParallelism, results);
  }
  return results;
}

/**
 * Bounded-parallelism helpers shared by the builder and the orchestrator.
 */
import os from 'node:os';

/**
 * Default concurrency: 75% of available CPUs, min 2, max 16.
 */
export function defaultConcurrency(): number {
  return Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
}

/**
 * Run a processor over items in batches with a concurrency limit.
 * Every item yields a settled result in input order, so one failure
 * never aborts its siblings.
 */
export async function settleInBatches<T, R>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const size = Math.max(1, concurrency);
  const results: PromiseSettledResult<R>[] = [];

  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    const settled = await Promise.allSettled(
      batch.map((item, j) => processor(item, i + j))
    );
    results.push(...settled);
  }

  return results;
}

/**
 * Reject with the given error if the promise does not settle within `ms`.
 * The timer is always cleared so nothing is left running.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

import { OperationCancelled } from './errors';

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Runs `worker` over `items` with at most `limit` tasks in flight.
 * Results keep input order. Rejections propagate after all started tasks settle,
 * so callers that need per-item isolation should catch inside `worker`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const width = Math.max(1, Math.min(limit, items.length));

  const lanes = Array.from({ length: width }, async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  });

  await Promise.all(lanes);
  return results;
}

/**
 * Counting semaphore bounding concurrent outstanding calls (AI requests).
 */
export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
  }

  get inFlight(): number {
    return this.active;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.capacity) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.waiters.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const wake = this.waiters.shift();
    if (wake) wake();
  }
}

/**
 * Per-key mutual exclusion: tasks sharing a key run one after another,
 * tasks with different keys run freely.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

/**
 * Races `task` against a timer. The AbortSignal handed to the task fires on
 * timeout or when the outer signal aborts; the latter rejects with
 * OperationCancelled, also when the signal fired before the call.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  outer?: AbortSignal
): Promise<T> {
  if (outer?.aborted) {
    throw new OperationCancelled();
  }

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  let forwardAbort: (() => void) | undefined;

  // Reject before aborting so the race settles with our error, not the task's.
  const interrupted = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(onTimeout());
      controller.abort();
    }, timeoutMs);
    forwardAbort = () => {
      reject(new OperationCancelled());
      controller.abort();
    };
    outer?.addEventListener('abort', forwardAbort, { once: true });
  });

  try {
    return await Promise.race([task(controller.signal), interrupted]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    if (forwardAbort) outer?.removeEventListener('abort', forwardAbort);
  }
}

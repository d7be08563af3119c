import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export interface WorkerPool {
  readonly maxConcurrency: number;
  run<T>(work: () => Promise<T>): Promise<T>;
}

// =============================================================================
// BOUNDED POOL
// =============================================================================

/**
 * Process-wide cap on concurrently running task bodies.
 * Work beyond the cap waits in FIFO order for a free slot.
 */
export class BoundedWorkerPool implements WorkerPool {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(readonly maxConcurrency: number) {
    assertMaxParallel(maxConcurrency);
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.waiting.length;
  }

  async run<T>(work: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await work();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrency) {
      this.active += 1;
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.active += 1;
        resolve();
      });
    });
  }

  private release(): void {
    this.active -= 1;
    const next = this.waiting.shift();
    if (next) next();
  }
}

function assertMaxParallel(maxParallel: number): void {
  if (Number.isInteger(maxParallel) && maxParallel > 0) return;

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Invalid worker pool size.",
    message: `max_parallel must be a positive integer (received ${maxParallel}).`,
    hint: "Set pipeline.max_parallel to 1 or more.",
  });
}

class Semaphore {
  private active = 0;
  private readonly queue: Array<(release: () => void) => void> = [];

  constructor(private readonly max: number) {}

  get inUse(): number {
    return this.active;
  }

  get waiting(): number {
    return this.queue.length;
  }

  async acquire(): Promise<() => void> {
    if (this.active < this.max) {
      this.active++;
      return this.releaser();
    }

    return await new Promise((resolve) => {
      this.queue.push((release) => resolve(release));
    });
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Keep active count constant: transfer slot to the next waiter.
      next(this.releaser());
      return;
    }
    this.active = Math.max(0, this.active - 1);
  }
}

export type ConcurrencyLimiter = {
  max: number;
  /** Slots currently held. */
  readonly inUse: number;
  /** Callers queued for a slot. */
  readonly waiting: number;
  acquire(): Promise<() => void>;
};

/** Returns null when `max` is 0 (or not a finite number): no limit. */
export function createConcurrencyLimiter(maxConcurrent: number): ConcurrencyLimiter | null {
  const max = Number.isFinite(maxConcurrent) ? Math.max(0, Math.floor(maxConcurrent)) : 0;
  if (max <= 0) return null;
  const sem = new Semaphore(max);
  return {
    max,
    get inUse() {
      return sem.inUse;
    },
    get waiting() {
      return sem.waiting;
    },
    acquire: () => sem.acquire(),
  };
}

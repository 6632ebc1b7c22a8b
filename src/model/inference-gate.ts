type Waiter = () => void;

/**
 * FIFO counting semaphore around model calls. With the default capacity of one
 * at most one inference runs at a time and later arrivals queue in order.
 */
export class InferenceGate {
  private readonly waiters: Waiter[] = [];
  private running = 0;

  public constructor(private readonly capacity = 1) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Invalid inference capacity: ${capacity}`);
    }
  }

  public get active(): number {
    return this.running;
  }

  public get queued(): number {
    return this.waiters.length;
  }

  public async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.running < this.capacity && this.waiters.length === 0) {
      this.running += 1;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(() => {
        this.running += 1;
        resolve();
      });
    });
  }

  private release(): void {
    this.running -= 1;
    const next = this.waiters.shift();
    next?.();
  }
}

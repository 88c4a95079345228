// caps how many probes run at once, extra work waits in fifo order

type Release = () => void;

export class TaskPool {
  private active = 0;
  private waiting: Array<(release: Release) => void> = [];
  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`pool capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  get running(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiting.length;
  }

  private acquire(): Promise<Release> {
    if (this.active < this.capacity) {
      this.active++;
      return Promise.resolve(this.releaser());
    }

    return new Promise(resolve => {
      this.waiting.push(resolve);
    });
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      // hand the slot straight to the next waiter, active count stays put
      const next = this.waiting.shift();
      if (next) {
        next(this.releaser());
      } else {
        this.active--;
      }
    };
  }
}

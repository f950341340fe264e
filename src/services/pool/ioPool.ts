interface QueuedTask {
  start: () => void;
}

/**
 * Runs I/O-bound tasks with at most `concurrency` of them in flight. Extra
 * tasks wait in FIFO order and start as slots free up.
 */
export class IoPool {
  private readonly limit: number;
  private active = 0;
  private readonly queue: QueuedTask[] = [];

  constructor(concurrency: number) {
    this.limit = Math.max(1, Math.floor(concurrency));
  }

  get size(): number {
    return this.limit;
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this.active += 1;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.active -= 1;
            this.next();
          });
      };

      if (this.active < this.limit) {
        start();
      } else {
        this.queue.push({ start });
      }
    });
  }

  private next(): void {
    const queued = this.queue.shift();
    if (queued) {
      queued.start();
    }
  }
}

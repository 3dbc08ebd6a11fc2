/**
 * Runs queued async tasks with a cap on how many are in flight.
 */
export class RequestQueue {
  private readonly queue: Array<() => Promise<void>> = [];
  private isProcessingQueue = false;
  private activeRequests = 0;

  constructor(private readonly maxConcurrentRequests: number) {
    if (!Number.isInteger(maxConcurrentRequests) || maxConcurrentRequests < 1) {
      throw new Error(
        `maxConcurrentRequests must be a positive integer, got ${maxConcurrentRequests}`,
      );
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  get active(): number {
    return this.activeRequests;
  }

  /**
   * Add a task; resolves or rejects with the task's own outcome
   */
  add<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await task());
        } catch (error) {
          reject(error);
        }
      });
      this.processQueue();
    });
  }

  private processQueue(): void {
    if (this.isProcessingQueue) {
      return;
    }

    this.isProcessingQueue = true;

    while (
      this.queue.length > 0 &&
      this.activeRequests < this.maxConcurrentRequests
    ) {
      const request = this.queue.shift();
      if (request) {
        this.activeRequests++;
        void request().finally(() => {
          this.activeRequests--;
          this.processQueue();
        });
      }
    }

    this.isProcessingQueue = false;
  }
}

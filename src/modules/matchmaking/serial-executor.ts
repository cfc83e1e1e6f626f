import Denque = require('denque');

type PendingTask = () => Promise<void>;

/**
 * Runs submitted tasks one at a time, in submission order.
 * A task starts only after every earlier task has settled; a rejection reaches
 * its own caller and does not stall the queue.
 */
export class SerialExecutor {
  private readonly pending = new Denque<PendingTask>();
  private draining = false;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.pending.push(async () => {
        try {
          resolve(await task());
        } catch (err) {
          reject(err);
        }
      });
      if (!this.draining) {
        void this.drain();
      }
    });
  }

  private async drain(): Promise<void> {
    this.draining = true;
    try {
      let next = this.pending.shift();
      while (next !== undefined) {
        await next();
        next = this.pending.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}

import { setTimeout as sleep } from "node:timers/promises";
import PQueue from "p-queue";
import { AutoThrottle } from "./throttle";

/**
 * Shared request queue. At most `concurrency` jobs run at once, higher priority starts first and
 * FIFO holds within a priority. Job starts are spaced by the throttle's current delay.
 */
export class RequestScheduler {
  private readonly queue: PQueue;
  private nextStartAt = 0;

  constructor(
    concurrency: number,
    readonly throttle: AutoThrottle
  ) {
    this.queue = new PQueue({ concurrency: Math.max(1, concurrency) });
  }

  get inFlight(): number {
    return this.queue.pending;
  }

  get pending(): number {
    return this.queue.size;
  }

  schedule<T>(job: () => Promise<T>, priority = 0): Promise<T> {
    return this.queue.add(
      async () => {
        await this.waitForStartSlot();
        return job();
      },
      { priority }
    );
  }

  // The slot is reserved before the first await, so two jobs never share a start time.
  private async waitForStartSlot(): Promise<void> {
    const now = Date.now();
    const startAt = Math.max(now, this.nextStartAt);
    this.nextStartAt = startAt + this.throttle.delayMs;
    if (startAt > now) {
      await sleep(startAt - now);
    }
  }
}

import { toErrorString } from "./errors.js";
import { childLogger, type Logger } from "./logger.js";
import type { Lane } from "./inFlightIndex.js";

export type LaneJob = () => Promise<void>;

export interface LaneStats {
  lane: Lane;
  concurrency: number;
  running: number;
  queued: number;
}

/**
 * FIFO queue with a fixed concurrency budget. A job keeps its slot until its
 * promise settles, so retries inside the job do not let other work jump ahead.
 */
export class WorkerLane {
  private readonly queue: LaneJob[] = [];
  private running = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];
  private readonly log: Logger;

  constructor(
    readonly lane: Lane,
    readonly concurrency: number,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`lane ${lane}: concurrency must be a positive integer, got ${concurrency}`);
    }
    this.log = childLogger({ component: "worker_lane", lane });
  }

  /** Returns false when the lane is closed and the job was not queued. */
  enqueue(job: LaneJob): boolean {
    if (this.closed) return false;
    this.queue.push(job);
    this.pump();
    return true;
  }

  stats(): LaneStats {
    return { lane: this.lane, concurrency: this.concurrency, running: this.running, queued: this.queue.length };
  }

  /** Stop taking jobs and drop the ones not started. Returns how many were dropped. */
  close(): number {
    this.closed = true;
    const dropped = this.queue.length;
    this.queue.length = 0;
    this.notifyIdle();
    return dropped;
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private pump(): void {
    while (this.running < this.concurrency && this.queue.length > 0) {
      const job = this.queue.shift();
      if (!job) break;
      this.running++;
      void this.execute(job);
    }
  }

  private async execute(job: LaneJob): Promise<void> {
    try {
      await job();
    } catch (e) {
      this.log.error("lane job failed", { error: toErrorString(e) });
    } finally {
      this.running--;
      this.pump();
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    if (this.running !== 0 || this.queue.length !== 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const w of waiters) w();
  }
}

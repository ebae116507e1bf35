/**
 * Translation Queue — FIFO admission for translation calls
 *
 * One consumer drains the queue in arrival order. At most `maxPerWindow`
 * translations complete inside any rolling window; once the window is full
 * the consumer sleeps until the oldest completion falls out of it.
 */

import { SlidingWindow, systemClock, type Clock } from '../resilience';

export interface TranslationQueueConfig {
  maxPerWindow: number;
  windowMs: number;
  clock?: Clock;
}

export interface TranslationQueueStats {
  queued: number;
  completed: number;
  failed: number;
  inWindow: number;
  maxPerWindow: number;
  windowMs: number;
}

/** Settles its caller's promise; never rejects */
type Job = () => Promise<void>;

export const DEFAULT_QUEUE_CONFIG: TranslationQueueConfig = {
  maxPerWindow: 25,
  windowMs: 60_000,
};

export class TranslationQueue {
  private readonly pending: Job[] = [];
  private readonly window: SlidingWindow;
  private readonly clock: Clock;
  private draining = false;
  private completed = 0;
  private failed = 0;

  constructor(config: Partial<TranslationQueueConfig> = {}) {
    const cfg = { ...DEFAULT_QUEUE_CONFIG, ...config };
    this.window = new SlidingWindow({ maxEvents: cfg.maxPerWindow, windowMs: cfg.windowMs });
    this.clock = cfg.clock ?? systemClock;
  }

  /**
   * Queue a translation; resolves with its result once the consumer runs it
   */
  enqueue<T>(run: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.pending.push(async () => {
        try {
          resolve(await run());
          this.completed++;
        } catch (error) {
          reject(error);
          this.failed++;
        }
      });
      this.drain().catch((error: unknown) => {
        console.error('[TranslationQueue] Consumer stopped:', error);
      });
    });
  }

  get size(): number {
    return this.pending.length;
  }

  stats(): TranslationQueueStats {
    return {
      queued: this.pending.length,
      completed: this.completed,
      failed: this.failed,
      inWindow: this.window.count(this.clock.now()),
      maxPerWindow: this.window.config.maxEvents,
      windowMs: this.window.config.windowMs,
    };
  }

  private async drain(): Promise<void> {
    if (this.draining) return;
    this.draining = true;

    try {
      while (this.pending.length > 0) {
        const wait = this.window.delayUntilFree(this.clock.now());
        if (wait > 0) {
          console.log(`[TranslationQueue] Window full, waiting ${wait}ms (${this.pending.length} queued)`);
          await this.clock.sleep(wait);
          continue;
        }

        const job = this.pending.shift();
        if (!job) break;

        await job();
        this.window.record(this.clock.now());
      }
    } finally {
      this.draining = false;
    }
  }
}

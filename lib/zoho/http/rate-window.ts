import { Clock, defaultSleep, Sleep, systemClock } from '../../http/runtime';
import { createLogger } from '../../logging';

const log = createLogger('zoho');

/** Zoho Books allows 100 requests per rolling minute per organization */
export const MAX_REQUESTS_PER_WINDOW = 100;
export const RATE_WINDOW_MS = 60_000;

export interface RateWindowOptions {
  maxRequests?: number;
  windowMs?: number;
  clock?: Clock;
  sleep?: Sleep;
}

export interface RateWindowUsage {
  inWindow: number;
  capacity: number;
  oldestAgeMs: number | null;
}

/**
 * Sliding-window admission control for outbound destination requests.
 *
 * acquire() resolves when the caller may transmit. Calls are admitted one
 * at a time in arrival order, so concurrent callers cannot both take the
 * last free slot.
 */
export class RateWindow {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private timestamps: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateWindowOptions = {}) {
    this.maxRequests = options.maxRequests ?? MAX_REQUESTS_PER_WINDOW;
    this.windowMs = options.windowMs ?? RATE_WINDOW_MS;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
  }

  acquire(): Promise<void> {
    const admitted = this.tail.then(() => this.admit());
    // The next caller queues behind this one whether or not it succeeded;
    // a rejection still reaches this caller through `admitted`.
    this.tail = admitted.catch(() => undefined);
    return admitted;
  }

  getUsage(): RateWindowUsage {
    const now = this.clock();
    this.prune(now);
    return {
      inWindow: this.timestamps.length,
      capacity: this.maxRequests,
      oldestAgeMs: this.timestamps.length > 0 ? now - this.timestamps[0] : null,
    };
  }

  private async admit(): Promise<void> {
    let now = this.clock();
    this.prune(now);

    if (this.timestamps.length >= this.maxRequests) {
      const waitMs = this.timestamps[0] + this.windowMs - now;
      if (waitMs > 0) {
        log.warn('Rate window full, waiting for the oldest request to expire', {
          inWindow: this.timestamps.length,
          waitMs,
        });
        await this.sleep(waitMs);
      }
      now = this.clock();
      this.prune(now);
    }

    this.timestamps.push(now);
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    while (this.timestamps.length > 0 && this.timestamps[0] <= cutoff) {
      this.timestamps.shift();
    }
  }
}

import { logger } from "./logger.ts";

/** Anything that paces outbound calls. */
export interface Governor {
  acquire(): Promise<void>;
}

export interface RateLimiterOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Enforces a minimum spacing between successive acquisitions. The first
 * acquire never waits.
 */
export class RateLimiter implements Governor {
  private lastAcquiredAt: number | null = null;
  private readonly minIntervalMs: number;
  private readonly name: string;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(minIntervalMs: number, name: string = "API", options: RateLimiterOptions = {}) {
    this.minIntervalMs = Math.max(0, minIntervalMs);
    this.name = name;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async acquire(): Promise<void> {
    if (this.lastAcquiredAt !== null) {
      const elapsed = this.now() - this.lastAcquiredAt;
      const waitTime = this.minIntervalMs - elapsed;
      if (waitTime > 0) {
        logger.debug(`${this.name} pacing: waiting ${waitTime}ms`);
        await this.sleep(waitTime);
      }
    }
    this.lastAcquiredAt = this.now();
  }
}

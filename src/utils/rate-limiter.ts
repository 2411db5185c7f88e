/**
 * Minimum-interval rate limiter for outbound navigations
 */

import { sleep } from './retry.js';

export class RateLimiter {
  private nextSlotAt = 0;
  private readonly minIntervalMs: number;

  constructor(minIntervalMs: number) {
    this.minIntervalMs = Math.max(0, minIntervalMs);
  }

  get intervalMs(): number {
    return this.minIntervalMs;
  }

  /**
   * Reserve the next slot and wait for it. Concurrent callers are spaced
   * one interval apart in call order.
   */
  async waitForSlot(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;

    const waitTime = slot - now;
    if (waitTime > 0) {
      await sleep(waitTime);
    }
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.waitForSlot();
    return fn();
  }
}

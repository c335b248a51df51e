/**
 * Spaces out calls to the same host
 */

import { sleep } from './retry.js';

export class RateLimiter {
  private lastCallTime = 0;
  private readonly minIntervalMs: number;

  constructor(minIntervalMs: number) {
    this.minIntervalMs = Math.max(0, minIntervalMs);
  }

  async waitForSlot(): Promise<void> {
    const now = Date.now();
    const timeSinceLastCall = now - this.lastCallTime;
    const waitTime = Math.max(0, this.minIntervalMs - timeSinceLastCall);

    if (waitTime > 0) {
      await sleep(waitTime);
    }

    this.lastCallTime = Date.now();
  }
}

// Process-wide sliding-window limiter shared by every research endpoint

export type RateLimitDecision =
  | { allowed: true }
  | { allowed: false; retryAfterSeconds: number };

export type RateLimiterOptions = {
  maxRequests?: number;
  windowSeconds?: number;
  now?: () => number; // epoch ms
};

export class SlidingWindowRateLimiter {
  readonly maxRequests: number;
  readonly windowSeconds: number;
  private readonly now: () => number;
  private timestamps: number[] = [];

  constructor({ maxRequests = 10, windowSeconds = 60, now = Date.now }: RateLimiterOptions = {}) {
    this.maxRequests = maxRequests;
    this.windowSeconds = windowSeconds;
    this.now = now;
  }

  /**
   * Records the call when admitted. Rejections leave the window untouched,
   * so it never holds more than maxRequests timestamps.
   */
  check(): RateLimitDecision {
    const now = this.now();
    const windowMs = this.windowSeconds * 1000;

    while (this.timestamps.length > 0 && this.timestamps[0] < now - windowMs) {
      this.timestamps.shift();
    }

    if (this.timestamps.length >= this.maxRequests) {
      const oldest = this.timestamps[0];
      const retryAfterSeconds = Math.floor(this.windowSeconds - (now - oldest) / 1000) + 1;
      return { allowed: false, retryAfterSeconds };
    }

    this.timestamps.push(now);
    return { allowed: true };
  }

  get size(): number {
    return this.timestamps.length;
  }

  rejectionMessage(retryAfterSeconds: number): string {
    return (
      `Rate limit exceeded. Please wait ${retryAfterSeconds} seconds before trying again. ` +
      `(Free tier limit: ${this.maxRequests} requests per ${this.windowSeconds} seconds)`
    );
  }
}

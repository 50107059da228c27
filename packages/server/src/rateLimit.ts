// packages/server/src/rateLimit.ts

export interface RateBudgetOptions {
  windowMs: number;
  maxMessages: number;
  now?: () => number;
}

/** Fixed-window message budget, one window per connection. */
export class RateBudget {
  private windowStartMs = Number.NEGATIVE_INFINITY;
  private messageCount = 0;
  private readonly now: () => number;

  constructor(private readonly options: RateBudgetOptions) {
    this.now = options.now ?? Date.now;
  }

  consume(): boolean {
    const now = this.now();
    if (now - this.windowStartMs >= this.options.windowMs) {
      this.windowStartMs = now;
      this.messageCount = 1;
      return true;
    }

    if (this.messageCount >= this.options.maxMessages) {
      return false;
    }

    this.messageCount += 1;
    return true;
  }
}

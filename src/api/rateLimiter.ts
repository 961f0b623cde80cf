import { ownValue } from '../utils/records.js';
import { isoNow } from '../utils/time.js';

// ─── Rate limiter types ─────────────────────────────────────────────────────

export interface RateLimiterConfig {
  writesPerMinute: number;
  /** Milliseconds source; defaults to Date.now. */
  nowMs?: () => number;
}

interface AccountBucket {
  tokens: number;
  lastRefillAt: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  limit: number;
  retryAfterSeconds: number | null;
  checkedAt: string;
}

export interface RateLimitMetrics {
  totalChecks: number;
  totalAllowed: number;
  totalDenied: number;
  deniedByAccount: Record<string, number>;
}

// ─── Rate limiter (token bucket per account) ────────────────────────────────

export class RateLimiter {
  private readonly limit: number;
  private readonly nowMs: () => number;
  private readonly buckets: Map<string, AccountBucket> = new Map();
  private readonly metrics: RateLimitMetrics = {
    totalChecks: 0,
    totalAllowed: 0,
    totalDenied: 0,
    deniedByAccount: {},
  };

  constructor(config: RateLimiterConfig) {
    this.limit = config.writesPerMinute;
    this.nowMs = config.nowMs ?? Date.now;
  }

  check(accountId: string): RateLimitResult {
    this.metrics.totalChecks += 1;

    const now = this.nowMs();
    const bucket = this.buckets.get(accountId) ?? { tokens: this.limit, lastRefillAt: now };
    this.buckets.set(accountId, bucket);

    // Refill tokens based on elapsed time
    const elapsedMs = now - bucket.lastRefillAt;
    bucket.tokens = Math.min(this.limit, bucket.tokens + (elapsedMs / 60_000) * this.limit);
    bucket.lastRefillAt = now;

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      this.metrics.totalAllowed += 1;

      return {
        allowed: true,
        remaining: Math.floor(bucket.tokens),
        limit: this.limit,
        retryAfterSeconds: null,
        checkedAt: isoNow(),
      };
    }

    const tokensNeeded = 1 - bucket.tokens;
    const retryAfterSeconds = Math.ceil((tokensNeeded / this.limit) * 60);

    this.metrics.totalDenied += 1;
    this.metrics.deniedByAccount[accountId] = (ownValue(this.metrics.deniedByAccount, accountId) ?? 0) + 1;

    return {
      allowed: false,
      remaining: 0,
      limit: this.limit,
      retryAfterSeconds,
      checkedAt: isoNow(),
    };
  }

  getMetrics(): RateLimitMetrics {
    return structuredClone(this.metrics);
  }

  reset(accountId: string): void {
    this.buckets.delete(accountId);
  }

  resetAll(): void {
    this.buckets.clear();
  }
}

/**
 * Rate Limiter Module
 *
 * Keyed cooldown throttle: a key may pass once per cooldown window.
 *
 * @packageDocumentation
 */

/**
 * Result of a cooldown check
 */
export interface RateLimitDecision {
  /** Whether the call may proceed */
  allowed: boolean;
  /** Milliseconds until the key may pass again (0 when allowed) */
  retryAfterMs: number;
}

export interface RateLimiterConfig {
  /** Cooldown used when a call does not pass one (default: 2000) */
  defaultCooldownMs?: number;
}

const DEFAULT_COOLDOWN_MS = 2000;

interface CallRecord {
  timestamp: number;
  cooldownMs: number;
}

/**
 * Cooldown Rate Limiter
 *
 * Remembers the last accepted call per key with the cooldown it was
 * accepted under. Every accepted call evicts entries older than twice
 * their own cooldown, so the map stays bounded by the number of recently
 * active keys.
 *
 * Checks are synchronous: one clock read and the read-modify-write of the
 * timestamp happen in the same turn of the event loop, so concurrent
 * callers sharing a key cannot both pass.
 *
 * @example
 * ```typescript
 * const limiter = new CooldownRateLimiter();
 *
 * if (!limiter.allow('sync-notes', 5000)) {
 *   return; // pressed again too soon
 * }
 * ```
 */
export class CooldownRateLimiter {
  private readonly lastCalls: Map<string, CallRecord>;
  private readonly defaultCooldownMs: number;
  private readonly getNow: () => number;

  /**
   * @param getNow - Optional clock (for testing)
   */
  constructor(config: RateLimiterConfig = {}, getNow?: () => number) {
    this.lastCalls = new Map();
    this.defaultCooldownMs = config.defaultCooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.getNow = getNow ?? (() => Date.now());

    if (this.defaultCooldownMs < 0) {
      throw new Error('defaultCooldownMs cannot be negative');
    }
  }

  /**
   * Records the call and returns true unless `key` passed within `cooldownMs`
   */
  allow(key: string, cooldownMs?: number): boolean {
    return this.check(key, cooldownMs).allowed;
  }

  /**
   * Like {@link allow}, with the remaining wait on refusal
   */
  check(key: string, cooldownMs: number = this.defaultCooldownMs): RateLimitDecision {
    const now = this.getNow();
    const lastCall = this.lastCalls.get(key);

    if (lastCall !== undefined && now - lastCall.timestamp < cooldownMs) {
      return { allowed: false, retryAfterMs: cooldownMs - (now - lastCall.timestamp) };
    }

    this.lastCalls.set(key, { timestamp: now, cooldownMs });
    this.evictExpired(now);

    return { allowed: true, retryAfterMs: 0 };
  }

  reset(key: string): boolean {
    return this.lastCalls.delete(key);
  }

  clear(): void {
    this.lastCalls.clear();
  }

  /**
   * Number of keys currently tracked
   */
  size(): number {
    return this.lastCalls.size;
  }

  private evictExpired(now: number): void {
    for (const [key, { timestamp, cooldownMs }] of this.lastCalls) {
      if (now - timestamp > cooldownMs * 2) {
        this.lastCalls.delete(key);
      }
    }
  }
}

export function createRateLimiter(config?: RateLimiterConfig, getNow?: () => number): CooldownRateLimiter {
  return new CooldownRateLimiter(config, getNow);
}

import { KeyedMutex, LIMIT_DEFAULTS } from '@glimpse/core';

export interface RateLimitDecision {
  allowed: boolean;
  /** Admissions left in the current window after this decision. */
  remaining: number;
  /** Time until the oldest retained admission leaves the window; 0 when allowed. */
  retryAfterMs: number;
}

export interface SlidingWindowRateLimiterOptions {
  /** Used in logs and errors (`address`, `credential`). */
  name: string;
  quota: number;
  windowMs?: number;
  now?: () => number;
}

export interface RateLimiterStats {
  name: string;
  trackedIdentifiers: number;
  quota: number;
  windowMs: number;
}

/**
 * Sliding-window limiter over admission instants. Decisions for one
 * identifier are linearized through a keyed mutex.
 */
export class SlidingWindowRateLimiter {
  public readonly name: string;
  public readonly quota: number;
  public readonly windowMs: number;
  private readonly windows = new Map<string, number[]>();
  private readonly mutex = new KeyedMutex();
  private readonly now: () => number;

  public constructor(options: SlidingWindowRateLimiterOptions) {
    this.name = options.name;
    this.quota = options.quota;
    this.windowMs = options.windowMs ?? LIMIT_DEFAULTS.WINDOW_MS;
    this.now = options.now ?? Date.now;
  }

  public admit(identifier: string): Promise<RateLimitDecision> {
    return this.mutex.runExclusive(identifier, () => this.decide(identifier, this.now()));
  }

  public remaining(identifier: string): number {
    return Math.max(0, this.quota - this.retained(identifier, this.now()).length);
  }

  /** Forgets one identifier, or every identifier when none is given. */
  public reset(identifier?: string): void {
    if (identifier === undefined) {
      this.windows.clear();
    } else {
      this.windows.delete(identifier);
    }
  }

  /** Drops identifiers with no admission inside the window at `now`. */
  public sweepExpired(now: number = this.now()): number {
    let removed = 0;
    for (const [identifier, instants] of this.windows) {
      const newest = instants[instants.length - 1];
      if (newest === undefined || newest <= now - this.windowMs) {
        this.windows.delete(identifier);
        removed += 1;
      }
    }
    return removed;
  }

  public stats(): RateLimiterStats {
    return {
      name: this.name,
      trackedIdentifiers: this.windows.size,
      quota: this.quota,
      windowMs: this.windowMs
    };
  }

  private decide(identifier: string, now: number): RateLimitDecision {
    const instants = this.retained(identifier, now);

    if (instants.length < this.quota) {
      instants.push(now);
      this.windows.set(identifier, instants);
      return { allowed: true, remaining: this.quota - instants.length, retryAfterMs: 0 };
    }

    this.windows.set(identifier, instants);
    const oldest = instants[0] ?? now;
    return { allowed: false, remaining: 0, retryAfterMs: Math.max(0, oldest + this.windowMs - now) };
  }

  private retained(identifier: string, now: number): number[] {
    const cutoff = now - this.windowMs;
    return (this.windows.get(identifier) ?? []).filter((instant) => instant > cutoff);
  }
}

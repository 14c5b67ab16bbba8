// src/services/rateLimiter.ts
import { DEFAULT_RATE_LIMITS, RateLimitTable } from '../config/rateLimits';
import { logInfo, logWarn } from '../utils/logger';
import { MINUTE_MS } from '../utils/dateUtils';

export type RateLimitSubject = number | string;

/** Millisecond clock; injectable for tests. */
export type MillisClock = () => number;

interface WindowEntry {
  action: string;
  timestamps: number[];
}

export interface RateLimiterOptions {
  limits?: RateLimitTable;
  now?: MillisClock;
  sweepIntervalMs?: number;
}

const DEFAULT_SWEEP_INTERVAL_MS = 10 * MINUTE_MS;

/**
 * Sliding-window counter per (subject, action). Process local: every
 * worker instance keeps its own windows.
 */
export class RateLimiter {
  private readonly windows = new Map<string, WindowEntry>();
  private readonly limits: RateLimitTable;
  private readonly now: MillisClock;
  private readonly sweepIntervalMs: number;
  private lastSweep: number;

  constructor(options: RateLimiterOptions = {}) {
    this.limits = options.limits ?? DEFAULT_RATE_LIMITS;
    this.now = options.now ?? Date.now;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.lastSweep = this.now();
  }

  /**
   * Records the request and returns true when it fits in the window.
   * A refused request is not recorded. Actions without a rule are
   * always allowed.
   */
  allowed(subject: RateLimitSubject, action: string): boolean {
    const rule = this.limits[action];
    if (!rule) return true;

    const now = this.now();
    this.maybeSweep(now);

    const key = `${subject}:${action}`;
    const entry = this.windows.get(key) ?? { action, timestamps: [] };
    entry.timestamps = this.live(entry.timestamps, rule.windowSeconds, now);

    if (entry.timestamps.length >= rule.maxRequests) {
      this.windows.set(key, entry);
      logWarn('rate-limit', 'Rate limit exceeded', {
        subject,
        action,
        count: entry.timestamps.length,
        max: rule.maxRequests
      });
      return false;
    }

    entry.timestamps.push(now);
    this.windows.set(key, entry);
    return true;
  }

  /** Whole seconds until the oldest recorded request leaves the window. */
  resetInSeconds(subject: RateLimitSubject, action: string): number {
    const rule = this.limits[action];
    if (!rule) return 0;

    const entry = this.windows.get(`${subject}:${action}`);
    if (!entry) return 0;

    const now = this.now();
    const timestamps = this.live(entry.timestamps, rule.windowSeconds, now);
    if (!timestamps.length) return 0;

    const oldest = timestamps[0];
    return Math.max(0, Math.floor((oldest + rule.windowSeconds * 1000 - now) / 1000));
  }

  /** Drops windows that are empty or whose requests all expired. */
  sweep(now: number = this.now()): number {
    let removed = 0;

    for (const [key, entry] of this.windows) {
      const rule = this.limits[entry.action];
      const remaining = rule
        ? this.live(entry.timestamps, rule.windowSeconds, now)
        : [];

      if (!remaining.length) {
        this.windows.delete(key);
        removed += 1;
      } else {
        entry.timestamps = remaining;
      }
    }

    this.lastSweep = now;
    if (removed) {
      logInfo('rate-limit', 'Swept expired rate-limit windows', {
        removed,
        remaining: this.windows.size
      });
    }
    return removed;
  }

  get trackedWindows(): number {
    return this.windows.size;
  }

  private maybeSweep(now: number): void {
    if (now - this.lastSweep >= this.sweepIntervalMs) {
      this.sweep(now);
    }
  }

  private live(timestamps: number[], windowSeconds: number, now: number): number[] {
    const threshold = now - windowSeconds * 1000;
    return timestamps.filter((ts) => ts > threshold);
  }
}

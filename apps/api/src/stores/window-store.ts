import type { RateWindow, WindowCheck, WindowDecision, WindowScope } from "@tollgate/shared";

/**
 * Counter primitive behind the IP and identity layers.
 *
 * Counting is fixed-window, not a sliding log: one counter per (scope, subject)
 * covers `[windowStart, windowStart + windowSize)` with `windowStart` aligned to
 * multiples of the window size. Crossing into a new window resets the counter
 * inside the same atomic check. Storage is O(1) per subject and a check is one
 * round trip, but a client can get up to 2x the limit through by spending its
 * allowance at the end of one window and again at the start of the next.
 *
 * `checkAndIncrement` must be atomic at the storage layer: the compare against
 * `limit` and the increment happen in one step, so concurrent callers can never
 * both observe `count < limit` for the last slot. A rejected attempt does not
 * increment, which keeps `count <= limit` at all times.
 */
export interface WindowStore {
  readonly backend: "memory" | "redis";
  checkAndIncrement(check: WindowCheck): Promise<WindowDecision>;
  /** Live row for the subject, or null when it has none in the current window. */
  peek(scope: WindowScope, subject: string, nowMs: number): Promise<RateWindow | null>;
  reset(scope: WindowScope, subject: string): Promise<boolean>;
  /** Deletes rows whose window ended before `endedBeforeMs`; returns how many. */
  compact(endedBeforeMs: number): Promise<number>;
  healthcheck(): Promise<boolean>;
  close(): Promise<void>;
}

export function alignWindowStart(nowMs: number, windowMs: number): number {
  return nowMs - (nowMs % windowMs);
}

export function secondsUntilReset(windowStart: number, windowMs: number, nowMs: number): number {
  return Math.max(1, Math.ceil((windowStart + windowMs - nowMs) / 1000));
}

const rowKey = (scope: WindowScope, subject: string) => `${scope}:${subject}`;

export class InMemoryWindowStore implements WindowStore {
  readonly backend = "memory" as const;
  private readonly rows = new Map<string, RateWindow>();

  // No await between the read and the write: on a single event loop the whole
  // compare-and-increment runs to completion before any other check starts.
  async checkAndIncrement(check: WindowCheck): Promise<WindowDecision> {
    const windowMs = check.windowSeconds * 1000;
    const key = rowKey(check.scope, check.subject);
    const existing = this.rows.get(key);

    let windowStart = alignWindowStart(check.nowMs, windowMs);
    let count = 0;

    if (existing && existing.windowSize === check.windowSeconds && existing.windowStart >= windowStart) {
      // A newer window written by a caller with a faster clock stays authoritative.
      windowStart = existing.windowStart;
      count = existing.count;
    }

    const allowed = count < check.limit;
    if (allowed) {
      count += 1;
    }

    this.rows.set(key, {
      scope: check.scope,
      subject: check.subject,
      windowStart,
      windowSize: check.windowSeconds,
      count,
      limit: check.limit
    });

    return {
      allowed,
      count,
      limit: check.limit,
      remaining: Math.max(check.limit - count, 0),
      resetSeconds: secondsUntilReset(windowStart, windowMs, check.nowMs),
      windowStart
    };
  }

  async peek(scope: WindowScope, subject: string, nowMs: number): Promise<RateWindow | null> {
    const row = this.rows.get(rowKey(scope, subject));
    if (!row || row.windowStart + row.windowSize * 1000 <= nowMs) {
      return null;
    }
    return { ...row };
  }

  async reset(scope: WindowScope, subject: string): Promise<boolean> {
    return this.rows.delete(rowKey(scope, subject));
  }

  async compact(endedBeforeMs: number): Promise<number> {
    let pruned = 0;
    for (const [key, row] of this.rows) {
      if (row.windowStart + row.windowSize * 1000 < endedBeforeMs) {
        this.rows.delete(key);
        pruned += 1;
      }
    }
    return pruned;
  }

  async healthcheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.rows.clear();
  }

  get size(): number {
    return this.rows.size;
  }
}

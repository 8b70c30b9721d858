import type { Redis } from "ioredis";
import type { RateWindow, WindowCheck, WindowDecision, WindowScope } from "@tollgate/shared";
import type { RedisScriptManager } from "../redis/scripts.js";
import type { WindowStore } from "./window-store.js";

export interface RedisWindowStoreDeps {
  redis: Redis;
  scripts: RedisScriptManager;
  graceSeconds: number;
  keyPrefix?: string;
}

/**
 * Multi-instance window store. The check runs as a single Lua script, so the
 * compare and the increment are atomic across every process sharing Redis.
 * Stale rows expire through PEXPIRE (window remainder + grace), which is why
 * `compact` has nothing to do here.
 */
export class RedisWindowStore implements WindowStore {
  readonly backend = "redis" as const;
  private readonly prefix: string;

  constructor(private readonly deps: RedisWindowStoreDeps) {
    this.prefix = deps.keyPrefix ?? "tollgate:win";
  }

  private key(scope: WindowScope, subject: string): string {
    return `${this.prefix}:${scope}:${subject}`;
  }

  async checkAndIncrement(check: WindowCheck): Promise<WindowDecision> {
    const [allowed, count, limit, resetMs, windowStart] = await this.deps.scripts.evalScript(
      "window_check",
      [this.key(check.scope, check.subject)],
      [check.limit, check.windowSeconds * 1000, check.nowMs, this.deps.graceSeconds * 1000]
    );

    return {
      allowed: allowed === 1,
      count,
      limit,
      remaining: Math.max(limit - count, 0),
      resetSeconds: Math.max(1, Math.ceil(resetMs / 1000)),
      windowStart
    };
  }

  async peek(scope: WindowScope, subject: string, nowMs: number): Promise<RateWindow | null> {
    const [windowStart, windowMs, count, limit] = await this.deps.redis.hmget(
      this.key(scope, subject),
      "window_start",
      "window_ms",
      "count",
      "limit"
    );

    if (windowStart === null || windowMs === null || count === null || limit === null) {
      return null;
    }

    const start = Number(windowStart);
    const size = Number(windowMs);
    if (start + size <= nowMs) {
      return null;
    }

    return {
      scope,
      subject,
      windowStart: start,
      windowSize: size / 1000,
      count: Number(count),
      limit: Number(limit)
    };
  }

  async reset(scope: WindowScope, subject: string): Promise<boolean> {
    const removed = await this.deps.redis.del(this.key(scope, subject));
    return removed > 0;
  }

  async compact(): Promise<number> {
    return 0;
  }

  async healthcheck(): Promise<boolean> {
    try {
      return (await this.deps.redis.ping()) === "PONG";
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.deps.redis.quit();
  }
}

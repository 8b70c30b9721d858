import { randomUUID } from "node:crypto";
import { Redis } from "ioredis";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { WindowCheck } from "@tollgate/shared";
import { RedisScriptManager } from "../../apps/api/src/redis/scripts.js";
import { RedisWindowStore } from "../../apps/api/src/stores/redis-window-store.js";

const runIntegration = process.env.RUN_INTEGRATION === "1";

describe.runIf(runIntegration)("RedisWindowStore (Lua)", () => {
  const redisUrl = process.env.REDIS_URL ?? "redis://localhost:6379";
  const redis = new Redis(redisUrl);
  const scripts = new RedisScriptManager(redis);
  const store = new RedisWindowStore({ redis, scripts, graceSeconds: 5, keyPrefix: `tollgate-test:${randomUUID()}` });

  // Aligned to the start of a 60s window so every check below lands in the same one.
  const windowStart = 1_741_608_000_000;

  const check = (subject: string, overrides: Partial<WindowCheck> = {}): WindowCheck => ({
    scope: "ip",
    subject,
    limit: 3,
    windowSeconds: 60,
    nowMs: windowStart + 1_000,
    ...overrides
  });

  beforeAll(async () => {
    await redis.ping();
    await scripts.loadScripts();
  });

  afterAll(async () => {
    await redis.quit();
  });

  it("blocks after the limit without counting the rejected attempt", async () => {
    const subject = `ip-${randomUUID()}`;

    const decisions = [];
    for (let i = 0; i < 4; i += 1) {
      decisions.push(await store.checkAndIncrement(check(subject)));
    }

    expect(decisions.map((decision) => decision.allowed)).toEqual([true, true, true, false]);
    expect(decisions[3]).toMatchObject({ count: 3, remaining: 0, resetSeconds: 59, windowStart });
  });

  it("admits exactly the limit under concurrent checks", async () => {
    const subject = `ip-${randomUUID()}`;

    const decisions = await Promise.all(
      Array.from({ length: 25 }, () => store.checkAndIncrement(check(subject, { limit: 10 })))
    );

    expect(decisions.filter((decision) => decision.allowed)).toHaveLength(10);
    expect((await store.peek("ip", subject, windowStart + 1_000))?.count).toBe(10);
  });

  it("starts a fresh count in the next window", async () => {
    const subject = `ip-${randomUUID()}`;
    for (let i = 0; i < 3; i += 1) {
      await store.checkAndIncrement(check(subject));
    }

    const next = await store.checkAndIncrement(check(subject, { nowMs: windowStart + 60_000 }));

    expect(next).toMatchObject({ allowed: true, count: 1, windowStart: windowStart + 60_000 });
  });

  it("peeks and resets a subject", async () => {
    const subject = `user-${randomUUID()}`;
    await store.checkAndIncrement(check(subject, { scope: "identity" }));

    expect(await store.peek("identity", subject, windowStart + 1_000)).toEqual({
      scope: "identity",
      subject,
      windowStart,
      windowSize: 60,
      count: 1,
      limit: 3
    });
    expect(await store.reset("identity", subject)).toBe(true);
    expect(await store.peek("identity", subject, windowStart + 1_000)).toBeNull();
    expect(await store.reset("identity", subject)).toBe(false);
  });

  it("reports healthy while Redis answers", async () => {
    expect(await store.healthcheck()).toBe(true);
  });
});

import { describe, expect, it, vi } from "vitest";
import type { QuotaAuditRecord } from "@tollgate/shared";
import { buildUsageView } from "../../apps/api/src/services/quota-resolver.js";
import { standingFor } from "../../apps/api/src/services/standing.js";
import { InMemoryQuotaStore, type NewQuotaAudit } from "../../apps/api/src/stores/quota-store.js";
import { MARCH_10_NOON, createHarness } from "../support/fixtures.js";

class AuditlessQuotaStore extends InMemoryQuotaStore {
  protected override buildAudit(_input: NewQuotaAudit): QuotaAuditRecord {
    throw new Error("audit table unavailable");
  }
}

const FEBRUARY_15 = Date.UTC(2025, 1, 15, 9, 30, 0);

describe("buildUsageView", () => {
  it("keeps percentage, warning and exceeded consistent", () => {
    for (const limit of [1, 3, 7, 100, 1000]) {
      for (let used = 0; used <= limit + 2; used += 1) {
        const view = buildUsageView({
          organizationId: "org",
          resourceType: "calculations",
          plan: "free",
          used,
          limit,
          nowMs: MARCH_10_NOON
        });
        const percentage = view.percentage ?? 0;

        expect(view.warning && view.exceeded).toBe(false);
        expect(view.exceeded).toBe(used >= limit);
        if (view.exceeded) {
          expect(percentage).toBeGreaterThanOrEqual(100);
        } else {
          expect(percentage).toBeLessThan(100);
        }
        if (view.warning) {
          expect(percentage).toBeGreaterThanOrEqual(80);
        }
      }
    }
  });

  it("floors the percentage to one decimal", () => {
    const view = buildUsageView({
      organizationId: "org",
      resourceType: "calculations",
      plan: "free",
      used: 6,
      limit: 7,
      nowMs: MARCH_10_NOON
    });

    expect(view.percentage).toBe(85.7);
    expect(view.standing).toBe("warning_zone");
  });

  it("represents unlimited plans without numeric limits", () => {
    const view = buildUsageView({
      organizationId: "org",
      resourceType: "comparisons",
      plan: "enterprise",
      used: 5_000_000,
      limit: "unlimited",
      nowMs: MARCH_10_NOON
    });

    expect(view).toMatchObject({
      limit: null,
      unlimited: true,
      remaining: null,
      percentage: null,
      warning: false,
      exceeded: false,
      standing: "under_limit"
    });
  });

  it("reports the calendar period", () => {
    const view = buildUsageView({
      organizationId: "org",
      resourceType: "calculations",
      plan: "free",
      used: 0,
      limit: 100,
      nowMs: MARCH_10_NOON
    });

    expect(view.periodStart).toBe("2025-03-01T00:00:00.000Z");
    expect(view.resetsAt).toBe("2025-04-01T00:00:00.000Z");
    expect(view.resetsInDays).toBe(21);
  });
});

describe("standingFor", () => {
  it("switches to warning at 80% and blocked at the limit", () => {
    expect(standingFor(79, 100)).toBe("under_limit");
    expect(standingFor(80, 100)).toBe("warning_zone");
    expect(standingFor(99, 100)).toBe("warning_zone");
    expect(standingFor(100, 100)).toBe("blocked");
    expect(standingFor(0, 0)).toBe("blocked");
  });
});

describe("QuotaResolver", () => {
  it("meters the 100th unit and refuses the 101st", async () => {
    const { quotas, violations, violationStore } = createHarness();

    const warming = await quotas.recordUsage({
      organizationId: "org-free",
      resourceType: "calculations",
      units: 99,
      endpoint: "/v1/calculations",
      nowMs: MARCH_10_NOON
    });
    expect(warming.view).toMatchObject({ used: 99, percentage: 99, warning: true, exceeded: false });

    const hundredth = await quotas.recordUsage({
      organizationId: "org-free",
      resourceType: "calculations",
      units: 1,
      endpoint: "/v1/calculations",
      nowMs: MARCH_10_NOON
    });
    expect(hundredth.applied).toBe(true);
    expect(hundredth.view).toMatchObject({ used: 100, percentage: 100, warning: false, exceeded: true, remaining: 0 });

    const refused = await quotas.recordUsage({
      organizationId: "org-free",
      resourceType: "calculations",
      units: 1,
      endpoint: "/v1/calculations",
      nowMs: MARCH_10_NOON
    });
    expect(refused.applied).toBe(false);
    expect(refused.view.used).toBe(100);

    await violations.flush();
    const logged = await violationStore.list({ subject: "org-free" });
    expect(logged).toHaveLength(1);
    expect(logged[0]).toMatchObject({ scope: "organization", limit: 100, observedCount: 101, endpoint: "/v1/calculations" });
  });

  it("notifies each standing transition once", async () => {
    const { quotas, notifier } = createHarness();
    const record = (units: number) =>
      quotas.recordUsage({
        organizationId: "org-free",
        resourceType: "calculations",
        units,
        endpoint: "/v1/calculations",
        nowMs: MARCH_10_NOON
      });

    await record(79);
    await record(1);
    await record(10);
    await record(10);

    expect(notifier.transitions.map((transition) => `${transition.from}->${transition.to}`)).toEqual([
      "under_limit->warning_zone",
      "warning_zone->blocked"
    ]);
    expect(notifier.transitions[0]).toMatchObject({ layer: "organization", subject: "org-free", resourceType: "calculations", used: 80 });
  });

  it("never refuses usage on an unlimited plan", async () => {
    const { quotas } = createHarness({ plans: { "org-ent": "enterprise" } });

    const result = await quotas.recordUsage({
      organizationId: "org-ent",
      resourceType: "comparisons",
      units: 1_000_000,
      endpoint: "/v1/comparisons",
      nowMs: MARCH_10_NOON
    });

    expect(result.applied).toBe(true);
    expect(result.view).toMatchObject({ used: 1_000_000, unlimited: true, exceeded: false, limit: null });
  });

  it("resets only the current period and writes one audit record", async () => {
    const { quotas, quotaStore } = createHarness();
    await quotas.recordUsage({
      organizationId: "org-free",
      resourceType: "calculations",
      units: 30,
      endpoint: "/v1/calculations",
      nowMs: FEBRUARY_15
    });
    await quotas.recordUsage({
      organizationId: "org-free",
      resourceType: "calculations",
      units: 100,
      endpoint: "/v1/calculations",
      nowMs: MARCH_10_NOON
    });

    const result = await quotas.resetQuota({
      organizationId: "org-free",
      resourceType: "calculations",
      actor: "ops@example.test",
      reason: "billing dispute",
      nowMs: MARCH_10_NOON
    });

    expect(result.previousUsed).toBe(100);
    expect(result.view).toMatchObject({ used: 0, exceeded: false });
    expect(result.audit).toMatchObject({
      kind: "admin_reset",
      previousUsed: 100,
      actor: "ops@example.test",
      reason: "billing dispute",
      periodStart: "2025-03-01T00:00:00.000Z"
    });

    const february = await quotaStore.getUsage({
      organizationId: "org-free",
      resourceType: "calculations",
      periodStart: "2025-02-01T00:00:00.000Z"
    });
    expect(february).toBe(30);

    const resets = (await quotas.listAudit({ organizationId: "org-free" })).filter((record) => record.kind === "admin_reset");
    expect(resets).toHaveLength(1);
  });

  it("leaves recorded violations untouched by a reset", async () => {
    const { quotas, violations } = createHarness();
    const record = (units: number) =>
      quotas.recordUsage({
        organizationId: "org-free",
        resourceType: "calculations",
        units,
        endpoint: "/v1/calculations",
        nowMs: MARCH_10_NOON
      });
    await record(95);
    await record(10);
    await record(6);
    await violations.flush();
    const before = await violations.violationsFor("org-free");
    expect(before).toHaveLength(2);

    await quotas.resetQuota({ organizationId: "org-free", resourceType: "calculations", actor: "ops", nowMs: MARCH_10_NOON });
    await violations.flush();

    expect(await violations.violationsFor("org-free")).toEqual(before);
  });

  it("resets without a separate audit write", async () => {
    const { quotas, quotaStore } = createHarness();
    await quotas.recordUsage({
      organizationId: "org-free",
      resourceType: "calculations",
      units: 60,
      endpoint: "/v1/calculations",
      nowMs: MARCH_10_NOON
    });
    vi.spyOn(quotaStore, "appendAudit").mockRejectedValue(new Error("db down"));

    const result = await quotas.resetQuota({ organizationId: "org-free", resourceType: "calculations", actor: "ops", nowMs: MARCH_10_NOON });

    expect(result).toMatchObject({ previousUsed: 60, view: { used: 0 }, audit: { kind: "admin_reset", previousUsed: 60 } });
    expect(await quotas.listAudit({ organizationId: "org-free" })).toHaveLength(1);
  });

  it("keeps usage when the reset cannot be audited", async () => {
    const { quotas } = createHarness({ quotaStore: new AuditlessQuotaStore() });
    await quotas.recordUsage({
      organizationId: "org-free",
      resourceType: "calculations",
      units: 60,
      endpoint: "/v1/calculations",
      nowMs: MARCH_10_NOON
    });

    await expect(
      quotas.resetQuota({ organizationId: "org-free", resourceType: "calculations", actor: "ops", nowMs: MARCH_10_NOON })
    ).rejects.toThrow("audit table unavailable");

    expect((await quotas.resolve("org-free", "calculations", MARCH_10_NOON)).used).toBe(60);
    expect(await quotas.listAudit({ organizationId: "org-free" })).toEqual([]);
  });

  it("audits the rollover when a reset opens the period", async () => {
    const { quotas } = createHarness();
    const record = (nowMs: number) =>
      quotas.recordUsage({
        organizationId: "org-free",
        resourceType: "calculations",
        units: 40,
        endpoint: "/v1/calculations",
        nowMs
      });

    await record(FEBRUARY_15);
    await quotas.resetQuota({ organizationId: "org-free", resourceType: "calculations", actor: "ops", nowMs: MARCH_10_NOON });
    await record(MARCH_10_NOON);

    const audit = await quotas.listAudit({ organizationId: "org-free" });
    expect(audit.map((entry) => [entry.kind, entry.previousUsed, entry.periodStart])).toEqual([
      ["period_rollover", 40, "2025-03-01T00:00:00.000Z"],
      ["admin_reset", 0, "2025-03-01T00:00:00.000Z"]
    ]);
  });

  it("starts a new period from zero and audits the rollover once", async () => {
    const { quotas } = createHarness();
    const record = (nowMs: number) =>
      quotas.recordUsage({
        organizationId: "org-free",
        resourceType: "calculations",
        units: 40,
        endpoint: "/v1/calculations",
        nowMs
      });

    await record(FEBRUARY_15);
    const march = await record(MARCH_10_NOON);
    await record(MARCH_10_NOON);

    expect(march.view.used).toBe(40);

    const audit = await quotas.listAudit({ organizationId: "org-free" });
    expect(audit).toHaveLength(1);
    expect(audit[0]).toMatchObject({
      kind: "period_rollover",
      previousUsed: 40,
      actor: "system",
      periodStart: "2025-03-01T00:00:00.000Z",
      reason: "rolled over from period 2025-02-01T00:00:00.000Z"
    });
  });

  it("lists usage for every resource type", async () => {
    const { quotas } = createHarness({ plans: { "org-pro": "pro" } });
    await quotas.recordUsage({
      organizationId: "org-pro",
      resourceType: "comparisons",
      units: 5,
      endpoint: "/v1/comparisons",
      nowMs: MARCH_10_NOON
    });

    const usage = await quotas.listUsage("org-pro", MARCH_10_NOON);

    expect(usage.map((view) => [view.resourceType, view.used, view.limit])).toEqual([
      ["calculations", 0, 1000],
      ["comparisons", 5, 500]
    ]);
  });

  it("applies the free plan to organizations billing does not know", async () => {
    const { quotas } = createHarness({ plans: {} });

    const view = await quotas.resolve("org-unknown", "calculations", MARCH_10_NOON);

    expect(view.plan).toBe("free");
    expect(view.limit).toBe(100);
  });
});

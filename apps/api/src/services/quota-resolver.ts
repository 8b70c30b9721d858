import type { FastifyBaseLogger } from "fastify";
import {
  RESOURCE_TYPES,
  UNLIMITED,
  type Limit,
  type PlanTier,
  type QuotaAuditRecord,
  type ResourceType,
  type UsageView
} from "@tollgate/shared";
import type { QuotaAuditFilter, QuotaKey, QuotaStore } from "../stores/quota-store.js";
import { daysUntilNextPeriod, nextPeriodStart, periodStartOf } from "./periods.js";
import type { PlanCatalog } from "./plan-catalog.js";
import type { PlanResolver } from "./plan-resolver.js";
import { emitTransition, standingFor, type StandingNotifier } from "./standing.js";
import type { ViolationRecorder } from "./violation-recorder.js";

export interface UsageViewInput {
  organizationId: string;
  resourceType: ResourceType;
  plan: PlanTier;
  used: number;
  limit: Limit;
  nowMs: number;
}

/**
 * Percentage is floored to one decimal so that the warning band never
 * displays as 100 and an exceeded quota never displays below 100.
 */
export function buildUsageView(input: UsageViewInput): UsageView {
  const base = {
    organizationId: input.organizationId,
    resourceType: input.resourceType,
    plan: input.plan,
    used: input.used,
    periodStart: periodStartOf(input.nowMs).toISOString(),
    resetsAt: nextPeriodStart(input.nowMs).toISOString(),
    resetsInDays: daysUntilNextPeriod(input.nowMs)
  };

  if (input.limit === UNLIMITED) {
    return {
      ...base,
      limit: null,
      unlimited: true,
      remaining: null,
      percentage: null,
      warning: false,
      exceeded: false,
      standing: "under_limit"
    };
  }

  const limit = input.limit;
  const standing = standingFor(input.used, limit);
  const percentage = limit > 0 ? Math.floor((input.used * 1000) / limit) / 10 : 100;

  return {
    ...base,
    limit,
    unlimited: false,
    remaining: Math.max(limit - input.used, 0),
    percentage,
    warning: standing === "warning_zone",
    exceeded: standing === "blocked",
    standing
  };
}

export interface QuotaResolverDeps {
  store: QuotaStore;
  plans: PlanResolver;
  catalog: PlanCatalog;
  violations: ViolationRecorder;
  notifier: StandingNotifier;
  logger: FastifyBaseLogger;
}

export interface RecordUsageInput {
  organizationId: string;
  resourceType: ResourceType;
  units: number;
  endpoint: string;
  nowMs?: number;
}

export interface RecordUsageResult {
  applied: boolean;
  view: UsageView;
}

export interface ResetQuotaInput {
  organizationId: string;
  resourceType: ResourceType;
  actor: string;
  reason?: string | null;
  nowMs?: number;
}

export interface ResetQuotaResult {
  previousUsed: number;
  audit: QuotaAuditRecord;
  view: UsageView;
}

/** Sole writer of quota usage rows and their audit trail. */
export class QuotaResolver {
  constructor(private readonly deps: QuotaResolverDeps) {}

  private async limitFor(organizationId: string, resourceType: ResourceType, nowMs: number) {
    const plan = await this.deps.plans.resolvePlan(organizationId, nowMs);
    return { plan, limit: this.deps.catalog.planLimit(plan, resourceType) };
  }

  private keyFor(organizationId: string, resourceType: ResourceType, nowMs: number): QuotaKey {
    return { organizationId, resourceType, periodStart: periodStartOf(nowMs).toISOString() };
  }

  async resolve(organizationId: string, resourceType: ResourceType, nowMs: number = Date.now()): Promise<UsageView> {
    const [{ plan, limit }, used] = await Promise.all([
      this.limitFor(organizationId, resourceType, nowMs),
      this.deps.store.getUsage(this.keyFor(organizationId, resourceType, nowMs))
    ]);

    return buildUsageView({ organizationId, resourceType, plan, used, limit, nowMs });
  }

  async listUsage(organizationId: string, nowMs: number = Date.now()): Promise<UsageView[]> {
    return Promise.all(RESOURCE_TYPES.map((resourceType) => this.resolve(organizationId, resourceType, nowMs)));
  }

  /**
   * Meters billable units after business logic has run. The increment is
   * refused when it would pass the limit (two requests admitted at
   * `limit - 1` cannot both land); a refusal is logged as a quota violation.
   */
  async recordUsage(input: RecordUsageInput): Promise<RecordUsageResult> {
    const nowMs = input.nowMs ?? Date.now();
    const { plan, limit } = await this.limitFor(input.organizationId, input.resourceType, nowMs);
    const key = this.keyFor(input.organizationId, input.resourceType, nowMs);

    const result = await this.deps.store.incrementUsage({
      ...key,
      units: input.units,
      limit: limit === UNLIMITED ? null : limit
    });

    const view = buildUsageView({ ...key, plan, used: result.used, limit, nowMs });

    if (!result.applied) {
      this.deps.violations.record({
        subject: input.organizationId,
        scope: "organization",
        limit: view.limit ?? 0,
        observedCount: result.used + input.units,
        endpoint: input.endpoint,
        userAgent: null
      });
      return { applied: false, view };
    }

    // The increment has landed; nothing below may turn it into a failure.
    if (result.created) {
      await this.auditRollover(key);
    }

    if (view.limit !== null) {
      const before = standingFor(result.used - input.units, view.limit);
      if (before !== view.standing) {
        emitTransition(
          this.deps.notifier,
          {
            layer: "organization",
            subject: input.organizationId,
            resourceType: input.resourceType,
            from: before,
            to: view.standing,
            used: view.used,
            limit: view.limit,
            at: new Date(nowMs).toISOString()
          },
          this.deps.logger
        );
      }
    }

    return { applied: true, view };
  }

  /** Zeroes the current period only and writes exactly one admin_reset audit record. */
  async resetQuota(input: ResetQuotaInput): Promise<ResetQuotaResult> {
    const nowMs = input.nowMs ?? Date.now();
    const key = this.keyFor(input.organizationId, input.resourceType, nowMs);

    const { previousUsed, created, audit } = await this.deps.store.resetUsage({
      ...key,
      actor: input.actor,
      reason: input.reason ?? null
    });

    this.deps.logger.warn(
      {
        organizationId: input.organizationId,
        resourceType: input.resourceType,
        periodStart: key.periodStart,
        previousUsed,
        actor: input.actor,
        auditId: audit.id
      },
      "Quota reset by administrator"
    );

    // A reset can be the first write of a new period; the rollover is still recorded.
    if (created) {
      await this.auditRollover(key);
    }

    const view = await this.resolve(input.organizationId, input.resourceType, nowMs);
    return { previousUsed, audit, view };
  }

  async listAudit(filter: QuotaAuditFilter): Promise<QuotaAuditRecord[]> {
    return this.deps.store.listAudit(filter);
  }

  /** Records the rollover into `key`'s period; a failure is logged and not raised. */
  private async auditRollover(key: QuotaKey): Promise<void> {
    try {
      const previous = await this.deps.store.latestPeriodBefore(key);
      if (!previous) {
        return;
      }

      await this.deps.store.appendAudit({
        ...key,
        kind: "period_rollover",
        previousUsed: previous.used,
        actor: "system",
        reason: `rolled over from period ${previous.periodStart}`
      });
    } catch (error) {
      this.deps.logger.error({ err: error, ...key }, "Failed to record quota period rollover");
    }
  }
}

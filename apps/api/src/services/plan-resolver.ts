import type { FastifyBaseLogger } from "fastify";
import type { PlanTier } from "@tollgate/shared";
import type { BillingDirectory, BillingEvents, PlanChangeEvent } from "../stores/billing-directory.js";
import type { MetricsService } from "./metrics.js";

interface CachedPlan {
  plan: PlanTier;
  expiresAt: number;
}

export const FALLBACK_PLAN: PlanTier = "free";

/**
 * TTL cache in front of the billing directory. Plan-change events replace the
 * cached entry immediately, so a stale plan can outlive a change by at most
 * one TTL when an event is lost.
 */
export class PlanResolver {
  private readonly cache = new Map<string, CachedPlan>();

  constructor(
    private readonly directory: BillingDirectory,
    private readonly ttlMs: number,
    private readonly metrics: MetricsService,
    private readonly logger: FastifyBaseLogger
  ) {}

  subscribe(events: BillingEvents): () => void {
    return events.onPlanChanged((event) => this.handlePlanChange(event));
  }

  handlePlanChange(event: PlanChangeEvent, nowMs: number = Date.now()): void {
    this.cache.set(event.organizationId, {
      plan: event.plan,
      expiresAt: nowMs + this.ttlMs
    });
    this.logger.info({ organizationId: event.organizationId, plan: event.plan }, "Organization plan changed");
  }

  invalidateOrganization(organizationId: string): void {
    this.cache.delete(organizationId);
  }

  async resolvePlan(organizationId: string, nowMs: number = Date.now()): Promise<PlanTier> {
    const cached = this.cache.get(organizationId);
    if (cached && cached.expiresAt > nowMs) {
      this.metrics.planCacheHitsTotal.inc();
      return cached.plan;
    }

    this.metrics.planCacheMissesTotal.inc();
    const plan = await this.directory.getOrganizationPlan(organizationId);
    if (plan === null) {
      // Not cached: an organization created after this lookup gets its real plan on the next request.
      this.logger.warn({ organizationId, fallbackPlan: FALLBACK_PLAN }, "Organization has no plan on record");
      return FALLBACK_PLAN;
    }

    if (this.ttlMs > 0) {
      this.cache.set(organizationId, { plan, expiresAt: nowMs + this.ttlMs });
    }
    return plan;
  }
}

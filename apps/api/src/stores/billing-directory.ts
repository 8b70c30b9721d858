import { EventEmitter } from "node:events";
import type { FastifyBaseLogger } from "fastify";
import { ConfigurationError, PLAN_TIERS, type PlanTier } from "@tollgate/shared";
import type { Pool } from "../db/pool.js";

/**
 * Read side of the billing collaborator: which plan an organization is on.
 * The billing system owns this data; this service never writes it back.
 */
export interface BillingDirectory {
  /** Checks the directory against the limits catalog; throws `ConfigurationError` on a mismatch. */
  init(): Promise<void>;
  getOrganizationPlan(organizationId: string): Promise<PlanTier | null>;
}

export interface PlanChangeEvent {
  organizationId: string;
  plan: PlanTier;
  changedAt: string;
}

const PLAN_CHANGED = "plan.changed";

/** In-process bus for billing events; subscribers are called synchronously in registration order. */
export class BillingEvents {
  private readonly emitter = new EventEmitter();

  onPlanChanged(listener: (event: PlanChangeEvent) => void): () => void {
    this.emitter.on(PLAN_CHANGED, listener);
    return () => {
      this.emitter.off(PLAN_CHANGED, listener);
    };
  }

  emitPlanChanged(event: PlanChangeEvent): void {
    this.emitter.emit(PLAN_CHANGED, event);
  }
}

export function isPlanTier(value: unknown): value is PlanTier {
  return PLAN_TIERS.some((tier) => tier === value);
}

export function assertKnownPlanTiers(plans: readonly string[]): void {
  const unknown = plans.filter((plan) => !isPlanTier(plan));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `organizations.plan holds tiers missing from the limits catalog: ${unknown.join(", ")} (known: ${PLAN_TIERS.join(", ")})`
    );
  }
}

/**
 * Event-fed replica of the organization to plan mapping, for deployments
 * without a shared organizations table.
 */
export class InMemoryBillingDirectory implements BillingDirectory {
  private readonly plans = new Map<string, PlanTier>();

  constructor(seed: Record<string, PlanTier> = {}) {
    for (const [organizationId, plan] of Object.entries(seed)) {
      this.plans.set(organizationId, plan);
    }
  }

  async init(): Promise<void> {
    return;
  }

  subscribe(events: BillingEvents): () => void {
    return events.onPlanChanged((event) => {
      this.plans.set(event.organizationId, event.plan);
    });
  }

  async getOrganizationPlan(organizationId: string): Promise<PlanTier | null> {
    return this.plans.get(organizationId) ?? null;
  }

  setPlan(organizationId: string, plan: PlanTier): void {
    this.plans.set(organizationId, plan);
  }
}

/** Reads the denormalized `organizations.plan` column maintained by billing. */
export class PostgresBillingDirectory implements BillingDirectory {
  constructor(
    private readonly pool: Pool,
    private readonly logger: FastifyBaseLogger
  ) {}

  async init(): Promise<void> {
    const result = await this.pool.query<{ plan: string }>("SELECT DISTINCT plan FROM organizations");
    assertKnownPlanTiers(result.rows.map((row) => row.plan));
  }

  async getOrganizationPlan(organizationId: string): Promise<PlanTier | null> {
    const result = await this.pool.query<{ plan: string }>(
      "SELECT plan FROM organizations WHERE id = $1 LIMIT 1",
      [organizationId]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }

    if (!isPlanTier(row.plan)) {
      this.logger.error({ organizationId, plan: row.plan }, "Organization plan changed to a tier missing from the limits catalog");
      return null;
    }

    return row.plan;
  }
}

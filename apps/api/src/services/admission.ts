import type { FastifyBaseLogger } from "fastify";
import {
  UNLIMITED,
  type AdmissionContext,
  type AdmissionDecision,
  type AdmissionLayer,
  type LayerEvaluation,
  type OrganizationTarget,
  type ResourceType,
  type WindowScope
} from "@tollgate/shared";
import type { WindowStore } from "../stores/window-store.js";
import type { MetricsService } from "./metrics.js";
import type { PlanCatalog } from "./plan-catalog.js";
import type { QuotaResolver, RecordUsageResult } from "./quota-resolver.js";
import { emitTransition, standingFor, type StandingNotifier } from "./standing.js";
import type { StoreGuard } from "./store-guard.js";
import type { ViolationRecorder } from "./violation-recorder.js";

export interface AdmissionSettings {
  ipLimit: number;
  windowSeconds: number;
  upgradeUrl: string;
}

export interface AdmissionDeps {
  windows: WindowStore;
  guard: StoreGuard;
  catalog: PlanCatalog;
  quotas: QuotaResolver;
  violations: ViolationRecorder;
  notifier: StandingNotifier;
  metrics: MetricsService;
  logger: FastifyBaseLogger;
  settings: AdmissionSettings;
  clock?: () => number;
}

export interface ConsumptionInput {
  organizationId: string;
  resourceType: ResourceType;
  units: number;
  endpoint: string;
}

interface EvaluationCursor {
  layer: AdmissionLayer;
}

export type ConsumptionResult = (RecordUsageResult & { degraded: false }) | { applied: false; degraded: true; view: null };

/**
 * Evaluates the IP, identity and organization layers in that order. The first
 * rejection stops evaluation; window counters of layers already passed keep
 * the attempt they counted. The organization layer only reads usage here:
 * usage grows through `recordConsumption` once business logic has run.
 */
export class AdmissionService {
  private readonly clock: () => number;

  constructor(private readonly deps: AdmissionDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  get settings(): AdmissionSettings {
    return this.deps.settings;
  }

  async admit(context: AdmissionContext): Promise<AdmissionDecision> {
    const start = process.hrtime.bigint();
    const nowMs = this.clock();
    const layers: LayerEvaluation[] = [];
    const cursor: EvaluationCursor = { layer: "ip" };

    let decision: AdmissionDecision;
    try {
      decision = await this.evaluateLayers(context, nowMs, layers, cursor, start);
    } catch (error) {
      // Anything not already handled by the store guard still ends as a decision,
      // attributed to the layer that was being evaluated when it failed.
      this.deps.logger.error(
        { err: error, correlationId: context.correlationId, layer: cursor.layer },
        "Admission evaluation failed"
      );
      decision = this.unavailableDecision(cursor.layer, layers, start);
    }

    this.observe(context, decision);
    return decision;
  }

  async recordConsumption(input: ConsumptionInput): Promise<ConsumptionResult> {
    const nowMs = this.clock();
    const outcome = await this.deps.guard.run("quota.increment", () =>
      this.deps.quotas.recordUsage({ ...input, nowMs })
    );

    if (!outcome.ok) {
      return { applied: false, degraded: true, view: null };
    }
    return { ...outcome.value, degraded: false };
  }

  private async evaluateLayers(
    context: AdmissionContext,
    nowMs: number,
    layers: LayerEvaluation[],
    cursor: EvaluationCursor,
    start: bigint
  ): Promise<AdmissionDecision> {
    cursor.layer = "ip";
    const ip = await this.evaluateWindow("ip", context.ip, this.deps.settings.ipLimit, nowMs, context);
    layers.push(ip);
    if (!ip.allowed) {
      return this.reject(ip, layers, start);
    }

    if (context.identity) {
      cursor.layer = "identity";
      const roleLimit = this.deps.catalog.roleLimit(context.identity.role);
      if (roleLimit !== UNLIMITED) {
        const identity = await this.evaluateWindow("identity", context.identity.id, roleLimit, nowMs, context);
        layers.push(identity);
        if (!identity.allowed) {
          return this.reject(identity, layers, start);
        }
      }
    }

    if (context.organization) {
      cursor.layer = "organization";
      const organization = await this.evaluateQuota(context.organization, nowMs, context);
      layers.push(organization);
      if (!organization.allowed) {
        return this.reject(organization, layers, start);
      }
    }

    return this.allow(layers, start);
  }

  private async evaluateWindow(
    scope: WindowScope,
    subject: string,
    limit: number,
    nowMs: number,
    context: AdmissionContext
  ): Promise<LayerEvaluation> {
    const outcome = await this.deps.guard.run("window.check", () =>
      this.deps.windows.checkAndIncrement({
        scope,
        subject,
        limit,
        windowSeconds: this.deps.settings.windowSeconds,
        nowMs
      })
    );

    if (!outcome.ok) {
      return this.degradedEvaluation(scope, subject, limit);
    }

    const result = outcome.value;
    const standing = standingFor(result.count, result.limit);

    if (!result.allowed) {
      this.deps.violations.record({
        subject,
        scope,
        limit: result.limit,
        observedCount: result.count + 1,
        endpoint: context.endpoint,
        userAgent: context.userAgent ?? null
      });
    } else {
      const before = standingFor(result.count - 1, result.limit);
      if (before !== standing) {
        emitTransition(
          this.deps.notifier,
          {
            layer: scope,
            subject,
            resourceType: null,
            from: before,
            to: standing,
            used: result.count,
            limit: result.limit,
            at: new Date(nowMs).toISOString()
          },
          this.deps.logger
        );
      }
    }

    return {
      layer: scope,
      subject,
      allowed: result.allowed,
      limit: result.limit,
      used: result.count,
      remaining: result.remaining,
      resetSeconds: result.resetSeconds,
      resetsInDays: null,
      standing,
      degraded: false
    };
  }

  private async evaluateQuota(
    target: OrganizationTarget,
    nowMs: number,
    context: AdmissionContext
  ): Promise<LayerEvaluation> {
    const outcome = await this.deps.guard.run("quota.read", () =>
      this.deps.quotas.resolve(target.id, target.resourceType, nowMs)
    );

    if (!outcome.ok) {
      return this.degradedEvaluation("organization", target.id, null);
    }

    const view = outcome.value;
    if (view.exceeded) {
      this.deps.violations.record({
        subject: target.id,
        scope: "organization",
        limit: view.limit ?? 0,
        observedCount: view.used + 1,
        endpoint: context.endpoint,
        userAgent: context.userAgent ?? null
      });
    }

    return {
      layer: "organization",
      subject: target.id,
      allowed: !view.exceeded,
      limit: view.limit,
      used: view.used,
      remaining: view.remaining,
      resetSeconds: null,
      resetsInDays: view.resetsInDays,
      standing: view.standing,
      degraded: false
    };
  }

  private degradedEvaluation(layer: AdmissionLayer, subject: string, limit: number | null): LayerEvaluation {
    const allowed = this.deps.guard.policy === "fail_open";
    return {
      layer,
      subject,
      allowed,
      limit,
      used: 0,
      remaining: null,
      resetSeconds: null,
      resetsInDays: null,
      standing: "under_limit",
      degraded: true
    };
  }

  private allow(layers: LayerEvaluation[], start: bigint): AdmissionDecision {
    // Headers describe the most specific window layer that ran.
    const windowLayer = [...layers].reverse().find((layer) => layer.layer !== "organization");

    return {
      allowed: true,
      rejectingLayer: null,
      reason: null,
      limit: windowLayer?.limit ?? null,
      used: windowLayer?.used ?? 0,
      remaining: windowLayer?.remaining ?? null,
      retryAfterSeconds: null,
      resetSeconds: windowLayer?.resetSeconds ?? null,
      resetsInDays: null,
      upgradeUrl: null,
      degraded: layers.some((layer) => layer.degraded),
      diagnostics: { layers, latencyMs: elapsedMs(start) }
    };
  }

  private reject(layer: LayerEvaluation, layers: LayerEvaluation[], start: bigint): AdmissionDecision {
    if (layer.degraded) {
      return this.unavailableDecision(layer.layer, layers, start);
    }

    const isQuota = layer.layer === "organization";
    return {
      allowed: false,
      rejectingLayer: layer.layer,
      reason: "limit_exceeded",
      limit: layer.limit,
      used: layer.used,
      remaining: 0,
      retryAfterSeconds: isQuota ? null : Math.max(1, layer.resetSeconds ?? 1),
      resetSeconds: layer.resetSeconds,
      resetsInDays: isQuota ? layer.resetsInDays : null,
      upgradeUrl: isQuota ? this.deps.settings.upgradeUrl : null,
      degraded: false,
      diagnostics: { layers, latencyMs: elapsedMs(start) }
    };
  }

  private unavailableDecision(layer: AdmissionLayer, layers: LayerEvaluation[], start: bigint): AdmissionDecision {
    if (this.deps.guard.policy === "fail_open") {
      return { ...this.allow(layers, start), degraded: true };
    }

    return {
      allowed: false,
      rejectingLayer: layer,
      reason: "store_unavailable",
      limit: null,
      used: 0,
      remaining: null,
      retryAfterSeconds: 1,
      resetSeconds: null,
      resetsInDays: null,
      upgradeUrl: null,
      degraded: true,
      diagnostics: { layers, latencyMs: elapsedMs(start) }
    };
  }

  private observe(context: AdmissionContext, decision: AdmissionDecision): void {
    const outcome = decision.allowed ? "allowed" : "rejected";
    this.deps.metrics.checksTotal.inc({ outcome });
    this.deps.metrics.latencyMs.observe({ outcome }, decision.diagnostics.latencyMs);

    if (!decision.allowed && decision.rejectingLayer) {
      this.deps.metrics.rejectionsTotal.inc({
        layer: decision.rejectingLayer,
        reason: decision.reason ?? "limit_exceeded"
      });
    }

    this.deps.logger.info(
      {
        correlationId: context.correlationId,
        ip: context.ip,
        identityId: context.identity?.id,
        organizationId: context.organization?.id,
        endpoint: context.endpoint,
        allowed: decision.allowed,
        rejectingLayer: decision.rejectingLayer,
        reason: decision.reason,
        degraded: decision.degraded,
        latencyMs: decision.diagnostics.latencyMs
      },
      "Admission decision"
    );
  }
}

function elapsedMs(start: bigint): number {
  return Number(process.hrtime.bigint() - start) / 1_000_000;
}

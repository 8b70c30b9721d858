import { timingSafeEqual } from "node:crypto";
import { z } from "zod";
import type { FastifyInstance, FastifyRequest } from "fastify";
import { ADMISSION_LAYERS, ConfigurationError, PLAN_TIERS, RESOURCE_TYPES } from "@tollgate/shared";
import type { BillingEvents } from "../stores/billing-directory.js";
import type { WindowStore } from "../stores/window-store.js";
import type { PlanCatalog } from "../services/plan-catalog.js";
import type { QuotaResolver } from "../services/quota-resolver.js";
import type { ViolationRecorder } from "../services/violation-recorder.js";
import { withSpan } from "../telemetry/tracing.js";

interface AdminDeps {
  token: string;
  violations: ViolationRecorder;
  quotas: QuotaResolver;
  catalog: PlanCatalog;
  billingEvents: BillingEvents;
  windows: WindowStore;
  clock: () => number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const pageLimit = z.coerce.number().int().positive().max(1000);

const violationQuerySchema = z.object({
  subject: z.string().min(1).optional(),
  scope: z.enum(ADMISSION_LAYERS).optional(),
  since: z.coerce.date().optional(),
  until: z.coerce.date().optional(),
  limit: pageLimit.optional()
});

const topQuerySchema = z.object({
  since: z.coerce.date().optional(),
  limit: pageLimit.optional()
});

const subjectParamsSchema = z.object({ subject: z.string().min(1) });
const organizationParamsSchema = z.object({ organizationId: z.string().min(1) });
const windowParamsSchema = z.object({
  scope: z.enum(["ip", "identity"]),
  subject: z.string().min(1)
});

const quotaResetSchema = z.object({
  organizationId: z.string().min(1),
  resourceType: z.enum(RESOURCE_TYPES),
  reason: z.string().min(1).max(500).optional()
});

const auditQuerySchema = z.object({
  organizationId: z.string().min(1).optional(),
  resourceType: z.enum(RESOURCE_TYPES).optional(),
  limit: pageLimit.optional()
});

const planChangedSchema = z.object({
  organizationId: z.string().min(1),
  plan: z.enum(PLAN_TIERS),
  changedAt: z.string().datetime().optional()
});

function requireAdminToken(request: FastifyRequest, token: string): boolean {
  const provided = request.headers["x-admin-token"];
  if (!provided || typeof provided !== "string") {
    return false;
  }
  const expected = Buffer.from(token);
  const actual = Buffer.from(provided);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

function adminActor(request: FastifyRequest): string {
  const actor = request.headers["x-admin-actor"];
  return typeof actor === "string" && actor.length > 0 ? actor : "admin";
}

export async function registerAdminRoutes(fastify: FastifyInstance, deps: AdminDeps): Promise<void> {
  fastify.register(async (admin) => {
    admin.addHook("preHandler", async (request, reply) => {
      if (!requireAdminToken(request, deps.token)) {
        return reply.status(401).send({ error: "unauthorized" });
      }
    });

    admin.get("/v1/admin/violations", async (request, reply) => {
      const parsed = violationQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        reply.status(400);
        return { error: "validation_error", details: parsed.error.flatten() };
      }

      const violations = await deps.violations.listViolations(parsed.data);
      return { count: violations.length, violations };
    });

    admin.get("/v1/admin/violations/top", async (request, reply) => {
      const parsed = topQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        reply.status(400);
        return { error: "validation_error", details: parsed.error.flatten() };
      }

      const since = parsed.data.since ?? new Date(deps.clock() - DAY_MS);
      const violators = await deps.violations.topViolators({ since, limit: parsed.data.limit });
      return { since: since.toISOString(), violators };
    });

    admin.get("/v1/admin/violations/:subject", async (request, reply) => {
      const params = subjectParamsSchema.safeParse(request.params);
      const query = violationQuerySchema.omit({ subject: true }).safeParse(request.query);
      if (!params.success || !query.success) {
        reply.status(400);
        return {
          error: "validation_error",
          details: params.success ? query.error?.flatten() : params.error.flatten()
        };
      }

      const violations = await deps.violations.violationsFor(params.data.subject, query.data);
      return { subject: params.data.subject, count: violations.length, violations };
    });

    admin.get("/v1/admin/organizations/:organizationId/usage", async (request, reply) => {
      const parsed = organizationParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        reply.status(400);
        return { error: "validation_error", details: parsed.error.flatten() };
      }

      const usage = await withSpan("admin.organization_usage", { "organization.id": parsed.data.organizationId }, async () =>
        deps.quotas.listUsage(parsed.data.organizationId, deps.clock())
      );
      return { organizationId: parsed.data.organizationId, usage };
    });

    admin.post("/v1/admin/quotas/reset", async (request, reply) => {
      const parsed = quotaResetSchema.safeParse(request.body);
      if (!parsed.success) {
        reply.status(400);
        return { error: "validation_error", details: parsed.error.flatten() };
      }

      const result = await withSpan(
        "admin.quota_reset",
        {
          "organization.id": parsed.data.organizationId,
          "quota.resource_type": parsed.data.resourceType
        },
        async () => deps.quotas.resetQuota({ ...parsed.data, actor: adminActor(request), nowMs: deps.clock() })
      );

      return result;
    });

    admin.get("/v1/admin/quotas/audit", async (request, reply) => {
      const parsed = auditQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        reply.status(400);
        return { error: "validation_error", details: parsed.error.flatten() };
      }

      const records = await deps.quotas.listAudit(parsed.data);
      return { count: records.length, records };
    });

    admin.get("/v1/admin/windows/:scope/:subject", async (request, reply) => {
      const parsed = windowParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        reply.status(400);
        return { error: "validation_error", details: parsed.error.flatten() };
      }

      const window = await deps.windows.peek(parsed.data.scope, parsed.data.subject, deps.clock());
      if (!window) {
        reply.status(404);
        return { error: "window_not_found" };
      }
      return window;
    });

    admin.delete("/v1/admin/windows/:scope/:subject", async (request, reply) => {
      const parsed = windowParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        reply.status(400);
        return { error: "validation_error", details: parsed.error.flatten() };
      }

      const removed = await deps.windows.reset(parsed.data.scope, parsed.data.subject);
      request.log.warn({ ...parsed.data, actor: adminActor(request), removed }, "Rate window reset by administrator");
      return { removed };
    });

    admin.post("/v1/admin/plans/reload", async (_request, reply) => {
      try {
        await deps.catalog.reload();
      } catch (error) {
        if (error instanceof ConfigurationError) {
          reply.status(422);
          return { error: "invalid_catalog", message: error.message };
        }
        throw error;
      }

      return deps.catalog.describe();
    });

    admin.post("/v1/admin/billing/plan-changed", async (request, reply) => {
      const parsed = planChangedSchema.safeParse(request.body);
      if (!parsed.success) {
        reply.status(400);
        return { error: "validation_error", details: parsed.error.flatten() };
      }

      deps.billingEvents.emitPlanChanged({
        organizationId: parsed.data.organizationId,
        plan: parsed.data.plan,
        changedAt: parsed.data.changedAt ?? new Date(deps.clock()).toISOString()
      });

      reply.status(202);
      return { accepted: true };
    });
  });
}

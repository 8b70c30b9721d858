import { z } from "zod";
import type { FastifyInstance } from "fastify";
import { RESOURCE_TYPES, ROLES, type AdmissionContext } from "@tollgate/shared";
import {
  buildDenyPayload,
  buildQuotaDenyPayload,
  denyStatusCode,
  setAdmissionHeaders
} from "../http/admission-response.js";
import type { AdmissionService } from "../services/admission.js";
import { annotateDecision, withSpan } from "../telemetry/tracing.js";

const checkSchema = z.object({
  ip: z.string().min(1),
  identity: z
    .object({
      id: z.string().min(1),
      role: z.enum(ROLES)
    })
    .optional(),
  organization: z
    .object({
      id: z.string().min(1),
      resourceType: z.enum(RESOURCE_TYPES)
    })
    .optional(),
  endpoint: z.string().min(1),
  userAgent: z.string().optional()
});

const consumeSchema = z.object({
  organizationId: z.string().min(1),
  resourceType: z.enum(RESOURCE_TYPES),
  units: z.coerce.number().int().positive().default(1),
  endpoint: z.string().min(1).default("/v1/admission/consume")
});

export async function registerAdmissionRoutes(fastify: FastifyInstance, admission: AdmissionService): Promise<void> {
  fastify.post("/v1/admission/check", async (request, reply) => {
    const parsed = checkSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return {
        error: "validation_error",
        details: parsed.error.flatten()
      };
    }

    const context: AdmissionContext = { ...parsed.data, correlationId: request.correlationId };

    const decision = await withSpan(
      "admission.check",
      {
        "admission.ip": context.ip,
        "admission.endpoint": context.endpoint,
        "admission.identity_id": context.identity?.id ?? "anonymous",
        "admission.organization_id": context.organization?.id ?? "none"
      },
      async () => {
        const result = await admission.admit(context);
        annotateDecision(result);
        return result;
      }
    );

    setAdmissionHeaders(reply, decision);

    if (!decision.allowed) {
      reply.status(denyStatusCode(decision));
      return {
        allowed: false,
        ...buildDenyPayload(decision, context, admission.settings.windowSeconds)
      };
    }

    return {
      allowed: true,
      limit: decision.limit,
      used: decision.used,
      remaining: decision.remaining,
      resetSeconds: decision.resetSeconds,
      degraded: decision.degraded,
      diagnostics: decision.diagnostics
    };
  });

  fastify.post("/v1/admission/consume", async (request, reply) => {
    const parsed = consumeSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return {
        error: "validation_error",
        details: parsed.error.flatten()
      };
    }

    const input = parsed.data;
    const result = await withSpan(
      "admission.consume",
      {
        "admission.organization_id": input.organizationId,
        "admission.resource_type": input.resourceType,
        "admission.units": input.units
      },
      async () => admission.recordConsumption(input)
    );

    if (result.degraded) {
      return { applied: false, degraded: true, usage: null };
    }

    if (!result.applied) {
      reply.status(429);
      return {
        applied: false,
        ...buildQuotaDenyPayload({
          resourceType: input.resourceType,
          limit: result.view.limit,
          used: result.view.used,
          resetsInDays: result.view.resetsInDays,
          upgradeUrl: admission.settings.upgradeUrl
        }),
        usage: result.view
      };
    }

    return { applied: true, degraded: false, usage: result.view };
  });
}

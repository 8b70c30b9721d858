import type { FastifyInstance, FastifyRequest } from "fastify";
import type { AdmissionContext } from "@tollgate/shared";
import { buildDenyPayload, denyStatusCode, setAdmissionHeaders } from "../http/admission-response.js";
import type { AdmissionService } from "../services/admission.js";
import type { RequestPrincipal } from "../types/fastify.js";

export interface AdmissionGateOptions {
  admission: AdmissionService;
  /** Defaults to `request.principal`, filled in by the identity provider's hook. */
  resolvePrincipal?: (request: FastifyRequest) => RequestPrincipal | null;
}

const SKIPPED_PATHS = new Set(["/health", "/ready", "/metrics"]);

export function clientIp(request: FastifyRequest): string {
  const forwarded = request.headers["x-forwarded-for"];
  const forwardedValue = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  const firstHop = forwardedValue?.split(",")[0]?.trim();
  if (firstHop) {
    return firstHop;
  }

  const realIp = request.headers["x-real-ip"];
  if (typeof realIp === "string" && realIp.trim().length > 0) {
    return realIp.trim();
  }

  return request.ip;
}

function isSkipped(request: FastifyRequest): boolean {
  if (request.method === "OPTIONS") {
    return true;
  }
  const path = request.url.split("?")[0] ?? request.url;
  return SKIPPED_PATHS.has(path) || path.startsWith("/v1/admission/");
}

/**
 * In-process gate for business routes served by this same Fastify instance.
 * Every request passes the IP and identity layers; routes declaring
 * `config.admission` also pass the organization layer and, on success,
 * meter their units.
 */
export function registerAdmissionGate(fastify: FastifyInstance, options: AdmissionGateOptions): void {
  const resolvePrincipal = options.resolvePrincipal ?? ((request: FastifyRequest) => request.principal);

  if (!fastify.hasRequestDecorator("principal")) {
    fastify.decorateRequest("principal", null);
  }
  fastify.decorateRequest("admission", null);

  fastify.addHook("onRequest", async (request, reply) => {
    if (isSkipped(request)) {
      return;
    }

    const principal = resolvePrincipal(request);
    const routeConfig = request.routeOptions.config?.admission;

    const context: AdmissionContext = {
      ip: clientIp(request),
      endpoint: request.routeOptions.url ?? request.url,
      correlationId: request.correlationId,
      userAgent: request.headers["user-agent"]
    };
    if (principal) {
      context.identity = { id: principal.id, role: principal.role };
      if (routeConfig && principal.organizationId) {
        context.organization = { id: principal.organizationId, resourceType: routeConfig.resourceType };
      }
    }

    const decision = await options.admission.admit(context);
    request.admission = decision;
    setAdmissionHeaders(reply, decision);

    if (!decision.allowed) {
      reply.status(denyStatusCode(decision));
      return reply.send(buildDenyPayload(decision, context, options.admission.settings.windowSeconds));
    }
  });

  fastify.addHook("onResponse", async (request, reply) => {
    const routeConfig = request.routeOptions.config?.admission;
    const organizationId = resolvePrincipal(request)?.organizationId;
    if (!routeConfig || !organizationId || !request.admission?.allowed || reply.statusCode >= 400) {
      return;
    }

    const result = await options.admission.recordConsumption({
      organizationId,
      resourceType: routeConfig.resourceType,
      units: routeConfig.units ?? 1,
      endpoint: request.routeOptions.url ?? request.url
    });

    if (!result.applied && !result.degraded) {
      request.log.warn({ organizationId, resourceType: routeConfig.resourceType }, "Usage not metered: quota already exhausted");
    }
  });
}

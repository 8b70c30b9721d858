import type { FastifyReply } from "fastify";
import type { AdmissionContext, AdmissionDecision, ResourceType } from "@tollgate/shared";

export interface RateLimitDenyPayload {
  error: "rate_limit_exceeded";
  message: string;
  limit: number | null;
  used: number;
  retry_after_seconds: number;
}

export interface QuotaDenyPayload {
  error: "quota_exceeded";
  message: string;
  limit: number | null;
  used: number;
  resets_in_days: number | null;
  upgrade_url?: string;
}

export interface UnavailableDenyPayload {
  error: "admission_unavailable";
  message: string;
  retry_after_seconds: number;
}

export type DenyPayload = RateLimitDenyPayload | QuotaDenyPayload | UnavailableDenyPayload;

export interface QuotaDenyInput {
  resourceType: ResourceType | null;
  limit: number | null;
  used: number;
  resetsInDays: number | null;
  upgradeUrl: string | null;
}

export function buildQuotaDenyPayload(input: QuotaDenyInput): QuotaDenyPayload {
  const resource = input.resourceType ?? "usage";
  const payload: QuotaDenyPayload = {
    error: "quota_exceeded",
    message: `Monthly ${resource} quota exceeded. Limit: ${input.limit ?? 0} ${resource}/month.`,
    limit: input.limit,
    used: input.used,
    resets_in_days: input.resetsInDays
  };
  if (input.upgradeUrl) {
    payload.upgrade_url = input.upgradeUrl;
  }
  return payload;
}

export function denyStatusCode(decision: AdmissionDecision): 429 | 503 {
  return decision.reason === "store_unavailable" ? 503 : 429;
}

export function buildDenyPayload(
  decision: AdmissionDecision,
  context: AdmissionContext,
  windowSeconds: number
): DenyPayload {
  const retryAfter = decision.retryAfterSeconds ?? 1;

  if (decision.reason === "store_unavailable") {
    return {
      error: "admission_unavailable",
      message: "Admission control is temporarily unavailable. Please retry shortly.",
      retry_after_seconds: retryAfter
    };
  }

  if (decision.rejectingLayer === "organization") {
    return buildQuotaDenyPayload({
      resourceType: context.organization?.resourceType ?? null,
      limit: decision.limit,
      used: decision.used,
      resetsInDays: decision.resetsInDays,
      upgradeUrl: decision.upgradeUrl
    });
  }

  const message =
    decision.rejectingLayer === "identity" && context.identity
      ? `Rate limit exceeded for ${context.identity.role} role. Limit: ${decision.limit ?? 0} requests per ${windowSeconds}s.`
      : "Too many requests. Please try again later.";

  return {
    error: "rate_limit_exceeded",
    message,
    limit: decision.limit,
    used: decision.used,
    retry_after_seconds: retryAfter
  };
}

/**
 * Window layers report through X-RateLimit-*; the organization layer through
 * X-Quota-*. Retry-After accompanies every deny that carries a retry hint.
 */
export function setAdmissionHeaders(reply: FastifyReply, decision: AdmissionDecision): void {
  if (decision.limit !== null && decision.rejectingLayer !== "organization") {
    reply.header("X-RateLimit-Limit", decision.limit);
    reply.header("X-RateLimit-Remaining", decision.remaining ?? 0);
    if (decision.resetSeconds !== null) {
      reply.header("X-RateLimit-Reset", decision.resetSeconds);
    }
  }

  const quota = decision.diagnostics.layers.find((layer) => layer.layer === "organization" && !layer.degraded);
  if (quota) {
    reply.header("X-Quota-Limit", quota.limit ?? "unlimited");
    reply.header("X-Quota-Used", quota.used);
    if (quota.remaining !== null) {
      reply.header("X-Quota-Remaining", quota.remaining);
    }
    if (quota.resetsInDays !== null) {
      reply.header("X-Quota-Resets-In-Days", quota.resetsInDays);
    }
  }

  if (!decision.allowed && decision.retryAfterSeconds !== null) {
    reply.header("Retry-After", decision.retryAfterSeconds);
  }
}

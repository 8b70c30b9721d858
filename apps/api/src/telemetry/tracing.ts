import { SpanStatusCode, trace } from "@opentelemetry/api";
import type { AdmissionDecision } from "@tollgate/shared";

const tracer = trace.getTracer("tollgate-api");

export async function withSpan<T>(name: string, attributes: Record<string, string | number | boolean>, fn: () => Promise<T>): Promise<T> {
  return tracer.startActiveSpan(name, async (span) => {
    try {
      span.setAttributes(attributes);
      return await fn();
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({ code: SpanStatusCode.ERROR });
      throw error;
    } finally {
      span.end();
    }
  });
}

export function annotateDecision(decision: AdmissionDecision): void {
  const span = trace.getActiveSpan();
  if (!span) {
    return;
  }

  span.setAttributes({
    "admission.allowed": decision.allowed,
    "admission.rejecting_layer": decision.rejectingLayer ?? "none",
    "admission.reason": decision.reason ?? "none",
    "admission.used": decision.used,
    "admission.degraded": decision.degraded,
    "admission.latency_ms": decision.diagnostics.latencyMs
  });

  if (decision.limit !== null) {
    span.setAttribute("admission.limit", decision.limit);
  }
}

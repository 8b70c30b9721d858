import type { AdmissionDecision, Principal, ResourceType } from "@tollgate/shared";

/** Principal as the identity provider's hook leaves it on the request. */
export interface RequestPrincipal extends Principal {
  organizationId?: string;
}

/**
 * Route-level opt-in to the organization quota layer. A successful response
 * meters `units` (default 1) against the organization's monthly usage.
 */
export interface AdmissionRouteConfig {
  resourceType: ResourceType;
  units?: number;
}

declare module "fastify" {
  interface FastifyRequest {
    correlationId: string;
    principal: RequestPrincipal | null;
    admission: AdmissionDecision | null;
  }

  interface FastifyContextConfig {
    admission?: AdmissionRouteConfig;
  }
}

export const PLAN_TIERS = ["free", "pro", "enterprise"] as const;
export const RESOURCE_TYPES = ["calculations", "comparisons"] as const;
export const ROLES = ["viewer", "user", "admin", "superadmin"] as const;
export const ADMISSION_LAYERS = ["ip", "identity", "organization"] as const;

export type PlanTier = (typeof PLAN_TIERS)[number];
export type ResourceType = (typeof RESOURCE_TYPES)[number];
export type Role = (typeof ROLES)[number];
export type AdmissionLayer = (typeof ADMISSION_LAYERS)[number];
export type WindowScope = Exclude<AdmissionLayer, "organization">;
export type FailurePolicy = "fail_open" | "fail_closed";
export type Standing = "under_limit" | "warning_zone" | "blocked";

export const UNLIMITED = "unlimited" as const;
export type Limit = number | typeof UNLIMITED;

export interface Principal {
  id: string;
  role: Role;
}

export interface OrganizationTarget {
  id: string;
  resourceType: ResourceType;
}

export interface AdmissionContext {
  ip: string;
  identity?: Principal;
  organization?: OrganizationTarget;
  endpoint: string;
  userAgent?: string;
  correlationId?: string;
}

export interface WindowCheck {
  scope: WindowScope;
  subject: string;
  limit: number;
  windowSeconds: number;
  nowMs: number;
}

export interface WindowDecision {
  allowed: boolean;
  count: number;
  limit: number;
  remaining: number;
  resetSeconds: number;
  windowStart: number;
}

export interface RateWindow {
  scope: WindowScope;
  subject: string;
  windowStart: number;
  windowSize: number;
  count: number;
  limit: number;
}

export interface UsageView {
  organizationId: string;
  resourceType: ResourceType;
  plan: PlanTier;
  used: number;
  limit: number | null;
  unlimited: boolean;
  remaining: number | null;
  percentage: number | null;
  warning: boolean;
  exceeded: boolean;
  standing: Standing;
  periodStart: string;
  resetsAt: string;
  resetsInDays: number;
}

export interface LayerEvaluation {
  layer: AdmissionLayer;
  subject: string;
  allowed: boolean;
  limit: number | null;
  used: number;
  remaining: number | null;
  resetSeconds: number | null;
  resetsInDays: number | null;
  standing: Standing;
  degraded: boolean;
}

export type DenialReason = "limit_exceeded" | "store_unavailable";

export interface AdmissionDecision {
  allowed: boolean;
  rejectingLayer: AdmissionLayer | null;
  reason: DenialReason | null;
  limit: number | null;
  used: number;
  remaining: number | null;
  retryAfterSeconds: number | null;
  resetSeconds: number | null;
  resetsInDays: number | null;
  upgradeUrl: string | null;
  degraded: boolean;
  diagnostics: {
    layers: LayerEvaluation[];
    latencyMs: number;
  };
}

export interface ViolationRecord {
  id: string;
  subject: string;
  scope: AdmissionLayer;
  limit: number;
  observedCount: number;
  endpoint: string;
  userAgent: string | null;
  createdAt: string;
}

export interface ViolationFilter {
  subject?: string;
  scope?: AdmissionLayer;
  since?: Date;
  until?: Date;
  limit?: number;
}

export interface ViolatorSummary {
  subject: string;
  scope: AdmissionLayer;
  violations: number;
  lastSeenAt: string;
}

export type QuotaAuditKind = "admin_reset" | "period_rollover";

export interface QuotaAuditRecord {
  id: string;
  organizationId: string;
  resourceType: ResourceType;
  periodStart: string;
  kind: QuotaAuditKind;
  previousUsed: number;
  actor: string;
  reason: string | null;
  createdAt: string;
}

export interface StandingTransition {
  layer: AdmissionLayer;
  subject: string;
  resourceType: ResourceType | null;
  from: Standing;
  to: Standing;
  used: number;
  limit: number;
  at: string;
}

export interface LimitsCatalog {
  roles: Record<Role, Limit>;
  plans: Record<PlanTier, Record<ResourceType, Limit>>;
}

import {
  createLogger,
  type FailurePolicy,
  type LimitsCatalog,
  type PlanTier,
  type StandingTransition
} from "@tollgate/shared";
import { AdmissionService, type AdmissionSettings } from "../../apps/api/src/services/admission.js";
import { MetricsService } from "../../apps/api/src/services/metrics.js";
import { PlanCatalog } from "../../apps/api/src/services/plan-catalog.js";
import { PlanResolver } from "../../apps/api/src/services/plan-resolver.js";
import { QuotaResolver } from "../../apps/api/src/services/quota-resolver.js";
import type { StandingNotifier } from "../../apps/api/src/services/standing.js";
import { StoreGuard } from "../../apps/api/src/services/store-guard.js";
import { ViolationRecorder } from "../../apps/api/src/services/violation-recorder.js";
import { InMemoryBillingDirectory } from "../../apps/api/src/stores/billing-directory.js";
import { InMemoryQuotaStore, type QuotaStore } from "../../apps/api/src/stores/quota-store.js";
import { InMemoryViolationStore } from "../../apps/api/src/stores/violation-store.js";
import { InMemoryWindowStore, type WindowStore } from "../../apps/api/src/stores/window-store.js";

export const silentLogger = createLogger("silent");

/** 2025-03-10T12:00:00Z: 21.5 days before the April period starts. */
export const MARCH_10_NOON = Date.UTC(2025, 2, 10, 12, 0, 0);

export const testCatalogData: LimitsCatalog = {
  roles: { viewer: 5, user: 10, admin: 50, superadmin: "unlimited" },
  plans: {
    free: { calculations: 100, comparisons: 50 },
    pro: { calculations: 1000, comparisons: 500 },
    enterprise: { calculations: 10000, comparisons: "unlimited" }
  }
};

export class RecordingNotifier implements StandingNotifier {
  readonly transitions: StandingTransition[] = [];

  notify(transition: StandingTransition): void {
    this.transitions.push(transition);
  }
}

export interface HarnessOptions {
  plans?: Record<string, PlanTier>;
  windows?: WindowStore;
  quotaStore?: QuotaStore;
  policy?: FailurePolicy;
  timeoutMs?: number;
  settings?: Partial<AdmissionSettings>;
  nowMs?: number;
}

/** Admission service over in-memory stores with a settable clock. */
export function createHarness(options: HarnessOptions = {}) {
  const clock = { now: options.nowMs ?? MARCH_10_NOON };
  const metrics = new MetricsService();
  const catalog = PlanCatalog.fromData(testCatalogData);
  const directory = new InMemoryBillingDirectory(options.plans ?? { "org-free": "free" });
  const plans = new PlanResolver(directory, 10_000, metrics, silentLogger);
  const quotaStore = options.quotaStore ?? new InMemoryQuotaStore();
  const violationStore = new InMemoryViolationStore();
  const violations = new ViolationRecorder(violationStore, metrics, silentLogger);
  const notifier = new RecordingNotifier();
  const windows = options.windows ?? new InMemoryWindowStore();
  const quotas = new QuotaResolver({ store: quotaStore, plans, catalog, violations, notifier, logger: silentLogger });
  const guard = new StoreGuard(options.policy ?? "fail_open", options.timeoutMs ?? 50, metrics, silentLogger);

  const admission = new AdmissionService({
    windows,
    guard,
    catalog,
    quotas,
    violations,
    notifier,
    metrics,
    logger: silentLogger,
    settings: { ipLimit: 100, windowSeconds: 60, upgradeUrl: "/pricing", ...options.settings },
    clock: () => clock.now
  });

  return {
    admission,
    catalog,
    clock,
    directory,
    metrics,
    notifier,
    plans,
    quotaStore,
    quotas,
    violationStore,
    violations,
    windows
  };
}

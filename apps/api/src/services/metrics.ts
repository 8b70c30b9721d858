import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export class MetricsService {
  readonly registry: Registry;
  readonly checksTotal: Counter;
  readonly rejectionsTotal: Counter;
  readonly storeFailuresTotal: Counter;
  readonly planCacheHitsTotal: Counter;
  readonly planCacheMissesTotal: Counter;
  readonly violationsRecordedTotal: Counter;
  readonly compactedWindowsTotal: Counter;
  readonly latencyMs: Histogram;

  constructor() {
    this.registry = new Registry();
    collectDefaultMetrics({ register: this.registry, prefix: "tollgate_" });

    this.checksTotal = new Counter({
      name: "admission_checks_total",
      help: "Total number of admission decisions",
      labelNames: ["outcome"],
      registers: [this.registry]
    });

    this.rejectionsTotal = new Counter({
      name: "admission_rejections_total",
      help: "Rejected admissions by the layer that rejected them",
      labelNames: ["layer", "reason"],
      registers: [this.registry]
    });

    this.storeFailuresTotal = new Counter({
      name: "admission_store_failures_total",
      help: "Counter store timeouts and errors resolved by the failure policy",
      labelNames: ["operation", "policy"],
      registers: [this.registry]
    });

    this.planCacheHitsTotal = new Counter({
      name: "plan_cache_hits_total",
      help: "Total organization plan cache hits",
      registers: [this.registry]
    });

    this.planCacheMissesTotal = new Counter({
      name: "plan_cache_misses_total",
      help: "Total organization plan cache misses",
      registers: [this.registry]
    });

    this.violationsRecordedTotal = new Counter({
      name: "violations_recorded_total",
      help: "Violations appended to the violation log",
      labelNames: ["scope"],
      registers: [this.registry]
    });

    this.compactedWindowsTotal = new Counter({
      name: "rate_windows_compacted_total",
      help: "Expired rate window rows removed by compaction",
      registers: [this.registry]
    });

    this.latencyMs = new Histogram({
      name: "admission_latency_ms",
      help: "Admission decision latency in milliseconds",
      buckets: [0.25, 0.5, 1, 2, 3, 5, 10, 25, 50],
      labelNames: ["outcome"],
      registers: [this.registry]
    });
  }

  async getMetricsText(): Promise<string> {
    return this.registry.metrics();
  }
}

import type { FastifyBaseLogger } from "fastify";
import type { ViolationFilter, ViolationRecord, ViolatorSummary } from "@tollgate/shared";
import { DEFAULT_VIOLATION_PAGE, type NewViolation, type ViolationStore } from "../stores/violation-store.js";
import type { MetricsService } from "./metrics.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface TopViolatorsQuery {
  since: Date;
  limit?: number;
}

/**
 * Sole writer of the violation log. `record` never blocks the caller and never
 * throws; a failed append is logged and dropped.
 */
export class ViolationRecorder {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly store: ViolationStore,
    private readonly metrics: MetricsService,
    private readonly logger: FastifyBaseLogger
  ) {}

  record(input: NewViolation): void {
    const write: Promise<void> = this.store
      .append(input)
      .then((violation) => {
        this.metrics.violationsRecordedTotal.inc({ scope: violation.scope });
        this.logger.info(
          {
            violationId: violation.id,
            subject: violation.subject,
            scope: violation.scope,
            limit: violation.limit,
            observedCount: violation.observedCount,
            endpoint: violation.endpoint
          },
          "Limit violation recorded"
        );
      })
      .catch((error: unknown) => {
        this.logger.error({ err: error, subject: input.subject, scope: input.scope }, "Failed to record violation");
      })
      .finally(() => {
        this.pending.delete(write);
      });

    this.pending.add(write);
  }

  /** Resolves once every append started so far has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  async listViolations(filter: ViolationFilter): Promise<ViolationRecord[]> {
    return this.store.list({ ...filter, limit: filter.limit ?? DEFAULT_VIOLATION_PAGE });
  }

  async violationsFor(subject: string, filter: Omit<ViolationFilter, "subject"> = {}): Promise<ViolationRecord[]> {
    return this.listViolations({ ...filter, subject });
  }

  async topViolators(query: TopViolatorsQuery): Promise<ViolatorSummary[]> {
    return this.store.topViolators(query.since, query.limit ?? 20);
  }

  async purgeOlderThan(retentionDays: number, nowMs: number = Date.now()): Promise<number> {
    return this.store.purgeBefore(new Date(nowMs - retentionDays * DAY_MS));
  }
}

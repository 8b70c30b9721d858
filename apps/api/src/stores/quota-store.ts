import { randomUUID } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import type { QuotaAuditKind, QuotaAuditRecord, ResourceType } from "@tollgate/shared";
import type { Pool } from "../db/pool.js";

export interface QuotaKey {
  organizationId: string;
  resourceType: ResourceType;
  periodStart: string;
}

export interface IncrementUsageInput extends QuotaKey {
  units: number;
  /** null means unlimited: the increment is never refused. */
  limit: number | null;
}

export interface IncrementUsageResult {
  applied: boolean;
  used: number;
  /** True when this increment created the period's row. */
  created: boolean;
}

export interface PeriodUsage {
  periodStart: string;
  used: number;
}

export interface NewQuotaAudit extends QuotaKey {
  kind: QuotaAuditKind;
  previousUsed: number;
  actor: string;
  reason: string | null;
}

export interface ResetUsageInput extends QuotaKey {
  actor: string;
  reason: string | null;
}

export interface ResetUsageResult {
  previousUsed: number;
  /** True when the reset created the period's row. */
  created: boolean;
  audit: QuotaAuditRecord;
}

export interface QuotaAuditFilter {
  organizationId?: string;
  resourceType?: ResourceType;
  limit?: number;
}

export interface QuotaStore {
  init(): Promise<void>;
  close(): Promise<void>;
  healthcheck(): Promise<boolean>;
  getUsage(key: QuotaKey): Promise<number>;
  /** Atomic conditional increment: refused when `used + units` would pass `limit`. */
  incrementUsage(input: IncrementUsageInput): Promise<IncrementUsageResult>;
  /**
   * Zeroes the period's usage and writes its `admin_reset` audit record as one
   * operation: either both land or neither does.
   */
  resetUsage(input: ResetUsageInput): Promise<ResetUsageResult>;
  latestPeriodBefore(key: QuotaKey): Promise<PeriodUsage | null>;
  appendAudit(input: NewQuotaAudit): Promise<QuotaAuditRecord>;
  listAudit(filter: QuotaAuditFilter): Promise<QuotaAuditRecord[]>;
}

const DEFAULT_AUDIT_PAGE = 100;

const usageKey = (key: QuotaKey) => `${key.organizationId}:${key.resourceType}:${key.periodStart}`;

export class InMemoryQuotaStore implements QuotaStore {
  private readonly usage = new Map<string, PeriodUsage & QuotaKey>();
  private readonly audit: QuotaAuditRecord[] = [];

  async init(): Promise<void> {
    return;
  }

  async close(): Promise<void> {
    return;
  }

  async healthcheck(): Promise<boolean> {
    return true;
  }

  async getUsage(key: QuotaKey): Promise<number> {
    return this.usage.get(usageKey(key))?.used ?? 0;
  }

  async incrementUsage(input: IncrementUsageInput): Promise<IncrementUsageResult> {
    const id = usageKey(input);
    const existing = this.usage.get(id);
    const current = existing?.used ?? 0;

    if (input.limit !== null && current + input.units > input.limit) {
      return { applied: false, used: current, created: false };
    }

    const used = current + input.units;
    this.usage.set(id, {
      organizationId: input.organizationId,
      resourceType: input.resourceType,
      periodStart: input.periodStart,
      used
    });

    return { applied: true, used, created: existing === undefined };
  }

  async resetUsage(input: ResetUsageInput): Promise<ResetUsageResult> {
    const key: QuotaKey = {
      organizationId: input.organizationId,
      resourceType: input.resourceType,
      periodStart: input.periodStart
    };
    const id = usageKey(key);
    const existing = this.usage.get(id);
    const previousUsed = existing?.used ?? 0;

    // The record is built before anything is written; both writes then happen with no await between them.
    const audit = this.buildAudit({ ...key, kind: "admin_reset", previousUsed, actor: input.actor, reason: input.reason });
    this.usage.set(id, { ...key, used: 0 });
    this.audit.push(audit);

    return { previousUsed, created: existing === undefined, audit: { ...audit } };
  }

  async latestPeriodBefore(key: QuotaKey): Promise<PeriodUsage | null> {
    let latest: PeriodUsage | null = null;
    for (const row of this.usage.values()) {
      if (
        row.organizationId === key.organizationId &&
        row.resourceType === key.resourceType &&
        row.periodStart < key.periodStart &&
        (latest === null || row.periodStart > latest.periodStart)
      ) {
        latest = { periodStart: row.periodStart, used: row.used };
      }
    }
    return latest;
  }

  async appendAudit(input: NewQuotaAudit): Promise<QuotaAuditRecord> {
    const record = this.buildAudit(input);
    this.audit.push(record);
    return { ...record };
  }

  protected buildAudit(input: NewQuotaAudit): QuotaAuditRecord {
    return {
      id: randomUUID(),
      ...input,
      createdAt: new Date().toISOString()
    };
  }

  async listAudit(filter: QuotaAuditFilter): Promise<QuotaAuditRecord[]> {
    return this.audit
      .filter((record) => (
        (filter.organizationId === undefined || record.organizationId === filter.organizationId) &&
        (filter.resourceType === undefined || record.resourceType === filter.resourceType)
      ))
      .reverse()
      .slice(0, filter.limit ?? DEFAULT_AUDIT_PAGE)
      .map((record) => ({ ...record }));
  }
}

// Row shapes are type aliases: pg's QueryResultRow needs an index signature.
type AuditRow = {
  id: string;
  organization_id: string;
  resource_type: ResourceType;
  period_start: Date | string;
  kind: QuotaAuditKind;
  previous_used: number;
  actor: string;
  reason: string | null;
  created_at: Date | string;
};

type ResetRow = AuditRow & { created: boolean };

const toIso = (value: Date | string) => new Date(value).toISOString();

export class PostgresQuotaStore implements QuotaStore {
  constructor(
    private readonly pool: Pool,
    private readonly logger: FastifyBaseLogger
  ) {}

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS quota_usage (
        organization_id TEXT NOT NULL,
        resource_type TEXT NOT NULL,
        period_start TIMESTAMPTZ NOT NULL,
        used INTEGER NOT NULL DEFAULT 0 CHECK (used >= 0),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        PRIMARY KEY (organization_id, resource_type, period_start)
      );
    `);

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS quota_audit (
        id TEXT PRIMARY KEY,
        organization_id TEXT NOT NULL,
        resource_type TEXT NOT NULL,
        period_start TIMESTAMPTZ NOT NULL,
        kind TEXT NOT NULL,
        previous_used INTEGER NOT NULL,
        actor TEXT NOT NULL,
        reason TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);

    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_quota_audit_org
      ON quota_audit(organization_id, created_at DESC);
    `);
  }

  async close(): Promise<void> {
    return;
  }

  async healthcheck(): Promise<boolean> {
    try {
      await this.pool.query("SELECT 1");
      return true;
    } catch (error) {
      this.logger.error({ err: error }, "Postgres healthcheck failed");
      return false;
    }
  }

  async getUsage(key: QuotaKey): Promise<number> {
    const result = await this.pool.query<{ used: number }>(
      `SELECT used FROM quota_usage
       WHERE organization_id = $1 AND resource_type = $2 AND period_start = $3`,
      [key.organizationId, key.resourceType, key.periodStart]
    );
    return result.rows[0]?.used ?? 0;
  }

  async incrementUsage(input: IncrementUsageInput): Promise<IncrementUsageResult> {
    // Insert and update are guarded by the same limit predicate, so the row
    // lock taken by ON CONFLICT makes the compare and the add one step.
    const query = `
      INSERT INTO quota_usage (organization_id, resource_type, period_start, used, updated_at)
      SELECT $1, $2, $3, $4, NOW()
      WHERE $5::integer IS NULL OR $4 <= $5::integer
      ON CONFLICT (organization_id, resource_type, period_start)
      DO UPDATE SET used = quota_usage.used + EXCLUDED.used, updated_at = NOW()
      WHERE $5::integer IS NULL OR quota_usage.used + EXCLUDED.used <= $5::integer
      RETURNING used, (xmax = 0) AS created;
    `;

    const result = await this.pool.query<{ used: number; created: boolean }>(query, [
      input.organizationId,
      input.resourceType,
      input.periodStart,
      input.units,
      input.limit
    ]);

    const row = result.rows[0];
    if (!row) {
      return { applied: false, used: await this.getUsage(input), created: false };
    }

    return { applied: true, used: row.used, created: row.created };
  }

  async resetUsage(input: ResetUsageInput): Promise<ResetUsageResult> {
    // One statement: the zeroing upsert and the audit insert commit together.
    const result = await this.pool.query<ResetRow>(
      `WITH previous AS (
         SELECT used FROM quota_usage
         WHERE organization_id = $1 AND resource_type = $2 AND period_start = $3
         FOR UPDATE
       ), upserted AS (
         INSERT INTO quota_usage (organization_id, resource_type, period_start, used, updated_at)
         VALUES ($1, $2, $3, 0, NOW())
         ON CONFLICT (organization_id, resource_type, period_start)
         DO UPDATE SET used = 0, updated_at = NOW()
         RETURNING (xmax = 0) AS created
       ), audit AS (
         INSERT INTO quota_audit (id, organization_id, resource_type, period_start, kind, previous_used, actor, reason)
         VALUES ($4, $1, $2, $3, 'admin_reset', COALESCE((SELECT used FROM previous), 0), $5, $6)
         RETURNING *
       )
       SELECT audit.*, (SELECT created FROM upserted) AS created FROM audit;`,
      [input.organizationId, input.resourceType, input.periodStart, randomUUID(), input.actor, input.reason]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error("quota reset returned no audit row");
    }
    return { previousUsed: row.previous_used, created: row.created, audit: mapAuditRow(row) };
  }

  async latestPeriodBefore(key: QuotaKey): Promise<PeriodUsage | null> {
    const result = await this.pool.query<{ period_start: Date | string; used: number }>(
      `SELECT period_start, used FROM quota_usage
       WHERE organization_id = $1 AND resource_type = $2 AND period_start < $3
       ORDER BY period_start DESC
       LIMIT 1`,
      [key.organizationId, key.resourceType, key.periodStart]
    );

    const row = result.rows[0];
    return row ? { periodStart: toIso(row.period_start), used: row.used } : null;
  }

  async appendAudit(input: NewQuotaAudit): Promise<QuotaAuditRecord> {
    const result = await this.pool.query<AuditRow>(
      `INSERT INTO quota_audit (id, organization_id, resource_type, period_start, kind, previous_used, actor, reason)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING *;`,
      [
        randomUUID(),
        input.organizationId,
        input.resourceType,
        input.periodStart,
        input.kind,
        input.previousUsed,
        input.actor,
        input.reason
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error("quota_audit insert returned no row");
    }
    return mapAuditRow(row);
  }

  async listAudit(filter: QuotaAuditFilter): Promise<QuotaAuditRecord[]> {
    const result = await this.pool.query<AuditRow>(
      `SELECT * FROM quota_audit
       WHERE ($1::text IS NULL OR organization_id = $1)
         AND ($2::text IS NULL OR resource_type = $2)
       ORDER BY created_at DESC
       LIMIT $3`,
      [filter.organizationId ?? null, filter.resourceType ?? null, filter.limit ?? DEFAULT_AUDIT_PAGE]
    );
    return result.rows.map(mapAuditRow);
  }
}

function mapAuditRow(row: AuditRow): QuotaAuditRecord {
  return {
    id: row.id,
    organizationId: row.organization_id,
    resourceType: row.resource_type,
    periodStart: toIso(row.period_start),
    kind: row.kind,
    previousUsed: row.previous_used,
    actor: row.actor,
    reason: row.reason,
    createdAt: toIso(row.created_at)
  };
}

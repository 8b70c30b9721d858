import { randomUUID } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import type { AdmissionLayer, ViolationFilter, ViolationRecord, ViolatorSummary } from "@tollgate/shared";
import type { Pool } from "../db/pool.js";

export type NewViolation = Omit<ViolationRecord, "id" | "createdAt"> & { createdAt?: Date };

export interface ViolationStore {
  init(): Promise<void>;
  close(): Promise<void>;
  healthcheck(): Promise<boolean>;
  append(input: NewViolation): Promise<ViolationRecord>;
  /** Newest first. */
  list(filter: ViolationFilter): Promise<ViolationRecord[]>;
  topViolators(since: Date, limit: number): Promise<ViolatorSummary[]>;
  /** Retention sweep only; normal operation never deletes violations. */
  purgeBefore(cutoff: Date): Promise<number>;
}

export const DEFAULT_VIOLATION_PAGE = 100;

function matches(record: ViolationRecord, filter: ViolationFilter): boolean {
  const createdAt = Date.parse(record.createdAt);
  return (
    (filter.subject === undefined || record.subject === filter.subject) &&
    (filter.scope === undefined || record.scope === filter.scope) &&
    (filter.since === undefined || createdAt >= filter.since.getTime()) &&
    (filter.until === undefined || createdAt <= filter.until.getTime())
  );
}

export class InMemoryViolationStore implements ViolationStore {
  private records: ViolationRecord[] = [];

  async init(): Promise<void> {
    return;
  }

  async close(): Promise<void> {
    return;
  }

  async healthcheck(): Promise<boolean> {
    return true;
  }

  async append(input: NewViolation): Promise<ViolationRecord> {
    const { createdAt, ...fields } = input;
    const record: ViolationRecord = Object.freeze({
      id: randomUUID(),
      ...fields,
      createdAt: (createdAt ?? new Date()).toISOString()
    });
    this.records.push(record);
    return record;
  }

  async list(filter: ViolationFilter): Promise<ViolationRecord[]> {
    return this.records
      .filter((record) => matches(record, filter))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(0, filter.limit ?? DEFAULT_VIOLATION_PAGE);
  }

  async topViolators(since: Date, limit: number): Promise<ViolatorSummary[]> {
    const grouped = new Map<string, ViolatorSummary>();

    for (const record of this.records) {
      if (Date.parse(record.createdAt) < since.getTime()) {
        continue;
      }

      const key = `${record.scope}:${record.subject}`;
      const current = grouped.get(key);
      if (!current) {
        grouped.set(key, {
          subject: record.subject,
          scope: record.scope,
          violations: 1,
          lastSeenAt: record.createdAt
        });
        continue;
      }

      current.violations += 1;
      if (record.createdAt > current.lastSeenAt) {
        current.lastSeenAt = record.createdAt;
      }
    }

    return [...grouped.values()]
      .sort((a, b) => b.violations - a.violations || b.lastSeenAt.localeCompare(a.lastSeenAt))
      .slice(0, limit);
  }

  async purgeBefore(cutoff: Date): Promise<number> {
    const before = this.records.length;
    this.records = this.records.filter((record) => Date.parse(record.createdAt) >= cutoff.getTime());
    return before - this.records.length;
  }

  get size(): number {
    return this.records.length;
  }
}

type ViolationRow = {
  id: string;
  subject: string;
  scope: AdmissionLayer;
  limit_value: number;
  observed_count: number;
  endpoint: string;
  user_agent: string | null;
  created_at: Date | string;
};

function mapViolationRow(row: ViolationRow): ViolationRecord {
  return {
    id: row.id,
    subject: row.subject,
    scope: row.scope,
    limit: row.limit_value,
    observedCount: row.observed_count,
    endpoint: row.endpoint,
    userAgent: row.user_agent,
    createdAt: new Date(row.created_at).toISOString()
  };
}

export class PostgresViolationStore implements ViolationStore {
  constructor(
    private readonly pool: Pool,
    private readonly logger: FastifyBaseLogger
  ) {}

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS rate_limit_violations (
        id TEXT PRIMARY KEY,
        subject TEXT NOT NULL,
        scope TEXT NOT NULL,
        limit_value INTEGER NOT NULL,
        observed_count INTEGER NOT NULL,
        endpoint TEXT NOT NULL,
        user_agent TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);

    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_violations_subject_created
      ON rate_limit_violations(subject, created_at DESC);
    `);

    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_violations_created
      ON rate_limit_violations(created_at);
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

  async append(input: NewViolation): Promise<ViolationRecord> {
    const result = await this.pool.query<ViolationRow>(
      `INSERT INTO rate_limit_violations (id, subject, scope, limit_value, observed_count, endpoint, user_agent, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, COALESCE($8::timestamptz, NOW()))
       RETURNING *;`,
      [
        randomUUID(),
        input.subject,
        input.scope,
        input.limit,
        input.observedCount,
        input.endpoint,
        input.userAgent,
        input.createdAt?.toISOString() ?? null
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error("rate_limit_violations insert returned no row");
    }
    return mapViolationRow(row);
  }

  async list(filter: ViolationFilter): Promise<ViolationRecord[]> {
    const result = await this.pool.query<ViolationRow>(
      `SELECT * FROM rate_limit_violations
       WHERE ($1::text IS NULL OR subject = $1)
         AND ($2::text IS NULL OR scope = $2)
         AND ($3::timestamptz IS NULL OR created_at >= $3)
         AND ($4::timestamptz IS NULL OR created_at <= $4)
       ORDER BY created_at DESC
       LIMIT $5`,
      [
        filter.subject ?? null,
        filter.scope ?? null,
        filter.since?.toISOString() ?? null,
        filter.until?.toISOString() ?? null,
        filter.limit ?? DEFAULT_VIOLATION_PAGE
      ]
    );
    return result.rows.map(mapViolationRow);
  }

  async topViolators(since: Date, limit: number): Promise<ViolatorSummary[]> {
    const result = await this.pool.query<{
      subject: string;
      scope: AdmissionLayer;
      violations: string;
      last_seen_at: Date | string;
    }>(
      `SELECT subject, scope, COUNT(*) AS violations, MAX(created_at) AS last_seen_at
       FROM rate_limit_violations
       WHERE created_at >= $1
       GROUP BY subject, scope
       ORDER BY COUNT(*) DESC, MAX(created_at) DESC
       LIMIT $2`,
      [since.toISOString(), limit]
    );

    // COUNT(*) is a bigint, which pg hands back as a string.
    return result.rows.map((row) => ({
      subject: row.subject,
      scope: row.scope,
      violations: Number(row.violations),
      lastSeenAt: new Date(row.last_seen_at).toISOString()
    }));
  }

  async purgeBefore(cutoff: Date): Promise<number> {
    const result = await this.pool.query("DELETE FROM rate_limit_violations WHERE created_at < $1", [
      cutoff.toISOString()
    ]);
    return result.rowCount ?? 0;
  }
}

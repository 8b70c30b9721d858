import type { FastifyBaseLogger } from "fastify";
import { StoreUnavailableError, type FailurePolicy, type StoreOperation } from "@tollgate/shared";
import type { MetricsService } from "./metrics.js";

export type GuardedResult<T> = { ok: true; value: T } | { ok: false; error: StoreUnavailableError };

/**
 * Bounds every counter-store call by a timeout and converts failures into a
 * value. What to do with a failure is the caller's decision, made from
 * `policy`: fail_open admits (availability first), fail_closed rejects
 * (enforcement first).
 */
export class StoreGuard {
  constructor(
    readonly policy: FailurePolicy,
    private readonly timeoutMs: number,
    private readonly metrics: MetricsService,
    private readonly logger: FastifyBaseLogger
  ) {}

  async run<T>(operation: StoreOperation, fn: () => Promise<T>): Promise<GuardedResult<T>> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new StoreUnavailableError(operation, `no answer within ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    try {
      const value = await Promise.race([fn(), timeout]);
      return { ok: true, value };
    } catch (error) {
      const failure =
        error instanceof StoreUnavailableError
          ? error
          : new StoreUnavailableError(operation, error instanceof Error ? error.message : String(error), { cause: error });

      this.metrics.storeFailuresTotal.inc({ operation, policy: this.policy });
      const details = { err: failure, operation, policy: this.policy };
      if (this.policy === "fail_open") {
        this.logger.warn(details, "Counter store unavailable, admitting under fail_open");
      } else {
        this.logger.error(details, "Counter store unavailable, rejecting under fail_closed");
      }

      return { ok: false, error: failure };
    } finally {
      clearTimeout(timer);
    }
  }
}

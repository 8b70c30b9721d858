import { describe, expect, it } from "vitest";
import { StoreUnavailableError } from "@tollgate/shared";
import { MetricsService } from "../../apps/api/src/services/metrics.js";
import { StoreGuard } from "../../apps/api/src/services/store-guard.js";
import { silentLogger } from "../support/fixtures.js";

describe("StoreGuard", () => {
  it("passes results through", async () => {
    const guard = new StoreGuard("fail_open", 50, new MetricsService(), silentLogger);

    await expect(guard.run("quota.read", async () => 42)).resolves.toEqual({ ok: true, value: 42 });
  });

  it("turns backend errors into a store-unavailable failure", async () => {
    const metrics = new MetricsService();
    const guard = new StoreGuard("fail_closed", 50, metrics, silentLogger);
    const cause = new Error("connection reset");

    const result = await guard.run("window.check", async () => {
      throw cause;
    });

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error).toBeInstanceOf(StoreUnavailableError);
    expect(result.error.operation).toBe("window.check");
    expect(result.error.message).toBe("Store unavailable during window.check: connection reset");
    expect(result.error.cause).toBe(cause);

    const failures = await metrics.storeFailuresTotal.get();
    expect(failures.values).toEqual([{ value: 1, labels: { operation: "window.check", policy: "fail_closed" } }]);
  });

  it("gives up on a store that does not answer in time", async () => {
    const guard = new StoreGuard("fail_open", 10, new MetricsService(), silentLogger);

    const result = await guard.run("quota.increment", () => new Promise<number>(() => undefined));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Store unavailable during quota.increment: no answer within 10ms");
    }
  });

  it("exposes the configured policy", () => {
    expect(new StoreGuard("fail_closed", 10, new MetricsService(), silentLogger).policy).toBe("fail_closed");
  });
});

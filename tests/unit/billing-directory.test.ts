import { describe, expect, it } from "vitest";
import { ConfigurationError } from "@tollgate/shared";
import {
  BillingEvents,
  InMemoryBillingDirectory,
  assertKnownPlanTiers
} from "../../apps/api/src/stores/billing-directory.js";

describe("assertKnownPlanTiers", () => {
  it("accepts tiers the limits catalog knows", () => {
    expect(() => assertKnownPlanTiers(["free", "pro", "enterprise"])).not.toThrow();
    expect(() => assertKnownPlanTiers([])).not.toThrow();
  });

  it("rejects a tier the limits catalog does not know", () => {
    expect(() => assertKnownPlanTiers(["free", "platinum"])).toThrow(ConfigurationError);
    expect(() => assertKnownPlanTiers(["free", "platinum"])).toThrow(
      "organizations.plan holds tiers missing from the limits catalog: platinum (known: free, pro, enterprise)"
    );
  });
});

describe("InMemoryBillingDirectory", () => {
  it("follows plan change events", async () => {
    const directory = new InMemoryBillingDirectory({ acme: "free" });
    const events = new BillingEvents();
    const unsubscribe = directory.subscribe(events);

    events.emitPlanChanged({ organizationId: "acme", plan: "enterprise", changedAt: "2025-03-10T12:00:00.000Z" });
    unsubscribe();
    events.emitPlanChanged({ organizationId: "acme", plan: "pro", changedAt: "2025-03-11T12:00:00.000Z" });

    await expect(directory.init()).resolves.toBeUndefined();
    expect(await directory.getOrganizationPlan("acme")).toBe("enterprise");
    expect(await directory.getOrganizationPlan("globex")).toBeNull();
  });
});

import { describe, expect, it } from "vitest";
import { createSequencer, SCOPE } from "../../test/setup";

describe("ConsistencyMonitor", () => {
  it("is healthy when every sampled counter covers its durable maximum", async () => {
    const { monitor, allocator } = await createSequencer();
    await allocator.allocate(SCOPE, "a");

    const report = await monitor.check();

    expect(report.status).toBe("healthy");
    expect(report.warnings).toEqual([]);
    expect(report.scopes).toEqual([
      { status: "ok", scope: SCOPE, dbMax: 1, counter: 1, consistent: true },
    ]);
    expect(Number.isNaN(Date.parse(report.checkedAt))).toBe(false);
  });

  it("warns about drift without touching the counter", async () => {
    const { monitor, durable, counters } = await createSequencer();
    durable.seed(SCOPE, [1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    await counters.set(SCOPE, 7);

    const report = await monitor.check();

    expect(report.status).toBe("warning");
    expect(report.warnings).toEqual([`${SCOPE}: counter (7) < durable max (10)`]);
    expect(await counters.get(SCOPE)).toBe(7);
  });

  it("reports a failing scope without changing the status", async () => {
    const { monitor, durable } = await createSequencer();
    durable.addScope("broken");
    durable.faults.maxNumber = (scope) => {
      if (scope === "broken") throw new Error("shard offline");
    };

    const report = await monitor.check();

    expect(report.status).toBe("healthy");
    expect(report.scopes).toContainEqual({
      status: "error",
      scope: "broken",
      error: "shard offline",
    });
  });
});

import { describe, expect, it, vi } from "vitest";
import { createSequencer, SCOPE } from "../../test/setup";

describe("DriftSupervisor", () => {
  it("reconciles known scopes on start", async () => {
    const { supervisor, durable, counters } = await createSequencer();
    durable.seed(SCOPE, [1, 2, 3]);

    await supervisor.start();

    expect(await counters.get(SCOPE)).toBe(3);
    await supervisor.stop();
  });

  it("delays the startup run when asked to", async () => {
    const { supervisor, durable, counters } = await createSequencer({
      startupDelayMs: 30,
    });
    durable.seed(SCOPE, [1, 2]);

    await supervisor.start();
    expect(await counters.get(SCOPE)).toBeUndefined();

    await vi.waitFor(async () => {
      expect(await counters.get(SCOPE)).toBe(2);
    });
    await supervisor.stop();
  });

  it("reconciles on a poll only once the drift threshold is reached", async () => {
    const { supervisor, durable, counters } = await createSequencer({
      driftThreshold: 2,
    });
    durable.seed(SCOPE, [1, 2]);

    const first = await supervisor.poll();
    expect(first?.status).toBe("warning");
    expect(await counters.get(SCOPE)).toBeUndefined();

    durable.seed("app:2:chats", [1]);
    await supervisor.poll();

    expect(await counters.get(SCOPE)).toBe(2);
    expect(await counters.get("app:2:chats")).toBe(1);
  });

  it("polls on its interval", async () => {
    const { supervisor, durable, counters } = await createSequencer({
      startupDelayMs: 60_000,
      monitorIntervalMs: 20,
    });
    durable.seed(SCOPE, [1, 2, 3, 4]);

    await supervisor.start();

    await vi.waitFor(async () => {
      expect(await counters.get(SCOPE)).toBe(4);
    });
    await supervisor.stop();
  });

  it("shares one run between concurrent requests for a scope", async () => {
    const { supervisor, reconciler, durable, counters } = await createSequencer();
    durable.seed(SCOPE, [1, 2]);
    const reconcile = vi.spyOn(reconciler, "reconcile");

    const first = supervisor.requestReconcile(SCOPE);
    const second = supervisor.requestReconcile(SCOPE);
    expect(second).toBe(first);
    await first;

    expect(reconcile).toHaveBeenCalledTimes(1);
    expect(await counters.get(SCOPE)).toBe(2);

    await supervisor.requestReconcile(SCOPE);
    expect(reconcile).toHaveBeenCalledTimes(2);
  });

  it("resolves a failed recovery to an empty run", async () => {
    const { supervisor, durable } = await createSequencer();
    vi.spyOn(durable, "listScopes").mockRejectedValue(new Error("offline"));

    expect(await supervisor.recover()).toEqual([]);
  });
});

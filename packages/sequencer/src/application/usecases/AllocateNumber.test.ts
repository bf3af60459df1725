import { createMemoryCounterStore, type ICounterStore } from "@chatseq/counterstore";
import { describe, expect, it } from "vitest";
import {
  AllocationExhaustedError,
  AmbiguousCommitError,
  PersistenceFailureError,
  ScopeNotFoundError,
  StoreTimeoutError,
} from "../../domain/errors";
import { createSequencer, SCOPE, sleep, stall } from "../../test/setup";

describe("AllocateNumber", () => {
  it("hands out 1 for the first entity of a scope", async () => {
    const { allocator, durable } = await createSequencer();

    const allocation = await allocator.allocate(SCOPE, "hello");

    expect(allocation).toEqual({
      scope: SCOPE,
      number: 1,
      attempts: 1,
      record: { scope: SCOPE, number: 1, body: "hello" },
    });
    expect(durable.numbers(SCOPE)).toEqual([1]);
  });

  it("gives 50 concurrent callers the numbers 1 to 50 exactly once", async () => {
    const { allocator, durable } = await createSequencer();

    const allocations = await Promise.all(
      Array.from({ length: 50 }, (_, i) => allocator.allocate(SCOPE, `message ${i}`))
    );

    const numbers = allocations.map((a) => a.number).sort((a, b) => a - b);
    expect(numbers).toEqual(Array.from({ length: 50 }, (_, i) => i + 1));
    expect(allocations.every((a) => a.attempts === 1)).toBe(true);
    expect(durable.numbers(SCOPE)).toHaveLength(50);
  });

  it("walks past numbers the durable store already holds after the counter was lost", async () => {
    const { allocator, durable, counters } = await createSequencer();
    durable.seed(SCOPE, [1, 2, 3]);

    const allocation = await allocator.allocate(SCOPE, "after crash");

    expect(allocation.number).toBe(4);
    expect(allocation.attempts).toBe(4);
    expect(durable.numbers(SCOPE)).toEqual([1, 2, 3, 4]);
    expect(await counters.get(SCOPE)).toBe(4);
  });

  it("rejects an unknown scope without touching the counter", async () => {
    const { allocator, counters } = await createSequencer();

    await expect(allocator.allocate("app:9:chats", "x")).rejects.toBeInstanceOf(
      ScopeNotFoundError
    );
    expect(await counters.get("app:9:chats")).toBeUndefined();
  });

  it("fails fast on a durable write error", async () => {
    const { allocator, durable } = await createSequencer();
    const failure = new Error("disk full");
    durable.faults.insert = () => {
      throw failure;
    };

    const error = await allocator.allocate(SCOPE, "x").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PersistenceFailureError);
    expect(error).toMatchObject({ store: "durable", scope: SCOPE, retryable: true });
    expect(error instanceof Error && error.cause).toBe(failure);
    expect(durable.insertCalls).toBe(1);
  });

  it("reports a failing counter store as a persistence failure", async () => {
    const real = await createMemoryCounterStore();
    const counters: ICounterStore = {
      increment: () => Promise.reject(new Error("connection reset")),
      set: (scope, value) => real.set(scope, value),
      get: (scope) => real.get(scope),
      close: () => real.close(),
    };
    const { allocator, durable } = await createSequencer({}, { counters });

    await expect(allocator.allocate(SCOPE, "x")).rejects.toMatchObject({
      code: "PERSISTENCE_FAILURE",
      store: "counter",
    });
    expect(durable.insertCalls).toBe(0);
  });

  it("gives up after maxAttempts and asks for a reconciliation of the scope", async () => {
    const { allocator, durable, counters, supervisor } = await createSequencer({
      maxAttempts: 2,
    });
    durable.seed(SCOPE, [1, 2, 3]);

    const error = await allocator.allocate(SCOPE, "x").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AllocationExhaustedError);
    expect(error).toMatchObject({ attempts: 2, code: "ALLOCATION_EXHAUSTED" });

    await supervisor.stop();
    expect(await counters.get(SCOPE)).toBe(3);

    const next = await allocator.allocate(SCOPE, "y");
    expect(next).toMatchObject({ number: 4, attempts: 1 });
  });

  it("counts a stalled increment as a spent attempt", async () => {
    const real = await createMemoryCounterStore();
    let stalls = 1;
    const counters: ICounterStore = {
      increment: (scope) => (stalls-- > 0 ? stall<number>() : real.increment(scope)),
      set: (scope, value) => real.set(scope, value),
      get: (scope) => real.get(scope),
      close: () => real.close(),
    };
    const { allocator } = await createSequencer({ storeTimeoutMs: 20 }, { counters });

    const allocation = await allocator.allocate(SCOPE, "x");

    expect(allocation).toMatchObject({ number: 1, attempts: 2 });
  });

  it("exhausts with the last timeout as cause when the counter never answers", async () => {
    const real = await createMemoryCounterStore();
    const counters: ICounterStore = {
      increment: () => stall<number>(),
      set: (scope, value) => real.set(scope, value),
      get: (scope) => real.get(scope),
      close: () => real.close(),
    };
    const { allocator, supervisor } = await createSequencer(
      { storeTimeoutMs: 10, maxAttempts: 3 },
      { counters }
    );

    const error = await allocator.allocate(SCOPE, "x").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AllocationExhaustedError);
    expect(error instanceof Error && error.cause).toBeInstanceOf(StoreTimeoutError);
    await supervisor.stop();
  });

  describe("when the insert times out", () => {
    it("keeps the number if the slot holds this attempt", async () => {
      const { allocator, durable } = await createSequencer(
        { storeTimeoutMs: 20 },
        { newAttemptId: () => "attempt-a" }
      );
      durable.faults.insertAck = () => sleep(100);

      const allocation = await allocator.allocate(SCOPE, "slow ack");

      expect(allocation).toEqual({
        scope: SCOPE,
        number: 1,
        attempts: 1,
        record: { scope: SCOPE, number: 1, body: "slow ack" },
      });
    });

    it("moves on to the next number if another attempt owns the slot", async () => {
      const { allocator, durable } = await createSequencer({ storeTimeoutMs: 20 });
      durable.faults.insert = async (scope, number) => {
        if (number !== 1) return;
        durable.slots.get(scope)?.set(1, {
          attemptId: "someone-else",
          record: { scope, number: 1, body: "theirs" },
        });
        await sleep(100);
      };

      const allocation = await allocator.allocate(SCOPE, "mine");

      expect(allocation).toMatchObject({ number: 2, attempts: 2 });
      expect(durable.slots.get(SCOPE)?.get(1)?.attemptId).toBe("someone-else");
    });

    it("stops a queued insert from landing once it moved on", async () => {
      const { allocator, durable } = await createSequencer({ storeTimeoutMs: 20 });
      durable.faults.insert = async (_scope, number) => {
        if (number === 1) await sleep(100);
      };

      const allocation = await allocator.allocate(SCOPE, "one request");
      await sleep(150);

      expect(allocation).toMatchObject({ number: 2, attempts: 2 });
      expect(durable.numbers(SCOPE)).toEqual([2]);
      expect(durable.insertCalls).toBe(2);
    });

    it("raises AmbiguousCommit when the slot cannot be read back", async () => {
      const { allocator, durable } = await createSequencer({ storeTimeoutMs: 20 });
      durable.faults.insertAck = () => sleep(100);
      durable.faults.readCommitted = () => {
        throw new Error("read failed");
      };

      const error = await allocator.allocate(SCOPE, "x").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AmbiguousCommitError);
      expect(error).toMatchObject({ number: 1, scope: SCOPE, retryable: true });
    });
  });
});

import type { ICounterStore } from "@chatseq/counterstore";
import { randomUUID } from "node:crypto";
import type { Scope } from "../../domain/entities/Scope";
import {
  AllocationExhaustedError,
  AmbiguousCommitError,
  PersistenceFailureError,
  ScopeNotFoundError,
  StoreTimeoutError,
} from "../../domain/errors";
import type {
  ICommittedSlot,
  IDurableStore,
  InsertResult,
} from "../../domain/ports/IDurableStore";
import type { ILogger } from "../../domain/ports/ILogger";
import { withTimeout } from "../../infrastructure/util/withTimeout";
import type {
  IAllocateOptions,
  IAllocation,
} from "../interfaces/ISequenceAllocator";

export interface IAllocateNumberConfig {
  maxAttempts: number;
  storeTimeoutMs: number;
  onExhausted?: (scope: Scope) => void;
  newAttemptId?: () => string;
}

/**
 * Takes a candidate from the counter store and lets the durable store arbitrate.
 * A uniqueness conflict means the counter lags behind persisted data; every
 * retry takes the next increment, so the loop walks past the collision.
 */
export class AllocateNumber<P, R> {
  private newAttemptId: () => string;

  constructor(
    private counters: ICounterStore,
    private durable: IDurableStore<P, R>,
    private config: IAllocateNumberConfig,
    private logger?: ILogger
  ) {
    this.newAttemptId = config.newAttemptId ?? randomUUID;
  }

  async execute(
    scope: Scope,
    payload: P,
    options: IAllocateOptions = {}
  ): Promise<IAllocation<R>> {
    const timeoutMs = options.timeoutMs ?? this.config.storeTimeoutMs;
    const { maxAttempts } = this.config;

    const exists = await this.durableCall(scope, "scopeExists", timeoutMs, () =>
      this.durable.scopeExists(scope)
    );
    if (!exists) throw new ScopeNotFoundError(scope);

    let lastCause: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const candidate = await this.takeCandidate(scope, timeoutMs);
      if (candidate instanceof StoreTimeoutError) {
        lastCause = candidate;
        this.logger?.log("Counter increment timed out", { scope, attempt }, "warn");
        continue;
      }

      const attemptId = this.newAttemptId();
      const result = await this.insert(scope, candidate, payload, attemptId, timeoutMs);

      if (result.status === "ok") {
        if (attempt > 1) {
          this.logger?.log("Number is allocated after retries", {
            scope,
            number: candidate,
            attempt,
          });
        }
        return { scope, number: candidate, attempts: attempt, record: result.record };
      }

      if (result.status === "error") {
        throw new PersistenceFailureError(scope, "durable", { cause: result.error });
      }

      lastCause = undefined;
      this.logger?.log(
        "Number is taken or unconfirmed, retrying",
        { scope, number: candidate, attempt },
        "warn"
      );
    }

    this.logger?.log("Allocation is exhausted", { scope, maxAttempts }, "error");
    this.config.onExhausted?.(scope);
    throw new AllocationExhaustedError(
      scope,
      maxAttempts,
      lastCause === undefined ? undefined : { cause: lastCause }
    );
  }

  private async takeCandidate(scope: Scope, timeoutMs: number) {
    try {
      return await withTimeout(
        this.counters.increment(scope),
        timeoutMs,
        () => new StoreTimeoutError(scope, "increment", timeoutMs)
      );
    } catch (error) {
      if (error instanceof StoreTimeoutError) return error;
      throw new PersistenceFailureError(scope, "counter", { cause: error });
    }
  }

  private async insert(
    scope: Scope,
    number: number,
    payload: P,
    attemptId: string,
    timeoutMs: number
  ): Promise<InsertResult<R>> {
    const controller = new AbortController();
    try {
      return await withTimeout(
        this.durable.insertWithNumber(scope, number, payload, attemptId, controller.signal),
        timeoutMs,
        () => new StoreTimeoutError(scope, "insertWithNumber", timeoutMs)
      );
    } catch (error) {
      if (!(error instanceof StoreTimeoutError)) {
        return { status: "error", error };
      }
      // a late insert must not land once we move on to another number
      controller.abort(error);
      return this.resolveAmbiguousInsert(scope, number, attemptId, timeoutMs);
    }
  }

  /** The insert may or may not have landed: look at the slot before deciding. */
  private async resolveAmbiguousInsert(
    scope: Scope,
    number: number,
    attemptId: string,
    timeoutMs: number
  ): Promise<InsertResult<R>> {
    this.logger?.log("Insert timed out, re-reading the slot", { scope, number }, "warn");

    let slot: ICommittedSlot<R> | undefined;
    try {
      slot = await withTimeout(
        this.durable.readCommitted(scope, number),
        timeoutMs,
        () => new StoreTimeoutError(scope, "readCommitted", timeoutMs)
      );
    } catch (cause) {
      throw new AmbiguousCommitError(scope, number, { cause });
    }

    if (slot?.attemptId === attemptId) {
      return { status: "ok", record: slot.record };
    }
    // taken by someone else, or never written: either way try a new number
    return { status: "conflict" };
  }

  private async durableCall<T>(
    scope: Scope,
    operation: string,
    timeoutMs: number,
    call: () => Promise<T>
  ) {
    try {
      return await withTimeout(
        call(),
        timeoutMs,
        () => new StoreTimeoutError(scope, operation, timeoutMs)
      );
    } catch (cause) {
      throw new PersistenceFailureError(scope, "durable", { cause });
    }
  }
}

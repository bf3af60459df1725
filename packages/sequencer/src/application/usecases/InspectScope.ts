import type { ICounterStore } from "@chatseq/counterstore";
import type { Scope } from "../../domain/entities/Scope";
import { StoreTimeoutError } from "../../domain/errors";
import type { IScopeSnapshot } from "../../domain/interfaces/IScopeSnapshot";
import type { IDurableStore } from "../../domain/ports/IDurableStore";
import { withTimeout } from "../../infrastructure/util/withTimeout";

/** Read-only comparison of the counter against the durable maximum. */
export class InspectScope {
  constructor(
    private counters: ICounterStore,
    private durable: IDurableStore,
    private storeTimeoutMs: number
  ) {}

  async execute(scope: Scope): Promise<IScopeSnapshot> {
    const timeoutMs = this.storeTimeoutMs;
    const [dbMax, counter = 0] = await Promise.all([
      withTimeout(
        this.durable.maxNumber(scope),
        timeoutMs,
        () => new StoreTimeoutError(scope, "maxNumber", timeoutMs)
      ),
      withTimeout(
        this.counters.get(scope),
        timeoutMs,
        () => new StoreTimeoutError(scope, "get", timeoutMs)
      ),
    ]);

    return { scope, dbMax, counter, consistent: counter >= dbMax };
  }
}

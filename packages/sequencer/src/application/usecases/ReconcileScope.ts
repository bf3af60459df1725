import type { ICounterStore } from "@chatseq/counterstore";
import type { Scope } from "../../domain/entities/Scope";
import { StoreTimeoutError } from "../../domain/errors";
import type { IReconcileResult } from "../../domain/interfaces/IReconcileResult";
import type { ILogger } from "../../domain/ports/ILogger";
import { withTimeout } from "../../infrastructure/util/withTimeout";
import type { InspectScope } from "./InspectScope";

export class ReconcileScope {
  constructor(
    private inspectScope: InspectScope,
    private counters: ICounterStore,
    private storeTimeoutMs: number,
    private logger?: ILogger
  ) {}

  async execute(scope: Scope): Promise<IReconcileResult> {
    const { dbMax, counter, consistent } = await this.inspectScope.execute(scope);
    if (consistent) {
      return { scope, before: counter, after: counter, corrected: false };
    }

    // only ever raised: a counter ahead of the durable maximum is left alone
    await withTimeout(
      this.counters.set(scope, dbMax),
      this.storeTimeoutMs,
      () => new StoreTimeoutError(scope, "set", this.storeTimeoutMs)
    );

    this.logger?.log(
      "Counter was behind the durable maximum and is raised",
      { scope, before: counter, after: dbMax },
      "warn"
    );

    return { scope, before: counter, after: dbMax, corrected: true };
  }
}

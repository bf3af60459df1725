import type { Scope } from "../../domain/entities/Scope";
import { errorMessage } from "../../domain/errors";
import type { ReconcileOutcome } from "../../domain/interfaces/IReconcileResult";
import type { IDurableStore } from "../../domain/ports/IDurableStore";
import type { ILogger } from "../../domain/ports/ILogger";
import type { ReconcileScope } from "./ReconcileScope";

/** Reconciles the given scopes, or every known scope a page at a time. */
export class ReconcileScopes {
  constructor(
    private reconcileScope: ReconcileScope,
    private durable: IDurableStore,
    private batchSize: number,
    private logger?: ILogger
  ) {}

  async execute(scopes?: Scope[]): Promise<ReconcileOutcome[]> {
    const outcomes = scopes ? await this.reconcileEach(scopes) : await this.reconcileKnown();

    this.logger?.log("Reconciliation finished", {
      scopes: outcomes.length,
      corrected: outcomes.filter((o) => o.status === "ok" && o.corrected).length,
      failed: outcomes.filter((o) => o.status === "error").length,
    });

    return outcomes;
  }

  private async reconcileKnown() {
    const outcomes: ReconcileOutcome[] = [];
    let after: Scope | undefined;

    for (;;) {
      const page = await this.durable.listScopes(this.batchSize, after);
      outcomes.push(...(await this.reconcileEach(page)));
      if (page.length < this.batchSize) return outcomes;
      after = page.at(-1);
    }
  }

  private async reconcileEach(scopes: Scope[]) {
    const outcomes: ReconcileOutcome[] = [];

    // one scope at a time keeps the load on both stores flat
    for (const scope of scopes) {
      try {
        const result = await this.reconcileScope.execute(scope);
        outcomes.push({ status: "ok", ...result });
      } catch (error) {
        this.logger?.log("Failed to reconcile scope", { scope, error }, "error");
        outcomes.push({ status: "error", scope, error: errorMessage(error) });
      }
    }

    return outcomes;
  }
}

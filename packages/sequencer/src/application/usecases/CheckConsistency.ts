import { errorMessage } from "../../domain/errors";
import type {
  IConsistencyReport,
  ScopeCheck,
} from "../../domain/interfaces/IConsistencyReport";
import type { IDurableStore } from "../../domain/ports/IDurableStore";
import type { ILogger } from "../../domain/ports/ILogger";
import type { InspectScope } from "./InspectScope";

export class CheckConsistency {
  constructor(
    private inspectScope: InspectScope,
    private durable: IDurableStore,
    private sampleSize: number,
    private logger?: ILogger
  ) {}

  async execute(): Promise<IConsistencyReport> {
    const scopes = await this.durable.sampleScopes(this.sampleSize);
    const checks: ScopeCheck[] = [];
    const warnings: string[] = [];

    for (const scope of scopes) {
      try {
        const snapshot = await this.inspectScope.execute(scope);
        checks.push({ status: "ok", ...snapshot });

        if (!snapshot.consistent) {
          warnings.push(
            `${scope}: counter (${snapshot.counter}) < durable max (${snapshot.dbMax})`
          );
        }
      } catch (error) {
        checks.push({ status: "error", scope, error: errorMessage(error) });
      }
    }

    if (warnings.length > 0) {
      this.logger?.log("Counter drift detected", { warnings }, "warn");
    }

    return {
      status: warnings.length > 0 ? "warning" : "healthy",
      checkedAt: new Date().toISOString(),
      scopes: checks,
      warnings,
    };
  }
}

import { clearInterval, clearTimeout, setInterval, setTimeout } from "node:timers";
import type { Scope } from "../../domain/entities/Scope";
import type { IConsistencyReport } from "../../domain/interfaces/IConsistencyReport";
import type { ReconcileOutcome } from "../../domain/interfaces/IReconcileResult";
import type { ILogger } from "../../domain/ports/ILogger";
import type { IConsistencyMonitor } from "../interfaces/IConsistencyMonitor";
import type { IReconciler } from "../interfaces/IReconciler";
import type { ISequencerConfig } from "../interfaces/ISequencerConfig";

export type IDriftSupervisorConfig = Pick<
  ISequencerConfig,
  "monitorIntervalMs" | "driftThreshold" | "startupDelayMs"
>;

/**
 * Schedules detection and correction independently: a startup
 * reconciliation, periodic checks that reconcile drifted scopes once
 * `driftThreshold` of them show up, and single-scope requests from the
 * allocator when it runs out of attempts.
 */
export class DriftSupervisor {
  private pollTimer?: NodeJS.Timeout;
  private startupTimer?: NodeJS.Timeout;
  private polling = false;
  private started = false;
  private scopeRequests = new Map<Scope, Promise<void>>();
  private pending = new Set<Promise<unknown>>();

  constructor(
    private reconciler: IReconciler,
    private monitor: IConsistencyMonitor,
    private config: IDriftSupervisorConfig,
    private logger?: ILogger
  ) {}

  /** Resolves once the startup reconciliation is done, or scheduled when delayed. */
  async start() {
    if (this.started) return;
    this.started = true;

    const { startupDelayMs, monitorIntervalMs } = this.config;

    if (startupDelayMs > 0) {
      this.startupTimer = setTimeout(() => {
        this.track(this.recover());
      }, startupDelayMs);
      this.startupTimer.unref();
    } else {
      await this.track(this.recover());
    }

    if (Number.isFinite(monitorIntervalMs) && monitorIntervalMs > 0) {
      this.pollTimer = setInterval(() => {
        this.track(this.poll());
      }, monitorIntervalMs);
      this.pollTimer.unref();
    }
  }

  async stop() {
    clearTimeout(this.startupTimer);
    clearInterval(this.pollTimer);
    this.startupTimer = undefined;
    this.pollTimer = undefined;
    this.started = false;
    await Promise.all(this.pending);
  }

  /** Never rejects; failures are logged and reported as an empty run. */
  async recover(scopes?: Scope[]): Promise<ReconcileOutcome[]> {
    try {
      return await this.reconciler.reconcileAll(scopes);
    } catch (error) {
      this.logger?.log("Reconciliation run failed", { error }, "error");
      return [];
    }
  }

  /** One monitoring round; skipped while the previous one is still running. */
  async poll(): Promise<IConsistencyReport | undefined> {
    if (this.polling) return undefined;
    this.polling = true;

    try {
      const report = await this.monitor.check();
      const drifted = report.scopes.flatMap((check) =>
        check.status === "ok" && !check.consistent ? [check.scope] : []
      );

      if (drifted.length > 0 && drifted.length >= this.config.driftThreshold) {
        this.logger?.log("Drift threshold reached, reconciling", { drifted }, "warn");
        await this.recover(drifted);
      }

      return report;
    } catch (error) {
      this.logger?.log("Consistency check failed", { error }, "error");
      return undefined;
    } finally {
      this.polling = false;
    }
  }

  /** Out-of-band correction of one scope; concurrent requests share a run. */
  requestReconcile(scope: Scope): Promise<void> {
    const inFlight = this.scopeRequests.get(scope);
    if (inFlight) return inFlight;

    const run = this.reconciler
      .reconcile(scope)
      .then(
        (result) => {
          this.logger?.log("Scope reconciled on request", { ...result });
        },
        (error: unknown) => {
          this.logger?.log("Requested reconciliation failed", { scope, error }, "error");
        }
      )
      .finally(() => this.scopeRequests.delete(scope));

    this.scopeRequests.set(scope, run);
    return this.track(run);
  }

  private track<T>(promise: Promise<T>): Promise<T> {
    this.pending.add(promise);
    const forget = () => {
      this.pending.delete(promise);
    };
    promise.then(forget, forget);
    return promise;
  }
}

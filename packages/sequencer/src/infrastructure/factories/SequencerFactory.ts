import type { ICounterStore } from "@chatseq/counterstore";
import type { IConsistencyMonitor } from "../../application/interfaces/IConsistencyMonitor";
import type { IReconciler } from "../../application/interfaces/IReconciler";
import type { ISequenceAllocator } from "../../application/interfaces/ISequenceAllocator";
import type { ISequencerConfig } from "../../application/interfaces/ISequencerConfig";
import { ConsistencyMonitor } from "../../application/services/ConsistencyMonitor";
import { DriftSupervisor } from "../../application/services/DriftSupervisor";
import { Reconciler } from "../../application/services/Reconciler";
import { SequenceAllocator } from "../../application/services/SequenceAllocator";
import { AllocateNumber } from "../../application/usecases/AllocateNumber";
import { CheckConsistency } from "../../application/usecases/CheckConsistency";
import { InspectScope } from "../../application/usecases/InspectScope";
import { ReconcileScope } from "../../application/usecases/ReconcileScope";
import { ReconcileScopes } from "../../application/usecases/ReconcileScopes";
import type { IDurableStore } from "../../domain/ports/IDurableStore";
import type { ILoggerFactory } from "../../domain/ports/ILoggerFactory";

export interface ISequencer<P, R> {
  allocator: ISequenceAllocator<P, R>;
  reconciler: IReconciler;
  monitor: IConsistencyMonitor;
  supervisor: DriftSupervisor;
}

export interface SequencerFactoryOptions {
  loggerFactory?: ILoggerFactory;
  /** Replaces the random attempt ids; tests pin them. */
  newAttemptId?: () => string;
}

export class SequencerFactory {
  static DEFAULT_CONFIG: ISequencerConfig = {
    maxAttempts: 5,
    storeTimeoutMs: 2000,
    reconcileBatchSize: 5,
    monitorSampleSize: 10,
    monitorIntervalMs: 30_000,
    driftThreshold: 1,
    startupDelayMs: 0,
  };

  create<P, R>(
    counters: ICounterStore,
    durable: IDurableStore<P, R>,
    config: Partial<ISequencerConfig> = {},
    options: SequencerFactoryOptions = {}
  ): ISequencer<P, R> {
    const settings = { ...SequencerFactory.DEFAULT_CONFIG, ...config };
    const { loggerFactory, newAttemptId } = options;

    if (!Number.isInteger(settings.maxAttempts) || settings.maxAttempts < 1) {
      throw new RangeError("maxAttempts must be a positive integer");
    }
    if (!Number.isInteger(settings.reconcileBatchSize) || settings.reconcileBatchSize < 1) {
      throw new RangeError("reconcileBatchSize must be a positive integer");
    }

    const inspectScope = new InspectScope(counters, durable, settings.storeTimeoutMs);
    const reconcileScope = new ReconcileScope(
      inspectScope,
      counters,
      settings.storeTimeoutMs,
      loggerFactory?.create("reconciler")
    );
    const reconciler = new Reconciler(
      reconcileScope,
      new ReconcileScopes(
        reconcileScope,
        durable,
        settings.reconcileBatchSize,
        loggerFactory?.create("reconciler")
      )
    );

    const monitor = new ConsistencyMonitor(
      new CheckConsistency(
        inspectScope,
        durable,
        settings.monitorSampleSize,
        loggerFactory?.create("monitor")
      )
    );

    const supervisor = new DriftSupervisor(
      reconciler,
      monitor,
      settings,
      loggerFactory?.create("supervisor")
    );

    const allocator = new SequenceAllocator(
      new AllocateNumber(
        counters,
        durable,
        {
          maxAttempts: settings.maxAttempts,
          storeTimeoutMs: settings.storeTimeoutMs,
          onExhausted: (scope) => {
            void supervisor.requestReconcile(scope);
          },
          newAttemptId,
        },
        loggerFactory?.create("allocator")
      )
    );

    return { allocator, reconciler, monitor, supervisor };
  }
}

export * from "./application/interfaces/IConsistencyMonitor";
export * from "./application/interfaces/IReconciler";
export * from "./application/interfaces/ISequenceAllocator";
export * from "./application/interfaces/ISequencerConfig";
export * from "./application/services/DriftSupervisor";
export * from "./domain/entities/Scope";
export * from "./domain/errors";
export * from "./domain/interfaces/IConsistencyReport";
export * from "./domain/interfaces/IReconcileResult";
export * from "./domain/interfaces/IScopeSnapshot";
export * from "./domain/ports/IDurableStore";
export * from "./domain/ports/ILogDriver";
export * from "./domain/ports/ILogger";
export * from "./domain/ports/ILoggerFactory";
export * from "./infrastructure/factories/SequencerFactory";
export * from "./infrastructure/logging/BufferLoggerFactory";
export * from "./infrastructure/logging/BufferedLogger";
export * from "./infrastructure/util/withTimeout";

export * from "./application/interfaces/ICounterStore";
export * from "./domain/ports/IFlushManager";
export * from "./domain/ports/ILogger";
export * from "./domain/ports/IRedisClient";
export * from "./infrastructure/factories/LevelDbCounterStoreFactory";
export * from "./infrastructure/factories/MemoryCounterStoreFactory";
export * from "./infrastructure/factories/RedisCounterStoreFactory";
export type { CounterDb } from "./infrastructure/leveldb/CounterDb";

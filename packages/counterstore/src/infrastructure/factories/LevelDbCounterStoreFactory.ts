import type { ICounterStore } from "../../application/interfaces/ICounterStore";
import { CounterStore } from "../../application/CounterStore";
import { CloseStore } from "../../application/usecases/CloseStore";
import { GetCounter } from "../../application/usecases/GetCounter";
import { IncrementCounter } from "../../application/usecases/IncrementCounter";
import { SetCounter } from "../../application/usecases/SetCounter";
import type { IFlushManagerConfig } from "../../domain/ports/IFlushManager";
import type { ILogger } from "../../domain/ports/ILogger";
import { Level } from "level";
import type { CounterDb } from "../leveldb/CounterDb";
import { LevelDbCounterCloser } from "../leveldb/LevelDbCounterCloser";
import { LevelDbCounterFlusher } from "../leveldb/LevelDbCounterFlusher";
import { LevelDbCounterGetter } from "../leveldb/LevelDbCounterGetter";
import { LevelDbCounterIncrementer } from "../leveldb/LevelDbCounterIncrementer";
import { LevelDbCounterMap } from "../leveldb/LevelDbCounterMap";
import { LevelDbCounterRestorer } from "../leveldb/LevelDbCounterRestorer";
import { LevelDbCounterSetter } from "../leveldb/LevelDbCounterSetter";
import { MemoryPressureChecker } from "../ram/MemoryPressureChecker";
import { FlushManager } from "../storage/FlushManager";

export interface LevelDbCounterStoreConfig extends IFlushManagerConfig {
  logger?: ILogger;
}

/**
 * Write-behind counter store: increments are served from memory and reach
 * LevelDB on the next flush, so a crash forgets at most one flush window.
 */
export class LevelDbCounterStoreFactory {
  async open(
    location: string,
    options: LevelDbCounterStoreConfig = {}
  ): Promise<ICounterStore> {
    const db = new Level<string, string>(location);
    return this.create(db, options);
  }

  async create(
    db: CounterDb,
    options: LevelDbCounterStoreConfig = {}
  ): Promise<ICounterStore> {
    const {
      persistThresholdMs,
      maxPendingFlushes,
      memoryUsageThresholdMB,
      logger,
    } = options;

    const map = new LevelDbCounterMap();
    const restored = await new LevelDbCounterRestorer(db, map).restore();
    logger?.log("Counters are restored", { restored });

    const flushManager = new FlushManager(
      new MemoryPressureChecker(memoryUsageThresholdMB),
      new Set(),
      persistThresholdMs,
      maxPendingFlushes,
      logger
    );
    flushManager.register(new LevelDbCounterFlusher(db, map).flush);

    return new CounterStore(
      new IncrementCounter(new LevelDbCounterIncrementer(map, flushManager)),
      new SetCounter(new LevelDbCounterSetter(map, flushManager), logger),
      new GetCounter(new LevelDbCounterGetter(map)),
      new CloseStore(new LevelDbCounterCloser(db, flushManager))
    );
  }
}

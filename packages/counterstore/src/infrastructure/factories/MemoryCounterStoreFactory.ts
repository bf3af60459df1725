import type { ICounterStore } from "../../application/interfaces/ICounterStore";
import { MemoryLevel } from "memory-level";
import {
  LevelDbCounterStoreFactory,
  type LevelDbCounterStoreConfig,
} from "./LevelDbCounterStoreFactory";

/** The LevelDB counter store on an in-memory database, for tests and local runs. */
export function createMemoryCounterStore(
  options: LevelDbCounterStoreConfig = {}
): Promise<ICounterStore> {
  return new LevelDbCounterStoreFactory().create(
    new MemoryLevel<string, string>(),
    { persistThresholdMs: Infinity, ...options }
  );
}

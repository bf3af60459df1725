import type { ICounterIncrementer } from "../../domain/ports/ICounterIncrementer";
import type { IFlushManager } from "../../domain/ports/IFlushManager";
import type { LevelDbCounterMap } from "./LevelDbCounterMap";

export class LevelDbCounterIncrementer implements ICounterIncrementer {
  constructor(
    private map: LevelDbCounterMap,
    private flushManager: IFlushManager
  ) {}

  async increment(scope: string) {
    // read-modify-write happens in one synchronous step, so it cannot interleave
    const value = this.map.bump(scope);
    this.flushManager.commit();
    return value;
  }
}

import type { ICounterSetter } from "../../domain/ports/ICounterSetter";
import type { IFlushManager } from "../../domain/ports/IFlushManager";
import type { LevelDbCounterMap } from "./LevelDbCounterMap";

export class LevelDbCounterSetter implements ICounterSetter {
  constructor(
    private map: LevelDbCounterMap,
    private flushManager: IFlushManager
  ) {}

  async set(scope: string, value: number) {
    if (this.map.get(scope) === value) return;
    this.map.mark(scope, value);
    this.flushManager.commit();
  }
}

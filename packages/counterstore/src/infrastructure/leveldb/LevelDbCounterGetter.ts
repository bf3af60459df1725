import type { ICounterGetter } from "../../domain/ports/ICounterGetter";
import type { LevelDbCounterMap } from "./LevelDbCounterMap";

export class LevelDbCounterGetter implements ICounterGetter {
  constructor(private map: LevelDbCounterMap) {}

  async get(scope: string) {
    return this.map.get(scope);
  }
}

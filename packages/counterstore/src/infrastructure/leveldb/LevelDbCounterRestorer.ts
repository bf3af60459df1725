import { COUNTER_PREFIX, type CounterDb } from "./CounterDb";
import type { LevelDbCounterMap } from "./LevelDbCounterMap";

export class LevelDbCounterRestorer {
  constructor(
    private db: CounterDb,
    private map: LevelDbCounterMap
  ) {}

  async restore() {
    try {
      for await (const [key, value] of this.db.iterator({
        gt: COUNTER_PREFIX,
        lt: `${COUNTER_PREFIX}~`,
      })) {
        const scope = key.slice(COUNTER_PREFIX.length);
        const counter = Number(value);
        if (Number.isSafeInteger(counter)) this.map.set(scope, counter);
      }
    } catch (cause) {
      throw new Error("Failed to restore counters", { cause });
    }

    return this.map.size;
  }
}

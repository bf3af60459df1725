import { counterKey, type CounterDb } from "./CounterDb";
import type { LevelDbCounterMap } from "./LevelDbCounterMap";

export class LevelDbCounterFlusher {
  constructor(
    private db: CounterDb,
    private map: LevelDbCounterMap
  ) {}

  flush = async () => {
    const { pending } = this.map;
    if (pending.size === 0) return;

    const entries = Array.from(pending);
    pending.clear();

    const batch = this.db.batch();
    for (const [scope, value] of entries) {
      batch.put(counterKey(scope), String(value));
    }

    try {
      await batch.write();
    } catch (cause) {
      // keep them for the next run unless a newer value came in meanwhile
      for (const [scope, value] of entries) {
        if (!pending.has(scope)) pending.set(scope, value);
      }
      throw new Error(`Failed to flush ${entries.length} counters`, { cause });
    }
  };
}

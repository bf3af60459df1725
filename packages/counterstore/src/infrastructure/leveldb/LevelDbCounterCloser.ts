import type { IFlushManager } from "../../domain/ports/IFlushManager";
import type { IStoreCloser } from "../../domain/ports/IStoreCloser";
import type { CounterDb } from "./CounterDb";

export class LevelDbCounterCloser implements IStoreCloser {
  constructor(
    private db: CounterDb,
    private flushManager: IFlushManager
  ) {}

  async close() {
    await this.flushManager.close();
    await this.db.close();
  }
}

import type { IRedisClient } from "../../domain/ports/IRedisClient";
import type { IStoreCloser } from "../../domain/ports/IStoreCloser";

export class RedisCounterCloser implements IStoreCloser {
  constructor(private client: IRedisClient) {}

  async close() {
    await this.client.quit();
  }
}

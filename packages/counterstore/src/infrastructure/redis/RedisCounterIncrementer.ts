import type { ICounterIncrementer } from "../../domain/ports/ICounterIncrementer";
import type { IRedisClient } from "../../domain/ports/IRedisClient";

export class RedisCounterIncrementer implements ICounterIncrementer {
  constructor(
    private client: IRedisClient,
    private keyPrefix: string
  ) {}

  increment(scope: string) {
    return this.client.incr(`${this.keyPrefix}${scope}`);
  }
}

import type { ICounterSetter } from "../../domain/ports/ICounterSetter";
import type { IRedisClient } from "../../domain/ports/IRedisClient";

export class RedisCounterSetter implements ICounterSetter {
  constructor(
    private client: IRedisClient,
    private keyPrefix: string
  ) {}

  async set(scope: string, value: number) {
    await this.client.set(`${this.keyPrefix}${scope}`, String(value));
  }
}

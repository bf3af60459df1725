import type { ICounterGetter } from "../../domain/ports/ICounterGetter";
import type { IRedisClient } from "../../domain/ports/IRedisClient";

export class RedisCounterGetter implements ICounterGetter {
  constructor(
    private client: IRedisClient,
    private keyPrefix: string
  ) {}

  async get(scope: string) {
    const raw = await this.client.get(`${this.keyPrefix}${scope}`);
    if (raw == null) return undefined;

    const value = Number(raw);
    if (!Number.isSafeInteger(value)) {
      throw new Error(`Counter ${scope} holds a non-integer value "${raw}"`);
    }
    return value;
  }
}

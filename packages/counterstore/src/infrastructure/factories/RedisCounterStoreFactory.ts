import type { ICounterStore } from "../../application/interfaces/ICounterStore";
import { CounterStore } from "../../application/CounterStore";
import { CloseStore } from "../../application/usecases/CloseStore";
import { GetCounter } from "../../application/usecases/GetCounter";
import { IncrementCounter } from "../../application/usecases/IncrementCounter";
import { SetCounter } from "../../application/usecases/SetCounter";
import type { ILogger } from "../../domain/ports/ILogger";
import type { IRedisClient } from "../../domain/ports/IRedisClient";
import { Redis } from "ioredis";
import { RedisCounterCloser } from "../redis/RedisCounterCloser";
import { RedisCounterGetter } from "../redis/RedisCounterGetter";
import { RedisCounterIncrementer } from "../redis/RedisCounterIncrementer";
import { RedisCounterSetter } from "../redis/RedisCounterSetter";

export interface RedisCounterStoreConfig {
  keyPrefix?: string;
  logger?: ILogger;
}

export class RedisCounterStoreFactory {
  static DEFAULT_KEY_PREFIX = "chatseq:counter:";

  open(url: string, options: RedisCounterStoreConfig = {}): ICounterStore {
    const client = new Redis(url, { maxRetriesPerRequest: 1 });
    client.on("error", (error: Error) => {
      options.logger?.log("Redis connection error", { error }, "error");
    });
    return this.create(client, options);
  }

  create(client: IRedisClient, options: RedisCounterStoreConfig = {}): ICounterStore {
    const { keyPrefix = RedisCounterStoreFactory.DEFAULT_KEY_PREFIX, logger } =
      options;

    return new CounterStore(
      new IncrementCounter(new RedisCounterIncrementer(client, keyPrefix)),
      new SetCounter(new RedisCounterSetter(client, keyPrefix), logger),
      new GetCounter(new RedisCounterGetter(client, keyPrefix)),
      new CloseStore(new RedisCounterCloser(client))
    );
  }
}

/** The slice of a Redis client the counter store needs; an ioredis client satisfies it. */
export interface IRedisClient {
  incr(key: string): Promise<number>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  quit(): Promise<unknown>;
}

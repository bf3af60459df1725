import { describe, expect, it } from "vitest";
import type { IRedisClient } from "../../domain/ports/IRedisClient";
import { RedisCounterStoreFactory } from "./RedisCounterStoreFactory";

class FakeRedisClient implements IRedisClient {
  readonly data = new Map<string, string>();
  quitCalls = 0;

  async incr(key: string) {
    const next = Number(this.data.get(key) ?? "0") + 1;
    this.data.set(key, String(next));
    return next;
  }

  async get(key: string) {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string) {
    this.data.set(key, value);
    return "OK";
  }

  async quit() {
    this.quitCalls++;
    return "OK";
  }
}

describe("RedisCounterStoreFactory", () => {
  it("maps counter operations to INCR, SET and GET under the key prefix", async () => {
    const client = new FakeRedisClient();
    const store = new RedisCounterStoreFactory().create(client);

    expect(await store.increment("app:1:chats")).toBe(1);
    expect(await store.increment("app:1:chats")).toBe(2);
    await store.set("apps", 12);

    expect(client.data.get("chatseq:counter:app:1:chats")).toBe("2");
    expect(client.data.get("chatseq:counter:apps")).toBe("12");
    expect(await store.get("apps")).toBe(12);
    expect(await store.get("app:9:chats")).toBeUndefined();
  });

  it("honours a custom key prefix", async () => {
    const client = new FakeRedisClient();
    const store = new RedisCounterStoreFactory().create(client, {
      keyPrefix: "test:",
    });

    await store.increment("apps");

    expect(Array.from(client.data.keys())).toEqual(["test:apps"]);
  });

  it("refuses a counter that does not hold an integer", async () => {
    const client = new FakeRedisClient();
    client.data.set("chatseq:counter:apps", "garbage");
    const store = new RedisCounterStoreFactory().create(client);

    await expect(store.get("apps")).rejects.toThrow(
      'Counter apps holds a non-integer value "garbage"'
    );
  });

  it("quits the client on close", async () => {
    const client = new FakeRedisClient();
    const store = new RedisCounterStoreFactory().create(client);

    await store.close();

    expect(client.quitCalls).toBe(1);
  });
});

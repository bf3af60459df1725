import type { IRedisClient } from "@chatseq/counterstore";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createRuntime } from "./bootstrap";
import { loadConfig } from "./config";

class FakeRedisClient implements IRedisClient {
  readonly data = new Map<string, string>();

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
    return "OK";
  }
}

function createDriver() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const redisConfig = loadConfig({
  CHATSEQ_COUNTER_STORE: "redis",
  CHATSEQ_MONITOR_INTERVAL_MS: "0",
});

describe("createRuntime", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), "chatseq-"));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("serves chats from in-memory stores and logs its lifecycle", async () => {
    const logDriver = createDriver();
    const runtime = await createRuntime(loadConfig({ CHATSEQ_MONITOR_INTERVAL_MS: "0" }), {
      logDriver,
    });
    await runtime.start();

    const { token } = await runtime.chat.createApplication("Support");
    const chat = await runtime.chat.createChat(token);
    const message = await runtime.chat.createMessage(token, chat.number, "hello");

    expect([chat.number, message.number]).toEqual([1, 1]);
    expect((await runtime.ops.status()).status).toBe("healthy");

    await runtime.close();
    expect(logDriver.info).toHaveBeenCalledWith("Runtime is closed", {
      label: "runtime",
      ts: expect.any(Number),
    });
  });

  it("restores numbering from the durable store after the counters are lost", async () => {
    const config = { ...redisConfig, dataDir };
    const logDriver = createDriver();

    const first = await createRuntime(config, { redisClient: new FakeRedisClient(), logDriver });
    await first.start();
    const { token } = await first.chat.createApplication("Support");
    for (let i = 0; i < 3; i++) await first.chat.createChat(token);
    await first.close();

    const second = await createRuntime(config, { redisClient: new FakeRedisClient(), logDriver });
    await second.start();

    expect((await second.chat.createChat(token)).number).toBe(4);
    expect((await second.chat.createApplication("Sales")).number).toBe(2);
    await second.chat.flush();
    expect((await second.chat.getApplication(token)).chatsCount).toBe(4);
    expect((await second.ops.status()).status).toBe("healthy");

    await second.close();
  });

  it("reports drift and repairs it on request", async () => {
    const redisClient = new FakeRedisClient();
    const runtime = await createRuntime(redisConfig, { redisClient, logDriver: createDriver() });
    const { token } = await runtime.chat.createApplication("Support");
    await runtime.chat.createChat(token);
    await runtime.chat.createChat(token);
    redisClient.data.clear();

    const before = await runtime.ops.status();
    const outcomes = await runtime.ops.recover(["apps", "app:1:chats"]);
    const after = await runtime.ops.status();

    expect(before.status).toBe("warning");
    expect(before.warnings).toEqual([
      "apps: counter (0) < durable max (1)",
      "app:1:chats: counter (0) < durable max (2)",
    ]);
    expect(outcomes).toEqual([
      { status: "ok", scope: "apps", before: 0, after: 1, corrected: true },
      { status: "ok", scope: "app:1:chats", before: 0, after: 2, corrected: true },
    ]);
    expect(after.status).toBe("healthy");

    await runtime.close();
  });
});

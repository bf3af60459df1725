import { createMemoryCounterStore } from "@chatseq/counterstore";
import { SequencerFactory } from "@chatseq/sequencer";
import { describe, expect, it } from "vitest";
import { NotFoundError, ValidationError } from "../../domain/errors";
import { ChatServiceFactory } from "../../infrastructure/factories/ChatServiceFactory";
import { CREATED_AT, createChatHarness, testToken } from "../../test/setup";
import { httpStatusFor } from "../httpStatusFor";

describe("ChatService", () => {
  it("creates applications with consecutive numbers and fresh tokens", async () => {
    const { service } = await createChatHarness();

    const support = await service.createApplication("Support");
    const sales = await service.createApplication("Sales");

    expect(support).toEqual({
      kind: "application",
      number: 1,
      token: testToken(1),
      name: "Support",
      chatsCount: 0,
      createdAt: CREATED_AT,
    });
    expect(sales).toMatchObject({ number: 2, token: testToken(2) });
    expect(await service.getApplication(testToken(2))).toEqual(sales);
  });

  it("numbers chats per application and keeps chatsCount up to date", async () => {
    const { service } = await createChatHarness();
    const support = await service.createApplication("Support");
    const sales = await service.createApplication("Sales");

    const chats = [
      await service.createChat(support.token),
      await service.createChat(support.token),
      await service.createChat(sales.token),
    ];
    await service.flush();

    expect(chats.map((c) => [c.appNumber, c.number])).toEqual([
      [1, 1],
      [1, 2],
      [2, 1],
    ]);
    expect((await service.getApplication(support.token)).chatsCount).toBe(2);
    expect((await service.getApplication(sales.token)).chatsCount).toBe(1);
  });

  it("gives 50 concurrent messages the numbers 1 to 50", async () => {
    const { service } = await createChatHarness();
    const { token } = await service.createApplication("Support");
    await service.createChat(token);

    const messages = await Promise.all(
      Array.from({ length: 50 }, (_, i) => service.createMessage(token, 1, `message ${i}`))
    );
    await service.flush();

    expect(messages.map((m) => m.number).sort((a, b) => a - b)).toEqual(
      Array.from({ length: 50 }, (_, i) => i + 1)
    );
    expect((await service.getChat(token, 1)).messagesCount).toBe(50);
    expect(await service.listMessages(token, 1, { limit: 3 })).toHaveLength(3);
  });

  it("reads messages back by number and lists them in order", async () => {
    const { service } = await createChatHarness();
    const { token } = await service.createApplication("Support");
    await service.createChat(token);
    for (const body of ["hello", "how can I help?", "bye"]) {
      await service.createMessage(token, 1, body);
    }

    expect(await service.getMessage(token, 1, 2)).toEqual({
      kind: "message",
      appNumber: 1,
      chatNumber: 1,
      number: 2,
      body: "how can I help?",
      createdAt: CREATED_AT,
    });
    expect((await service.listMessages(token, 1, { after: 1 })).map((m) => m.body)).toEqual([
      "how can I help?",
      "bye",
    ]);
  });

  it("pages through applications", async () => {
    const { service } = await createChatHarness();
    for (const name of ["a", "b", "c"]) await service.createApplication(name);

    const page = await service.listApplications({ after: 1, limit: 1 });

    expect(page.map((a) => a.name)).toEqual(["b"]);
  });

  it("renames an application without touching its counts", async () => {
    const { service } = await createChatHarness();
    const { token } = await service.createApplication("Support");
    await service.createChat(token);
    await service.flush();

    const renamed = await service.renameApplication(token, "Helpdesk");

    expect(renamed).toMatchObject({ name: "Helpdesk", chatsCount: 1, number: 1, token });
    expect((await service.getApplication(token)).name).toBe("Helpdesk");
  });

  it("answers unknown parents with NotFound", async () => {
    const { service } = await createChatHarness();
    const { token } = await service.createApplication("Support");

    const missingApp = await service.createChat(testToken(99)).catch((e: unknown) => e);
    const missingChat = await service.createMessage(token, 7, "hi").catch((e: unknown) => e);
    const missingMessage = await service.getMessage(token, 1, 1).catch((e: unknown) => e);

    expect(missingApp).toBeInstanceOf(NotFoundError);
    expect(missingChat).toMatchObject({ resource: "chat" });
    expect(missingMessage).toMatchObject({ resource: "chat" });
    expect(httpStatusFor(missingApp)).toBe(404);
  });

  it("rejects invalid input before a number is taken", async () => {
    const { service, counters } = await createChatHarness();
    const { token } = await service.createApplication("Support");
    await service.createChat(token);

    const error = await service.createMessage(token, 1, "").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(httpStatusFor(error)).toBe(422);
    expect(await counters.get("app:1:chat:1:messages")).toBeUndefined();
    await expect(service.createApplication(" ")).rejects.toBeInstanceOf(ValidationError);
  });

  it("recomputes every count on a sweep", async () => {
    const { service, store } = await createChatHarness();
    const { token } = await service.createApplication("Support");
    await service.createChat(token);
    await service.createChat(token);
    await service.createMessage(token, 2, "hi");
    await service.flush();
    await store.updater.setChildCount({ kind: "application", appNumber: 1 }, 99);
    await store.updater.setChildCount({ kind: "chat", appNumber: 1, chatNumber: 2 }, 0);

    expect(await service.syncCounts()).toEqual({ refreshed: 3, failed: 0 });
    expect((await service.getApplication(token)).chatsCount).toBe(2);
    expect((await service.getChat(token, 2)).messagesCount).toBe(1);
  });

  it("continues above persisted numbers after the counters are lost", async () => {
    const { service, store } = await createChatHarness();
    const { token } = await service.createApplication("Support");
    for (let i = 0; i < 3; i++) await service.createChat(token);

    const restarted = new SequencerFactory().create(
      await createMemoryCounterStore(),
      store.durable
    );
    await restarted.reconciler.reconcileAll();
    const afterRestart = new ChatServiceFactory().create(restarted.allocator, store);

    const chat = await afterRestart.createChat(token);

    expect(chat.number).toBe(4);
  });

  it("restores the counters of every application after a total counter loss", async () => {
    const { service, store } = await createChatHarness();
    const tokens: string[] = [];
    for (let i = 0; i < 7; i++) tokens.push((await service.createApplication(`App ${i}`)).token);
    for (let i = 0; i < 6; i++) await service.createChat(tokens[6]);

    const restarted = new SequencerFactory().create(
      await createMemoryCounterStore(),
      store.durable,
      { monitorIntervalMs: Infinity }
    );
    const outcomes = await restarted.reconciler.reconcileAll();
    const afterRestart = new ChatServiceFactory().create(restarted.allocator, store);

    expect(outcomes).toContainEqual({
      status: "ok",
      scope: "app:7:chats",
      before: 0,
      after: 6,
      corrected: true,
    });
    expect((await afterRestart.createChat(tokens[6])).number).toBe(7);
  });
});


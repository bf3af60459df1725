import type { Application } from "../../domain/entities/Application";
import {
  isApplication,
  isChat,
  type ChatEntity,
  type ParentRef,
  type StoredSlot,
} from "../../domain/entities/ChatEntity";
import type { IEntityUpdater } from "../../domain/ports/IEntityUpdater";
import type { ISerializer } from "../../domain/ports/ISerializer";
import type { KeyedMutex } from "../util/KeyedMutex";
import { parentKey, slotKey, type ChatDb } from "./ChatDb";
import type { LevelDbSlotReader } from "./LevelDbSlotReader";

/** Read-modify-write of one slot under that slot's lock; the number and attempt stay. */
export class LevelDbEntityUpdater implements IEntityUpdater {
  constructor(
    private db: ChatDb,
    private slots: LevelDbSlotReader,
    private serializer: ISerializer<StoredSlot>,
    private locks: KeyedMutex
  ) {}

  renameApplication(appNumber: number, name: string): Promise<Application | undefined> {
    return this.update(slotKey({ kind: "application" }, appNumber), isApplication, (app) => ({
      ...app,
      name,
    }));
  }

  async setChildCount(parent: ParentRef, count: number) {
    const key = parentKey(parent);
    const updated =
      parent.kind === "application"
        ? await this.update(key, isApplication, (app) => ({ ...app, chatsCount: count }))
        : await this.update(key, isChat, (chat) => ({ ...chat, messagesCount: count }));

    return updated !== undefined;
  }

  private update<E extends ChatEntity>(
    key: string,
    isKind: (entity: ChatEntity) => entity is E,
    change: (entity: E) => E
  ): Promise<E | undefined> {
    return this.locks.runExclusive(key, async () => {
      const slot = await this.slots.read(key);
      if (!slot) return undefined;
      if (!isKind(slot.entity)) throw new Error(`Slot ${key} holds a ${slot.entity.kind}`);

      const entity = change(slot.entity);
      await this.db.put(key, this.serializer.serialize({ attemptId: slot.attemptId, entity }));
      return entity;
    });
  }
}

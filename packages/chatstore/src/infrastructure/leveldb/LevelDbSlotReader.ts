import type { ChatEntity, StoredSlot } from "../../domain/entities/ChatEntity";
import type { ISerializer } from "../../domain/ports/ISerializer";
import { rangeOf, type ChatDb } from "./ChatDb";

export class LevelDbSlotReader {
  constructor(
    private db: ChatDb,
    private serializer: ISerializer<StoredSlot>
  ) {}

  async read(key: string): Promise<StoredSlot | undefined> {
    const bytes = await this.db.get(key);
    return bytes === undefined ? undefined : this.serializer.deserialize(bytes);
  }

  async readEntity<E extends ChatEntity>(
    key: string,
    isKind: (entity: ChatEntity) => entity is E
  ): Promise<E | undefined> {
    const slot = await this.read(key);
    if (!slot) return undefined;
    if (!isKind(slot.entity)) {
      throw new Error(`Slot ${key} holds a ${slot.entity.kind}`);
    }
    return slot.entity;
  }

  async list<E extends ChatEntity>(
    prefix: string,
    isKind: (entity: ChatEntity) => entity is E,
    { after = 0, limit = 100 }: { after?: number; limit?: number } = {}
  ): Promise<E[]> {
    const entities: E[] = [];

    for await (const [key, bytes] of this.db.iterator({ ...rangeOf(prefix, after), limit })) {
      const { entity } = this.serializer.deserialize(bytes);
      if (!isKind(entity)) throw new Error(`Slot ${key} holds a ${entity.kind}`);
      entities.push(entity);
    }

    return entities;
  }
}

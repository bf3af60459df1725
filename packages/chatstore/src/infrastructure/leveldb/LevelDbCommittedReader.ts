import type { ICommittedSlot, Scope } from "@chatseq/sequencer";
import type { ChatEntity } from "../../domain/entities/ChatEntity";
import { parseScope } from "../../domain/scopes";
import { slotKey } from "./ChatDb";
import type { KeyedMutex } from "../util/KeyedMutex";
import type { LevelDbSlotReader } from "./LevelDbSlotReader";

/** Reads behind the scope's insert lock, so an in-flight insert lands first. */
export class LevelDbCommittedReader {
  constructor(
    private slots: LevelDbSlotReader,
    private locks: KeyedMutex
  ) {}

  async readCommitted(
    scope: Scope,
    number: number
  ): Promise<ICommittedSlot<ChatEntity> | undefined> {
    const parsed = parseScope(scope);
    if (!parsed) return undefined;

    const key = slotKey(parsed, number);
    const slot = await this.locks.runExclusive(scope, () => this.slots.read(key));
    return slot && { attemptId: slot.attemptId, record: slot.entity };
  }
}

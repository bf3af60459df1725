import type { ParentRef } from "../../domain/entities/ChatEntity";
import type { IChildCounter } from "../../domain/ports/IChildCounter";
import { APPS_PREFIX, CHATS_PREFIX, numbersOf, rangeOf, slotPrefix, type ChatDb } from "./ChatDb";

export class LevelDbChildCounter implements IChildCounter {
  constructor(private db: ChatDb) {}

  async countChildren(parent: ParentRef) {
    const prefix =
      parent.kind === "application"
        ? slotPrefix({ kind: "chat", appNumber: parent.appNumber })
        : slotPrefix({
            kind: "message",
            appNumber: parent.appNumber,
            chatNumber: parent.chatNumber,
          });

    let count = 0;
    for await (const _ of this.db.keys(rangeOf(prefix))) count++;
    return count;
  }

  async *parents(): AsyncGenerator<ParentRef> {
    for await (const key of this.db.keys(rangeOf(APPS_PREFIX))) {
      const [appNumber] = numbersOf(key);
      yield { kind: "application", appNumber };
    }
    for await (const key of this.db.keys(rangeOf(CHATS_PREFIX))) {
      const [appNumber, chatNumber] = numbersOf(key);
      yield { kind: "chat", appNumber, chatNumber };
    }
  }
}

import {
  isApplication,
  isChat,
  isMessage,
} from "../../domain/entities/ChatEntity";
import type { IChatReader, IListOptions } from "../../domain/ports/IChatReader";
import { slotKey, slotPrefix, tokenKey, type ChatDb } from "./ChatDb";
import type { LevelDbSlotReader } from "./LevelDbSlotReader";

export class LevelDbChatReader implements IChatReader {
  constructor(
    private db: ChatDb,
    private slots: LevelDbSlotReader
  ) {}

  async getApplication(token: string) {
    const indexed = await this.db.get(tokenKey(token));
    if (indexed === undefined) return undefined;
    return this.slots.readEntity(Buffer.from(indexed).toString(), isApplication);
  }

  getChat(appNumber: number, number: number) {
    return this.slots.readEntity(slotKey({ kind: "chat", appNumber }, number), isChat);
  }

  getMessage(appNumber: number, chatNumber: number, number: number) {
    return this.slots.readEntity(
      slotKey({ kind: "message", appNumber, chatNumber }, number),
      isMessage
    );
  }

  listApplications(options?: IListOptions) {
    return this.slots.list(slotPrefix({ kind: "application" }), isApplication, options);
  }

  listChats(appNumber: number, options?: IListOptions) {
    return this.slots.list(slotPrefix({ kind: "chat", appNumber }), isChat, options);
  }

  listMessages(appNumber: number, chatNumber: number, options?: IListOptions) {
    return this.slots.list(
      slotPrefix({ kind: "message", appNumber, chatNumber }),
      isMessage,
      options
    );
  }
}

import type { ISequenceAllocator } from "@chatseq/sequencer";
import type { Chat } from "../../domain/entities/Chat";
import { isChat, type ChatEntity, type ChatEntityPayload } from "../../domain/entities/ChatEntity";
import { NotFoundError } from "../../domain/errors";
import type { IChatReader } from "../../domain/ports/IChatReader";
import { chatsScope } from "../../domain/scopes";
import type { ChildCountRefresher } from "../services/ChildCountRefresher";
import { expectEntity } from "./expectEntity";

export class CreateChat {
  constructor(
    private allocator: ISequenceAllocator<ChatEntityPayload, ChatEntity>,
    private reader: IChatReader,
    private refresher: ChildCountRefresher
  ) {}

  async execute(token: string): Promise<Chat> {
    const app = await this.reader.getApplication(token);
    if (!app) throw new NotFoundError("application", token);

    const { record } = await this.allocator.allocate(chatsScope(app.number), { kind: "chat" });
    this.refresher.markDirty({ kind: "application", appNumber: app.number });

    return expectEntity(record, isChat);
  }
}

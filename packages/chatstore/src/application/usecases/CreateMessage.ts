import type { ISequenceAllocator } from "@chatseq/sequencer";
import {
  isMessage,
  type ChatEntity,
  type ChatEntityPayload,
  type MessagePayload,
} from "../../domain/entities/ChatEntity";
import type { Message } from "../../domain/entities/Message";
import { NotFoundError } from "../../domain/errors";
import type { IChatReader } from "../../domain/ports/IChatReader";
import type { IPayloadValidator } from "../../domain/ports/IPayloadValidator";
import { messagesScope } from "../../domain/scopes";
import type { ChildCountRefresher } from "../services/ChildCountRefresher";
import { expectEntity } from "./expectEntity";

export class CreateMessage {
  constructor(
    private allocator: ISequenceAllocator<ChatEntityPayload, ChatEntity>,
    private reader: IChatReader,
    private validator: IPayloadValidator,
    private refresher: ChildCountRefresher
  ) {}

  async execute(token: string, chatNumber: number, body: string): Promise<Message> {
    const app = await this.reader.getApplication(token);
    if (!app) throw new NotFoundError("application", token);

    const chat = await this.reader.getChat(app.number, chatNumber);
    if (!chat) throw new NotFoundError("chat", `${token}/${chatNumber}`);

    const payload: MessagePayload = { kind: "message", body };
    const invalid = this.validator.check(payload);
    if (invalid) throw invalid;

    const { record } = await this.allocator.allocate(
      messagesScope(app.number, chat.number),
      payload
    );
    this.refresher.markDirty({ kind: "chat", appNumber: app.number, chatNumber: chat.number });

    return expectEntity(record, isMessage);
  }
}

import { NotFoundError } from "../../domain/errors";
import type { IChatReader, IListOptions } from "../../domain/ports/IChatReader";
import type { IChatService } from "../interfaces/IChatService";
import type { CreateApplication } from "../usecases/CreateApplication";
import type { CreateChat } from "../usecases/CreateChat";
import type { CreateMessage } from "../usecases/CreateMessage";
import type { RenameApplication } from "../usecases/RenameApplication";
import type { ChildCountRefresher } from "./ChildCountRefresher";

export class ChatService implements IChatService {
  constructor(
    private reader: IChatReader,
    private createApplicationCase: CreateApplication,
    private renameApplicationCase: RenameApplication,
    private createChatCase: CreateChat,
    private createMessageCase: CreateMessage,
    private refresher: ChildCountRefresher
  ) {}

  createApplication(name: string) {
    return this.createApplicationCase.execute(name);
  }

  async getApplication(token: string) {
    const app = await this.reader.getApplication(token);
    if (!app) throw new NotFoundError("application", token);
    return app;
  }

  listApplications(options?: IListOptions) {
    return this.reader.listApplications(options);
  }

  renameApplication(token: string, name: string) {
    return this.renameApplicationCase.execute(token, name);
  }

  createChat(token: string) {
    return this.createChatCase.execute(token);
  }

  async getChat(token: string, number: number) {
    const app = await this.getApplication(token);
    const chat = await this.reader.getChat(app.number, number);
    if (!chat) throw new NotFoundError("chat", `${token}/${number}`);
    return chat;
  }

  async listChats(token: string, options?: IListOptions) {
    const app = await this.getApplication(token);
    return this.reader.listChats(app.number, options);
  }

  createMessage(token: string, chatNumber: number, body: string) {
    return this.createMessageCase.execute(token, chatNumber, body);
  }

  async getMessage(token: string, chatNumber: number, number: number) {
    const chat = await this.getChat(token, chatNumber);
    const message = await this.reader.getMessage(chat.appNumber, chat.number, number);
    if (!message) throw new NotFoundError("message", `${token}/${chatNumber}/${number}`);
    return message;
  }

  async listMessages(token: string, chatNumber: number, options?: IListOptions) {
    const chat = await this.getChat(token, chatNumber);
    return this.reader.listMessages(chat.appNumber, chat.number, options);
  }

  syncCounts() {
    return this.refresher.syncCounts();
  }

  flush() {
    return this.refresher.flush();
  }
}

import type { Application } from "../../domain/entities/Application";
import type { Chat } from "../../domain/entities/Chat";
import type { Message } from "../../domain/entities/Message";
import type { IListOptions } from "../../domain/ports/IChatReader";
import type { IRefreshSummary } from "../services/ChildCountRefresher";

export interface IChatService {
  createApplication(name: string): Promise<Application>;
  getApplication(token: string): Promise<Application>;
  listApplications(options?: IListOptions): Promise<Application[]>;
  renameApplication(token: string, name: string): Promise<Application>;

  createChat(token: string): Promise<Chat>;
  getChat(token: string, number: number): Promise<Chat>;
  listChats(token: string, options?: IListOptions): Promise<Chat[]>;

  createMessage(token: string, chatNumber: number, body: string): Promise<Message>;
  getMessage(token: string, chatNumber: number, number: number): Promise<Message>;
  listMessages(token: string, chatNumber: number, options?: IListOptions): Promise<Message[]>;

  /** Recomputes every child count from the stored children. */
  syncCounts(): Promise<IRefreshSummary>;
  /** Waits for pending child count refreshes. */
  flush(): Promise<void>;
}

import type { Application } from "../entities/Application";
import type { Chat } from "../entities/Chat";
import type { Message } from "../entities/Message";

export interface IListOptions {
  /** Only numbers above this one. */
  after?: number;
  limit?: number;
}

export interface IChatReader {
  getApplication(token: string): Promise<Application | undefined>;
  getChat(appNumber: number, number: number): Promise<Chat | undefined>;
  getMessage(appNumber: number, chatNumber: number, number: number): Promise<Message | undefined>;
  listApplications(options?: IListOptions): Promise<Application[]>;
  listChats(appNumber: number, options?: IListOptions): Promise<Chat[]>;
  listMessages(appNumber: number, chatNumber: number, options?: IListOptions): Promise<Message[]>;
}

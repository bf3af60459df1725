import type { Application } from "./Application";
import type { Chat } from "./Chat";
import type { Message } from "./Message";

export type ChatEntity = Application | Chat | Message;
export type EntityKind = ChatEntity["kind"];

export interface ApplicationPayload {
  kind: "application";
  name: string;
  token: string;
}

export interface ChatPayload {
  kind: "chat";
}

export interface MessagePayload {
  kind: "message";
  body: string;
}

/** What the caller supplies; the store adds the number, parents and counts. */
export type ChatEntityPayload = ApplicationPayload | ChatPayload | MessagePayload;

/** The persisted value of a numbered slot. */
export interface StoredSlot<E extends ChatEntity = ChatEntity> {
  attemptId: string;
  entity: E;
}

/** An entity whose children are counted. */
export type ParentRef =
  | { kind: "application"; appNumber: number }
  | { kind: "chat"; appNumber: number; chatNumber: number };

export function isApplication(entity: ChatEntity): entity is Application {
  return entity.kind === "application";
}

export function isChat(entity: ChatEntity): entity is Chat {
  return entity.kind === "chat";
}

export function isMessage(entity: ChatEntity): entity is Message {
  return entity.kind === "message";
}

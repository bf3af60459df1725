import type { AbstractLevel } from "abstract-level";
import type { ParentRef } from "../../domain/entities/ChatEntity";
import type { ParsedScope } from "../../domain/scopes";

export type ChatDb = AbstractLevel<string | Buffer | Uint8Array, string, Uint8Array>;

const NUMBER_WIDTH = 16;

export const APPS_PREFIX = "apps!";
export const CHATS_PREFIX = "chats!";
export const MESSAGES_PREFIX = "msgs!";
export const TOKEN_PREFIX = "token!";

/** Fixed width keeps the key order equal to the numeric order. */
export function pad(number: number) {
  return String(number).padStart(NUMBER_WIDTH, "0");
}

export function slotPrefix(scope: ParsedScope) {
  switch (scope.kind) {
    case "application":
      return APPS_PREFIX;
    case "chat":
      return `${CHATS_PREFIX}${pad(scope.appNumber)}!`;
    case "message":
      return `${MESSAGES_PREFIX}${pad(scope.appNumber)}!${pad(scope.chatNumber)}!`;
  }
}

export function slotKey(scope: ParsedScope, number: number) {
  return `${slotPrefix(scope)}${pad(number)}`;
}

/** The slot holding `parent` itself. */
export function parentKey(parent: ParentRef) {
  return parent.kind === "application"
    ? slotKey({ kind: "application" }, parent.appNumber)
    : slotKey({ kind: "chat", appNumber: parent.appNumber }, parent.chatNumber);
}

export function tokenKey(token: string) {
  return `${TOKEN_PREFIX}${token}`;
}

export function rangeOf(prefix: string, after = 0) {
  return { gt: after > 0 ? `${prefix}${pad(after)}` : prefix, lt: `${prefix}~` };
}

export function numbersOf(key: string) {
  return key
    .slice(key.indexOf("!") + 1)
    .split("!")
    .map(Number);
}

import type { Scope } from "@chatseq/sequencer";
import type { ParentRef } from "./entities/ChatEntity";

export type ParsedScope =
  | { kind: "application" }
  | { kind: "chat"; appNumber: number }
  | { kind: "message"; appNumber: number; chatNumber: number };

export const APPS_SCOPE = "apps";

const CHATS_SCOPE = /^app:([1-9]\d*):chats$/;
const MESSAGES_SCOPE = /^app:([1-9]\d*):chat:([1-9]\d*):messages$/;

export function chatsScope(appNumber: number): Scope {
  return `app:${appNumber}:chats`;
}

export function messagesScope(appNumber: number, chatNumber: number): Scope {
  return `app:${appNumber}:chat:${chatNumber}:messages`;
}

export function parseScope(scope: Scope): ParsedScope | undefined {
  if (scope === APPS_SCOPE) return { kind: "application" };

  const chats = CHATS_SCOPE.exec(scope);
  if (chats) return { kind: "chat", appNumber: Number(chats[1]) };

  const messages = MESSAGES_SCOPE.exec(scope);
  if (messages) {
    return {
      kind: "message",
      appNumber: Number(messages[1]),
      chatNumber: Number(messages[2]),
    };
  }

  return undefined;
}

/** The entity whose child count changes when a number is taken in `scope`. */
export function parentOf(scope: ParsedScope): ParentRef | undefined {
  switch (scope.kind) {
    case "application":
      return undefined;
    case "chat":
      return { kind: "application", appNumber: scope.appNumber };
    case "message":
      return { kind: "chat", appNumber: scope.appNumber, chatNumber: scope.chatNumber };
  }
}

/** The scope that numbers the children of `parent`. */
export function childScopeOf(parent: ParentRef): Scope {
  return parent.kind === "application"
    ? chatsScope(parent.appNumber)
    : messagesScope(parent.appNumber, parent.chatNumber);
}

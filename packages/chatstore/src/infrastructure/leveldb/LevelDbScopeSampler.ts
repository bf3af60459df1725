import type { Scope } from "@chatseq/sequencer";
import { APPS_SCOPE, chatsScope, messagesScope, parseScope } from "../../domain/scopes";
import { APPS_PREFIX, CHATS_PREFIX, numbersOf, rangeOf, slotKey, type ChatDb } from "./ChatDb";

/**
 * Scopes in key order: `apps`, then one chat scope per application, then one
 * message scope per chat.
 */
export class LevelDbScopeSampler {
  constructor(private db: ChatDb) {}

  /** `apps` plus the first `limit` chat scopes and the first `limit` message scopes. */
  async sampleScopes(limit: number): Promise<Scope[]> {
    if (limit <= 0) return [];

    const apps = await this.db.keys({ ...rangeOf(APPS_PREFIX), limit }).all();
    const chats = await this.db.keys({ ...rangeOf(CHATS_PREFIX), limit }).all();

    return [APPS_SCOPE, ...apps.map(toChatsScope), ...chats.map(toMessagesScope)];
  }

  async listScopes(limit: number, after?: Scope): Promise<Scope[]> {
    const cursor = after === undefined ? undefined : parseScope(after);
    if (limit <= 0 || (after !== undefined && !cursor)) return [];

    const scopes: Scope[] = cursor ? [] : [APPS_SCOPE];

    if (cursor?.kind !== "message" && scopes.length < limit) {
      const gt =
        cursor?.kind === "chat" ? slotKey({ kind: "application" }, cursor.appNumber) : APPS_PREFIX;
      const apps = await this.db
        .keys({ gt, lt: `${APPS_PREFIX}~`, limit: limit - scopes.length })
        .all();
      scopes.push(...apps.map(toChatsScope));
    }

    if (scopes.length < limit) {
      const gt =
        cursor?.kind === "message"
          ? slotKey({ kind: "chat", appNumber: cursor.appNumber }, cursor.chatNumber)
          : CHATS_PREFIX;
      const chats = await this.db
        .keys({ gt, lt: `${CHATS_PREFIX}~`, limit: limit - scopes.length })
        .all();
      scopes.push(...chats.map(toMessagesScope));
    }

    return scopes;
  }
}

function toChatsScope(key: string) {
  return chatsScope(numbersOf(key)[0]);
}

function toMessagesScope(key: string) {
  const [appNumber, chatNumber] = numbersOf(key);
  return messagesScope(appNumber, chatNumber);
}

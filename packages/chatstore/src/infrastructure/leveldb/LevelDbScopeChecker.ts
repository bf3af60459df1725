import type { Scope } from "@chatseq/sequencer";
import { parseScope } from "../../domain/scopes";
import { slotKey, type ChatDb } from "./ChatDb";

/** A scope exists when the entity owning it does; `apps` always exists. */
export class LevelDbScopeChecker {
  constructor(private db: ChatDb) {}

  async scopeExists(scope: Scope) {
    const parsed = parseScope(scope);

    if (!parsed) return false;

    switch (parsed.kind) {
      case "application":
        return true;
      case "chat":
        return this.has(slotKey({ kind: "application" }, parsed.appNumber));
      case "message":
        return this.has(
          slotKey({ kind: "chat", appNumber: parsed.appNumber }, parsed.chatNumber)
        );
    }
  }

  private async has(key: string) {
    return (await this.db.get(key)) !== undefined;
  }
}

import type { InsertResult, Scope } from "@chatseq/sequencer";
import type {
  ChatEntity,
  ChatEntityPayload,
  StoredSlot,
} from "../../domain/entities/ChatEntity";
import { DuplicateTokenError, ValidationError } from "../../domain/errors";
import type { IPayloadValidator } from "../../domain/ports/IPayloadValidator";
import type { ISerializer } from "../../domain/ports/ISerializer";
import { parseScope, type ParsedScope } from "../../domain/scopes";
import type { KeyedMutex } from "../util/KeyedMutex";
import { slotKey, tokenKey, type ChatDb } from "./ChatDb";

/**
 * Writes a numbered entity only if its slot is free. The slot check and the
 * write run under the scope's lock, which makes the pair atomic for this
 * process; the database is opened by one process only. An aborted insert
 * gives up at the last moment before writing.
 */
export class LevelDbEntityInserter {
  constructor(
    private db: ChatDb,
    private serializer: ISerializer<StoredSlot>,
    private validator: IPayloadValidator,
    private locks: KeyedMutex,
    private now: () => Date = () => new Date()
  ) {}

  async insert(
    scope: Scope,
    number: number,
    payload: ChatEntityPayload,
    attemptId: string,
    signal?: AbortSignal
  ): Promise<InsertResult<ChatEntity>> {
    const parsed = parseScope(scope);
    const entity = parsed && this.build(parsed, number, payload);
    if (!parsed || !entity) {
      return {
        status: "error",
        error: new ValidationError(`A ${payload.kind} cannot be numbered in scope ${scope}`),
      };
    }

    const invalid = this.validator.check(payload);
    if (invalid) return { status: "error", error: invalid };

    const key = slotKey(parsed, number);

    return this.locks.runExclusive(scope, async (): Promise<InsertResult<ChatEntity>> => {
      try {
        if ((await this.db.get(key)) !== undefined) return { status: "conflict" };

        const index = entity.kind === "application" ? tokenKey(entity.token) : undefined;
        if (index && (await this.db.get(index)) !== undefined) {
          return { status: "error", error: new DuplicateTokenError() };
        }
        signal?.throwIfAborted();

        const batch = this.db.batch();
        batch.put(key, this.serializer.serialize({ attemptId, entity }));
        if (index) batch.put(index, Buffer.from(key));

        await batch.write();
        return { status: "ok", record: entity };
      } catch (error) {
        return { status: "error", error };
      }
    });
  }

  private build(
    scope: ParsedScope,
    number: number,
    payload: ChatEntityPayload
  ): ChatEntity | undefined {
    const createdAt = this.now().toISOString();

    if (scope.kind === "application" && payload.kind === "application") {
      const { name, token } = payload;
      return { kind: "application", number, token, name, chatsCount: 0, createdAt };
    }
    if (scope.kind === "chat" && payload.kind === "chat") {
      return { kind: "chat", appNumber: scope.appNumber, number, messagesCount: 0, createdAt };
    }
    if (scope.kind === "message" && payload.kind === "message") {
      const { appNumber, chatNumber } = scope;
      return { kind: "message", appNumber, chatNumber, number, body: payload.body, createdAt };
    }
    return undefined;
  }
}

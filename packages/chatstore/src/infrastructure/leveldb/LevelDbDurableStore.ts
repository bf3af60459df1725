import type { IDurableStore, Scope } from "@chatseq/sequencer";
import type { ChatEntity, ChatEntityPayload } from "../../domain/entities/ChatEntity";
import type { LevelDbCommittedReader } from "./LevelDbCommittedReader";
import type { LevelDbEntityInserter } from "./LevelDbEntityInserter";
import type { LevelDbMaxNumberReader } from "./LevelDbMaxNumberReader";
import type { LevelDbScopeChecker } from "./LevelDbScopeChecker";
import type { LevelDbScopeSampler } from "./LevelDbScopeSampler";

export class LevelDbDurableStore implements IDurableStore<ChatEntityPayload, ChatEntity> {
  constructor(
    private inserter: LevelDbEntityInserter,
    private maxNumberReader: LevelDbMaxNumberReader,
    private scopeChecker: LevelDbScopeChecker,
    private committedReader: LevelDbCommittedReader,
    private scopeSampler: LevelDbScopeSampler
  ) {}

  insertWithNumber(
    scope: Scope,
    number: number,
    payload: ChatEntityPayload,
    attemptId: string,
    signal?: AbortSignal
  ) {
    return this.inserter.insert(scope, number, payload, attemptId, signal);
  }

  maxNumber(scope: Scope) {
    return this.maxNumberReader.maxNumber(scope);
  }

  scopeExists(scope: Scope) {
    return this.scopeChecker.scopeExists(scope);
  }

  readCommitted(scope: Scope, number: number) {
    return this.committedReader.readCommitted(scope, number);
  }

  sampleScopes(limit: number) {
    return this.scopeSampler.sampleScopes(limit);
  }

  listScopes(limit: number, after?: Scope) {
    return this.scopeSampler.listScopes(limit, after);
  }
}

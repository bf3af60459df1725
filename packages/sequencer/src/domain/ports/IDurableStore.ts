import type { Scope } from "../entities/Scope";

export type InsertResult<R> =
  | { status: "ok"; record: R }
  | { status: "conflict" }
  | { status: "error"; error: unknown };

export interface ICommittedSlot<R> {
  attemptId: string;
  record: R;
}

/**
 * System of record. Implementations must reject a second entity with the
 * same (scope, number) atomically, and report that case as `conflict` only.
 * An insert whose `signal` is aborted before it writes must not write, and a
 * later `readCommitted` of the slot must see whatever the insert did.
 */
export interface IDurableStore<P = unknown, R = unknown> {
  insertWithNumber(
    scope: Scope,
    number: number,
    payload: P,
    attemptId: string,
    signal?: AbortSignal
  ): Promise<InsertResult<R>>;
  /** 0 when the scope holds no entity yet. */
  maxNumber(scope: Scope): Promise<number>;
  scopeExists(scope: Scope): Promise<boolean>;
  readCommitted(scope: Scope, number: number): Promise<ICommittedSlot<R> | undefined>;
  /** A bounded list of known scopes, never a full scan. */
  sampleScopes(limit: number): Promise<Scope[]>;
  /**
   * Up to `limit` known scopes following `after`, in a stable order.
   * Fewer than `limit` means the listing is done.
   */
  listScopes(limit: number, after?: Scope): Promise<Scope[]>;
}

import type { Scope } from "../../domain/entities/Scope";

export interface IAllocateOptions {
  /** Per store call; falls back to the configured `storeTimeoutMs`. */
  timeoutMs?: number;
}

export interface IAllocation<R> {
  scope: Scope;
  number: number;
  attempts: number;
  record: R;
}

export interface ISequenceAllocator<P, R> {
  allocate(scope: Scope, payload: P, options?: IAllocateOptions): Promise<IAllocation<R>>;
}

import type { Scope } from "../entities/Scope";

export interface IScopeSnapshot {
  scope: Scope;
  dbMax: number;
  /** 0 when the fast store has no counter for the scope. */
  counter: number;
  consistent: boolean;
}

export interface IScopeFailure {
  status: "error";
  scope: Scope;
  error: string;
}

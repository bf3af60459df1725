import type { Scope } from "../entities/Scope";
import type { IScopeFailure } from "./IScopeSnapshot";

export interface IReconcileResult {
  scope: Scope;
  before: number;
  after: number;
  corrected: boolean;
}

export type ReconcileOutcome = ({ status: "ok" } & IReconcileResult) | IScopeFailure;

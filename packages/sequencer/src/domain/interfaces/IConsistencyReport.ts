import type { IScopeFailure, IScopeSnapshot } from "./IScopeSnapshot";

export type ScopeCheck = ({ status: "ok" } & IScopeSnapshot) | IScopeFailure;

export interface IConsistencyReport {
  status: "healthy" | "warning";
  checkedAt: string;
  scopes: ScopeCheck[];
  warnings: string[];
}

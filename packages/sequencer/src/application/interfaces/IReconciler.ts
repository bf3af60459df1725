import type { Scope } from "../../domain/entities/Scope";
import type {
  IReconcileResult,
  ReconcileOutcome,
} from "../../domain/interfaces/IReconcileResult";

export interface IReconciler {
  reconcile(scope: Scope): Promise<IReconcileResult>;
  /** Reconciles the given scopes, or a bounded sample of known ones. */
  reconcileAll(scopes?: Scope[]): Promise<ReconcileOutcome[]>;
}

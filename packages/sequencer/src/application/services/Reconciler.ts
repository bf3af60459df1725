import type { Scope } from "../../domain/entities/Scope";
import type { IReconciler } from "../interfaces/IReconciler";
import type { ReconcileScope } from "../usecases/ReconcileScope";
import type { ReconcileScopes } from "../usecases/ReconcileScopes";

export class Reconciler implements IReconciler {
  constructor(
    private reconcileScope: ReconcileScope,
    private reconcileScopes: ReconcileScopes
  ) {}

  reconcile(scope: Scope) {
    return this.reconcileScope.execute(scope);
  }

  reconcileAll(scopes?: Scope[]) {
    return this.reconcileScopes.execute(scopes);
  }
}

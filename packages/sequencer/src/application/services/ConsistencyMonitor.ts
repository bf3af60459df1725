import type { IConsistencyMonitor } from "../interfaces/IConsistencyMonitor";
import type { CheckConsistency } from "../usecases/CheckConsistency";

export class ConsistencyMonitor implements IConsistencyMonitor {
  constructor(private checkConsistency: CheckConsistency) {}

  check() {
    return this.checkConsistency.execute();
  }
}

import type { IConsistencyReport } from "../../domain/interfaces/IConsistencyReport";

export interface IConsistencyMonitor {
  check(): Promise<IConsistencyReport>;
}

export type IFlushTask = () => Promise<void>;

export interface IFlushManagerConfig {
  persistThresholdMs?: number;
  maxPendingFlushes?: number;
  memoryUsageThresholdMB?: number;
}

export interface IFlushManager {
  register(task: IFlushTask): void;
  commit(): void;
  flush(): Promise<void>;
  close(): Promise<void>;
}

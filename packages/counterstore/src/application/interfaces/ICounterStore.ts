export interface ICounterStore {
  /** Atomically bumps the counter of `scope` and returns the new value (1 on first call). */
  increment(scope: string): Promise<number>;
  /** Overwrites the counter of `scope`. Only recovery paths call this. */
  set(scope: string, value: number): Promise<void>;
  get(scope: string): Promise<number | undefined>;
  close(): Promise<void>;
}

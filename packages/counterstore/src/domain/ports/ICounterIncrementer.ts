export interface ICounterIncrementer {
  increment(scope: string): Promise<number>;
}

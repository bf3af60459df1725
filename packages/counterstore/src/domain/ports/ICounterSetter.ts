export interface ICounterSetter {
  set(scope: string, value: number): Promise<void>;
}

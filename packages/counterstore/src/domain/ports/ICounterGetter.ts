export interface ICounterGetter {
  get(scope: string): Promise<number | undefined>;
}

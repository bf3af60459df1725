import type { ICounterStore } from "./interfaces/ICounterStore";
import type { CloseStore } from "./usecases/CloseStore";
import type { GetCounter } from "./usecases/GetCounter";
import type { IncrementCounter } from "./usecases/IncrementCounter";
import type { SetCounter } from "./usecases/SetCounter";

export class CounterStore implements ICounterStore {
  constructor(
    private incrementCounter: IncrementCounter,
    private setCounter: SetCounter,
    private getCounter: GetCounter,
    private closeStore: CloseStore
  ) {}

  increment(scope: string) {
    return this.incrementCounter.execute(scope);
  }

  set(scope: string, value: number) {
    return this.setCounter.execute(scope, value);
  }

  get(scope: string) {
    return this.getCounter.execute(scope);
  }

  close() {
    return this.closeStore.execute();
  }
}

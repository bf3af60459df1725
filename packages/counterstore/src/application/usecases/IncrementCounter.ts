import type { ICounterIncrementer } from "../../domain/ports/ICounterIncrementer";
import { assertScope } from "./assertScope";

export class IncrementCounter {
  constructor(private incrementer: ICounterIncrementer) {}

  async execute(scope: string) {
    assertScope(scope);
    return this.incrementer.increment(scope);
  }
}

import type { ICounterGetter } from "../../domain/ports/ICounterGetter";
import { assertScope } from "./assertScope";

export class GetCounter {
  constructor(private getter: ICounterGetter) {}

  async execute(scope: string) {
    assertScope(scope);
    return this.getter.get(scope);
  }
}

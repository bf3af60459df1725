import type { ICounterSetter } from "../../domain/ports/ICounterSetter";
import type { ILogger } from "../../domain/ports/ILogger";
import { assertScope } from "./assertScope";

export class SetCounter {
  constructor(
    private setter: ICounterSetter,
    private logger?: ILogger
  ) {}

  async execute(scope: string, value: number) {
    assertScope(scope);
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`Counter value must be a non-negative integer, got ${value}`);
    }

    await this.setter.set(scope, value);
    this.logger?.log("Counter is overwritten", { scope, value });
  }
}

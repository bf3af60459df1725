import type { Scope } from "../../domain/entities/Scope";
import type {
  IAllocateOptions,
  ISequenceAllocator,
} from "../interfaces/ISequenceAllocator";
import type { AllocateNumber } from "../usecases/AllocateNumber";

export class SequenceAllocator<P, R> implements ISequenceAllocator<P, R> {
  constructor(private allocateNumber: AllocateNumber<P, R>) {}

  allocate(scope: Scope, payload: P, options?: IAllocateOptions) {
    return this.allocateNumber.execute(scope, payload, options);
  }
}

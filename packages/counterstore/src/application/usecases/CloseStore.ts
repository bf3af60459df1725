import type { IStoreCloser } from "../../domain/ports/IStoreCloser";

export class CloseStore {
  constructor(private closer: IStoreCloser) {}

  async execute() {
    return this.closer.close();
  }
}

import type { ParentRef } from "../../domain/entities/ChatEntity";
import type { IChildCounter } from "../../domain/ports/IChildCounter";
import type { IEntityUpdater } from "../../domain/ports/IEntityUpdater";

/** Recomputes a parent's count from its children; undefined when the parent is gone. */
export class RefreshChildCount {
  constructor(
    private counter: IChildCounter,
    private updater: IEntityUpdater
  ) {}

  async execute(parent: ParentRef): Promise<number | undefined> {
    const count = await this.counter.countChildren(parent);
    const updated = await this.updater.setChildCount(parent, count);
    return updated ? count : undefined;
  }
}

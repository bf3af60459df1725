import type { ParentRef } from "../entities/ChatEntity";

export interface IChildCounter {
  countChildren(parent: ParentRef): Promise<number>;
  /** Every application, then every chat. */
  parents(): AsyncIterable<ParentRef>;
}

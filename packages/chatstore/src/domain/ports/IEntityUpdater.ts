import type { Application } from "../entities/Application";
import type { ParentRef } from "../entities/ChatEntity";

export interface IEntityUpdater {
  renameApplication(appNumber: number, name: string): Promise<Application | undefined>;
  /** false when the parent does not exist. */
  setChildCount(parent: ParentRef, count: number): Promise<boolean>;
}

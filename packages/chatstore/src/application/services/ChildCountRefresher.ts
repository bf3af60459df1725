import type { ILogger } from "@chatseq/sequencer";
import { clearImmediate, setImmediate } from "node:timers";
import type { ParentRef } from "../../domain/entities/ChatEntity";
import type { IChildCounter } from "../../domain/ports/IChildCounter";
import { childScopeOf } from "../../domain/scopes";
import type { RefreshChildCount } from "../usecases/RefreshChildCount";

export interface IRefreshSummary {
  refreshed: number;
  failed: number;
}

/**
 * Keeps `chatsCount` and `messagesCount` eventually consistent. Parents
 * marked dirty are refreshed together on the next tick; a sweep recomputes
 * all of them.
 */
export class ChildCountRefresher {
  private dirty = new Map<string, ParentRef>();
  private scheduled?: NodeJS.Immediate;
  private draining: Promise<unknown> = Promise.resolve();

  constructor(
    private refreshChildCount: RefreshChildCount,
    private counter: IChildCounter,
    private logger?: ILogger
  ) {}

  markDirty(parent: ParentRef) {
    this.dirty.set(childScopeOf(parent), parent);
    this.scheduled ??= setImmediate(this.drainInBackground);
  }

  /** Refreshes everything marked so far. */
  async flush() {
    clearImmediate(this.scheduled);
    this.drainInBackground();
    await this.draining;
  }

  syncCounts(): Promise<IRefreshSummary> {
    return this.refreshAll(this.counter.parents());
  }

  private drainInBackground = () => {
    this.scheduled = undefined;
    this.draining = this.draining.then(() => {
      const parents = Array.from(this.dirty.values());
      this.dirty.clear();
      return this.refreshAll(parents);
    });
  };

  private async refreshAll(
    parents: Iterable<ParentRef> | AsyncIterable<ParentRef>
  ): Promise<IRefreshSummary> {
    const summary = { refreshed: 0, failed: 0 };

    for await (const parent of parents) {
      try {
        await this.refreshChildCount.execute(parent);
        summary.refreshed++;
      } catch (error) {
        summary.failed++;
        this.logger?.log("Failed to refresh child count", { parent, error }, "error");
      }
    }

    if (summary.refreshed + summary.failed > 0) {
      this.logger?.log("Child counts are refreshed", summary, "debug");
    }
    return summary;
  }
}

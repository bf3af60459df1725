import type { Scope } from "@chatseq/sequencer";
import { parseScope } from "../../domain/scopes";
import { numbersOf, rangeOf, slotPrefix, type ChatDb } from "./ChatDb";

export class LevelDbMaxNumberReader {
  constructor(private db: ChatDb) {}

  /** One reverse read of the scope's key range. */
  async maxNumber(scope: Scope) {
    const parsed = parseScope(scope);
    if (!parsed) return 0;

    const [last] = await this.db
      .keys({ ...rangeOf(slotPrefix(parsed)), reverse: true, limit: 1 })
      .all();

    return last === undefined ? 0 : (numbersOf(last).at(-1) ?? 0);
  }
}

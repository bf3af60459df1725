import type { AbstractLevel } from "abstract-level";

export type CounterDb = AbstractLevel<string | Buffer | Uint8Array, string, string>;

export const COUNTER_PREFIX = "counter!";

export function counterKey(scope: string) {
  return `${COUNTER_PREFIX}${scope}`;
}

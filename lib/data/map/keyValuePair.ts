import { SplayTree } from "../splay/splayTree.ts";

/**
 * A map entry. Only `key` takes part in ordering and equality, so inserting
 * a pair whose key is already stored updates that entry.
 */
export interface KeyValuePair {
  readonly key: string;
  readonly value: string;
}

export function compareKeyValuePairs(a: KeyValuePair, b: KeyValuePair): number {
  if (a.key < b.key) return -1;
  if (a.key > b.key) return 1;
  return 0;
}

export function createKeyValueTree(): SplayTree<KeyValuePair> {
  return new SplayTree<KeyValuePair>(compareKeyValuePairs);
}

/**
 * Random map workload generation.
 *
 * This module generates random keys and operation sequences from a seeded
 * random source, so scripted workloads are reproducible.
 *
 * @module
 */
import type { TreeMap } from "./treeMap.ts";

/**
 * Simple interface for random number generation.
 * This allows the generator to work with any random number source
 * without bundling specific dependencies.
 */
export interface RandomSource {
  /** Returns a random integer between min (inclusive) and max (inclusive) */
  intBetween(min: number, max: number): number;
}

export type MapOperation =
  | { kind: "insert"; key: string; value: string }
  | { kind: "get"; key: string }
  | { kind: "delete"; key: string };

const ALPHABET = "abcdefghijklmnopqrstuvwxyz";

export const randKey = (rs: RandomSource, length: number): string => {
  if (length <= 0) {
    throw new Error("A key must contain at least one character.");
  }

  let key = "";
  for (let i = 0; i < length; i++) {
    key += ALPHABET[rs.intBetween(0, ALPHABET.length - 1)];
  }
  return key;
};

/**
 * Generate `count` operations over keys `key_0` .. `key_{keySpace - 1}`.
 * A small key space makes hits, updates and repeated deletes common.
 */
export const randOperations = (
  rs: RandomSource,
  count: number,
  keySpace: number,
): MapOperation[] => {
  if (keySpace <= 0) {
    throw new Error("The key space must contain at least one key.");
  }

  const ops: MapOperation[] = [];
  for (let i = 0; i < count; i++) {
    const key = `key_${rs.intBetween(0, keySpace - 1).toString()}`;
    switch (rs.intBetween(0, 2)) {
      case 0:
        ops.push({ kind: "insert", key, value: randKey(rs, 4) });
        break;
      case 1:
        ops.push({ kind: "get", key });
        break;
      default:
        ops.push({ kind: "delete", key });
    }
  }
  return ops;
};

/** Apply one operation; returns what a `get` saw, undefined otherwise. */
export const applyOperation = (
  map: TreeMap,
  op: MapOperation,
): string | undefined => {
  switch (op.kind) {
    case "insert":
      map.insert(op.key, op.value);
      return undefined;
    case "get":
      return map.get(op.key);
    case "delete":
      map.deleteKey(op.key);
      return undefined;
  }
};

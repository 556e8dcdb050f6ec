/**
 * Splay map: a mutable string-to-string map backed by a splay tree.
 *
 * This module re-exports the public API:
 * - the {@link TreeMap} facade (insert / get / deleteKey)
 * - the generic {@link SplayTree} it is built on, for other ordered values
 *
 * @example
 * ```ts
 * import { TreeMap } from "splay-map";
 * const map = new TreeMap();
 * map.insert("user", "Brad");
 * map.get("user"); // "Brad"
 * ```
 *
 * @module
 */
export { TreeMap } from "./data/map/treeMap.ts";
export {
  compareKeyValuePairs,
  createKeyValueTree,
  type KeyValuePair,
} from "./data/map/keyValuePair.ts";
export { type Comparator, SplayTree } from "./data/splay/splayTree.ts";
export { SplayInvariantError } from "./data/splay/splayError.ts";
export { VERSION } from "./shared/version.ts";

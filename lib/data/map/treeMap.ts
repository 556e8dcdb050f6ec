/**
 * String map implementation using a splay tree.
 *
 * This module provides a mutable string-to-string map. Every operation
 * splays the touched key to the root of the underlying tree, so recently
 * used keys are the cheapest to reach.
 *
 * @module
 */
import type { SplayTree } from "../splay/splayTree.ts";
import { createKeyValueTree, type KeyValuePair } from "./keyValuePair.ts";

export class TreeMap {
  /**
   * @param tree  The tree to store entries in. Defaults to a fresh one; pass
   *              your own to inspect its shape.
   */
  constructor(
    private readonly tree: SplayTree<KeyValuePair> = createKeyValueTree(),
  ) {}

  get size(): number {
    return this.tree.size;
  }

  /** Insert `key`, or overwrite its value if it is already present. */
  insert(key: string, value: string): void {
    this.tree.insert({ key, value });
  }

  /** Look up `key`. Returns undefined if it is not present. */
  get(key: string): string | undefined {
    const found = this.tree.find({ key, value: "" });
    if (found?.key === key) {
      return found.value;
    }
    return undefined;
  }

  /**
   * Look up `key`, falling back to `fallback` when it is absent.
   *
   * With the default fallback a missing key and a key stored with an empty
   * value read the same; use {@link TreeMap.get} to tell them apart.
   */
  getOrDefault(key: string, fallback = ""): string {
    return this.get(key) ?? fallback;
  }

  has(key: string): boolean {
    return this.tree.contains({ key, value: "" });
  }

  /** Remove `key` if present. */
  deleteKey(key: string): void {
    this.tree.erase({ key, value: "" });
  }

  clear(): void {
    this.tree.clear();
  }

  /** Key of the most recently splayed entry. */
  rootKey(): string | undefined {
    return this.tree.rootValue()?.key;
  }
}

/**
 *
 * https://en.wikipedia.org/wiki/Splay_tree
 *
 * A mutable splay tree over an arena of nodes.
 * - every access (insert, find, erase) splays the touched node to the root
 * - no balance metadata is kept; cost is amortized O(log n)
 * - ordering comes from a caller-supplied comparator
 *
 * @module
 */
import { EMPTY, NodeArena, type NodeId } from "./nodeArena.ts";
import { SplayInvariantError } from "./splayError.ts";

/** Return <0 if a<b, 0 if a==b, >0 if a>b. */
export type Comparator<T> = (a: T, b: T) => number;

export class SplayTree<T> {
  private readonly arena = new NodeArena<T>();
  private root: NodeId = EMPTY;

  constructor(private readonly compare: Comparator<T>) {}

  get size(): number {
    return this.arena.size;
  }

  /**
   * Insert `value`, or overwrite the stored value that compares equal to it.
   * Either way the touched node ends up at the root.
   *
   * @returns true if a new node was created
   */
  insert(value: T): boolean {
    const a = this.arena;
    if (this.root === EMPTY) {
      this.root = a.allocate(value);
      return true;
    }

    let current = this.root;
    for (;;) {
      const cmp = this.compare(value, a.value(current));
      if (cmp === 0) {
        a.setValue(current, value);
        this.splay(current);
        return false;
      }

      const next = cmp < 0 ? a.left(current) : a.right(current);
      if (next === EMPTY) {
        const created = a.allocate(value);
        a.setParent(created, current);
        if (cmp < 0) {
          a.setLeft(current, created);
        } else {
          a.setRight(current, created);
        }
        this.splay(created);
        return true;
      }
      current = next;
    }
  }

  /**
   * Look up the stored value that compares equal to `value`.
   *
   * A miss still splays the last node visited on the search path.
   */
  find(value: T): T | undefined {
    const node = this.findNode(value);
    return node === EMPTY ? undefined : this.arena.value(node);
  }

  contains(value: T): boolean {
    return this.findNode(value) !== EMPTY;
  }

  /**
   * Remove the stored value that compares equal to `value`.
   *
   * @returns true if a node was removed
   */
  erase(value: T): boolean {
    const a = this.arena;
    const node = this.findNode(value);
    if (node === EMPTY) return false;

    // findNode has splayed the target to the root
    const left = a.left(node);
    const right = a.right(node);

    if (left === EMPTY) {
      this.replaceNode(node, right);
    } else if (right === EMPTY) {
      this.replaceNode(node, left);
    } else {
      const successor = this.subtreeMin(right);
      if (a.parent(successor) !== node) {
        this.replaceNode(successor, a.right(successor));
        a.setRight(successor, right);
        a.setParent(right, successor);
      }
      this.replaceNode(node, successor);
      a.setLeft(successor, left);
      a.setParent(left, successor);
    }

    a.release(node);
    return true;
  }

  /** Release every node. */
  clear(): void {
    this.arena.releaseSubtree(this.root);
    this.root = EMPTY;
  }

  /** The value at the root, i.e. the most recently splayed one. */
  rootValue(): T | undefined {
    return this.root === EMPTY ? undefined : this.arena.value(this.root);
  }

  /** Number of nodes on the longest root-to-leaf path. */
  height(): number {
    const a = this.arena;
    if (this.root === EMPTY) return 0;

    let max = 0;
    const stack: [NodeId, number][] = [[this.root, 1]];
    for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
      const [node, depth] = top;
      if (depth > max) max = depth;
      const left = a.left(node);
      const right = a.right(node);
      if (left !== EMPTY) stack.push([left, depth + 1]);
      if (right !== EMPTY) stack.push([right, depth + 1]);
    }
    return max;
  }

  /**
   * Values in ascending order (in-order traversal). Does not splay.
   */
  toArray(): T[] {
    const a = this.arena;
    const result: T[] = [];
    const stack: NodeId[] = [];
    let current = this.root;

    while (stack.length > 0 || current !== EMPTY) {
      if (current !== EMPTY) {
        stack.push(current);
        current = a.left(current);
      } else {
        const node = stack.pop();
        if (node !== undefined) {
          result.push(a.value(node));
          current = a.right(node);
        }
      }
    }

    return result;
  }

  /**
   * Walk the whole tree and check parent links, BST ordering and the node
   * count.
   *
   * @throws SplayInvariantError on the first violation found
   */
  assertInvariants(): void {
    const a = this.arena;
    if (this.root !== EMPTY && a.parent(this.root) !== EMPTY) {
      throw new SplayInvariantError("root has a parent link");
    }

    let visited = 0;
    const stack: NodeId[] = this.root === EMPTY ? [] : [this.root];
    for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
      visited++;
      for (const child of [a.left(node), a.right(node)]) {
        if (child === EMPTY) continue;
        if (a.parent(child) !== node) {
          throw new SplayInvariantError(
            `node ${child.toString()} does not link back to its parent ${node.toString()}`,
          );
        }
        stack.push(child);
      }
    }

    if (visited !== a.size) {
      throw new SplayInvariantError(
        `reached ${visited.toString()} nodes but ${a.size.toString()} are live`,
      );
    }

    const ordered = this.toArray();
    for (let i = 1; i < ordered.length; i++) {
      if (this.compare(ordered[i - 1], ordered[i]) >= 0) {
        throw new SplayInvariantError(
          `in-order values out of order at position ${i.toString()}`,
        );
      }
    }
  }

  /** BST descent that splays the hit, or the last visited node on a miss. */
  private findNode(value: T): NodeId {
    const a = this.arena;
    let current = this.root;
    let last = EMPTY;

    while (current !== EMPTY) {
      last = current;
      const cmp = this.compare(value, a.value(current));
      if (cmp === 0) {
        this.splay(current);
        return current;
      }
      current = cmp < 0 ? a.left(current) : a.right(current);
    }

    if (last !== EMPTY) this.splay(last);
    return EMPTY;
  }

  private splay(x: NodeId): void {
    const a = this.arena;
    for (let p = a.parent(x); p !== EMPTY; p = a.parent(x)) {
      const g = a.parent(p);
      const xIsLeft = a.left(p) === x;

      if (g === EMPTY) {
        // zig
        if (xIsLeft) this.rotateRight(p);
        else this.rotateLeft(p);
      } else if (xIsLeft === (a.left(g) === p)) {
        // zig-zig
        if (xIsLeft) {
          this.rotateRight(g);
          this.rotateRight(p);
        } else {
          this.rotateLeft(g);
          this.rotateLeft(p);
        }
      } else {
        // zig-zag
        if (xIsLeft) {
          this.rotateRight(p);
          this.rotateLeft(g);
        } else {
          this.rotateLeft(p);
          this.rotateRight(g);
        }
      }
    }
  }

  /** Left rotation. */
  private rotateLeft(x: NodeId): void {
    const a = this.arena;
    const y = a.right(x);
    if (y === EMPTY) return;

    const inner = a.left(y);
    a.setRight(x, inner);
    if (inner !== EMPTY) a.setParent(inner, x);

    this.replaceNode(x, y);
    a.setLeft(y, x);
    a.setParent(x, y);
  }

  /** Right rotation. */
  private rotateRight(x: NodeId): void {
    const a = this.arena;
    const y = a.left(x);
    if (y === EMPTY) return;

    const inner = a.right(y);
    a.setLeft(x, inner);
    if (inner !== EMPTY) a.setParent(inner, x);

    this.replaceNode(x, y);
    a.setRight(y, x);
    a.setParent(x, y);
  }

  /** Put `v` (possibly EMPTY) where `u` hangs: under u's parent, or at the root. */
  private replaceNode(u: NodeId, v: NodeId): void {
    const a = this.arena;
    const parent = a.parent(u);
    if (parent === EMPTY) {
      this.root = v;
    } else if (a.left(parent) === u) {
      a.setLeft(parent, v);
    } else {
      a.setRight(parent, v);
    }
    if (v !== EMPTY) a.setParent(v, parent);
  }

  private subtreeMin(node: NodeId): NodeId {
    const a = this.arena;
    let current = node;
    for (let left = a.left(current); left !== EMPTY; left = a.left(current)) {
      current = left;
    }
    return current;
  }
}

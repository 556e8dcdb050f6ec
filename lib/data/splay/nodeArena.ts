/**
 * Index-addressed node storage for splay trees.
 *
 * Every node gets its own numeric index. Links between nodes are stored as
 * indices in parallel arrays, with {@link EMPTY} standing for an absent link.
 * Released indices go on a free list and are handed out again by
 * {@link NodeArena.allocate}.
 *
 * @module
 */

export type NodeId = number;

export const EMPTY = 0xffffffff;

export class NodeArena<T> {
  private readonly values: T[] = [];
  private readonly lefts: NodeId[] = [];
  private readonly rights: NodeId[] = [];
  private readonly parents: NodeId[] = [];
  private readonly free: NodeId[] = [];
  private live = 0;

  /** Number of live nodes. */
  get size(): number {
    return this.live;
  }

  /** Number of slots ever created, live or free. */
  get capacity(): number {
    return this.lefts.length;
  }

  allocate(value: T): NodeId {
    const reused = this.free.pop();
    const id = reused ?? this.lefts.length;
    this.values[id] = value;
    this.lefts[id] = EMPTY;
    this.rights[id] = EMPTY;
    this.parents[id] = EMPTY;
    this.live++;
    return id;
  }

  release(id: NodeId): void {
    // drop the payload so the arena does not keep it reachable
    delete this.values[id];
    this.lefts[id] = EMPTY;
    this.rights[id] = EMPTY;
    this.parents[id] = EMPTY;
    this.free.push(id);
    this.live--;
  }

  /**
   * Release every node reachable from `root` through child links.
   *
   * Post-order with an explicit stack: tree height is unbounded, so this
   * must not recurse.
   *
   * @returns the number of nodes released
   */
  releaseSubtree(root: NodeId): number {
    if (root === EMPTY) return 0;

    const stack: NodeId[] = [root];
    let lastReleased = EMPTY;
    let released = 0;

    while (stack.length > 0) {
      const top = stack[stack.length - 1];
      const left = this.lefts[top];
      const right = this.rights[top];

      const leftPending = left !== EMPTY && lastReleased !== left &&
        (right === EMPTY || lastReleased !== right);
      if (leftPending) {
        stack.push(left);
        continue;
      }
      if (right !== EMPTY && lastReleased !== right) {
        stack.push(right);
        continue;
      }

      stack.pop();
      this.release(top);
      lastReleased = top;
      released++;
    }

    return released;
  }

  value(id: NodeId): T {
    return this.values[id];
  }

  left(id: NodeId): NodeId {
    return this.lefts[id];
  }

  right(id: NodeId): NodeId {
    return this.rights[id];
  }

  parent(id: NodeId): NodeId {
    return this.parents[id];
  }

  setValue(id: NodeId, value: T): void {
    this.values[id] = value;
  }

  setLeft(id: NodeId, child: NodeId): void {
    this.lefts[id] = child;
  }

  setRight(id: NodeId, child: NodeId): void {
    this.rights[id] = child;
  }

  setParent(id: NodeId, parent: NodeId): void {
    this.parents[id] = parent;
  }
}

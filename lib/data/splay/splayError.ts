/**
 * Splay tree error definitions.
 *
 * Raised only by the invariant checks used in tests and debugging; the tree
 * operations themselves never throw.
 *
 * @module
 */
export class SplayInvariantError extends Error {}

import type { Digest } from "../hashing/index.js";

/** Stable handle of a node in the index arena */
export type NodeRef = number;

/**
 * MmrNode - a vertex in the forest
 *
 * Links are arena handles. `parent` is null iff the node is a current root;
 * `left` and `right` are both set for interior nodes and both null for
 * leaves. `next` is the following (smaller) root and is only meaningful
 * while the node is a root.
 */
export interface MmrNode {
  readonly digest: Digest;
  /** Number of leaves below this node, a power of two */
  readonly weight: number;
  parent: NodeRef | null;
  left: NodeRef | null;
  right: NodeRef | null;
  next: NodeRef | null;
}

export function createLeafNode(digest: Digest): MmrNode {
  return { digest, weight: 1, parent: null, left: null, right: null, next: null };
}

export function isLeaf(node: MmrNode): boolean {
  return node.left === null && node.right === null;
}

/**
 * NodeIndex - owner of every node in the accumulator
 *
 * Nodes live in an append-only arena and are addressed by NodeRef. A chained
 * hash table keyed by FNV-1a(digest) maps digests back to arena slots in
 * O(1) expected time, so witnesses can start from an element instead of
 * walking the forest. Each entry also carries the last witness computed for
 * its node.
 *
 * Nodes are never removed once an add() has been published. Nodes staged by
 * an add() that fails are discarded with rollback().
 */

import type { Digest } from "../hashing/index.js";
import { digestsEqual } from "../hashing/index.js";
import { fnv1a64, Uint64 } from "../uint64/index.js";
import type { AccumulatorLogger } from "../logger.js";
import {
  AllocationFailureError,
  MalformedTreeError,
  NotFoundError,
} from "../errors.js";
import { cloneWitness, type Witness } from "../witness/types.js";
import type { MmrNode, NodeRef } from "./types.js";

export type { MmrNode, NodeRef } from "./types.js";

export interface NodeIndexOptions {
  initialCapacity: number;
  loadFactor: number;
  maxCapacity: number;
  logger: AccumulatorLogger;
}

/** Hash table entry; chains link the most recently inserted entry first */
interface IndexEntry {
  readonly ref: NodeRef;
  witness: Witness | null;
  next: IndexEntry | null;
}

export class NodeIndex {
  private nodes: MmrNode[] = [];

  /** entries[ref] is the table entry of nodes[ref] */
  private entries: IndexEntry[] = [];

  private buckets: (IndexEntry | null)[];

  constructor(private readonly options: NodeIndexOptions) {
    this.buckets = this.allocateBuckets(options.initialCapacity);
  }

  /** Number of indexed nodes */
  get size(): number {
    return this.nodes.length;
  }

  /** Number of hash buckets */
  get capacity(): number {
    return this.buckets.length;
  }

  /**
   * Registers a node and returns its handle.
   *
   * Inserting the same node object twice returns the original handle.
   *
   * @throws AllocationFailureError if the table must grow past maxCapacity
   */
  insert(node: MmrNode): NodeRef {
    const existing = this.findEntry(
      node.digest,
      (entry) => this.nodes[entry.ref] === node,
    );
    if (existing !== null) {
      return existing.ref;
    }

    if (this.size > this.capacity * this.options.loadFactor) {
      this.grow();
    }

    const ref = this.nodes.length;
    const bucket = this.bucketOf(node.digest);
    const entry: IndexEntry = { ref, witness: null, next: this.buckets[bucket] };
    this.buckets[bucket] = entry;
    this.nodes.push(node);
    this.entries.push(entry);
    return ref;
  }

  /**
   * Returns the most recently inserted node with this digest, or null
   */
  lookupByDigest(digest: Digest): NodeRef | null {
    return this.findEntry(digest, () => true)?.ref ?? null;
  }

  /**
   * True iff an indexed node with this digest has no parent.
   *
   * Answered from the table, without walking the root chain.
   */
  isCurrentRoot(digest: Digest): boolean {
    return (
      this.findEntry(digest, (entry) => this.nodes[entry.ref].parent === null) !==
      null
    );
  }

  /**
   * Returns the node behind a handle.
   *
   * @throws MalformedTreeError for a handle the arena never issued
   */
  node(ref: NodeRef): MmrNode {
    const node = this.nodes[ref];
    if (node === undefined) {
      throw new MalformedTreeError(`Unknown node reference ${ref}`);
    }
    return node;
  }

  /**
   * Stores a copy of `witness` on the node with this digest, replacing any
   * earlier one.
   *
   * @throws NotFoundError if no node has the digest
   */
  cacheWitness(digest: Digest, witness: Witness): void {
    const entry = this.findEntry(digest, () => true);
    if (entry === null) {
      throw new NotFoundError(digest);
    }
    entry.witness = cloneWitness(witness);
  }

  /**
   * Returns a copy of the cached witness for this digest, or null
   */
  cachedWitness(digest: Digest): Witness | null {
    const witness = this.findEntry(digest, () => true)?.witness ?? null;
    return witness === null ? null : cloneWitness(witness);
  }

  /**
   * Marks the current arena length for a later rollback()
   */
  checkpoint(): number {
    return this.nodes.length;
  }

  /**
   * Discards every node inserted after `mark`.
   */
  rollback(mark: number): void {
    for (let ref = this.nodes.length - 1; ref >= mark; ref--) {
      this.unlink(this.nodes[ref].digest, this.entries[ref]);
    }
    this.nodes.length = mark;
    this.entries.length = mark;
  }

  /**
   * Drops every node and returns the table to its initial capacity
   */
  clear(): void {
    this.nodes = [];
    this.entries = [];
    this.buckets = this.allocateBuckets(this.options.initialCapacity);
  }

  private findEntry(
    digest: Digest,
    predicate: (entry: IndexEntry) => boolean,
  ): IndexEntry | null {
    let entry = this.buckets[this.bucketOf(digest)];
    while (entry !== null) {
      if (digestsEqual(this.nodes[entry.ref].digest, digest) && predicate(entry)) {
        return entry;
      }
      entry = entry.next;
    }
    return null;
  }

  private unlink(digest: Digest, target: IndexEntry): void {
    const bucket = this.bucketOf(digest);
    let prev: IndexEntry | null = null;
    let entry = this.buckets[bucket];
    while (entry !== null) {
      if (entry === target) {
        if (prev === null) {
          this.buckets[bucket] = entry.next;
        } else {
          prev.next = entry.next;
        }
        return;
      }
      prev = entry;
      entry = entry.next;
    }
    throw new MalformedTreeError(`Node ${target.ref} missing from its bucket`);
  }

  /**
   * Doubles the bucket count and rehashes every entry.
   */
  private grow(): void {
    const from = this.capacity;
    const to = from * 2;
    const buckets = this.allocateBuckets(to);

    // Insertion order keeps the newest entry at the head of each chain
    for (const entry of this.entries) {
      const bucket = bucketFor(this.nodes[entry.ref].digest, to);
      entry.next = buckets[bucket];
      buckets[bucket] = entry;
    }
    this.buckets = buckets;

    this.options.logger.debug("[nodeindex] grew", { from, to, size: this.size });
  }

  private allocateBuckets(capacity: number): (IndexEntry | null)[] {
    if (capacity > this.options.maxCapacity) {
      throw new AllocationFailureError(capacity, this.options.maxCapacity);
    }
    try {
      return new Array<IndexEntry | null>(capacity).fill(null);
    } catch (error) {
      if (error instanceof RangeError) {
        throw new AllocationFailureError(capacity, this.options.maxCapacity, error);
      }
      throw error;
    }
  }

  private bucketOf(digest: Digest): number {
    return bucketFor(digest, this.capacity);
  }
}

function bucketFor(digest: Digest, capacity: number): number {
  return fnv1a64(digest).mod(new Uint64(capacity)).toNumber();
}

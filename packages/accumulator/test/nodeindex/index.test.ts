import { describe, it, expect } from "vitest";
import { NodeIndex, type NodeIndexOptions } from "../../src/nodeindex/index.js";
import { createLeafNode, isLeaf } from "../../src/nodeindex/types.js";
import {
  AllocationFailureError,
  MalformedTreeError,
  NotFoundError,
} from "../../src/errors.js";
import { fakeDigest, mockLogger } from "../helpers.js";

function createIndex(overrides: Partial<NodeIndexOptions> = {}): NodeIndex {
  return new NodeIndex({
    initialCapacity: 16,
    loadFactor: 0.75,
    maxCapacity: 1024,
    logger: mockLogger(),
    ...overrides,
  });
}

describe("NodeIndex", () => {
  describe("insert and lookupByDigest", () => {
    it("should find inserted nodes by digest", () => {
      const index = createIndex();
      const a = index.insert(createLeafNode(fakeDigest(1)));
      const b = index.insert(createLeafNode(fakeDigest(2)));

      expect(index.size).toBe(2);
      expect(index.lookupByDigest(fakeDigest(1))).toBe(a);
      expect(index.lookupByDigest(fakeDigest(2))).toBe(b);
      expect(index.node(a).digest).toEqual(fakeDigest(1));
    });

    it("should return null for unknown digests", () => {
      const index = createIndex();
      index.insert(createLeafNode(fakeDigest(1)));
      expect(index.lookupByDigest(fakeDigest(9))).toBeNull();
    });

    it("should return the existing handle when the same node is inserted twice", () => {
      const index = createIndex();
      const node = createLeafNode(fakeDigest(1));
      const first = index.insert(node);
      const second = index.insert(node);

      expect(second).toBe(first);
      expect(index.size).toBe(1);
    });

    it("should prefer the most recent node when digests repeat", () => {
      const index = createIndex();
      index.insert(createLeafNode(fakeDigest(1)));
      const latest = index.insert(createLeafNode(fakeDigest(1)));

      expect(index.size).toBe(2);
      expect(index.lookupByDigest(fakeDigest(1))).toBe(latest);
    });
  });

  describe("isCurrentRoot", () => {
    it("should be true only for indexed nodes without a parent", () => {
      const index = createIndex();
      const child = index.insert(createLeafNode(fakeDigest(1)));
      const root = index.insert(createLeafNode(fakeDigest(2)));
      index.node(child).parent = root;

      expect(index.isCurrentRoot(fakeDigest(2))).toBe(true);
      expect(index.isCurrentRoot(fakeDigest(1))).toBe(false);
      expect(index.isCurrentRoot(fakeDigest(3))).toBe(false);
    });

    it("should consider every node sharing the digest", () => {
      const index = createIndex();
      index.insert(createLeafNode(fakeDigest(1)));
      const parent = index.insert(createLeafNode(fakeDigest(2)));
      const later = index.insert(createLeafNode(fakeDigest(1)));
      index.node(later).parent = parent;

      expect(index.isCurrentRoot(fakeDigest(1))).toBe(true);
    });
  });

  describe("growth", () => {
    it("should double capacity once occupancy passes the load factor", () => {
      const logger = mockLogger();
      const index = createIndex({ initialCapacity: 4, logger });
      for (let i = 1; i <= 4; i++) {
        index.insert(createLeafNode(fakeDigest(i)));
      }
      expect(index.capacity).toBe(4);

      index.insert(createLeafNode(fakeDigest(5)));
      expect(index.capacity).toBe(8);
      expect(logger.debug).toHaveBeenCalledWith("[nodeindex] grew", {
        from: 4,
        to: 8,
        size: 4,
      });
    });

    it("should keep every node reachable after rehashing", () => {
      const index = createIndex({ initialCapacity: 1 });
      const refs: number[] = [];
      for (let i = 1; i <= 40; i++) {
        refs.push(index.insert(createLeafNode(fakeDigest(i))));
      }
      expect(index.capacity).toBe(64);
      for (let i = 1; i <= 40; i++) {
        expect(index.lookupByDigest(fakeDigest(i))).toBe(refs[i - 1]);
      }
    });

    it("should fail without inserting when growth exceeds maxCapacity", () => {
      const index = createIndex({ initialCapacity: 2, maxCapacity: 2 });
      index.insert(createLeafNode(fakeDigest(1)));
      index.insert(createLeafNode(fakeDigest(2)));

      expect(() => index.insert(createLeafNode(fakeDigest(3)))).toThrow(
        AllocationFailureError,
      );
      expect(index.size).toBe(2);
      expect(index.capacity).toBe(2);
      expect(index.lookupByDigest(fakeDigest(3))).toBeNull();
    });
  });

  describe("rollback", () => {
    it("should discard nodes inserted after the checkpoint", () => {
      const index = createIndex();
      index.insert(createLeafNode(fakeDigest(1)));
      const mark = index.checkpoint();
      index.insert(createLeafNode(fakeDigest(2)));
      index.insert(createLeafNode(fakeDigest(3)));

      index.rollback(mark);

      expect(index.size).toBe(1);
      expect(index.lookupByDigest(fakeDigest(1))).toBe(0);
      expect(index.lookupByDigest(fakeDigest(2))).toBeNull();
      expect(index.lookupByDigest(fakeDigest(3))).toBeNull();
      expect(index.insert(createLeafNode(fakeDigest(4)))).toBe(1);
    });

    it("should restore an earlier node hidden by a duplicate digest", () => {
      const index = createIndex();
      const first = index.insert(createLeafNode(fakeDigest(1)));
      const mark = index.checkpoint();
      index.insert(createLeafNode(fakeDigest(1)));

      index.rollback(mark);
      expect(index.lookupByDigest(fakeDigest(1))).toBe(first);
    });
  });

  describe("witness cache", () => {
    it("should store and return copies of witnesses", () => {
      const index = createIndex();
      index.insert(createLeafNode(fakeDigest(1)));
      const witness = {
        leafHash: fakeDigest(1),
        siblings: [fakeDigest(2)],
        path: 1n,
      };

      expect(index.cachedWitness(fakeDigest(1))).toBeNull();
      index.cacheWitness(fakeDigest(1), witness);
      witness.siblings[0][0] = 0xff;

      const cached = index.cachedWitness(fakeDigest(1));
      expect(cached).toEqual({
        leafHash: fakeDigest(1),
        siblings: [fakeDigest(2)],
        path: 1n,
      });
    });

    it("should replace an earlier cached witness", () => {
      const index = createIndex();
      index.insert(createLeafNode(fakeDigest(1)));
      index.cacheWitness(fakeDigest(1), { leafHash: fakeDigest(1), siblings: [], path: 0n });
      index.cacheWitness(fakeDigest(1), {
        leafHash: fakeDigest(1),
        siblings: [fakeDigest(3)],
        path: 0n,
      });

      expect(index.cachedWitness(fakeDigest(1))?.siblings).toEqual([fakeDigest(3)]);
    });

    it("should throw for unknown digests", () => {
      const index = createIndex();
      expect(() =>
        index.cacheWitness(fakeDigest(1), { leafHash: fakeDigest(1), siblings: [], path: 0n }),
      ).toThrow(NotFoundError);
    });
  });

  describe("node", () => {
    it("should throw for handles that were never issued", () => {
      const index = createIndex();
      expect(() => index.node(0)).toThrow(MalformedTreeError);
    });

    it("should create leaves without links", () => {
      const index = createIndex();
      const ref = index.insert(createLeafNode(fakeDigest(1)));
      const node = index.node(ref);
      expect(node.weight).toBe(1);
      expect(isLeaf(node)).toBe(true);
      expect(node.parent).toBeNull();
      expect(node.next).toBeNull();
    });
  });

  describe("clear", () => {
    it("should drop all nodes and reset capacity", () => {
      const index = createIndex({ initialCapacity: 2 });
      for (let i = 1; i <= 5; i++) {
        index.insert(createLeafNode(fakeDigest(i)));
      }
      index.clear();

      expect(index.size).toBe(0);
      expect(index.capacity).toBe(2);
      expect(index.lookupByDigest(fakeDigest(1))).toBeNull();
    });
  });
});

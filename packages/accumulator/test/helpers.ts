import { vi } from "vitest";
import type { AccumulatorLogger } from "../src/logger.js";
import { leafHash, parentHash, type Digest } from "../src/hashing/index.js";
import type { NodeIndex, NodeRef } from "../src/nodeindex/index.js";

const enc = new TextEncoder();

export function bytes(text: string): Uint8Array {
  return enc.encode(text);
}

export function leaf(text: string): Digest {
  return leafHash(bytes(text));
}

/** Digest of the perfect tree over the given elements, in order */
export function treeDigest(...elements: string[]): Digest {
  let level = elements.map(leaf);
  while (level.length > 1) {
    const next: Digest[] = [];
    for (let i = 0; i < level.length; i += 2) {
      next.push(parentHash(level[i], level[i + 1]));
    }
    level = next;
  }
  return level[0];
}

/** Distinct 32-byte test digest */
export function fakeDigest(seed: number): Digest {
  return new Uint8Array(32).fill(seed);
}

export function mockLogger() {
  return {
    debug: vi.fn<AccumulatorLogger["debug"]>(),
    info: vi.fn<AccumulatorLogger["info"]>(),
    warn: vi.fn<AccumulatorLogger["warn"]>(),
    error: vi.fn<AccumulatorLogger["error"]>(),
  } satisfies AccumulatorLogger;
}

export function refOf(index: NodeIndex, digest: Digest): NodeRef {
  const ref = index.lookupByDigest(digest);
  if (ref === null) {
    throw new Error("digest not indexed");
  }
  return ref;
}

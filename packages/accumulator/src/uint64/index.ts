/**
 * Uint64 - A BigInt-based wrapper for 64-bit unsigned integer operations
 *
 * Used for the FNV-1a bucket hash of the node index and for witness path
 * bit fields. Every result is reduced with BigInt.asUintN(64, value).
 */
export class Uint64 {
  private readonly value: bigint;

  /**
   * Creates a new Uint64 instance
   * @param value - The initial value as number, bigint, or string
   */
  constructor(value: number | bigint | string | Uint64) {
    if (value instanceof Uint64) {
      this.value = value.value;
    } else {
      const bigIntValue = typeof value === "bigint" ? value : BigInt(value);
      this.value = BigInt.asUintN(64, bigIntValue);
    }
  }

  /**
   * Multiplication with overflow handling (wraps around at 2^64)
   */
  mul(other: Uint64): Uint64 {
    return new Uint64(this.value * other.value);
  }

  /**
   * Remainder of unsigned division
   * @throws Error on division by zero
   */
  mod(other: Uint64): Uint64 {
    if (other.value === 0n) {
      throw new Error("Division by zero");
    }
    return new Uint64(this.value % other.value);
  }

  /**
   * Left shift
   * @param bits - Number of bits to shift left
   */
  shl(bits: number): Uint64 {
    if (bits < 0 || bits > 63) {
      throw new Error("Shift amount must be between 0 and 63");
    }
    return new Uint64(this.value << BigInt(bits));
  }

  /**
   * Right shift (logical, zero-fill)
   * @param bits - Number of bits to shift right
   */
  shr(bits: number): Uint64 {
    if (bits < 0 || bits > 63) {
      throw new Error("Shift amount must be between 0 and 63");
    }
    return new Uint64(this.value >> BigInt(bits));
  }

  and(other: Uint64): Uint64 {
    return new Uint64(this.value & other.value);
  }

  or(other: Uint64): Uint64 {
    return new Uint64(this.value | other.value);
  }

  xor(other: Uint64): Uint64 {
    return new Uint64(this.value ^ other.value);
  }

  /**
   * Tests a single bit, counting from the least significant bit
   */
  testBit(bit: number): boolean {
    return this.shr(bit).and(ONE).equals(ONE);
  }

  /**
   * Returns a copy with a single bit set
   */
  setBit(bit: number): Uint64 {
    return this.or(ONE.shl(bit));
  }

  toBigInt(): bigint {
    return this.value;
  }

  /**
   * Returns the value as a number (with range check)
   * @throws Error if value exceeds Number.MAX_SAFE_INTEGER
   */
  toNumber(): number {
    if (this.value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new Error(
        `Value ${this.value} exceeds Number.MAX_SAFE_INTEGER (${Number.MAX_SAFE_INTEGER})`,
      );
    }
    return Number(this.value);
  }

  equals(other: Uint64): boolean {
    return this.value === other.value;
  }
}

const ONE = new Uint64(1);

/** FNV-1a 64-bit offset basis */
const FNV_OFFSET_BASIS = new Uint64(0xcbf29ce484222325n);

/** FNV-1a 64-bit prime */
const FNV_PRIME = new Uint64(0x100000001b3n);

/**
 * FNV-1a 64-bit hash of a byte string.
 */
export function fnv1a64(data: Uint8Array): Uint64 {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < data.length; i++) {
    hash = hash.xor(new Uint64(data[i])).mul(FNV_PRIME);
  }
  return hash;
}

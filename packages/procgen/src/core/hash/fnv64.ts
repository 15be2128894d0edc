/**
 * FNV-1a 64-bit hash, fed incrementally.
 */

const FNV64_OFFSET_BASIS = 14695981039346656037n;
const FNV64_PRIME = 1099511628211n;
const MASK_64 = (1n << 64n) - 1n;

const encoder = new TextEncoder();

export class FNV64Hasher {
  private hash = FNV64_OFFSET_BASIS;

  updateByte(byte: number): this {
    this.hash ^= BigInt(byte & 0xff);
    this.hash = (this.hash * FNV64_PRIME) & MASK_64;
    return this;
  }

  updateBytes(data: Uint8Array): this {
    for (const byte of data) {
      this.updateByte(byte);
    }
    return this;
  }

  /**
   * Add a 32-bit integer, little-endian. Negative values hash as their
   * two's complement.
   */
  updateInt32(value: number): this {
    const v = value >>> 0;
    return this.updateByte(v & 0xff)
      .updateByte((v >>> 8) & 0xff)
      .updateByte((v >>> 16) & 0xff)
      .updateByte((v >>> 24) & 0xff);
  }

  updateBoolean(value: boolean): this {
    return this.updateByte(value ? 1 : 0);
  }

  updateString(str: string): this {
    return this.updateBytes(encoder.encode(str));
  }

  /**
   * Final hash as a 16-character hex string
   */
  digest(): string {
    return this.hash.toString(16).padStart(16, "0");
  }
}

export function createFNV64Hasher(): FNV64Hasher {
  return new FNV64Hasher();
}

export function fnv64HashString(str: string): string {
  return new FNV64Hasher().updateString(str).digest();
}

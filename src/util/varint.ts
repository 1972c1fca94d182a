/**
 * LEB128 varint and zigzag helpers for the protobuf wire format.
 */

// Scalar ranges shared by both encoders.
export const UINT32_MAX = 0xffffffff;
export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;
export const INT64_MIN = -(1n << 63n);
export const INT64_MAX = (1n << 63n) - 1n;
export const UINT64_MAX = (1n << 64n) - 1n;

/** Write a varint for a non-negative JS number (no BigInt overhead). */
export function writeIntVarint(buf: Uint8Array, offset: number, value: number): number {
  let i = offset;
  while (value > 0x7f) {
    buf[i++] = (value & 0x7f) | 0x80;
    value >>>= 7;
  }
  buf[i++] = value;
  return i - offset;
}

/** Byte length of a non-negative JS number varint (uint32 range). */
export function intVarintSize(n: number): number {
  if (n < 0x80) return 1;
  if (n < 0x4000) return 2;
  if (n < 0x200000) return 3;
  if (n < 0x10000000) return 4;
  return 5;
}

/**
 * Encode a BigInt as a variable-length integer.
 * Negative values are written as 64-bit two's complement (10 bytes).
 */
export function encodeVarint(value: bigint): Uint8Array {
  const buf = new Uint8Array(varintSize(value));
  writeVarint(buf, 0, value);
  return buf;
}

/**
 * Write a varint into a pre-allocated buffer at the given offset.
 * Returns the number of bytes written.
 */
export function writeVarint(buf: Uint8Array, offset: number, value: bigint): number {
  value = BigInt.asUintN(64, value);
  let i = offset;
  do {
    let byte = Number(value & 0x7fn);
    value >>= 7n;
    if (value !== 0n) {
      byte |= 0x80;
    }
    buf[i++] = byte;
  } while (value !== 0n);
  return i - offset;
}

/**
 * Calculate the byte length of a varint encoding without allocating.
 */
export function varintSize(value: bigint): number {
  value = BigInt.asUintN(64, value);
  if (value === 0n) return 1;
  let size = 0;
  while (value > 0n) {
    size++;
    value >>= 7n;
  }
  return size;
}

/** Zigzag-map a signed 32-bit integer onto an unsigned one. */
export function zigzagEncode32(n: number): number {
  return ((n << 1) ^ (n >> 31)) >>> 0;
}

export function zigzagDecode32(n: number): number {
  return (n >>> 1) ^ -(n & 1);
}

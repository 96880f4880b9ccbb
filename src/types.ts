/**
 * Value tags used in the binvalue binary encoding.
 *
 * Every encoded value starts with its tag as a varint, followed by the
 * payload for that variant. The numbering is part of the wire format.
 */
export enum ValueTag {
  /** No payload */
  Null = 0,
  /** One byte, 0 or 1 */
  Boolean = 1,
  /** Length-prefixed bytes */
  Blob = 2,
  /** Element count followed by each element */
  Array = 3,
  /** ZigZag-encoded signed 64-bit varint */
  Integer = 4,
  /** Fixed 64-bit IEEE 754 double (little-endian) */
  Float = 5,
  /** Entry count followed by (string key, value) pairs */
  Object = 6,
  /** Length-prefixed UTF-8 */
  String = 7,
}

/**
 * Largest tag value currently assigned.
 */
export const MaxValueTag = ValueTag.String;

/**
 * Maximum values for varint encoding.
 */
export const MaxVarint32 = 0xffffffff;
export const MaxVarint64 = BigInt("0xffffffffffffffff");

/**
 * Signed 64-bit integer bounds.
 */
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1

/**
 * Unsigned 64-bit integer upper bound.
 */
export const MaxUint64 = MaxVarint64;

/**
 * Returns true if the tag is one of the assigned value tags.
 */
export function isValueTag(tag: number): tag is ValueTag {
  return Number.isInteger(tag) && tag >= 0 && tag <= MaxValueTag;
}

/**
 * Encode a signed bigint using ZigZag encoding.
 * @throws RangeError if n is outside the valid 64-bit signed integer range
 */
export function zigzagEncode64(n: bigint): bigint {
  if (n < MinInt64 || n > MaxInt64) {
    throw new RangeError(
      `BigInt value ${n} is outside valid 64-bit signed integer range [${MinInt64}, ${MaxInt64}]`
    );
  }
  return BigInt.asUintN(64, (n << 1n) ^ (n >> 63n));
}

/**
 * Decode a ZigZag encoded bigint.
 */
export function zigzagDecode64(n: bigint): bigint {
  return (n >> 1n) ^ -(n & 1n);
}

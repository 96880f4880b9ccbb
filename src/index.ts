/**
 * binvalue - typed values to a dynamic value tree and a compact binary form
 *
 * @example
 * ```typescript
 * import { shape, toBytes, fromBytes } from 'binvalue';
 *
 * const Point = shape.struct('Point', { x: shape.i32, y: shape.i32 });
 *
 * const data = toBytes({ x: 1, y: 2 }, Point);
 * const point = fromBytes(data, Point); // { x: 1, y: 2 }
 * ```
 */

import { getLogger } from "@logtape/logtape";
import { decodeValue, encodeValue } from "./binary";
import { Decode, ValueDecoder } from "./decoder";
import { Encode, ValueEncoder } from "./encoder";
import { BinaryCodecError, DecodeError, EncodeError } from "./errors";
import { resolveOptions, ValueOptionsInput } from "./options";
import { Value } from "./value";

const logger = getLogger(["binvalue"]);

// Core types
export {
  ValueTag,
  MaxValueTag,
  MaxVarint32,
  MaxVarint64,
  MinInt64,
  MaxInt64,
  MaxUint64,
  isValueTag,
  zigzagEncode64,
  zigzagDecode64,
} from "./types";

// Errors
export {
  BinvalueError,
  EncodeError,
  DecodeError,
  BufferUnderflowError,
  InvalidTagError,
  BinaryCodecError,
  CustomError,
  ExpectedError,
  DuplicatedFieldError,
  MissingFieldError,
  UnknownError,
  EofError,
  DepthLimitError,
  isValueError,
} from "./errors";
export type { ValueError, ValueErrorKind } from "./errors";

// Value model
export {
  Value,
  errorDescription,
  valueEquals,
  isNull,
  isBoolean,
  isBlob,
  isArray,
  isInteger,
  isFloat,
  isObject,
  isString,
  asBoolean,
  asBlob,
  asArray,
  asInteger,
  asFloat,
  asObject,
  asString,
} from "./value";
export type {
  NullValue,
  BooleanValue,
  BlobValue,
  ArrayValue,
  IntegerValue,
  FloatValue,
  ObjectValue,
  StringValue,
  ValueKind,
} from "./value";

// Options
export { DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT, valueOptionsSchema, resolveOptions, defaultOptions } from "./options";
export type { ValueOptions, ValueOptionsInput, KeyOrder } from "./options";

// Encoder and decoder
export { ValueEncoder } from "./encoder";
export type { Encode, Encoder, SeqEncoder, MapEncoder, StructEncoder } from "./encoder";
export { ValueDecoder, SeqDecoder, MapDecoder, ignored, ignoreVisitor } from "./decoder";
export type { Decode, Decoder, Visitor, SeqAccess, MapAccess, EnumAccess, VariantAccess } from "./decoder";

// Shapes
export * as shape from "./shapes";
export type {
  Shape,
  Infer,
  TupleOf,
  FieldShapes,
  StructOptions,
  VariantShape,
  UnitVariantShape,
  EnumValue,
} from "./shapes";

// Binary codec
export { encodeValue, decodeValue } from "./binary";
export type { DecodedValue } from "./binary";

// Text form
export { toJson, fromJson, toJsonText, fromJsonText } from "./json";
export type { JsonValue } from "./json";

// Byte layer
export { Writer } from "./writer";
export { Reader } from "./reader";

/**
 * Library version.
 */
export const VERSION = "0.1.0";

/**
 * Re-throws byte-layer failures as BinaryCodecError; everything else passes
 * through unchanged.
 */
function wrapCodec<T>(run: () => T): T {
  try {
    return run();
  } catch (error) {
    if (error instanceof EncodeError || error instanceof DecodeError) {
      throw new BinaryCodecError(error);
    }
    throw error;
  }
}

/**
 * Converts a typed value to a value tree.
 */
export function toValue<T>(value: NoInfer<T>, shape: Encode<T>, options?: ValueOptionsInput): Value {
  return shape.encode(value, new ValueEncoder(resolveOptions(options)));
}

/**
 * Builds a typed value from a value tree.
 */
export function fromValue<T>(value: Value, shape: Decode<T>, options?: ValueOptionsInput): T {
  return shape.decode(new ValueDecoder(value, resolveOptions(options)));
}

/**
 * Encodes a typed value to bytes by way of its value tree.
 */
export function toBytes<T>(value: NoInfer<T>, shape: Encode<T>, options?: ValueOptionsInput): Uint8Array {
  const resolved = resolveOptions(options);
  const tree = shape.encode(value, new ValueEncoder(resolved));
  return wrapCodec(() => encodeValue(tree, resolved));
}

/**
 * Decodes a typed value from bytes by way of its value tree. Bytes after the
 * first encoded value are ignored.
 */
export function fromBytes<T>(data: Uint8Array, shape: Decode<T>, options?: ValueOptionsInput): T {
  const resolved = resolveOptions(options);
  const { value, bytesRead } = wrapCodec(() => decodeValue(data, resolved));
  if (bytesRead < data.length) {
    const count = data.length - bytesRead;
    logger.warn("Ignoring {count} trailing bytes after the encoded value.", { count });
  }
  return shape.decode(new ValueDecoder(value, resolved));
}

import { DepthLimitError, InvalidTagError } from "./errors";
import { defaultOptions, ValueOptions } from "./options";
import { Reader } from "./reader";
import { isValueTag, ValueTag } from "./types";
import { Value } from "./value";
import { Writer } from "./writer";

/**
 * Result of decoding one value from the front of a buffer.
 */
export interface DecodedValue {
  value: Value;
  /** Number of input bytes the value occupied. */
  bytesRead: number;
}

/**
 * Encodes a value tree to its binary form.
 * @throws DepthLimitError if containers nest deeper than `maxDepth`
 */
export function encodeValue(value: Value, options: ValueOptions = defaultOptions): Uint8Array {
  const writer = new Writer();
  writeValue(writer, value, options, 0);
  return writer.bytes();
}

/**
 * Decodes one value from the start of `data`. Bytes after it are left
 * unread and reported through `bytesRead`.
 */
export function decodeValue(data: Uint8Array, options: ValueOptions = defaultOptions): DecodedValue {
  const reader = new Reader(data);
  const value = readValue(reader, options, 0);
  return { value, bytesRead: reader.position };
}

function enter(depth: number, options: ValueOptions): number {
  const next = depth + 1;
  if (next > options.maxDepth) {
    throw new DepthLimitError(options.maxDepth);
  }
  return next;
}

/**
 * Writes a value: its tag as a varint, then the payload.
 */
export function writeValue(writer: Writer, value: Value, options: ValueOptions, depth: number): void {
  switch (value.kind) {
    case "null":
      writer.writeVarint(ValueTag.Null);
      return;
    case "boolean":
      writer.writeVarint(ValueTag.Boolean);
      writer.writeBool(value.value);
      return;
    case "blob":
      writer.writeVarint(ValueTag.Blob);
      writer.writeLengthPrefixedBytes(value.value);
      return;
    case "array": {
      const child = enter(depth, options);
      writer.writeVarint(ValueTag.Array);
      writer.writeVarint(value.value.length);
      for (const item of value.value) {
        writeValue(writer, item, options, child);
      }
      return;
    }
    case "integer":
      writer.writeVarint(ValueTag.Integer);
      writer.writeSVarint64(value.value);
      return;
    case "float":
      writer.writeVarint(ValueTag.Float);
      writer.writeFloat64(value.value);
      return;
    case "object": {
      const child = enter(depth, options);
      writer.writeVarint(ValueTag.Object);
      writer.writeVarint(value.value.size);
      for (const [key, item] of value.value) {
        writer.writeString(key);
        writeValue(writer, item, options, child);
      }
      return;
    }
    case "string":
      writer.writeVarint(ValueTag.String);
      writer.writeString(value.value);
      return;
  }
}

/**
 * Reads a value written by writeValue. A repeated object key keeps the last
 * value read.
 */
export function readValue(reader: Reader, options: ValueOptions, depth: number): Value {
  const tag = reader.readVarint();
  if (!isValueTag(tag)) {
    throw new InvalidTagError(tag);
  }

  switch (tag) {
    case ValueTag.Null:
      return Value.null();
    case ValueTag.Boolean:
      return Value.boolean(reader.readBool());
    case ValueTag.Blob:
      return Value.blob(reader.readLengthPrefixedBytes());
    case ValueTag.Array: {
      const child = enter(depth, options);
      const count = reader.readVarint();
      const items: Value[] = [];
      for (let i = 0; i < count; i++) {
        items.push(readValue(reader, options, child));
      }
      return Value.array(items);
    }
    case ValueTag.Integer:
      return Value.integer(reader.readSVarint64());
    case ValueTag.Float:
      return Value.float(reader.readFloat64());
    case ValueTag.Object: {
      const child = enter(depth, options);
      const count = reader.readVarint();
      const entries = new Map<string, Value>();
      for (let i = 0; i < count; i++) {
        const key = reader.readString();
        entries.set(key, readValue(reader, options, child));
      }
      return Value.object(entries);
    }
    case ValueTag.String:
      return Value.string(reader.readString());
  }
}

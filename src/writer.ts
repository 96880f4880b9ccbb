import { EncodeError } from "./errors";
import { MaxVarint32, zigzagEncode64 } from "./types";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

const textEncoder = new TextEncoder();

// A high surrogate not followed by a low one, or a low one not preceded by a high one.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Writer appends binvalue primitives to a growable buffer.
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer);
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes raw bytes.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes an unsigned 32-bit varint (LEB128).
   * @throws EncodeError if the value is not an integer in [0, 2^32 - 1]
   */
  writeVarint(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > MaxVarint32) {
      throw new EncodeError(`Varint out of range: ${value}`);
    }
    this.ensureCapacity(5);
    while (value > 0x7f) {
      this.buffer[this.pos++] = (value & 0x7f) | 0x80;
      value >>>= 7;
    }
    this.buffer[this.pos++] = value;
  }

  /**
   * Writes an unsigned 64-bit varint (LEB128).
   */
  writeVarint64(value: bigint): void {
    this.ensureCapacity(10);
    while (value > 0x7fn) {
      this.buffer[this.pos++] = Number(value & 0x7fn) | 0x80;
      value >>= 7n;
    }
    this.buffer[this.pos++] = Number(value);
  }

  /**
   * Writes a signed 64-bit varint using ZigZag encoding.
   * @throws EncodeError if the value does not fit in 64 signed bits
   */
  writeSVarint64(value: bigint): void {
    let encoded: bigint;
    try {
      encoded = zigzagEncode64(value);
    } catch (error) {
      throw new EncodeError(error instanceof Error ? error.message : String(error));
    }
    this.writeVarint64(encoded);
  }

  /**
   * Writes a boolean as a single 0 or 1 byte.
   */
  writeBool(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  /**
   * Writes a 64-bit float (IEEE 754).
   */
  writeFloat64(value: number): void {
    this.ensureCapacity(8);
    this.view.setFloat64(this.pos, value, true); // Little-endian
    this.pos += 8;
  }

  /**
   * Writes a length-prefixed UTF-8 string.
   * @throws EncodeError if the string holds a lone surrogate, which UTF-8
   * cannot represent
   */
  writeString(value: string): void {
    if (LONE_SURROGATE.test(value)) {
      throw new EncodeError("Invalid UTF-16 in string: lone surrogate");
    }
    this.writeLengthPrefixedBytes(textEncoder.encode(value));
  }

  /**
   * Writes length-prefixed bytes.
   */
  writeLengthPrefixedBytes(data: Uint8Array): void {
    this.writeVarint(data.length);
    this.writeBytes(data);
  }
}

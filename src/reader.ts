import { BufferUnderflowError, DecodeError } from "./errors";
import { zigzagDecode64 } from "./types";

const textDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Reader consumes binvalue primitives from a byte buffer.
 */
export class Reader {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = 0;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  private checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new BufferUnderflowError(needed, this.remaining);
    }
  }

  /**
   * Reads a raw byte.
   */
  readByte(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  /**
   * Reads raw bytes. The result is a view into the input.
   */
  readBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /**
   * ceil(64 / 7): the longest LEB128 encoding of a 64-bit value.
   */
  private static readonly MAX_VARINT_BYTES = 10;

  /**
   * Reads an unsigned 32-bit varint (LEB128).
   */
  readVarint(): number {
    let result = 0;
    let shift = 0;

    for (let i = 0; i < 5; i++) {
      this.checkAvailable(1);
      const b = this.buffer[this.pos++];

      // The fifth byte carries only the top 4 bits.
      if (i === 4 && (b & 0xf0) !== 0) {
        throw new DecodeError("Varint overflow: value exceeds 32 bits");
      }

      result |= (b & 0x7f) << shift;
      if ((b & 0x80) === 0) {
        return result >>> 0;
      }
      shift += 7;
    }

    throw new DecodeError("Varint overflow: value exceeds 32 bits");
  }

  /**
   * Reads an unsigned 64-bit varint (LEB128).
   */
  readVarint64(): bigint {
    let result = 0n;
    let shift = 0n;

    for (let i = 0; i < Reader.MAX_VARINT_BYTES; i++) {
      this.checkAvailable(1);
      const b = this.buffer[this.pos++];

      // The tenth byte carries only bit 63.
      if (i === 9 && b > 1) {
        throw new DecodeError("Varint64 overflow: 10th byte must be 0 or 1");
      }

      result |= BigInt(b & 0x7f) << shift;
      if ((b & 0x80) === 0) {
        return result;
      }
      shift += 7n;
    }

    throw new DecodeError("Varint64 overflow: exceeded 10 bytes");
  }

  /**
   * Reads a signed 64-bit varint using ZigZag decoding.
   */
  readSVarint64(): bigint {
    return zigzagDecode64(this.readVarint64());
  }

  /**
   * Reads a boolean. Bytes other than 0 and 1 are rejected.
   */
  readBool(): boolean {
    const b = this.readByte();
    if (b > 1) {
      throw new DecodeError(`Invalid boolean byte: ${b}`);
    }
    return b === 1;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readFloat64(): number {
    this.checkAvailable(8);
    const value = this.view.getFloat64(this.pos, true); // Little-endian
    this.pos += 8;
    return value;
  }

  /**
   * Reads a length-prefixed UTF-8 string.
   */
  readString(): string {
    const bytes = this.readLengthPrefixedBytes();
    try {
      return textDecoder.decode(bytes);
    } catch (error) {
      throw new DecodeError("Invalid UTF-8 in string", { cause: error });
    }
  }

  /**
   * Reads length-prefixed bytes.
   */
  readLengthPrefixedBytes(): Uint8Array {
    const length = this.readVarint();
    return this.readBytes(length);
  }
}

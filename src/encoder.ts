import { CustomError, DepthLimitError, ExpectedError } from "./errors";
import { defaultOptions, KeyOrder, ValueOptions } from "./options";
import { errorDescription, Value } from "./value";

/**
 * Describes how to encode a value of type T. A shape calls exactly one
 * `encodeX` method of the encoder it is given and returns its result.
 */
export interface Encode<T> {
  encode<Ok>(value: T, encoder: Encoder<Ok>): Ok;
}

/**
 * Receives a typed value's description, one method per shape.
 *
 * Integer widths up to 32 bits are passed as numbers, 64-bit widths as
 * bigints. `name` and `index` identify the containing type and the variant's
 * position; encoders that don't need them ignore them.
 */
export interface Encoder<Ok> {
  /** Whether the output is meant for people rather than machines. */
  readonly isHumanReadable: boolean;

  encodeBool(value: boolean): Ok;
  encodeI8(value: number): Ok;
  encodeI16(value: number): Ok;
  encodeI32(value: number): Ok;
  encodeI64(value: bigint): Ok;
  encodeU8(value: number): Ok;
  encodeU16(value: number): Ok;
  encodeU32(value: number): Ok;
  encodeU64(value: bigint): Ok;
  encodeF32(value: number): Ok;
  encodeF64(value: number): Ok;
  encodeChar(value: string): Ok;
  encodeStr(value: string): Ok;
  encodeBytes(value: Uint8Array): Ok;

  encodeNone(): Ok;
  encodeSome<T>(value: T, shape: Encode<T>): Ok;

  encodeUnit(): Ok;
  encodeUnitStruct(name: string): Ok;
  encodeUnitVariant(name: string, index: number, variant: string): Ok;
  encodeNewtypeStruct<T>(name: string, value: T, shape: Encode<T>): Ok;
  encodeNewtypeVariant<T>(
    name: string,
    index: number,
    variant: string,
    value: T,
    shape: Encode<T>
  ): Ok;

  encodeSeq(length?: number): SeqEncoder<Ok>;
  encodeTuple(length: number): SeqEncoder<Ok>;
  encodeTupleStruct(name: string, length: number): SeqEncoder<Ok>;
  encodeTupleVariant(name: string, index: number, variant: string, length: number): SeqEncoder<Ok>;
  encodeMap(length?: number): MapEncoder<Ok>;
  encodeStruct(name: string, length: number): StructEncoder<Ok>;
  encodeStructVariant(
    name: string,
    index: number,
    variant: string,
    length: number
  ): StructEncoder<Ok>;
}

/**
 * Collects the elements of a sequence, tuple or tuple variant.
 */
export interface SeqEncoder<Ok> {
  element<T>(value: T, shape: Encode<T>): void;
  end(): Ok;
}

/**
 * Collects the entries of a map. `key` and `value` must alternate.
 */
export interface MapEncoder<Ok> {
  key<K>(key: K, shape: Encode<K>): void;
  value<V>(value: V, shape: Encode<V>): void;
  entry<K, V>(key: K, keyShape: Encode<K>, value: V, valueShape: Encode<V>): void;
  end(): Ok;
}

/**
 * Collects the fields of a struct or struct variant.
 */
export interface StructEncoder<Ok> {
  field<T>(key: string, value: T, shape: Encode<T>): void;
  end(): Ok;
}

/**
 * Encoder producing a Value tree.
 *
 * The mapping is fixed: integers of every width become signed 64-bit
 * integers, unit types become empty arrays, unit variants become their name
 * and other variants become a single-entry object keyed by the variant name.
 */
export class ValueEncoder implements Encoder<Value> {
  readonly isHumanReadable = false;

  constructor(
    private readonly options: ValueOptions = defaultOptions,
    private readonly depth: number = 0
  ) {}

  /**
   * Returns an encoder for the children of a container opened at this depth.
   */
  private nested(): ValueEncoder {
    const depth = this.depth + 1;
    if (depth > this.options.maxDepth) {
      throw new DepthLimitError(this.options.maxDepth);
    }
    return new ValueEncoder(this.options, depth);
  }

  encodeBool(value: boolean): Value {
    return Value.boolean(value);
  }

  encodeI8(value: number): Value {
    return this.encodeI64(BigInt(value));
  }

  encodeI16(value: number): Value {
    return this.encodeI64(BigInt(value));
  }

  encodeI32(value: number): Value {
    return this.encodeI64(BigInt(value));
  }

  encodeI64(value: bigint): Value {
    return { kind: "integer", value: BigInt.asIntN(64, value) };
  }

  encodeU8(value: number): Value {
    return this.encodeI64(BigInt(value));
  }

  encodeU16(value: number): Value {
    return this.encodeI64(BigInt(value));
  }

  encodeU32(value: number): Value {
    return this.encodeI64(BigInt(value));
  }

  /**
   * Values above the signed range keep their bit pattern and read back as
   * negative integers.
   */
  encodeU64(value: bigint): Value {
    return this.encodeI64(value);
  }

  encodeF32(value: number): Value {
    return this.encodeF64(Math.fround(value));
  }

  encodeF64(value: number): Value {
    return Value.float(value);
  }

  encodeChar(value: string): Value {
    return this.encodeStr(value);
  }

  encodeStr(value: string): Value {
    return Value.string(value);
  }

  encodeBytes(value: Uint8Array): Value {
    return Value.blob(value);
  }

  encodeNone(): Value {
    return Value.null();
  }

  encodeSome<T>(value: T, shape: Encode<T>): Value {
    return shape.encode(value, this);
  }

  encodeUnit(): Value {
    return Value.array([]);
  }

  encodeUnitStruct(_name: string): Value {
    return this.encodeUnit();
  }

  encodeUnitVariant(_name: string, _index: number, variant: string): Value {
    return this.encodeStr(variant);
  }

  encodeNewtypeStruct<T>(_name: string, value: T, shape: Encode<T>): Value {
    return shape.encode(value, this);
  }

  encodeNewtypeVariant<T>(
    _name: string,
    _index: number,
    variant: string,
    value: T,
    shape: Encode<T>
  ): Value {
    const payload = shape.encode(value, this.nested());
    return Value.object([[variant, payload]]);
  }

  encodeSeq(_length?: number): SeqEncoder<Value> {
    return new ArrayBuilder(this.nested());
  }

  encodeTuple(length: number): SeqEncoder<Value> {
    return this.encodeSeq(length);
  }

  encodeTupleStruct(_name: string, length: number): SeqEncoder<Value> {
    return this.encodeTuple(length);
  }

  encodeTupleVariant(
    _name: string,
    _index: number,
    variant: string,
    _length: number
  ): SeqEncoder<Value> {
    // Payload array sits one level below the wrapping object.
    return new VariantArrayBuilder(variant, this.nested().nested());
  }

  encodeMap(_length?: number): MapEncoder<Value> {
    return new ObjectBuilder(this.nested(), this.options.keyOrder);
  }

  encodeStruct(_name: string, _length: number): StructEncoder<Value> {
    return new FieldsBuilder(this.nested(), this.options.keyOrder);
  }

  encodeStructVariant(
    _name: string,
    _index: number,
    variant: string,
    _length: number
  ): StructEncoder<Value> {
    return new VariantFieldsBuilder(variant, this.nested().nested(), this.options.keyOrder);
  }
}

/**
 * Builds an object value, ordering keys as configured.
 */
function buildObject(entries: Map<string, Value>, keyOrder: KeyOrder): Value {
  if (keyOrder === "sorted") {
    return Value.object([...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  }
  return Value.object(entries);
}

class ArrayBuilder implements SeqEncoder<Value> {
  protected readonly items: Value[] = [];

  constructor(protected readonly child: ValueEncoder) {}

  element<T>(value: T, shape: Encode<T>): void {
    this.items.push(shape.encode(value, this.child));
  }

  end(): Value {
    return Value.array(this.items);
  }
}

class VariantArrayBuilder extends ArrayBuilder {
  constructor(
    private readonly variant: string,
    child: ValueEncoder
  ) {
    super(child);
  }

  override end(): Value {
    return Value.object([[this.variant, Value.array(this.items)]]);
  }
}

class ObjectBuilder implements MapEncoder<Value> {
  private readonly entries = new Map<string, Value>();
  private nextKey: string | undefined;

  constructor(
    private readonly child: ValueEncoder,
    private readonly keyOrder: KeyOrder
  ) {}

  key<K>(key: K, shape: Encode<K>): void {
    const encoded = shape.encode(key, this.child);
    if (encoded.kind !== "string") {
      throw new ExpectedError("type str", errorDescription(encoded));
    }
    this.nextKey = encoded.value;
  }

  value<V>(value: V, shape: Encode<V>): void {
    const key = this.nextKey;
    if (key === undefined) {
      throw new CustomError("map value encoded before its key");
    }
    this.nextKey = undefined;
    this.entries.set(key, shape.encode(value, this.child));
  }

  entry<K, V>(key: K, keyShape: Encode<K>, value: V, valueShape: Encode<V>): void {
    this.key(key, keyShape);
    this.value(value, valueShape);
  }

  end(): Value {
    return buildObject(this.entries, this.keyOrder);
  }
}

class FieldsBuilder implements StructEncoder<Value> {
  protected readonly fields = new Map<string, Value>();

  constructor(
    protected readonly child: ValueEncoder,
    protected readonly keyOrder: KeyOrder
  ) {}

  field<T>(key: string, value: T, shape: Encode<T>): void {
    this.fields.set(key, shape.encode(value, this.child));
  }

  end(): Value {
    return buildObject(this.fields, this.keyOrder);
  }
}

class VariantFieldsBuilder extends FieldsBuilder {
  constructor(
    private readonly variant: string,
    child: ValueEncoder,
    keyOrder: KeyOrder
  ) {
    super(child, keyOrder);
  }

  override end(): Value {
    return Value.object([[this.variant, super.end()]]);
  }
}

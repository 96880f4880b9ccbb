import { DepthLimitError, EofError, ExpectedError } from "./errors";
import { defaultOptions, ValueOptions } from "./options";
import { errorDescription, Value } from "./value";

/**
 * Describes how to build a value of type T from a decoder.
 */
export interface Decode<T> {
  decode(decoder: Decoder): T;
  /**
   * Value to use when a struct field of this shape is missing from the
   * input. Shapes without it make the field required.
   */
  absent?(): T;
}

/**
 * Receives whatever the decoder finds and builds a T from it.
 *
 * A visitor implements only the callbacks for the shapes it accepts. The
 * decoder rejects anything else with an ExpectedError naming `expecting`
 * and the type of the value it found.
 */
export interface Visitor<T> {
  /** What this visitor accepts, e.g. "i32" or "struct Point". */
  readonly expecting: string;

  visitBool?(value: boolean): T;
  visitInteger?(value: bigint): T;
  visitFloat?(value: number): T;
  visitString?(value: string): T;
  visitBytes?(value: Uint8Array): T;
  visitNone?(): T;
  visitSome?(decoder: Decoder): T;
  visitUnit?(): T;
  visitNewtypeStruct?(decoder: Decoder): T;
  visitSeq?(seq: SeqAccess): T;
  visitMap?(map: MapAccess): T;
  visitEnum?(data: EnumAccess): T;
}

/**
 * Source of one value. The `decodeX` methods hint what the caller expects;
 * a self-describing decoder may ignore the hint and dispatch on what it has.
 */
export interface Decoder {
  readonly isHumanReadable: boolean;

  decodeAny<T>(visitor: Visitor<T>): T;
  decodeOption<T>(visitor: Visitor<T>): T;
  decodeUnit<T>(visitor: Visitor<T>): T;
  decodeUnitStruct<T>(name: string, visitor: Visitor<T>): T;
  decodeNewtypeStruct<T>(name: string, visitor: Visitor<T>): T;
  decodeSeq<T>(visitor: Visitor<T>): T;
  decodeTuple<T>(length: number, visitor: Visitor<T>): T;
  decodeTupleStruct<T>(name: string, length: number, visitor: Visitor<T>): T;
  decodeMap<T>(visitor: Visitor<T>): T;
  decodeStruct<T>(name: string, fields: readonly string[], visitor: Visitor<T>): T;
  decodeEnum<T>(name: string, variants: readonly string[], visitor: Visitor<T>): T;
  decodeIdentifier<T>(visitor: Visitor<T>): T;
  decodeIgnoredAny<T>(visitor: Visitor<T>): T;
}

/**
 * Gives a visitor the elements of a sequence one at a time.
 */
export interface SeqAccess {
  /** Number of elements left, if known. */
  readonly remaining: number | undefined;
  nextElement<T>(shape: Decode<T>): IteratorResult<T, undefined>;
}

/**
 * Gives a visitor the entries of a map one at a time. Every key must be
 * followed by a call to `nextValue`.
 */
export interface MapAccess {
  /** Number of entries left, if known. */
  readonly remaining: number | undefined;
  nextKey<K>(shape: Decode<K>): IteratorResult<K, undefined>;
  nextValue<V>(shape: Decode<V>): V;
  nextEntry<K, V>(keyShape: Decode<K>, valueShape: Decode<V>): IteratorResult<[K, V], undefined>;
}

/**
 * Gives a visitor the name of an enum variant, then its payload.
 */
export interface EnumAccess {
  variant<V>(shape: Decode<V>): [V, VariantAccess];
}

/**
 * Decodes the payload of the variant chosen through an EnumAccess.
 */
export interface VariantAccess {
  unitVariant(): void;
  newtypeVariant<T>(shape: Decode<T>): T;
  tupleVariant<T>(length: number, visitor: Visitor<T>): T;
  structVariant<T>(fields: readonly string[], visitor: Visitor<T>): T;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Builds the error for a visitor that has no callback for the value found.
 */
function invalidType(visitor: Visitor<unknown>, value: Value): ExpectedError {
  return new ExpectedError(visitor.expecting, errorDescription(value));
}

/**
 * Returns the depth of the children of a container opened at `depth`.
 */
function enter(depth: number, options: ValueOptions): number {
  const next = depth + 1;
  if (next > options.maxDepth) {
    throw new DepthLimitError(options.maxDepth);
  }
  return next;
}

/**
 * Decoder reading a Value tree.
 *
 * Each ValueDecoder owns one value and hands it to exactly one visitor.
 * Decoding a second time fails with EofError.
 */
export class ValueDecoder implements Decoder {
  readonly isHumanReadable = false;
  private value: Value | undefined;

  constructor(
    value: Value,
    private readonly options: ValueOptions = defaultOptions,
    private readonly depth: number = 0
  ) {
    this.value = value;
  }

  /**
   * Takes the owned value, leaving nothing behind.
   */
  private take(): Value {
    const value = this.value;
    if (value === undefined) {
      throw new EofError();
    }
    this.value = undefined;
    return value;
  }

  decodeAny<T>(visitor: Visitor<T>): T {
    const value = this.take();
    switch (value.kind) {
      case "null":
        if (visitor.visitNone) return visitor.visitNone();
        break;
      case "boolean":
        if (visitor.visitBool) return visitor.visitBool(value.value);
        break;
      case "blob":
        if (visitor.visitBytes) return visitor.visitBytes(value.value);
        break;
      case "array":
        if (visitor.visitSeq) {
          const depth = enter(this.depth, this.options);
          return visitor.visitSeq(new SeqDecoder(value.value, this.options, depth));
        }
        break;
      case "integer":
        if (visitor.visitInteger) return visitor.visitInteger(value.value);
        break;
      case "float":
        if (visitor.visitFloat) return visitor.visitFloat(value.value);
        break;
      case "object":
        if (visitor.visitMap) {
          const depth = enter(this.depth, this.options);
          return visitor.visitMap(new MapDecoder(value.value, this.options, depth));
        }
        break;
      case "string":
        if (visitor.visitString) return visitor.visitString(value.value);
        break;
    }
    throw invalidType(visitor, value);
  }

  decodeOption<T>(visitor: Visitor<T>): T {
    const value = this.value;
    if (value === undefined) {
      throw new EofError();
    }
    if (value.kind === "null") {
      return this.decodeAny(visitor);
    }
    if (visitor.visitSome) {
      return visitor.visitSome(this);
    }
    throw invalidType(visitor, value);
  }

  /**
   * An empty array is the unit value.
   */
  decodeUnit<T>(visitor: Visitor<T>): T {
    const value = this.value;
    if (value?.kind === "array" && value.value.length === 0 && visitor.visitUnit) {
      this.take();
      return visitor.visitUnit();
    }
    return this.decodeAny(visitor);
  }

  decodeUnitStruct<T>(_name: string, visitor: Visitor<T>): T {
    return this.decodeUnit(visitor);
  }

  /**
   * Newtypes are transparent: the wrapped value is decoded in place.
   */
  decodeNewtypeStruct<T>(_name: string, visitor: Visitor<T>): T {
    if (visitor.visitNewtypeStruct) {
      return visitor.visitNewtypeStruct(this);
    }
    return this.decodeAny(visitor);
  }

  decodeSeq<T>(visitor: Visitor<T>): T {
    return this.decodeAny(visitor);
  }

  decodeTuple<T>(_length: number, visitor: Visitor<T>): T {
    return this.decodeAny(visitor);
  }

  decodeTupleStruct<T>(_name: string, _length: number, visitor: Visitor<T>): T {
    return this.decodeAny(visitor);
  }

  decodeMap<T>(visitor: Visitor<T>): T {
    return this.decodeAny(visitor);
  }

  decodeStruct<T>(_name: string, _fields: readonly string[], visitor: Visitor<T>): T {
    return this.decodeAny(visitor);
  }

  /**
   * Accepts a bare string (unit variant) or an object with exactly one key
   * naming the variant.
   */
  decodeEnum<T>(_name: string, _variants: readonly string[], visitor: Visitor<T>): T {
    const value = this.take();
    if (!visitor.visitEnum) {
      throw invalidType(visitor, value);
    }

    if (value.kind === "string") {
      return visitor.visitEnum(new EnumDecoder(value.value, undefined, this.options, this.depth));
    }
    if (value.kind !== "object") {
      throw new ExpectedError("an enum", errorDescription(value));
    }

    const entries = value.value.entries();
    const first = entries.next();
    if (first.done) {
      throw new ExpectedError("variant name", "empty object");
    }
    const extra = entries.next();
    if (!extra.done) {
      throw new ExpectedError("map with a single key", `extra key "${extra.value[0]}"`);
    }

    const [variant, payload] = first.value;
    const depth = enter(this.depth, this.options);
    return visitor.visitEnum(new EnumDecoder(variant, payload, this.options, depth));
  }

  decodeIdentifier<T>(visitor: Visitor<T>): T {
    return this.decodeAny(visitor);
  }

  decodeIgnoredAny<T>(visitor: Visitor<T>): T {
    return this.decodeAny(visitor);
  }
}

/**
 * Hands out the elements of an array value, each exactly once.
 */
export class SeqDecoder implements SeqAccess {
  private index = 0;

  constructor(
    private readonly items: readonly Value[],
    private readonly options: ValueOptions,
    private readonly depth: number
  ) {}

  get remaining(): number {
    return this.items.length - this.index;
  }

  nextElement<T>(shape: Decode<T>): IteratorResult<T, undefined> {
    if (this.index >= this.items.length) {
      return DONE;
    }
    const item = this.items[this.index++];
    return { done: false, value: shape.decode(new ValueDecoder(item, this.options, this.depth)) };
  }
}

/**
 * Hands out the entries of an object value in the map's iteration order.
 * Keys are decoded from string values.
 */
export class MapDecoder implements MapAccess {
  private readonly entries: Iterator<[string, Value]>;
  private pending: Value | undefined;
  private left: number;

  constructor(
    map: ReadonlyMap<string, Value>,
    private readonly options: ValueOptions,
    private readonly depth: number
  ) {
    this.entries = map.entries();
    this.left = map.size;
  }

  get remaining(): number {
    return this.left;
  }

  nextKey<K>(shape: Decode<K>): IteratorResult<K, undefined> {
    const next = this.entries.next();
    if (next.done) {
      return DONE;
    }
    const [key, value] = next.value;
    this.left--;
    this.pending = value;
    const decoded = shape.decode(new ValueDecoder(Value.string(key), this.options, this.depth));
    return { done: false, value: decoded };
  }

  nextValue<V>(shape: Decode<V>): V {
    const value = this.pending;
    if (value === undefined) {
      throw new EofError();
    }
    this.pending = undefined;
    return shape.decode(new ValueDecoder(value, this.options, this.depth));
  }

  nextEntry<K, V>(keyShape: Decode<K>, valueShape: Decode<V>): IteratorResult<[K, V], undefined> {
    const key = this.nextKey(keyShape);
    if (key.done) {
      return DONE;
    }
    return { done: false, value: [key.value, this.nextValue(valueShape)] };
  }
}

class EnumDecoder implements EnumAccess {
  constructor(
    private readonly name: string,
    private readonly payload: Value | undefined,
    private readonly options: ValueOptions,
    private readonly depth: number
  ) {}

  variant<V>(shape: Decode<V>): [V, VariantAccess] {
    const tag = shape.decode(new ValueDecoder(Value.string(this.name), this.options, this.depth));
    return [tag, new VariantDecoder(this.payload, this.options, this.depth)];
  }
}

class VariantDecoder implements VariantAccess {
  constructor(
    private payload: Value | undefined,
    private readonly options: ValueOptions,
    private readonly depth: number
  ) {}

  private take(): Value {
    const payload = this.payload;
    if (payload === undefined) {
      throw new EofError();
    }
    this.payload = undefined;
    return payload;
  }

  /**
   * A payload, if present, is decoded as a dynamic value and dropped.
   */
  unitVariant(): void {
    const payload = this.payload;
    this.payload = undefined;
    if (payload !== undefined) {
      new ValueDecoder(payload, this.options, this.depth).decodeIgnoredAny(ignoreVisitor);
    }
  }

  newtypeVariant<T>(shape: Decode<T>): T {
    return shape.decode(new ValueDecoder(this.take(), this.options, this.depth));
  }

  /**
   * An empty payload array is offered to `visitUnit` when the visitor has it.
   */
  tupleVariant<T>(_length: number, visitor: Visitor<T>): T {
    const payload = this.take();
    if (payload.kind !== "array") {
      throw new ExpectedError("a tuple", errorDescription(payload));
    }
    if (payload.value.length === 0 && visitor.visitUnit) {
      return visitor.visitUnit();
    }
    if (!visitor.visitSeq) {
      throw invalidType(visitor, payload);
    }
    const depth = enter(this.depth, this.options);
    return visitor.visitSeq(new SeqDecoder(payload.value, this.options, depth));
  }

  structVariant<T>(_fields: readonly string[], visitor: Visitor<T>): T {
    const payload = this.take();
    if (payload.kind !== "object") {
      throw new ExpectedError("a struct", errorDescription(payload));
    }
    if (!visitor.visitMap) {
      throw invalidType(visitor, payload);
    }
    const depth = enter(this.depth, this.options);
    return visitor.visitMap(new MapDecoder(payload.value, this.options, depth));
  }
}

/**
 * Accepts any value and discards it, walking containers so nested depth
 * limits still apply.
 */
export const ignoreVisitor: Visitor<void> = {
  expecting: "anything",
  visitBool: () => undefined,
  visitInteger: () => undefined,
  visitFloat: () => undefined,
  visitString: () => undefined,
  visitBytes: () => undefined,
  visitNone: () => undefined,
  visitUnit: () => undefined,
  visitSome(decoder) {
    decoder.decodeIgnoredAny(ignoreVisitor);
  },
  visitNewtypeStruct(decoder) {
    decoder.decodeIgnoredAny(ignoreVisitor);
  },
  visitSeq(seq) {
    while (!seq.nextElement(ignored).done) {
      // drain
    }
  },
  visitMap(map) {
    while (!map.nextEntry(ignored, ignored).done) {
      // drain
    }
  },
};

/**
 * Shape that decodes any value and discards it.
 */
export const ignored: Decode<void> = {
  decode(decoder) {
    decoder.decodeIgnoredAny(ignoreVisitor);
  },
};

import type { Decode, Decoder, MapAccess, SeqAccess, VariantAccess, Visitor } from "./decoder";
import { ignored } from "./decoder";
import type { Encode, Encoder, StructEncoder } from "./encoder";
import {
  CustomError,
  DuplicatedFieldError,
  ExpectedError,
  MissingFieldError,
  UnknownError,
} from "./errors";
import { MaxInt64, MaxUint64, MinInt64 } from "./types";
import { Value } from "./value";

/**
 * Two-way description of a type: how to encode it and how to decode it.
 */
export interface Shape<T> extends Encode<T>, Decode<T> {}

/**
 * The type a shape decodes to.
 */
export type Infer<S> = S extends Decode<infer T> ? T : never;

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

export const bool: Shape<boolean> = {
  encode<Ok>(value: boolean, encoder: Encoder<Ok>): Ok {
    return encoder.encodeBool(value);
  },
  decode(decoder: Decoder): boolean {
    return decoder.decodeAny<boolean>({ expecting: "bool", visitBool: (v) => v });
  },
};

type IntegerWidth = "i8" | "i16" | "i32" | "u8" | "u16" | "u32";

function checkedInteger(width: string, value: bigint, min: bigint, max: bigint): bigint {
  if (value < min || value > max) {
    throw new ExpectedError(width, `integer \`${value}\``);
  }
  return value;
}

function smallInteger(
  width: IntegerWidth,
  min: number,
  max: number,
  write: <Ok>(encoder: Encoder<Ok>, value: number) => Ok
): Shape<number> {
  const lo = BigInt(min);
  const hi = BigInt(max);
  return {
    encode<Ok>(value: number, encoder: Encoder<Ok>): Ok {
      if (!Number.isInteger(value) || value < min || value > max) {
        throw new CustomError(`${value} is not a valid ${width}`);
      }
      return write(encoder, value);
    },
    decode(decoder: Decoder): number {
      return decoder.decodeAny<number>({
        expecting: width,
        visitInteger: (v) => Number(checkedInteger(width, v, lo, hi)),
      });
    },
  };
}

export const i8 = smallInteger("i8", -0x80, 0x7f, (e, v) => e.encodeI8(v));
export const i16 = smallInteger("i16", -0x8000, 0x7fff, (e, v) => e.encodeI16(v));
export const i32 = smallInteger("i32", -0x80000000, 0x7fffffff, (e, v) => e.encodeI32(v));
export const u8 = smallInteger("u8", 0, 0xff, (e, v) => e.encodeU8(v));
export const u16 = smallInteger("u16", 0, 0xffff, (e, v) => e.encodeU16(v));
export const u32 = smallInteger("u32", 0, 0xffffffff, (e, v) => e.encodeU32(v));

export const i64: Shape<bigint> = {
  encode<Ok>(value: bigint, encoder: Encoder<Ok>): Ok {
    if (value < MinInt64 || value > MaxInt64) {
      throw new CustomError(`${value} is not a valid i64`);
    }
    return encoder.encodeI64(value);
  },
  decode(decoder: Decoder): bigint {
    return decoder.decodeAny<bigint>({
      expecting: "i64",
      visitInteger: (v) => checkedInteger("i64", v, MinInt64, MaxInt64),
    });
  },
};

/**
 * Unsigned 64-bit integer. Value trees hold signed integers, so values above
 * 2^63 - 1 are stored by bit pattern and restored here.
 */
export const u64: Shape<bigint> = {
  encode<Ok>(value: bigint, encoder: Encoder<Ok>): Ok {
    if (value < 0n || value > MaxUint64) {
      throw new CustomError(`${value} is not a valid u64`);
    }
    return encoder.encodeU64(value);
  },
  decode(decoder: Decoder): bigint {
    return decoder.decodeAny<bigint>({
      expecting: "u64",
      visitInteger: (v) => BigInt.asUintN(64, checkedInteger("u64", v, MinInt64, MaxUint64)),
    });
  },
};

export const f32: Shape<number> = {
  encode<Ok>(value: number, encoder: Encoder<Ok>): Ok {
    return encoder.encodeF32(value);
  },
  decode(decoder: Decoder): number {
    return decoder.decodeAny<number>({
      expecting: "f32",
      visitFloat: (v) => Math.fround(v),
      visitInteger: (v) => Math.fround(Number(v)),
    });
  },
};

export const f64: Shape<number> = {
  encode<Ok>(value: number, encoder: Encoder<Ok>): Ok {
    return encoder.encodeF64(value);
  },
  decode(decoder: Decoder): number {
    return decoder.decodeAny<number>({
      expecting: "f64",
      visitFloat: (v) => v,
      visitInteger: (v) => Number(v),
    });
  },
};

function isSingleCodePoint(value: string): boolean {
  const first = value.codePointAt(0);
  return first !== undefined && String.fromCodePoint(first).length === value.length;
}

/**
 * A single Unicode code point, carried as a string.
 */
export const char: Shape<string> = {
  encode<Ok>(value: string, encoder: Encoder<Ok>): Ok {
    if (!isSingleCodePoint(value)) {
      throw new CustomError(`${JSON.stringify(value)} is not a single character`);
    }
    return encoder.encodeChar(value);
  },
  decode(decoder: Decoder): string {
    return decoder.decodeAny<string>({
      expecting: "a character",
      visitString(v) {
        if (!isSingleCodePoint(v)) {
          throw new ExpectedError("a character", `string ${JSON.stringify(v)}`);
        }
        return v;
      },
    });
  },
};

export const string: Shape<string> = {
  encode<Ok>(value: string, encoder: Encoder<Ok>): Ok {
    return encoder.encodeStr(value);
  },
  decode(decoder: Decoder): string {
    return decoder.decodeAny<string>({ expecting: "a string", visitString: (v) => v });
  },
};

export const bytes: Shape<Uint8Array> = {
  encode<Ok>(value: Uint8Array, encoder: Encoder<Ok>): Ok {
    return encoder.encodeBytes(value);
  },
  decode(decoder: Decoder): Uint8Array {
    return decoder.decodeAny<Uint8Array>({ expecting: "a byte array", visitBytes: (v) => v.slice() });
  },
};

export const unit: Shape<undefined> = {
  encode<Ok>(_value: undefined, encoder: Encoder<Ok>): Ok {
    return encoder.encodeUnit();
  },
  decode(decoder: Decoder): undefined {
    return decoder.decodeUnit<undefined>({ expecting: "unit", visitUnit: () => undefined });
  },
};

/**
 * Identifier of a struct field or enum variant.
 */
export const identifier: Shape<string> = {
  encode<Ok>(value: string, encoder: Encoder<Ok>): Ok {
    return encoder.encodeStr(value);
  },
  decode(decoder: Decoder): string {
    return decoder.decodeIdentifier<string>({ expecting: "an identifier", visitString: (v) => v });
  },
};

// ---------------------------------------------------------------------------
// Containers
// ---------------------------------------------------------------------------

/**
 * Optional value. `undefined` encodes as none; a struct field of this shape
 * may be left out of the input.
 */
export function option<T>(shape: Shape<T>): Shape<T | undefined> {
  return {
    encode<Ok>(value: T | undefined, encoder: Encoder<Ok>): Ok {
      return value === undefined ? encoder.encodeNone() : encoder.encodeSome(value, shape);
    },
    decode(decoder: Decoder): T | undefined {
      return decoder.decodeOption<T | undefined>({
        expecting: "option",
        visitNone: () => undefined,
        visitSome: (inner) => shape.decode(inner),
      });
    },
    absent: () => undefined,
  };
}

export function array<T>(shape: Shape<T>): Shape<T[]> {
  return {
    encode<Ok>(value: T[], encoder: Encoder<Ok>): Ok {
      const seq = encoder.encodeSeq(value.length);
      for (const item of value) {
        seq.element(item, shape);
      }
      return seq.end();
    },
    decode(decoder: Decoder): T[] {
      return decoder.decodeSeq<T[]>({
        expecting: "a sequence",
        visitSeq(seq) {
          const out: T[] = [];
          for (let next = seq.nextElement(shape); !next.done; next = seq.nextElement(shape)) {
            out.push(next.value);
          }
          return out;
        },
      });
    },
  };
}

/**
 * Tuple type matching a list of shapes.
 */
export type TupleOf<S extends readonly Shape<unknown>[]> = { -readonly [K in keyof S]: Infer<S[K]> };

function elements(value: unknown): readonly unknown[] {
  if (!Array.isArray(value)) {
    throw new CustomError("tuple value is not an array");
  }
  return value;
}

function tupleVisitor(shapes: readonly Shape<unknown>[]): Visitor<unknown[]> {
  const expecting = `a tuple of size ${shapes.length}`;
  return {
    expecting,
    visitUnit() {
      if (shapes.length !== 0) {
        throw new ExpectedError(expecting, "an array of length 0");
      }
      return [];
    },
    visitSeq(seq: SeqAccess) {
      const out: unknown[] = [];
      for (const shape of shapes) {
        const next = seq.nextElement(shape);
        if (next.done) {
          throw new ExpectedError(expecting, `an array of length ${out.length}`);
        }
        out.push(next.value);
      }
      let extra = 0;
      while (!seq.nextElement(ignored).done) {
        extra++;
      }
      if (extra > 0) {
        throw new ExpectedError(expecting, `an array of length ${shapes.length + extra}`);
      }
      return out;
    },
  };
}

/**
 * Fixed-length heterogeneous array.
 */
export function tuple<S extends readonly Shape<unknown>[]>(...shapes: S): Shape<TupleOf<S>> {
  const visitor = tupleVisitor(shapes);
  return {
    encode<Ok>(value: TupleOf<S>, encoder: Encoder<Ok>): Ok {
      const items = elements(value);
      const seq = encoder.encodeTuple(shapes.length);
      shapes.forEach((shape, i) => seq.element(items[i], shape));
      return seq.end();
    },
    decode(decoder: Decoder): TupleOf<S> {
      // Element types are checked per shape; the tuple type is erased here.
      const items: unknown = decoder.decodeTuple(shapes.length, visitor);
      return items as TupleOf<S>;
    },
  };
}

function collectEntries<K, V>(map: MapAccess, key: Decode<K>, value: Decode<V>): [K, V][] {
  const out: [K, V][] = [];
  for (let next = map.nextEntry(key, value); !next.done; next = map.nextEntry(key, value)) {
    out.push(next.value);
  }
  return out;
}

/**
 * Map with arbitrary key shape. Value trees only hold string keys, so keys
 * must encode to strings.
 */
export function map<K, V>(key: Shape<K>, value: Shape<V>): Shape<Map<K, V>> {
  return {
    encode<Ok>(entries: Map<K, V>, encoder: Encoder<Ok>): Ok {
      const out = encoder.encodeMap(entries.size);
      for (const [k, v] of entries) {
        out.entry(k, key, v, value);
      }
      return out.end();
    },
    decode(decoder: Decoder): Map<K, V> {
      return decoder.decodeMap<Map<K, V>>({
        expecting: "a map",
        visitMap: (access) => new Map(collectEntries(access, key, value)),
      });
    },
  };
}

/**
 * String-keyed plain object.
 */
export function record<V>(value: Shape<V>): Shape<Record<string, V>> {
  return {
    encode<Ok>(entries: Record<string, V>, encoder: Encoder<Ok>): Ok {
      const out = encoder.encodeMap(Object.keys(entries).length);
      for (const [k, v] of Object.entries(entries)) {
        out.entry(k, string, v, value);
      }
      return out.end();
    },
    decode(decoder: Decoder): Record<string, V> {
      return decoder.decodeMap<Record<string, V>>({
        expecting: "a map",
        visitMap: (access) => Object.fromEntries(collectEntries(access, string, value)),
      });
    },
  };
}

// ---------------------------------------------------------------------------
// Structs
// ---------------------------------------------------------------------------

/**
 * One shape per property of T.
 */
export type FieldShapes<T> = { [K in keyof T]: Shape<T[K]> };

export interface StructOptions {
  /** Reject input fields that have no shape instead of skipping them. */
  denyUnknownFields?: boolean;
}

function fieldsVisitor(
  expecting: string,
  fields: ReadonlyMap<string, Shape<unknown>>,
  options: StructOptions
): Visitor<Record<string, unknown>> {
  const complete = (found: Map<string, unknown>, missing: (field: string) => Error) => {
    for (const [field, shape] of fields) {
      if (found.has(field)) continue;
      if (!shape.absent) {
        throw missing(field);
      }
      found.set(field, shape.absent());
    }
    return Object.fromEntries(found);
  };
  const bySeq = `${expecting} with ${fields.size} elements`;

  return {
    expecting,
    visitMap(access: MapAccess) {
      const found = new Map<string, unknown>();
      for (let key = access.nextKey(identifier); !key.done; key = access.nextKey(identifier)) {
        const field = key.value;
        const shape = fields.get(field);
        if (shape === undefined) {
          if (options.denyUnknownFields) {
            throw new UnknownError(field);
          }
          access.nextValue(ignored);
          continue;
        }
        if (found.has(field)) {
          throw new DuplicatedFieldError(field);
        }
        found.set(field, access.nextValue(shape));
      }
      return complete(found, (field) => new MissingFieldError(field));
    },
    visitSeq(seq: SeqAccess) {
      const found = new Map<string, unknown>();
      for (const [field, shape] of fields) {
        const next = seq.nextElement(shape);
        if (next.done) break;
        found.set(field, next.value);
      }
      let extra = 0;
      while (!seq.nextElement(ignored).done) {
        extra++;
      }
      if (extra > 0) {
        throw new ExpectedError(bySeq, `an array of length ${fields.size + extra}`);
      }
      const length = found.size;
      return complete(found, () => new ExpectedError(bySeq, `an array of length ${length}`));
    },
  };
}

function fieldTable<T>(fields: FieldShapes<T>): Map<string, Shape<unknown>> {
  const entries: [string, Shape<unknown>][] = Object.entries(fields);
  return new Map(entries);
}

function encodeFields<T extends object, Ok>(
  fields: FieldShapes<T>,
  value: T,
  out: StructEncoder<Ok>
): Ok {
  for (const key of Object.keys(fields) as (keyof T & string)[]) {
    out.field(key, value[key], fields[key]);
  }
  return out.end();
}

/**
 * Named record with a fixed set of fields. Fields whose shape has `absent`
 * (such as `option`) may be missing from the input.
 */
export function struct<T extends object>(
  name: string,
  fields: FieldShapes<T>,
  options: StructOptions = {}
): Shape<T> {
  const table = fieldTable(fields);
  const names = [...table.keys()];
  const visitor = fieldsVisitor(`struct ${name}`, table, options);
  return {
    encode<Ok>(value: T, encoder: Encoder<Ok>): Ok {
      return encodeFields(fields, value, encoder.encodeStruct(name, names.length));
    },
    decode(decoder: Decoder): T {
      // Each field was decoded by its own shape.
      return decoder.decodeStruct(name, names, visitor) as T;
    },
  };
}

/**
 * Struct with no fields.
 */
export function unitStruct(name: string): Shape<undefined> {
  return {
    encode<Ok>(_value: undefined, encoder: Encoder<Ok>): Ok {
      return encoder.encodeUnitStruct(name);
    },
    decode(decoder: Decoder): undefined {
      return decoder.decodeUnitStruct<undefined>(name, {
        expecting: `unit struct ${name}`,
        visitUnit: () => undefined,
      });
    },
  };
}

/**
 * Named wrapper around a single value; encodes as the inner value.
 */
export function newtype<T>(name: string, shape: Shape<T>): Shape<T> {
  return {
    encode<Ok>(value: T, encoder: Encoder<Ok>): Ok {
      return encoder.encodeNewtypeStruct(name, value, shape);
    },
    decode(decoder: Decoder): T {
      return decoder.decodeNewtypeStruct<T>(name, {
        expecting: `newtype struct ${name}`,
        visitNewtypeStruct: (inner) => shape.decode(inner),
      });
    },
  };
}

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

/**
 * Describes the payload of one enum case.
 */
export interface VariantShape<P> {
  /** True for cases without a payload. */
  readonly unit: boolean;
  encodeCase<Ok>(encoder: Encoder<Ok>, name: string, index: number, variant: string, payload: P): Ok;
  decodeCase(access: VariantAccess): P;
}

export interface UnitVariantShape extends VariantShape<undefined> {
  readonly unit: true;
}

type PayloadOf<S> = S extends VariantShape<infer P> ? P : never;

/**
 * Tagged union produced by an enumeration shape: `{ tag }` for unit cases,
 * `{ tag, value }` otherwise.
 */
export type EnumValue<V extends Record<string, VariantShape<unknown>>> = {
  [K in keyof V & string]: V[K] extends { readonly unit: true }
    ? { tag: K }
    : { tag: K; value: PayloadOf<V[K]> };
}[keyof V & string];

export function unitVariant(): UnitVariantShape {
  return {
    unit: true,
    encodeCase<Ok>(encoder: Encoder<Ok>, name: string, index: number, variant: string): Ok {
      return encoder.encodeUnitVariant(name, index, variant);
    },
    decodeCase(access: VariantAccess): undefined {
      access.unitVariant();
      return undefined;
    },
  };
}

export function newtypeVariant<T>(shape: Shape<T>): VariantShape<T> {
  return {
    unit: false,
    encodeCase<Ok>(encoder: Encoder<Ok>, name: string, index: number, variant: string, payload: T): Ok {
      return encoder.encodeNewtypeVariant(name, index, variant, payload, shape);
    },
    decodeCase: (access) => access.newtypeVariant(shape),
  };
}

export function tupleVariant<S extends readonly Shape<unknown>[]>(...shapes: S): VariantShape<TupleOf<S>> {
  const visitor = tupleVisitor(shapes);
  return {
    unit: false,
    encodeCase<Ok>(encoder: Encoder<Ok>, name: string, index: number, variant: string, payload: TupleOf<S>): Ok {
      const items = elements(payload);
      const seq = encoder.encodeTupleVariant(name, index, variant, shapes.length);
      shapes.forEach((shape, i) => seq.element(items[i], shape));
      return seq.end();
    },
    decodeCase(access: VariantAccess): TupleOf<S> {
      const items: unknown = access.tupleVariant(shapes.length, visitor);
      return items as TupleOf<S>;
    },
  };
}

export function structVariant<T extends object>(
  fields: FieldShapes<T>,
  options: StructOptions = {}
): VariantShape<T> {
  const table = fieldTable(fields);
  const names = [...table.keys()];
  const visitor = fieldsVisitor("struct variant", table, options);
  return {
    unit: false,
    encodeCase<Ok>(encoder: Encoder<Ok>, name: string, index: number, variant: string, payload: T): Ok {
      return encodeFields(fields, payload, encoder.encodeStructVariant(name, index, variant, names.length));
    },
    decodeCase(access: VariantAccess): T {
      return access.structVariant(names, visitor) as T;
    },
  };
}

function caseOf(value: unknown): [string, unknown] {
  if (typeof value !== "object" || value === null || !("tag" in value) || typeof value.tag !== "string") {
    throw new CustomError("enum value has no string tag");
  }
  return [value.tag, "value" in value ? value.value : undefined];
}

/**
 * Tagged union over named cases. Unit cases encode as their name, other
 * cases as a single-entry object keyed by the name.
 */
export function enumeration<V extends Record<string, VariantShape<unknown>>>(
  name: string,
  variants: V
): Shape<EnumValue<V>> {
  const table = new Map<string, VariantShape<unknown>>(Object.entries(variants));
  const names = [...table.keys()];
  const expecting = `enum ${name}`;

  return {
    encode<Ok>(value: EnumValue<V>, encoder: Encoder<Ok>): Ok {
      const [tag, payload] = caseOf(value);
      const variant = table.get(tag);
      if (variant === undefined) {
        throw new UnknownError(tag);
      }
      return variant.encodeCase(encoder, name, names.indexOf(tag), tag, payload);
    },
    decode(decoder: Decoder): EnumValue<V> {
      const decoded: unknown = decoder.decodeEnum<{ tag: string; value?: unknown }>(name, names, {
        expecting,
        visitEnum(data) {
          const [tag, access] = data.variant(identifier);
          const variant = table.get(tag);
          if (variant === undefined) {
            throw new UnknownError(tag);
          }
          const payload = variant.decodeCase(access);
          return variant.unit ? { tag } : { tag, value: payload };
        },
      });
      // The case was checked against its own shape above.
      return decoded as EnumValue<V>;
    },
  };
}

// ---------------------------------------------------------------------------
// Dynamic values
// ---------------------------------------------------------------------------

const valueVisitor: Visitor<Value> = {
  expecting: "any value",
  visitBool: (v) => Value.boolean(v),
  visitInteger: (v) => Value.integer(checkedInteger("i64", v, MinInt64, MaxInt64)),
  visitFloat: (v) => Value.float(v),
  visitString: (v) => Value.string(v),
  visitBytes: (v) => Value.blob(v),
  visitNone: () => Value.null(),
  visitSome: (inner) => inner.decodeAny(valueVisitor),
  visitUnit: () => Value.array([]),
  visitNewtypeStruct: (inner) => inner.decodeAny(valueVisitor),
  visitSeq(seq) {
    const items: Value[] = [];
    for (let next = seq.nextElement(value); !next.done; next = seq.nextElement(value)) {
      items.push(next.value);
    }
    return Value.array(items);
  },
  visitMap: (access) => Value.object(collectEntries(access, string, value)),
};

/**
 * The dynamic value itself. Passes through any encoder or decoder unchanged.
 */
export const value: Shape<Value> = {
  encode<Ok>(v: Value, encoder: Encoder<Ok>): Ok {
    switch (v.kind) {
      case "null":
        return encoder.encodeNone();
      case "boolean":
        return encoder.encodeBool(v.value);
      case "blob":
        return encoder.encodeBytes(v.value);
      case "integer":
        return encoder.encodeI64(v.value);
      case "float":
        return encoder.encodeF64(v.value);
      case "string":
        return encoder.encodeStr(v.value);
      case "array": {
        const seq = encoder.encodeSeq(v.value.length);
        for (const item of v.value) {
          seq.element(item, value);
        }
        return seq.end();
      }
      case "object": {
        const out = encoder.encodeMap(v.value.size);
        for (const [k, item] of v.value) {
          out.entry(k, string, item, value);
        }
        return out.end();
      }
    }
  },
  decode(decoder: Decoder): Value {
    return decoder.decodeAny(valueVisitor);
  },
};

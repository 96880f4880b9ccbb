import { MaxInt64, MinInt64 } from "./types";

/**
 * The dynamic value tree every typed value passes through.
 *
 * A Value is built once and never mutated. Containers own their children;
 * a subtree is moved into its parent, never shared.
 */
export type Value =
  | NullValue
  | BooleanValue
  | BlobValue
  | ArrayValue
  | IntegerValue
  | FloatValue
  | ObjectValue
  | StringValue;

export interface NullValue {
  readonly kind: "null";
}

export interface BooleanValue {
  readonly kind: "boolean";
  readonly value: boolean;
}

export interface BlobValue {
  readonly kind: "blob";
  readonly value: Uint8Array;
}

export interface ArrayValue {
  readonly kind: "array";
  readonly value: readonly Value[];
}

/** Signed 64-bit integer. */
export interface IntegerValue {
  readonly kind: "integer";
  readonly value: bigint;
}

/** 64-bit IEEE 754 float. */
export interface FloatValue {
  readonly kind: "float";
  readonly value: number;
}

export interface ObjectValue {
  readonly kind: "object";
  readonly value: ReadonlyMap<string, Value>;
}

export interface StringValue {
  readonly kind: "string";
  readonly value: string;
}

export type ValueKind = Value["kind"];

const NULL: NullValue = { kind: "null" };

/**
 * Constructors for each Value variant.
 */
export const Value = {
  null(): NullValue {
    return NULL;
  },

  boolean(value: boolean): BooleanValue {
    return { kind: "boolean", value };
  },

  /**
   * Creates a blob value holding a copy of the bytes.
   */
  blob(value: Uint8Array): BlobValue {
    return { kind: "blob", value: value.slice() };
  },

  array(value: readonly Value[]): ArrayValue {
    return { kind: "array", value };
  },

  /**
   * Creates an integer value.
   * @throws RangeError if the number is not a safe integer or the bigint does
   * not fit in 64 signed bits
   */
  integer(value: number | bigint): IntegerValue {
    if (typeof value === "number") {
      if (!Number.isSafeInteger(value)) {
        throw new RangeError(`${value} is not a safe integer`);
      }
      return { kind: "integer", value: BigInt(value) };
    }
    if (value < MinInt64 || value > MaxInt64) {
      throw new RangeError(
        `BigInt value ${value} is outside valid 64-bit signed integer range [${MinInt64}, ${MaxInt64}]`
      );
    }
    return { kind: "integer", value };
  },

  float(value: number): FloatValue {
    return { kind: "float", value };
  },

  /**
   * Creates an object value from entries or a plain record. Later entries
   * replace earlier ones with the same key.
   */
  object(entries: Iterable<readonly [string, Value]> | Readonly<Record<string, Value>> = []): ObjectValue {
    const source = isIterable(entries) ? entries : Object.entries(entries);
    return { kind: "object", value: new Map(source) };
  },

  string(value: string): StringValue {
    return { kind: "string", value };
  },
};

function isIterable<T>(input: Iterable<T> | object): input is Iterable<T> {
  return Symbol.iterator in input;
}

/**
 * Returns the fixed label naming the variant, for error messages.
 */
export function errorDescription(value: Value): string {
  switch (value.kind) {
    case "null":
      return "type null";
    case "blob":
      return "type blob";
    case "boolean":
      return "type boolean";
    case "integer":
      return "type integer";
    case "float":
      return "type float";
    case "object":
      return "type object";
    case "string":
      return "type string";
    case "array":
      return "type array";
  }
}

export function isNull(value: Value): value is NullValue {
  return value.kind === "null";
}

export function isBoolean(value: Value): value is BooleanValue {
  return value.kind === "boolean";
}

export function isBlob(value: Value): value is BlobValue {
  return value.kind === "blob";
}

export function isArray(value: Value): value is ArrayValue {
  return value.kind === "array";
}

export function isInteger(value: Value): value is IntegerValue {
  return value.kind === "integer";
}

export function isFloat(value: Value): value is FloatValue {
  return value.kind === "float";
}

export function isObject(value: Value): value is ObjectValue {
  return value.kind === "object";
}

export function isString(value: Value): value is StringValue {
  return value.kind === "string";
}

export function asBoolean(value: Value): boolean | undefined {
  return value.kind === "boolean" ? value.value : undefined;
}

/**
 * Returns a copy of the blob's bytes.
 */
export function asBlob(value: Value): Uint8Array | undefined {
  return value.kind === "blob" ? value.value.slice() : undefined;
}

export function asArray(value: Value): readonly Value[] | undefined {
  return value.kind === "array" ? value.value : undefined;
}

export function asInteger(value: Value): bigint | undefined {
  return value.kind === "integer" ? value.value : undefined;
}

export function asFloat(value: Value): number | undefined {
  return value.kind === "float" ? value.value : undefined;
}

export function asObject(value: Value): ReadonlyMap<string, Value> | undefined {
  return value.kind === "object" ? value.value : undefined;
}

export function asString(value: Value): string | undefined {
  return value.kind === "string" ? value.value : undefined;
}

/**
 * Structural equality. Floats compare with Object.is, so NaN equals NaN and
 * 0 differs from -0. Object key order is not significant.
 */
export function valueEquals(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "boolean":
      return b.kind === "boolean" && a.value === b.value;
    case "integer":
      return b.kind === "integer" && a.value === b.value;
    case "float":
      return b.kind === "float" && Object.is(a.value, b.value);
    case "string":
      return b.kind === "string" && a.value === b.value;
    case "blob":
      return b.kind === "blob" && bytesEqual(a.value, b.value);
    case "array": {
      if (b.kind !== "array" || a.value.length !== b.value.length) {
        return false;
      }
      const others = b.value;
      return a.value.every((item, i) => valueEquals(item, others[i]));
    }
    case "object": {
      if (b.kind !== "object" || a.value.size !== b.value.size) {
        return false;
      }
      for (const [key, item] of a.value) {
        const other = b.value.get(key);
        if (other === undefined || !valueEquals(item, other)) {
          return false;
        }
      }
      return true;
    }
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

import { getLogger } from "@logtape/logtape";
import { Value } from "./value";

const logger = getLogger(["binvalue", "json"]);

/**
 * Plain JSON data as produced by JSON.parse.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Converts a value tree to JSON data.
 *
 * Blobs become base64 strings. Integers outside the safe range and
 * non-finite floats become strings; neither reads back as the same variant.
 */
export function toJson(value: Value): JsonValue {
  switch (value.kind) {
    case "null":
      return null;
    case "boolean":
      return value.value;
    case "blob":
      return Buffer.from(value.value.buffer, value.value.byteOffset, value.value.byteLength).toString("base64");
    case "array":
      return value.value.map(toJson);
    case "integer": {
      const n = Number(value.value);
      if (Number.isSafeInteger(n)) {
        return n;
      }
      logger.debug("Integer {value} exceeds the safe range, writing it as a string.", {
        value: value.value.toString(),
      });
      return value.value.toString();
    }
    case "float":
      return Number.isFinite(value.value) ? value.value : String(value.value);
    case "object": {
      // fromEntries defines own properties, so "__proto__" survives as a key
      return Object.fromEntries([...value.value].map(([key, item]) => [key, toJson(item)]));
    }
    case "string":
      return value.value;
  }
}

/**
 * Converts JSON data to a value tree. Safe integers become integers, every
 * other number becomes a float.
 */
export function fromJson(json: JsonValue): Value {
  if (json === null) {
    return Value.null();
  }
  if (typeof json === "boolean") {
    return Value.boolean(json);
  }
  if (typeof json === "number") {
    return Number.isSafeInteger(json) ? Value.integer(json) : Value.float(json);
  }
  if (typeof json === "string") {
    return Value.string(json);
  }
  if (Array.isArray(json)) {
    return Value.array(json.map(fromJson));
  }
  return Value.object(Object.entries(json).map(([key, item]) => [key, fromJson(item)] as const));
}

/**
 * Renders a value tree as JSON text.
 */
export function toJsonText(value: Value, space?: number): string {
  return JSON.stringify(toJson(value), null, space);
}

/**
 * Parses JSON text into a value tree.
 * @throws SyntaxError if the text is not valid JSON
 */
export function fromJsonText(text: string): Value {
  const parsed: JsonValue = JSON.parse(text);
  return fromJson(parsed);
}

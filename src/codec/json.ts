/**
 * JSON field access shared by every resource codec.
 *
 * Decoders take the raw value produced by `JSON.parse` plus the JSON path it
 * was found at, and either return the typed value or throw a
 * {@link DecodeError} naming that path. Absent keys never reach a decoder:
 * {@link getOptional} filters them out first.
 */

import { DecodeError } from "../error/index.js";

/** A decoded JSON object. */
export type JsonObject = Record<string, unknown>;

/** Turns a raw JSON value found at `path` into `T`. */
export type Decoder<T> = (value: unknown, path: string) => T;

/** Root path used when decoding a top-level resource. */
export const ROOT_PATH = "$";

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** JSON type name of a value, for error messages. */
export function jsonTypeOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export function childPath(path: string, key: string): string {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
}

export function indexPath(path: string, index: number): string {
  return `${path}[${index}]`;
}

/**
 * Read an optional key.
 *
 * Returns `undefined` when the key is absent or JSON `null`. A present value
 * of the wrong type throws; it is never dropped.
 */
export function getOptional<T>(
  obj: JsonObject,
  key: string,
  decoder: Decoder<T>,
  path: string
): T | undefined {
  if (!Object.prototype.hasOwnProperty.call(obj, key)) return undefined;
  const value = obj[key];
  if (value === null || value === undefined) return undefined;
  return decoder(value, childPath(path, key));
}

/** {@link getOptional} with a fallback for absent keys. */
export function getOr<T>(
  obj: JsonObject,
  key: string,
  decoder: Decoder<T>,
  fallback: T,
  path: string
): T {
  return getOptional(obj, key, decoder, path) ?? fallback;
}

export function hasKey(obj: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

export const decodeString: Decoder<string> = (value, path) => {
  if (typeof value !== "string") throw new DecodeError(path, "string", jsonTypeOf(value));
  return value;
};

export const decodeNumber: Decoder<number> = (value, path) => {
  if (typeof value !== "number") throw new DecodeError(path, "number", jsonTypeOf(value));
  return value;
};

export const decodeBool: Decoder<boolean> = (value, path) => {
  if (typeof value !== "boolean") throw new DecodeError(path, "boolean", jsonTypeOf(value));
  return value;
};

export const decodeObject: Decoder<JsonObject> = (value, path) => {
  if (!isJsonObject(value)) throw new DecodeError(path, "object", jsonTypeOf(value));
  return value;
};

const INTEGER_TEXT = /^-?\d+$/;

/**
 * int64 fields travel as decimal strings; integral JSON numbers are accepted too.
 */
export const decodeInt64: Decoder<bigint> = (value, path) => {
  if (typeof value === "string" && INTEGER_TEXT.test(value)) return BigInt(value);
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
  throw new DecodeError(path, "int64", typeof value === "string" ? `string "${value}"` : jsonTypeOf(value));
};

/** int32 fields travel as JSON numbers; decimal strings are accepted too. */
export const decodeInt32: Decoder<number> = (value, path) => {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && INTEGER_TEXT.test(value)) return Number(value);
  throw new DecodeError(path, "int32", typeof value === "string" ? `string "${value}"` : jsonTypeOf(value));
};

/** Durations are whole milliseconds. */
export const decodeDuration: Decoder<number> = (value, path) => Number(decodeInt64(value, path));

/** Timestamps are whole milliseconds since the Unix epoch. */
export const decodeTimestamp: Decoder<Date> = (value, path) =>
  new Date(Number(decodeInt64(value, path)));

export function decodeArray<T>(element: Decoder<T>): Decoder<T[]> {
  return (value, path) => {
    if (!Array.isArray(value)) throw new DecodeError(path, "array", jsonTypeOf(value));
    return value.map((item, i) => element(item, indexPath(path, i)));
  };
}

/** Keys such as `__proto__` become own entries. */
export function decodeMap<T>(entry: Decoder<T>): Decoder<Record<string, T>> {
  return (value, path) => {
    const obj = decodeObject(value, path);
    return Object.fromEntries(
      Object.entries(obj).map(([key, item]): [string, T] => [key, entry(item, childPath(path, key))])
    );
  };
}

/** Adapt a `parseX(json, path)` resource parser into a decoder. */
export function decodeResource<T>(parse: (json: JsonObject, path: string) => T): Decoder<T> {
  return (value, path) => parse(decodeObject(value, path), path);
}

export const decodeStringArray = decodeArray(decodeString);
export const decodeStringMap = decodeMap(decodeString);

export function encodeInt64(value: bigint): string {
  return value.toString();
}

export function encodeDuration(ms: number): string {
  return Math.trunc(ms).toString();
}

export function encodeTimestamp(value: Date): string {
  return value.getTime().toString();
}

export function encodeMap<T>(
  map: Record<string, T>,
  encode: (value: T) => unknown
): Record<string, unknown> {
  return Object.fromEntries(Object.entries(map).map(([key, value]) => [key, encode(value)]));
}

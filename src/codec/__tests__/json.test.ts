/**
 * JSON codec helper tests.
 */

import { describe, it, expect } from "vitest";
import {
  childPath,
  decodeArray,
  decodeDuration,
  decodeInt32,
  decodeInt64,
  decodeMap,
  decodeString,
  decodeStringMap,
  decodeTimestamp,
  encodeDuration,
  encodeInt64,
  encodeMap,
  encodeTimestamp,
  getOptional,
  getOr,
  jsonTypeOf,
} from "../json.js";
import { DecodeError } from "../../error/index.js";

describe("getOptional", () => {
  it("should treat absent keys and null as unset", () => {
    const obj = { present: "x", empty: null };

    expect(getOptional(obj, "missing", decodeString, "$")).toBeUndefined();
    expect(getOptional(obj, "empty", decodeString, "$")).toBeUndefined();
    expect(getOptional(obj, "present", decodeString, "$")).toBe("x");
  });

  it("should throw for a present value of the wrong type", () => {
    expect(() => getOptional({ id: 5 }, "id", decodeString, "$")).toThrow(
      new DecodeError("$.id", "string", "number")
    );
  });

  it("should return the fallback from getOr", () => {
    expect(getOr({}, "etag", decodeString, "", "$")).toBe("");
  });
});

describe("paths", () => {
  it("should quote keys that are not identifiers", () => {
    expect(childPath("$", "numRows")).toBe("$.numRows");
    expect(childPath("$.labels", "team-name")).toBe('$.labels["team-name"]');
  });

  it("should report array indexes", () => {
    const decode = decodeArray(decodeString);

    expect(() => decode(["a", true], "$.fields")).toThrow("Type mismatch at $.fields[1]: expected string, got boolean");
  });

  it("should report map keys", () => {
    expect(() => decodeStringMap({ a: "1", "b c": 2 }, "$.labels")).toThrow(
      'Type mismatch at $.labels["b c"]: expected string, got number'
    );
  });
});

describe("integer decoding", () => {
  it("should decode int64 from strings and integral numbers", () => {
    expect(decodeInt64("9223372036854775807", "$")).toBe(9223372036854775807n);
    expect(decodeInt64("-12", "$")).toBe(-12n);
    expect(decodeInt64(42, "$")).toBe(42n);
  });

  it("should reject non-integral int64 values", () => {
    expect(() => decodeInt64("1.5", "$.numRows")).toThrow('expected int64, got string "1.5"');
    expect(() => decodeInt64(1.5, "$.numRows")).toThrow("expected int64, got number");
    expect(() => decodeInt64(true, "$.numRows")).toThrow("expected int64, got boolean");
  });

  it("should decode int32 from numbers and strings", () => {
    expect(decodeInt32(7, "$")).toBe(7);
    expect(decodeInt32("7", "$")).toBe(7);
  });

  it("should decode durations and timestamps as milliseconds", () => {
    expect(decodeDuration("1500", "$")).toBe(1500);
    expect(decodeTimestamp("1000", "$").toISOString()).toBe("1970-01-01T00:00:01.000Z");
  });

  it("should encode int64 values as decimal strings", () => {
    expect(encodeInt64(-3n)).toBe("-3");
    expect(encodeDuration(1500.9)).toBe("1500");
    expect(encodeTimestamp(new Date(86400000))).toBe("86400000");
  });
});

describe("decodeMap", () => {
  it("should decode each entry", () => {
    expect(decodeMap(decodeInt64)({ a: "1", b: 2 }, "$")).toEqual({ a: 1n, b: 2n });
  });

  it("should reject arrays", () => {
    expect(() => decodeMap(decodeString)([], "$.labels")).toThrow("expected object, got array");
  });

  it("should keep a __proto__ key as an own entry", () => {
    const decoded = decodeMap(decodeString)(JSON.parse('{"__proto__":"x","a":"y"}'), "$");

    expect(Object.keys(decoded)).toEqual(["__proto__", "a"]);
    expect(Object.getPrototypeOf(decoded)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(decoded, "__proto__")?.value).toBe("x");
  });
});

describe("encodeMap", () => {
  it("should encode each entry, __proto__ included", () => {
    const encoded = encodeMap<string>(JSON.parse('{"__proto__":"x","a":"y"}'), (v) => v.toUpperCase());

    expect(JSON.stringify(encoded)).toBe('{"__proto__":"X","a":"Y"}');
  });
});

describe("jsonTypeOf", () => {
  it("should name null and arrays", () => {
    expect(jsonTypeOf(null)).toBe("null");
    expect(jsonTypeOf([])).toBe("array");
    expect(jsonTypeOf({})).toBe("object");
  });
});

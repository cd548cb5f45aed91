/**
 * Query parameter codec tests.
 */

import { describe, it, expect } from "vitest";
import {
  ParameterType,
  createArrayParameterType,
  createArrayParameterValue,
  createDatetimeParameter,
  createInt64Parameter,
  createScalarParameterType,
  createScalarParameterValue,
  createStructField,
  createStructParameterType,
  createStructParameterValue,
  debugQueryParameterType,
  parseQueryParameter,
  parseQueryParameterType,
  parseQueryParameterValue,
  serializeQueryParameter,
  serializeQueryParameterType,
  serializeQueryParameterValue,
  type QueryParameterType,
} from "../parameter.js";
import { DecodeError } from "../../error/index.js";

function depthOf(type: QueryParameterType): number {
  let depth = 0;
  let current: QueryParameterType | undefined = type;
  while (current?.array_type) {
    depth += 1;
    current = current.array_type;
  }
  return depth;
}

describe("QueryParameterType", () => {
  it("should decode and re-encode an ARRAY of STRING", () => {
    const json = { type: "ARRAY", arrayType: { type: "STRING", structTypes: [] }, structTypes: [] };

    const type = parseQueryParameterType(json);

    expect(type.type).toBe("ARRAY");
    expect(type.array_type?.type).toBe("STRING");
    expect(type.struct_types).toEqual([]);
    expect(serializeQueryParameterType(type)).toEqual(json);
  });

  it("should leave array_type unset for scalars", () => {
    const type = parseQueryParameterType({ type: "INT64" });

    expect(type).toEqual({ type: "INT64", struct_types: [] });
    expect("array_type" in type).toBe(false);
  });

  it("should decode an empty object to defaults", () => {
    expect(parseQueryParameterType({})).toEqual({ type: "", struct_types: [] });
  });

  it("should round-trip deeply nested arrays ending in a struct", () => {
    let type = createStructParameterType([
      createStructField("id", createScalarParameterType(ParameterType.INT64), "row id"),
      createStructField("tags", createArrayParameterType(createScalarParameterType(ParameterType.STRING))),
    ]);
    for (let i = 0; i < 50; i++) {
      type = createArrayParameterType(type);
    }

    const decoded = parseQueryParameterType(JSON.parse(JSON.stringify(serializeQueryParameterType(type))));

    expect(decoded).toEqual(type);
    expect(depthOf(decoded)).toBe(50);
  });

  it("should keep struct fields in declaration order", () => {
    const json = {
      type: "STRUCT",
      structTypes: [
        { name: "b", type: { type: "STRING" } },
        { name: "a", description: "first", type: { type: "BOOL" } },
      ],
    };

    const type = parseQueryParameterType(json);

    expect(type.struct_types.map((f) => f.name)).toEqual(["b", "a"]);
    expect(type.struct_types[1]?.description).toBe("first");
    expect(type.struct_types[1]?.type?.type).toBe("BOOL");
  });

  it("should report the path of a nested type mismatch", () => {
    const json = { type: "ARRAY", arrayType: { type: "STRUCT", structTypes: [{ name: "x", type: "INT64" }] } };

    expect(() => parseQueryParameterType(json)).toThrow(
      new DecodeError("$.arrayType.structTypes[0].type", "object", "string")
    );
  });

  it("should render nested types in debug form", () => {
    const type = createArrayParameterType(createScalarParameterType(ParameterType.STRING));

    expect(debugQueryParameterType(type, "parameter_type")).toBe(
      'parameter_type { type: "ARRAY" array_type { type: "STRING" } }'
    );
  });
});

describe("QueryParameterValue", () => {
  it("should round-trip arrays of structs", () => {
    const value = createArrayParameterValue([
      createStructParameterValue({ id: createScalarParameterValue("1"), name: createScalarParameterValue("a") }),
      createStructParameterValue({ id: createScalarParameterValue("2") }),
    ]);

    expect(parseQueryParameterValue(serializeQueryParameterValue(value))).toEqual(value);
  });

  it("should keep all three parts when all are populated", () => {
    const json = {
      value: "x",
      arrayValues: [{ value: "y" }],
      structValues: { z: { value: "z" } },
    };

    const value = parseQueryParameterValue(json);

    expect(value.value).toBe("x");
    expect(value.array_values).toEqual([createScalarParameterValue("y")]);
    expect(value.struct_values).toEqual({ z: createScalarParameterValue("z") });
  });

  it("should keep a struct member named __proto__", () => {
    const value = parseQueryParameterValue(JSON.parse('{"structValues":{"__proto__":{"value":"1"}}}'));

    expect(Object.keys(value.struct_values)).toEqual(["__proto__"]);
    expect(Object.getOwnPropertyDescriptor(value.struct_values, "__proto__")?.value).toEqual(
      createScalarParameterValue("1")
    );
  });

  it("should reject a scalar where structValues expects an object", () => {
    expect(() => parseQueryParameterValue({ structValues: "nope" })).toThrow(
      "Type mismatch at $.structValues: expected object, got string"
    );
  });
});

describe("QueryParameter", () => {
  it("should serialize a named INT64 parameter", () => {
    expect(serializeQueryParameter(createInt64Parameter("limit", 10n))).toEqual({
      name: "limit",
      parameterType: { type: "INT64", structTypes: [] },
      parameterValue: { value: "10", arrayValues: [], structValues: {} },
    });
  });

  it("should decode a parameter without type or value", () => {
    expect(parseQueryParameter({ name: "p" })).toEqual({
      name: "p",
      parameter_type: { type: "", struct_types: [] },
      parameter_value: { value: "", array_values: [], struct_values: {} },
    });
  });

  it("should render DATETIME parameters in UTC", () => {
    const param = createDatetimeParameter(undefined, new Date(Date.UTC(2024, 0, 2, 3, 4, 5)));

    expect(param.name).toBe("");
    expect(param.parameter_value.value).toBe("2024-01-02 03:04:05");
  });
});

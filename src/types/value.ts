/**
 * Dynamically typed values: query result rows and system variable values.
 */

import {
  decodeArray,
  decodeBool,
  decodeInt32,
  decodeMap,
  decodeNumber,
  decodeResource,
  decodeString,
  encodeMap,
  getOptional,
  getOr,
  ROOT_PATH,
  type JsonObject,
} from "../codec/json.js";
import { DebugFormatter, type DebugRenderer } from "../debug/index.js";
import { UnknownDiscriminatorError } from "../error/index.js";

/**
 * Wire tags carried in `kind_index`.
 */
export enum ValueKindIndex {
  NULL = 0,
  DOUBLE = 1,
  STRING = 2,
  BOOL = 3,
  STRUCT = 4,
  LIST = 5,
}

export type ValueKind =
  | { kind: "null" }
  | { kind: "double"; value: number }
  | { kind: "string"; value: string }
  | { kind: "bool"; value: boolean }
  | { kind: "struct"; value: Struct }
  | { kind: "list"; value: Value[] };

export interface Value {
  value_kind: ValueKind;
}

/** Named values, e.g. one result row. */
export interface Struct {
  fields: Record<string, Value>;
}

export const nullValue = (): Value => ({ value_kind: { kind: "null" } });
export const doubleValue = (value: number): Value => ({ value_kind: { kind: "double", value } });
export const stringValue = (value: string): Value => ({ value_kind: { kind: "string", value } });
export const boolValue = (value: boolean): Value => ({ value_kind: { kind: "bool", value } });
export const structValue = (fields: Record<string, Value>): Value => ({
  value_kind: { kind: "struct", value: { fields } },
});
export const listValue = (values: Value[]): Value => ({ value_kind: { kind: "list", value: values } });

function kindIndex(kind: ValueKind): ValueKindIndex {
  switch (kind.kind) {
    case "null":
      return ValueKindIndex.NULL;
    case "double":
      return ValueKindIndex.DOUBLE;
    case "string":
      return ValueKindIndex.STRING;
    case "bool":
      return ValueKindIndex.BOOL;
    case "struct":
      return ValueKindIndex.STRUCT;
    case "list":
      return ValueKindIndex.LIST;
  }
}

/**
 * Serialize to `{"kind_index": n, "valueKind": payload}`.
 */
export function serializeValue(value: Value): Record<string, unknown> {
  const kind = value.value_kind;
  let payload: unknown;
  switch (kind.kind) {
    case "null":
      payload = null;
      break;
    case "double":
    case "string":
    case "bool":
      payload = kind.value;
      break;
    case "struct":
      payload = serializeStruct(kind.value);
      break;
    case "list":
      payload = kind.value.map(serializeValue);
      break;
  }
  return { kind_index: kindIndex(kind), valueKind: payload };
}

/**
 * Parse Value from BigQuery JSON.
 *
 * A missing `kind_index` yields a null value. An index outside 0..5 throws
 * {@link UnknownDiscriminatorError}. A known index with no payload yields that
 * kind's zero value.
 */
export function parseValue(json: JsonObject, path: string = ROOT_PATH): Value {
  const tag = getOptional(json, "kind_index", decodeInt32, path);
  switch (tag) {
    case undefined:
    case ValueKindIndex.NULL:
      return nullValue();
    case ValueKindIndex.DOUBLE:
      return doubleValue(getOr(json, "valueKind", decodeNumber, 0, path));
    case ValueKindIndex.STRING:
      return stringValue(getOr(json, "valueKind", decodeString, "", path));
    case ValueKindIndex.BOOL:
      return boolValue(getOr(json, "valueKind", decodeBool, false, path));
    case ValueKindIndex.STRUCT:
      return {
        value_kind: {
          kind: "struct",
          value: getOr(json, "valueKind", decodeResource(parseStruct), { fields: {} }, path),
        },
      };
    case ValueKindIndex.LIST:
      return listValue(getOr(json, "valueKind", decodeArray(decodeResource(parseValue)), [], path));
    default:
      throw new UnknownDiscriminatorError("Value", tag, `${path}.kind_index`);
  }
}

export function serializeStruct(struct: Struct): Record<string, unknown> {
  return { fields: encodeMap(struct.fields, serializeValue) };
}

export function parseStruct(json: JsonObject, path: string = ROOT_PATH): Struct {
  return { fields: getOr(json, "fields", decodeMap(decodeResource(parseValue)), {}, path) };
}

export const debugValue: DebugRenderer<Value> = (value, name, options, indent) => {
  const f = new DebugFormatter(name, options, indent);
  const kind = value.value_kind;
  switch (kind.kind) {
    case "null":
      f.literal("value_kind", "null");
      break;
    case "double":
    case "bool":
      f.field("value_kind", kind.value);
      break;
    case "string":
      f.stringField("value_kind", kind.value);
      break;
    case "struct":
      f.subMessage("value_kind", kind.value, debugStruct);
      break;
    case "list":
      f.subMessages("value_kind", kind.value, debugValue);
      break;
  }
  return f.build();
};

export const debugStruct: DebugRenderer<Struct> = (struct, name, options, indent) =>
  new DebugFormatter(name, options, indent).messageMap("fields", struct.fields, debugValue).build();

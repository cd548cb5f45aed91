/**
 * GoogleSQL data types as reported by the service (e.g. in system variables).
 */

import {
  decodeArray,
  decodeResource,
  decodeString,
  getOptional,
  getOr,
  ROOT_PATH,
  type JsonObject,
} from "../codec/json.js";
import { DebugFormatter, type DebugRenderer } from "../debug/index.js";

/** Wire tag for an array sub-type. */
export const SUB_TYPE_ARRAY = 1;
/** Wire tag for a struct sub-type. */
export const SUB_TYPE_STRUCT = 2;

export interface StandardSqlField {
  name: string;
  /** Absent when the payload carried no type. */
  type?: StandardSqlDataType;
}

export interface StandardSqlStructType {
  fields: StandardSqlField[];
}

/** Element type of an ARRAY, field list of a STRUCT, or nothing for scalars. */
export type StandardSqlSubType =
  | { kind: "none" }
  | { kind: "array"; element_type: StandardSqlDataType }
  | { kind: "struct"; struct_type: StandardSqlStructType };

export interface StandardSqlDataType {
  type_kind: string;
  sub_type: StandardSqlSubType;
}

export function createStandardSqlDataType(typeKind: string): StandardSqlDataType {
  return { type_kind: typeKind, sub_type: { kind: "none" } };
}

export function createArrayDataType(elementType: StandardSqlDataType): StandardSqlDataType {
  return { type_kind: "ARRAY", sub_type: { kind: "array", element_type: elementType } };
}

export function createStructDataType(fields: StandardSqlField[]): StandardSqlDataType {
  return { type_kind: "STRUCT", sub_type: { kind: "struct", struct_type: { fields } } };
}

export function serializeStandardSqlField(field: StandardSqlField): Record<string, unknown> {
  const json: Record<string, unknown> = { name: field.name };
  if (field.type) {
    json.type = serializeStandardSqlDataType(field.type);
  }
  return json;
}

export function parseStandardSqlField(json: JsonObject, path: string = ROOT_PATH): StandardSqlField {
  const field: StandardSqlField = { name: getOr(json, "name", decodeString, "", path) };
  const type = getOptional(json, "type", decodeResource(parseStandardSqlDataType), path);
  if (type) {
    field.type = type;
  }
  return field;
}

export function serializeStandardSqlStructType(struct: StandardSqlStructType): Record<string, unknown> {
  return { fields: struct.fields.map(serializeStandardSqlField) };
}

export function parseStandardSqlStructType(json: JsonObject, path: string = ROOT_PATH): StandardSqlStructType {
  return {
    fields: getOr(json, "fields", decodeArray(decodeResource(parseStandardSqlField)), [], path),
  };
}

/**
 * Serialize to `{"typeKind": ...}` plus, for arrays and structs, the
 * `sub_type_index` tag and its payload.
 */
export function serializeStandardSqlDataType(type: StandardSqlDataType): Record<string, unknown> {
  const json: Record<string, unknown> = { typeKind: type.type_kind };
  const sub = type.sub_type;
  switch (sub.kind) {
    case "array":
      json.sub_type_index = SUB_TYPE_ARRAY;
      json.arrayElementType = serializeStandardSqlDataType(sub.element_type);
      break;
    case "struct":
      json.sub_type_index = SUB_TYPE_STRUCT;
      json.structType = serializeStandardSqlStructType(sub.struct_type);
      break;
    case "none":
      break;
  }
  return json;
}

const INTEGER_TEXT = /^-?\d+$/;

/** Anything other than a whole number, as a JSON number or decimal string, reads as no tag. */
function readSubTypeTag(json: JsonObject): number | undefined {
  const raw = json.sub_type_index;
  if (typeof raw === "number" && Number.isInteger(raw)) return raw;
  if (typeof raw === "string" && INTEGER_TEXT.test(raw)) return Number(raw);
  return undefined;
}

/**
 * Parse StandardSqlDataType from BigQuery JSON.
 *
 * The `sub_type_index` tag is read first. An unknown or malformed tag, or a
 * known tag whose payload key is missing, leaves the sub-type empty.
 */
export function parseStandardSqlDataType(json: JsonObject, path: string = ROOT_PATH): StandardSqlDataType {
  const typeKind = getOr(json, "typeKind", decodeString, "", path);
  const tag = readSubTypeTag(json);

  if (tag === SUB_TYPE_ARRAY) {
    const element = getOptional(json, "arrayElementType", decodeResource(parseStandardSqlDataType), path);
    if (element) {
      return { type_kind: typeKind, sub_type: { kind: "array", element_type: element } };
    }
  } else if (tag === SUB_TYPE_STRUCT) {
    const struct = getOptional(json, "structType", decodeResource(parseStandardSqlStructType), path);
    if (struct) {
      return { type_kind: typeKind, sub_type: { kind: "struct", struct_type: struct } };
    }
  }
  return createStandardSqlDataType(typeKind);
}

export const debugStandardSqlField: DebugRenderer<StandardSqlField> = (field, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("name", field.name)
    .optionalSubMessage("type", field.type, debugStandardSqlDataType)
    .build();

export const debugStandardSqlStructType: DebugRenderer<StandardSqlStructType> = (
  struct,
  name,
  options,
  indent
) => new DebugFormatter(name, options, indent).subMessages("fields", struct.fields, debugStandardSqlField).build();

export const debugStandardSqlDataType: DebugRenderer<StandardSqlDataType> = (type, name, options, indent) => {
  const f = new DebugFormatter(name, options, indent).stringField("type_kind", type.type_kind);
  const sub = type.sub_type;
  if (sub.kind === "array") {
    f.subMessage("sub_type", sub.element_type, debugStandardSqlDataType);
  } else if (sub.kind === "struct") {
    f.subMessage("sub_type", sub.struct_type, debugStandardSqlStructType);
  }
  return f.build();
};

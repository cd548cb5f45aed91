/**
 * Query parameter types for parameterized BigQuery queries.
 *
 * Types and values are both recursive: an ARRAY type carries its element type
 * and a STRUCT type carries its named fields, and values nest the same way.
 */

import {
  decodeArray,
  decodeMap,
  decodeResource,
  decodeString,
  encodeMap,
  getOptional,
  getOr,
  ROOT_PATH,
  type JsonObject,
} from "../codec/json.js";
import { DebugFormatter, type DebugRenderer } from "../debug/index.js";

/**
 * Parameter type enumeration.
 *
 * `QueryParameterType.type` stays a plain string so that kinds added by the
 * service after this release still decode.
 */
export enum ParameterType {
  STRING = "STRING",
  INT64 = "INT64",
  FLOAT64 = "FLOAT64",
  BOOL = "BOOL",
  BYTES = "BYTES",
  DATE = "DATE",
  DATETIME = "DATETIME",
  TIME = "TIME",
  TIMESTAMP = "TIMESTAMP",
  NUMERIC = "NUMERIC",
  BIGNUMERIC = "BIGNUMERIC",
  GEOGRAPHY = "GEOGRAPHY",
  JSON = "JSON",
  STRUCT = "STRUCT",
  ARRAY = "ARRAY",
}

/**
 * Parameter mode enumeration.
 */
export enum ParameterMode {
  POSITIONAL = "POSITIONAL",
  NAMED = "NAMED",
}

/**
 * Parameter type definition for STRUCT fields.
 */
export interface QueryParameterStructType {
  /** Field name. */
  name: string;

  /** Field type; absent when the payload carried none. */
  type?: QueryParameterType;

  description: string;
}

/**
 * Query parameter type definition (recursive for STRUCT and ARRAY).
 */
export interface QueryParameterType {
  type: string;

  /** Element type; present exactly when `type` is ARRAY. */
  array_type?: QueryParameterType;

  /** Struct field types, in declaration order. */
  struct_types: QueryParameterStructType[];
}

/**
 * Query parameter value (recursive for STRUCT and ARRAY).
 *
 * The three parts are independent; nothing checks them against the
 * parameter's declared type.
 */
export interface QueryParameterValue {
  value: string;
  array_values: QueryParameterValue[];
  struct_values: Record<string, QueryParameterValue>;
}

/**
 * Query parameter (positional or named).
 */
export interface QueryParameter {
  /** Empty for positional parameters. */
  name: string;
  parameter_type: QueryParameterType;
  parameter_value: QueryParameterValue;
}

/**
 * Container for query parameters.
 */
export interface QueryParameters {
  mode: ParameterMode;
  parameters: QueryParameter[];
}

/**
 * Create a scalar parameter type.
 */
export function createScalarParameterType(type: ParameterType | string): QueryParameterType {
  return { type, struct_types: [] };
}

/**
 * Create an array parameter type.
 */
export function createArrayParameterType(elementType: QueryParameterType): QueryParameterType {
  return {
    type: ParameterType.ARRAY,
    array_type: elementType,
    struct_types: [],
  };
}

/**
 * Create a struct parameter type.
 */
export function createStructParameterType(fields: QueryParameterStructType[]): QueryParameterType {
  return {
    type: ParameterType.STRUCT,
    struct_types: fields,
  };
}

/**
 * Create a struct field type.
 */
export function createStructField(
  name: string,
  type: QueryParameterType,
  description: string = ""
): QueryParameterStructType {
  return { name, type, description };
}

/**
 * Create a scalar parameter value.
 */
export function createScalarParameterValue(value: string): QueryParameterValue {
  return { value, array_values: [], struct_values: {} };
}

/**
 * Create an array parameter value.
 */
export function createArrayParameterValue(values: QueryParameterValue[]): QueryParameterValue {
  return { value: "", array_values: values, struct_values: {} };
}

/**
 * Create a struct parameter value.
 */
export function createStructParameterValue(
  values: Record<string, QueryParameterValue>
): QueryParameterValue {
  return { value: "", array_values: [], struct_values: values };
}

/**
 * Create a named query parameter.
 */
export function createNamedParameter(
  name: string,
  type: QueryParameterType,
  value: QueryParameterValue
): QueryParameter {
  return {
    name,
    parameter_type: type,
    parameter_value: value,
  };
}

/**
 * Create a positional query parameter.
 */
export function createPositionalParameter(
  type: QueryParameterType,
  value: QueryParameterValue
): QueryParameter {
  return createNamedParameter("", type, value);
}

function scalarParameter(name: string | undefined, type: ParameterType, value: string): QueryParameter {
  return createNamedParameter(name ?? "", createScalarParameterType(type), createScalarParameterValue(value));
}

/**
 * Create a STRING parameter (named or positional).
 */
export function createStringParameter(name: string | undefined, value: string): QueryParameter {
  return scalarParameter(name, ParameterType.STRING, value);
}

/**
 * Create an INT64 parameter (named or positional).
 */
export function createInt64Parameter(name: string | undefined, value: number | bigint): QueryParameter {
  return scalarParameter(name, ParameterType.INT64, value.toString());
}

export function createFloat64Parameter(name: string | undefined, value: number): QueryParameter {
  return scalarParameter(name, ParameterType.FLOAT64, value.toString());
}

export function createBoolParameter(name: string | undefined, value: boolean): QueryParameter {
  return scalarParameter(name, ParameterType.BOOL, value.toString());
}

/**
 * Create a DATE parameter (named or positional).
 *
 * @param value - `YYYY-MM-DD` text, or a Date whose UTC calendar day is used.
 */
export function createDateParameter(name: string | undefined, value: string | Date): QueryParameter {
  const dateStr = typeof value === "string" ? value : value.toISOString().slice(0, 10);
  return scalarParameter(name, ParameterType.DATE, dateStr);
}

/**
 * Create a TIMESTAMP parameter (named or positional).
 *
 * @param value - RFC 3339 text or a Date.
 */
export function createTimestampParameter(name: string | undefined, value: string | Date): QueryParameter {
  const timestampStr = typeof value === "string" ? value : value.toISOString();
  return scalarParameter(name, ParameterType.TIMESTAMP, timestampStr);
}

/**
 * Create a DATETIME parameter (named or positional).
 *
 * @param value - `YYYY-MM-DD HH:MM:SS` text, or a Date rendered in UTC.
 */
export function createDatetimeParameter(name: string | undefined, value: string | Date): QueryParameter {
  const datetimeStr =
    typeof value === "string" ? value : value.toISOString().replace("T", " ").replace(/\.\d{3}Z$/, "");
  return scalarParameter(name, ParameterType.DATETIME, datetimeStr);
}

/**
 * @param value - Base64-encoded bytes.
 */
export function createBytesParameter(name: string | undefined, value: string): QueryParameter {
  return scalarParameter(name, ParameterType.BYTES, value);
}

export function createNumericParameter(name: string | undefined, value: string | number): QueryParameter {
  return scalarParameter(name, ParameterType.NUMERIC, value.toString());
}

/**
 * @param value - JSON text, or a value to stringify.
 */
export function createJsonParameter(name: string | undefined, value: string | object): QueryParameter {
  const jsonStr = typeof value === "string" ? value : JSON.stringify(value);
  return scalarParameter(name, ParameterType.JSON, jsonStr);
}

/**
 * Serialize query parameter type to BigQuery JSON format.
 */
export function serializeQueryParameterType(type: QueryParameterType): Record<string, unknown> {
  const json: Record<string, unknown> = {
    type: type.type,
    structTypes: type.struct_types.map(serializeQueryParameterStructType),
  };

  if (type.array_type) {
    json.arrayType = serializeQueryParameterType(type.array_type);
  }

  return json;
}

export function serializeQueryParameterStructType(field: QueryParameterStructType): Record<string, unknown> {
  const json: Record<string, unknown> = {
    name: field.name,
    description: field.description,
  };
  if (field.type) {
    json.type = serializeQueryParameterType(field.type);
  }
  return json;
}

/**
 * Parse query parameter type from BigQuery JSON.
 */
export function parseQueryParameterType(json: JsonObject, path: string = ROOT_PATH): QueryParameterType {
  const type: QueryParameterType = {
    type: getOr(json, "type", decodeString, "", path),
    struct_types: getOr(json, "structTypes", decodeArray(decodeResource(parseQueryParameterStructType)), [], path),
  };
  const arrayType = getOptional(json, "arrayType", decodeResource(parseQueryParameterType), path);
  if (arrayType) {
    type.array_type = arrayType;
  }
  return type;
}

export function parseQueryParameterStructType(
  json: JsonObject,
  path: string = ROOT_PATH
): QueryParameterStructType {
  const field: QueryParameterStructType = {
    name: getOr(json, "name", decodeString, "", path),
    description: getOr(json, "description", decodeString, "", path),
  };
  const type = getOptional(json, "type", decodeResource(parseQueryParameterType), path);
  if (type) {
    field.type = type;
  }
  return field;
}

/**
 * Serialize query parameter value to BigQuery JSON format.
 */
export function serializeQueryParameterValue(value: QueryParameterValue): Record<string, unknown> {
  return {
    value: value.value,
    arrayValues: value.array_values.map(serializeQueryParameterValue),
    structValues: encodeMap(value.struct_values, serializeQueryParameterValue),
  };
}

/**
 * Parse query parameter value from BigQuery JSON.
 */
export function parseQueryParameterValue(json: JsonObject, path: string = ROOT_PATH): QueryParameterValue {
  const nested = decodeResource(parseQueryParameterValue);
  return {
    value: getOr(json, "value", decodeString, "", path),
    array_values: getOr(json, "arrayValues", decodeArray(nested), [], path),
    struct_values: getOr(json, "structValues", decodeMap(nested), {}, path),
  };
}

/**
 * Serialize query parameter to BigQuery JSON format.
 */
export function serializeQueryParameter(param: QueryParameter): Record<string, unknown> {
  return {
    name: param.name,
    parameterType: serializeQueryParameterType(param.parameter_type),
    parameterValue: serializeQueryParameterValue(param.parameter_value),
  };
}

export function parseQueryParameter(json: JsonObject, path: string = ROOT_PATH): QueryParameter {
  return {
    name: getOr(json, "name", decodeString, "", path),
    parameter_type: getOr(
      json,
      "parameterType",
      decodeResource(parseQueryParameterType),
      createScalarParameterType(""),
      path
    ),
    parameter_value: getOr(
      json,
      "parameterValue",
      decodeResource(parseQueryParameterValue),
      createScalarParameterValue(""),
      path
    ),
  };
}

/**
 * Serialize query parameters to BigQuery JSON format.
 */
export function serializeQueryParameters(params: QueryParameters): {
  parameterMode: string;
  queryParameters: Record<string, unknown>[];
} {
  return {
    parameterMode: params.mode,
    queryParameters: params.parameters.map(serializeQueryParameter),
  };
}

export const debugQueryParameterType: DebugRenderer<QueryParameterType> = (type, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("type", type.type)
    .optionalSubMessage("array_type", type.array_type, debugQueryParameterType)
    .subMessages("struct_types", type.struct_types, debugQueryParameterStructType)
    .build();

export const debugQueryParameterStructType: DebugRenderer<QueryParameterStructType> = (
  field,
  name,
  options,
  indent
) =>
  new DebugFormatter(name, options, indent)
    .stringField("name", field.name)
    .optionalSubMessage("type", field.type, debugQueryParameterType)
    .stringField("description", field.description)
    .build();

export const debugQueryParameterValue: DebugRenderer<QueryParameterValue> = (value, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("value", value.value)
    .subMessages("array_values", value.array_values, debugQueryParameterValue)
    .messageMap("struct_values", value.struct_values, debugQueryParameterValue)
    .build();

export const debugQueryParameter: DebugRenderer<QueryParameter> = (param, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("name", param.name)
    .subMessage("parameter_type", param.parameter_type, debugQueryParameterType)
    .subMessage("parameter_value", param.parameter_value, debugQueryParameterValue)
    .build();

/**
 * Schema types for BigQuery tables.
 */

import {
  decodeArray,
  decodeInt64,
  decodeResource,
  decodeString,
  decodeStringArray,
  getOptional,
  getOr,
  encodeInt64,
  ROOT_PATH,
  type JsonObject,
} from "../codec/json.js";
import { DebugFormatter, type DebugRenderer } from "../debug/index.js";

/**
 * BigQuery field type enumeration.
 */
export enum FieldType {
  STRING = "STRING",
  BYTES = "BYTES",
  INTEGER = "INTEGER",
  INT64 = "INT64",
  FLOAT = "FLOAT",
  FLOAT64 = "FLOAT64",
  NUMERIC = "NUMERIC",
  BIGNUMERIC = "BIGNUMERIC",
  BOOLEAN = "BOOLEAN",
  BOOL = "BOOL",
  TIMESTAMP = "TIMESTAMP",
  DATE = "DATE",
  TIME = "TIME",
  DATETIME = "DATETIME",
  GEOGRAPHY = "GEOGRAPHY",
  JSON = "JSON",
  RANGE = "RANGE",
  RECORD = "RECORD",
}

/**
 * Field mode enumeration.
 */
export enum FieldMode {
  NULLABLE = "NULLABLE",
  REQUIRED = "REQUIRED",
  REPEATED = "REPEATED",
}

/**
 * Table field schema with support for nested and repeated fields.
 */
export interface TableFieldSchema {
  name: string;

  /** Field type; see {@link FieldType}. */
  type: string;

  /** Field mode; see {@link FieldMode}. Empty means NULLABLE. */
  mode: string;

  description: string;

  /** Nested fields (for RECORD types). */
  fields: TableFieldSchema[];

  /** Policy tag resource names for column-level security. */
  policy_tags: string[];

  /** Maximum length for STRING or BYTES fields; 0 when unset. */
  max_length: bigint;

  /** Precision for NUMERIC or BIGNUMERIC fields. */
  precision: bigint;

  /** Scale for NUMERIC or BIGNUMERIC fields. */
  scale: bigint;

  collation: string;
  default_value_expression: string;
  rounding_mode: string;

  /** Element type of a RANGE field. */
  range_element_type?: string;
}

/**
 * Complete table schema definition.
 */
export interface TableSchema {
  fields: TableFieldSchema[];
}

/**
 * Create a field with everything but name and type left empty.
 */
export function createTableFieldSchema(name: string, type: string, mode: string = ""): TableFieldSchema {
  return {
    name,
    type,
    mode,
    description: "",
    fields: [],
    policy_tags: [],
    max_length: 0n,
    precision: 0n,
    scale: 0n,
    collation: "",
    default_value_expression: "",
    rounding_mode: "",
  };
}

/**
 * Parse table field schema from BigQuery JSON response.
 */
export function parseTableFieldSchema(json: JsonObject, path: string = ROOT_PATH): TableFieldSchema {
  const field = createTableFieldSchema(
    getOr(json, "name", decodeString, "", path),
    getOr(json, "type", decodeString, "", path),
    getOr(json, "mode", decodeString, "", path)
  );

  field.description = getOr(json, "description", decodeString, "", path);
  field.fields = getOr(json, "fields", decodeArray(decodeResource(parseTableFieldSchema)), [], path);

  const policyTags = getOptional(json, "policyTags", decodeResource(parsePolicyTags), path);
  if (policyTags) {
    field.policy_tags = policyTags;
  }

  field.max_length = getOr(json, "maxLength", decodeInt64, 0n, path);
  field.precision = getOr(json, "precision", decodeInt64, 0n, path);
  field.scale = getOr(json, "scale", decodeInt64, 0n, path);
  field.collation = getOr(json, "collation", decodeString, "", path);
  field.default_value_expression = getOr(json, "defaultValueExpression", decodeString, "", path);
  field.rounding_mode = getOr(json, "roundingMode", decodeString, "", path);

  const range = getOptional(json, "rangeElementType", decodeResource(parseRangeElementType), path);
  if (range !== undefined) {
    field.range_element_type = range;
  }

  return field;
}

function parsePolicyTags(json: JsonObject, path: string): string[] {
  return getOr(json, "names", decodeStringArray, [], path);
}

function parseRangeElementType(json: JsonObject, path: string): string {
  return getOr(json, "type", decodeString, "", path);
}

/**
 * Parse table schema from BigQuery JSON response.
 */
export function parseTableSchema(json: JsonObject, path: string = ROOT_PATH): TableSchema {
  return {
    fields: getOr(json, "fields", decodeArray(decodeResource(parseTableFieldSchema)), [], path),
  };
}

/**
 * Serialize table field schema to BigQuery JSON format.
 *
 * Empty strings, zero limits and empty lists are left out.
 */
export function serializeTableFieldSchema(field: TableFieldSchema): Record<string, unknown> {
  const json: Record<string, unknown> = {
    name: field.name,
    type: field.type,
  };

  if (field.mode) {
    json.mode = field.mode;
  }

  if (field.description) {
    json.description = field.description;
  }

  if (field.fields.length > 0) {
    json.fields = field.fields.map(serializeTableFieldSchema);
  }

  if (field.policy_tags.length > 0) {
    json.policyTags = { names: field.policy_tags };
  }

  if (field.max_length !== 0n) {
    json.maxLength = encodeInt64(field.max_length);
  }

  if (field.precision !== 0n) {
    json.precision = encodeInt64(field.precision);
  }

  if (field.scale !== 0n) {
    json.scale = encodeInt64(field.scale);
  }

  if (field.collation) {
    json.collation = field.collation;
  }

  if (field.default_value_expression) {
    json.defaultValueExpression = field.default_value_expression;
  }

  if (field.rounding_mode) {
    json.roundingMode = field.rounding_mode;
  }

  if (field.range_element_type !== undefined) {
    json.rangeElementType = { type: field.range_element_type };
  }

  return json;
}

/**
 * Serialize table schema to BigQuery JSON format.
 */
export function serializeTableSchema(schema: TableSchema): Record<string, unknown> {
  return {
    fields: schema.fields.map(serializeTableFieldSchema),
  };
}

/**
 * Find a field by dotted path, e.g. `address.city`.
 */
export function findField(schema: TableSchema, dottedName: string): TableFieldSchema | undefined {
  let fields = schema.fields;
  let found: TableFieldSchema | undefined;
  for (const part of dottedName.split(".")) {
    found = fields.find((f) => f.name === part);
    if (!found) return undefined;
    fields = found.fields;
  }
  return found;
}

export const debugTableFieldSchema: DebugRenderer<TableFieldSchema> = (field, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("name", field.name)
    .stringField("type", field.type)
    .stringField("mode", field.mode)
    .stringField("description", field.description)
    .stringField("collation", field.collation)
    .stringField("default_value_expression", field.default_value_expression)
    .field("max_length", field.max_length)
    .field("precision", field.precision)
    .field("scale", field.scale)
    .subMessages("fields", field.fields, debugTableFieldSchema)
    .stringsField("policy_tags", field.policy_tags)
    .stringField("rounding_mode", field.rounding_mode)
    .build();

export const debugTableSchema: DebugRenderer<TableSchema> = (schema, name, options, indent) =>
  new DebugFormatter(name, options, indent).subMessages("fields", schema.fields, debugTableFieldSchema).build();

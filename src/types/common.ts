/**
 * Small structures shared by several BigQuery resources.
 */

import {
  decodeDuration,
  decodeInt64,
  decodeString,
  encodeDuration,
  encodeInt64,
  getOr,
  ROOT_PATH,
  type JsonObject,
} from "../codec/json.js";
import { DebugFormatter, type DebugRenderer } from "../debug/index.js";

/**
 * GoogleSQL type kinds.
 */
export enum TypeKind {
  TYPE_KIND_UNSPECIFIED = "TYPE_KIND_UNSPECIFIED",
  INT64 = "INT64",
  BOOL = "BOOL",
  FLOAT64 = "FLOAT64",
  STRING = "STRING",
  BYTES = "BYTES",
  TIMESTAMP = "TIMESTAMP",
  DATE = "DATE",
  TIME = "TIME",
  DATETIME = "DATETIME",
  INTERVAL = "INTERVAL",
  GEOGRAPHY = "GEOGRAPHY",
  NUMERIC = "NUMERIC",
  BIGNUMERIC = "BIGNUMERIC",
  JSON = "JSON",
  ARRAY = "ARRAY",
  STRUCT = "STRUCT",
}

/**
 * Rounding applied to NUMERIC and BIGNUMERIC values.
 */
export enum RoundingMode {
  ROUNDING_MODE_UNSPECIFIED = "ROUNDING_MODE_UNSPECIFIED",
  ROUND_HALF_AWAY_FROM_ZERO = "ROUND_HALF_AWAY_FROM_ZERO",
  ROUND_HALF_EVEN = "ROUND_HALF_EVEN",
}

/**
 * Which statement of a script is its "key result".
 */
export enum KeyResultStatementKind {
  KEY_RESULT_STATEMENT_KIND_UNSPECIFIED = "KEY_RESULT_STATEMENT_KIND_UNSPECIFIED",
  LAST = "LAST",
  FIRST_SELECT = "FIRST_SELECT",
}

/**
 * Error information attached to jobs and query results.
 */
export interface ErrorProto {
  reason: string;
  location: string;
  message: string;
}

export function parseErrorProto(json: JsonObject, path: string = ROOT_PATH): ErrorProto {
  return {
    reason: getOr(json, "reason", decodeString, "", path),
    location: getOr(json, "location", decodeString, "", path),
    message: getOr(json, "message", decodeString, "", path),
  };
}

export function serializeErrorProto(error: ErrorProto): Record<string, unknown> {
  return { reason: error.reason, location: error.location, message: error.message };
}

export const debugErrorProto: DebugRenderer<ErrorProto> = (error, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("reason", error.reason)
    .stringField("location", error.location)
    .stringField("message", error.message)
    .build();

/**
 * Table reference.
 */
export interface TableReference {
  project_id: string;
  dataset_id: string;
  table_id: string;
}

export function createTableReference(): TableReference {
  return { project_id: "", dataset_id: "", table_id: "" };
}

/** Parse TableReference from BigQuery JSON. */
export function parseTableReference(json: JsonObject, path: string = ROOT_PATH): TableReference {
  return {
    project_id: getOr(json, "projectId", decodeString, "", path),
    dataset_id: getOr(json, "datasetId", decodeString, "", path),
    table_id: getOr(json, "tableId", decodeString, "", path),
  };
}

export function serializeTableReference(ref: TableReference): Record<string, unknown> {
  return { projectId: ref.project_id, datasetId: ref.dataset_id, tableId: ref.table_id };
}

export const debugTableReference: DebugRenderer<TableReference> = (ref, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("project_id", ref.project_id)
    .stringField("dataset_id", ref.dataset_id)
    .stringField("table_id", ref.table_id)
    .build();

/**
 * Format a table reference as `project.dataset.table`.
 */
export function formatTableReference(ref: TableReference): string {
  return `${ref.project_id}.${ref.dataset_id}.${ref.table_id}`;
}

/**
 * Dataset reference.
 */
export interface DatasetReference {
  project_id: string;
  dataset_id: string;
}

export function createDatasetReference(): DatasetReference {
  return { project_id: "", dataset_id: "" };
}

/** Parse DatasetReference from BigQuery JSON. */
export function parseDatasetReference(json: JsonObject, path: string = ROOT_PATH): DatasetReference {
  return {
    project_id: getOr(json, "projectId", decodeString, "", path),
    dataset_id: getOr(json, "datasetId", decodeString, "", path),
  };
}

export function serializeDatasetReference(ref: DatasetReference): Record<string, unknown> {
  return { projectId: ref.project_id, datasetId: ref.dataset_id };
}

export const debugDatasetReference: DebugRenderer<DatasetReference> = (ref, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("project_id", ref.project_id)
    .stringField("dataset_id", ref.dataset_id)
    .build();

/**
 * Routine (UDF or stored procedure) reference.
 */
export interface RoutineReference {
  project_id: string;
  dataset_id: string;
  routine_id: string;
}

export function createRoutineReference(): RoutineReference {
  return { project_id: "", dataset_id: "", routine_id: "" };
}

export function parseRoutineReference(json: JsonObject, path: string = ROOT_PATH): RoutineReference {
  return {
    project_id: getOr(json, "projectId", decodeString, "", path),
    dataset_id: getOr(json, "datasetId", decodeString, "", path),
    routine_id: getOr(json, "routineId", decodeString, "", path),
  };
}

export function serializeRoutineReference(ref: RoutineReference): Record<string, unknown> {
  return { projectId: ref.project_id, datasetId: ref.dataset_id, routineId: ref.routine_id };
}

export const debugRoutineReference: DebugRenderer<RoutineReference> = (ref, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("project_id", ref.project_id)
    .stringField("dataset_id", ref.dataset_id)
    .stringField("routine_id", ref.routine_id)
    .build();

/**
 * Connection-level property for a query, e.g. `time_zone`.
 */
export interface ConnectionProperty {
  key: string;
  value: string;
}

export function parseConnectionProperty(json: JsonObject, path: string = ROOT_PATH): ConnectionProperty {
  return {
    key: getOr(json, "key", decodeString, "", path),
    value: getOr(json, "value", decodeString, "", path),
  };
}

export function serializeConnectionProperty(prop: ConnectionProperty): Record<string, unknown> {
  return { key: prop.key, value: prop.value };
}

export const debugConnectionProperty: DebugRenderer<ConnectionProperty> = (prop, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("key", prop.key)
    .stringField("value", prop.value)
    .build();

/**
 * Customer-managed encryption key.
 */
export interface EncryptionConfiguration {
  kms_key_name: string;
}

export function parseEncryptionConfiguration(
  json: JsonObject,
  path: string = ROOT_PATH
): EncryptionConfiguration {
  return { kms_key_name: getOr(json, "kmsKeyName", decodeString, "", path) };
}

export function serializeEncryptionConfiguration(config: EncryptionConfiguration): Record<string, unknown> {
  return { kmsKeyName: config.kms_key_name };
}

export const debugEncryptionConfiguration: DebugRenderer<EncryptionConfiguration> = (
  config,
  name,
  options,
  indent
) => new DebugFormatter(name, options, indent).stringField("kms_key_name", config.kms_key_name).build();

/**
 * Script execution limits.
 */
export interface ScriptOptions {
  /** Milliseconds. */
  statement_timeout: number;
  statement_byte_budget: bigint;
  key_result_statement: string;
}

export function createScriptOptions(): ScriptOptions {
  return { statement_timeout: 0, statement_byte_budget: 0n, key_result_statement: "" };
}

export function parseScriptOptions(json: JsonObject, path: string = ROOT_PATH): ScriptOptions {
  return {
    statement_timeout: getOr(json, "statementTimeoutMs", decodeDuration, 0, path),
    statement_byte_budget: getOr(json, "statementByteBudget", decodeInt64, 0n, path),
    key_result_statement: getOr(json, "keyResultStatement", decodeString, "", path),
  };
}

export function serializeScriptOptions(options: ScriptOptions): Record<string, unknown> {
  return {
    statementTimeoutMs: encodeDuration(options.statement_timeout),
    statementByteBudget: encodeInt64(options.statement_byte_budget),
    keyResultStatement: options.key_result_statement,
  };
}

export const debugScriptOptions: DebugRenderer<ScriptOptions> = (script, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .durationField("statement_timeout", script.statement_timeout)
    .field("statement_byte_budget", script.statement_byte_budget)
    .stringField("key_result_statement", script.key_result_statement)
    .build();

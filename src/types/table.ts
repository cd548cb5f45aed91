/**
 * Table resources for BigQuery.
 */

import {
  decodeBool,
  decodeDuration,
  decodeInt64,
  decodeResource,
  decodeString,
  decodeStringArray,
  decodeStringMap,
  decodeTimestamp,
  encodeDuration,
  encodeInt64,
  encodeTimestamp,
  getOptional,
  getOr,
  ROOT_PATH,
  type JsonObject,
} from "../codec/json.js";
import { DebugFormatter, type DebugRenderer } from "../debug/index.js";
import {
  createTableReference,
  debugEncryptionConfiguration,
  debugTableReference,
  parseEncryptionConfiguration,
  parseTableReference,
  serializeEncryptionConfiguration,
  serializeTableReference,
  type EncryptionConfiguration,
  type TableReference,
} from "./common.js";
import { debugTableSchema, parseTableSchema, serializeTableSchema, type TableSchema } from "./schema.js";

/**
 * Time partitioning type enumeration.
 */
export enum TimePartitioningType {
  DAY = "DAY",
  HOUR = "HOUR",
  MONTH = "MONTH",
  YEAR = "YEAR",
}

/**
 * Time partitioning configuration.
 */
export interface TimePartitioning {
  /** See {@link TimePartitioningType}. */
  type: string;

  /** Partitioning column; empty means ingestion time. */
  field: string;

  /** Partition expiration in milliseconds; 0 when unset. */
  expiration_time: number;
}

/**
 * Integer range partitioning configuration.
 */
export interface RangePartitioning {
  field: string;
  range: {
    start: bigint;
    end: bigint;
    interval: bigint;
  };
}

/**
 * Clustering configuration.
 */
export interface Clustering {
  /** Up to four columns, in priority order. */
  fields: string[];
}

/**
 * View definition.
 */
export interface ViewDefinition {
  query: string;
  use_legacy_sql: boolean;
}

/**
 * Complete table metadata and configuration.
 */
export interface Table {
  kind: string;
  etag: string;
  id: string;
  self_link: string;
  friendly_name: string;
  description: string;

  /** TABLE, VIEW, EXTERNAL, MATERIALIZED_VIEW or SNAPSHOT. */
  type: string;

  location: string;
  default_collation: string;
  default_rounding_mode: string;
  require_partition_filter: boolean;
  labels: Record<string, string>;
  table_reference: TableReference;
  schema: TableSchema;

  num_bytes: bigint;
  num_rows: bigint;
  num_partitions: bigint;
  num_physical_bytes: bigint;
  num_long_term_bytes: bigint;

  creation_time: Date;
  expiration_time: Date;
  last_modified_time: Date;

  time_partitioning?: TimePartitioning;
  range_partitioning?: RangePartitioning;
  clustering?: Clustering;
  view?: ViewDefinition;
  encryption_configuration?: EncryptionConfiguration;
}

/**
 * Table as returned by `tables.list`.
 */
export interface ListFormatTable {
  kind: string;
  id: string;
  friendly_name: string;
  type: string;
  labels: Record<string, string>;
  table_reference: TableReference;
  creation_time: Date;
  expiration_time: Date;
  time_partitioning?: TimePartitioning;
  range_partitioning?: RangePartitioning;
  clustering?: Clustering;
  view?: ViewDefinition;
}

/**
 * Parse time partitioning from BigQuery JSON.
 */
export function parseTimePartitioning(json: JsonObject, path: string = ROOT_PATH): TimePartitioning {
  return {
    type: getOr(json, "type", decodeString, "", path),
    field: getOr(json, "field", decodeString, "", path),
    expiration_time: getOr(json, "expirationMs", decodeDuration, 0, path),
  };
}

export function serializeTimePartitioning(tp: TimePartitioning): Record<string, unknown> {
  return {
    type: tp.type,
    field: tp.field,
    expirationMs: encodeDuration(tp.expiration_time),
  };
}

/**
 * Parse range partitioning from BigQuery JSON.
 */
export function parseRangePartitioning(json: JsonObject, path: string = ROOT_PATH): RangePartitioning {
  const parseRange = (range: JsonObject, rangePath: string): RangePartitioning["range"] => ({
    start: getOr(range, "start", decodeInt64, 0n, rangePath),
    end: getOr(range, "end", decodeInt64, 0n, rangePath),
    interval: getOr(range, "interval", decodeInt64, 0n, rangePath),
  });
  return {
    field: getOr(json, "field", decodeString, "", path),
    range: getOr(json, "range", decodeResource(parseRange), { start: 0n, end: 0n, interval: 0n }, path),
  };
}

export function serializeRangePartitioning(rp: RangePartitioning): Record<string, unknown> {
  return {
    field: rp.field,
    range: {
      start: encodeInt64(rp.range.start),
      end: encodeInt64(rp.range.end),
      interval: encodeInt64(rp.range.interval),
    },
  };
}

export function parseClustering(json: JsonObject, path: string = ROOT_PATH): Clustering {
  return { fields: getOr(json, "fields", decodeStringArray, [], path) };
}

export function serializeClustering(clustering: Clustering): Record<string, unknown> {
  return { fields: clustering.fields };
}

export function parseViewDefinition(json: JsonObject, path: string = ROOT_PATH): ViewDefinition {
  return {
    query: getOr(json, "query", decodeString, "", path),
    use_legacy_sql: getOr(json, "useLegacySql", decodeBool, false, path),
  };
}

export function serializeViewDefinition(view: ViewDefinition): Record<string, unknown> {
  return { query: view.query, useLegacySql: view.use_legacy_sql };
}

const EPOCH = 0;

/**
 * Parse table from BigQuery JSON response.
 */
export function parseTable(json: JsonObject, path: string = ROOT_PATH): Table {
  const table: Table = {
    kind: getOr(json, "kind", decodeString, "", path),
    etag: getOr(json, "etag", decodeString, "", path),
    id: getOr(json, "id", decodeString, "", path),
    self_link: getOr(json, "selfLink", decodeString, "", path),
    friendly_name: getOr(json, "friendlyName", decodeString, "", path),
    description: getOr(json, "description", decodeString, "", path),
    type: getOr(json, "type", decodeString, "", path),
    location: getOr(json, "location", decodeString, "", path),
    default_collation: getOr(json, "defaultCollation", decodeString, "", path),
    default_rounding_mode: getOr(json, "defaultRoundingMode", decodeString, "", path),
    require_partition_filter: getOr(json, "requirePartitionFilter", decodeBool, false, path),
    labels: getOr(json, "labels", decodeStringMap, {}, path),
    table_reference: getOr(json, "tableReference", decodeResource(parseTableReference), createTableReference(), path),
    schema: getOr(json, "schema", decodeResource(parseTableSchema), { fields: [] }, path),
    num_bytes: getOr(json, "numBytes", decodeInt64, 0n, path),
    num_rows: getOr(json, "numRows", decodeInt64, 0n, path),
    num_partitions: getOr(json, "numPartitions", decodeInt64, 0n, path),
    num_physical_bytes: getOr(json, "numPhysicalBytes", decodeInt64, 0n, path),
    num_long_term_bytes: getOr(json, "numLongTermBytes", decodeInt64, 0n, path),
    creation_time: getOr(json, "creationTime", decodeTimestamp, new Date(EPOCH), path),
    expiration_time: getOr(json, "expirationTime", decodeTimestamp, new Date(EPOCH), path),
    last_modified_time: getOr(json, "lastModifiedTime", decodeTimestamp, new Date(EPOCH), path),
  };

  const timePartitioning = getOptional(json, "timePartitioning", decodeResource(parseTimePartitioning), path);
  if (timePartitioning) table.time_partitioning = timePartitioning;

  const rangePartitioning = getOptional(json, "rangePartitioning", decodeResource(parseRangePartitioning), path);
  if (rangePartitioning) table.range_partitioning = rangePartitioning;

  const clustering = getOptional(json, "clustering", decodeResource(parseClustering), path);
  if (clustering) table.clustering = clustering;

  const view = getOptional(json, "view", decodeResource(parseViewDefinition), path);
  if (view) table.view = view;

  const encryption = getOptional(
    json,
    "encryptionConfiguration",
    decodeResource(parseEncryptionConfiguration),
    path
  );
  if (encryption) table.encryption_configuration = encryption;

  return table;
}

/**
 * Serialize table to BigQuery JSON format.
 */
export function serializeTable(table: Table): Record<string, unknown> {
  const json: Record<string, unknown> = {
    kind: table.kind,
    etag: table.etag,
    id: table.id,
    selfLink: table.self_link,
    friendlyName: table.friendly_name,
    description: table.description,
    type: table.type,
    location: table.location,
    defaultCollation: table.default_collation,
    defaultRoundingMode: table.default_rounding_mode,
    requirePartitionFilter: table.require_partition_filter,
    labels: table.labels,
    tableReference: serializeTableReference(table.table_reference),
    schema: serializeTableSchema(table.schema),
    numBytes: encodeInt64(table.num_bytes),
    numRows: encodeInt64(table.num_rows),
    numPartitions: encodeInt64(table.num_partitions),
    numPhysicalBytes: encodeInt64(table.num_physical_bytes),
    numLongTermBytes: encodeInt64(table.num_long_term_bytes),
    creationTime: encodeTimestamp(table.creation_time),
    expirationTime: encodeTimestamp(table.expiration_time),
    lastModifiedTime: encodeTimestamp(table.last_modified_time),
  };

  if (table.time_partitioning) json.timePartitioning = serializeTimePartitioning(table.time_partitioning);
  if (table.range_partitioning) json.rangePartitioning = serializeRangePartitioning(table.range_partitioning);
  if (table.clustering) json.clustering = serializeClustering(table.clustering);
  if (table.view) json.view = serializeViewDefinition(table.view);
  if (table.encryption_configuration) {
    json.encryptionConfiguration = serializeEncryptionConfiguration(table.encryption_configuration);
  }

  return json;
}

/**
 * Parse a `tables.list` entry.
 */
export function parseListFormatTable(json: JsonObject, path: string = ROOT_PATH): ListFormatTable {
  const table: ListFormatTable = {
    kind: getOr(json, "kind", decodeString, "", path),
    id: getOr(json, "id", decodeString, "", path),
    friendly_name: getOr(json, "friendlyName", decodeString, "", path),
    type: getOr(json, "type", decodeString, "", path),
    labels: getOr(json, "labels", decodeStringMap, {}, path),
    table_reference: getOr(json, "tableReference", decodeResource(parseTableReference), createTableReference(), path),
    creation_time: getOr(json, "creationTime", decodeTimestamp, new Date(EPOCH), path),
    expiration_time: getOr(json, "expirationTime", decodeTimestamp, new Date(EPOCH), path),
  };

  const timePartitioning = getOptional(json, "timePartitioning", decodeResource(parseTimePartitioning), path);
  if (timePartitioning) table.time_partitioning = timePartitioning;

  const rangePartitioning = getOptional(json, "rangePartitioning", decodeResource(parseRangePartitioning), path);
  if (rangePartitioning) table.range_partitioning = rangePartitioning;

  const clustering = getOptional(json, "clustering", decodeResource(parseClustering), path);
  if (clustering) table.clustering = clustering;

  const view = getOptional(json, "view", decodeResource(parseViewDefinition), path);
  if (view) table.view = view;

  return table;
}

export const debugTimePartitioning: DebugRenderer<TimePartitioning> = (tp, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("type", tp.type)
    .durationField("expiration_time", tp.expiration_time)
    .stringField("field", tp.field)
    .build();

export const debugRangePartitioning: DebugRenderer<RangePartitioning> = (rp, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("field", rp.field)
    .subMessage("range", rp.range, (range, rangeName, rangeOptions, rangeIndent) =>
      new DebugFormatter(rangeName, rangeOptions, rangeIndent)
        .field("start", range.start)
        .field("end", range.end)
        .field("interval", range.interval)
        .build()
    )
    .build();

export const debugClustering: DebugRenderer<Clustering> = (clustering, name, options, indent) =>
  new DebugFormatter(name, options, indent).stringsField("fields", clustering.fields).build();

export const debugViewDefinition: DebugRenderer<ViewDefinition> = (view, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("query", view.query)
    .field("use_legacy_sql", view.use_legacy_sql)
    .build();

export const debugTable: DebugRenderer<Table> = (table, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("kind", table.kind)
    .stringField("etag", table.etag)
    .stringField("id", table.id)
    .stringField("self_link", table.self_link)
    .stringField("friendly_name", table.friendly_name)
    .stringField("description", table.description)
    .stringField("type", table.type)
    .stringField("location", table.location)
    .stringField("default_collation", table.default_collation)
    .stringField("default_rounding_mode", table.default_rounding_mode)
    .field("require_partition_filter", table.require_partition_filter)
    .mapField("labels", table.labels)
    .field("num_bytes", table.num_bytes)
    .field("num_rows", table.num_rows)
    .field("num_partitions", table.num_partitions)
    .field("num_physical_bytes", table.num_physical_bytes)
    .field("num_long_term_bytes", table.num_long_term_bytes)
    .timestampField("creation_time", table.creation_time)
    .timestampField("expiration_time", table.expiration_time)
    .timestampField("last_modified_time", table.last_modified_time)
    .subMessage("table_reference", table.table_reference, debugTableReference)
    .subMessage("schema", table.schema, debugTableSchema)
    .optionalSubMessage("time_partitioning", table.time_partitioning, debugTimePartitioning)
    .optionalSubMessage("range_partitioning", table.range_partitioning, debugRangePartitioning)
    .optionalSubMessage("clustering", table.clustering, debugClustering)
    .optionalSubMessage("view", table.view, debugViewDefinition)
    .optionalSubMessage("encryption_configuration", table.encryption_configuration, debugEncryptionConfiguration)
    .build();

export const debugListFormatTable: DebugRenderer<ListFormatTable> = (table, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("kind", table.kind)
    .stringField("id", table.id)
    .stringField("friendly_name", table.friendly_name)
    .stringField("type", table.type)
    .mapField("labels", table.labels)
    .timestampField("creation_time", table.creation_time)
    .timestampField("expiration_time", table.expiration_time)
    .subMessage("table_reference", table.table_reference, debugTableReference)
    .optionalSubMessage("time_partitioning", table.time_partitioning, debugTimePartitioning)
    .optionalSubMessage("range_partitioning", table.range_partitioning, debugRangePartitioning)
    .optionalSubMessage("clustering", table.clustering, debugClustering)
    .optionalSubMessage("view", table.view, debugViewDefinition)
    .build();

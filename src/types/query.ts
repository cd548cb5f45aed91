/**
 * Synchronous query request and result resources.
 */

import {
  decodeArray,
  decodeBool,
  decodeInt64,
  decodeResource,
  decodeString,
  encodeDuration,
  encodeInt64,
  getOptional,
  getOr,
  ROOT_PATH,
  type JsonObject,
} from "../codec/json.js";
import { DebugFormatter, type DebugRenderer } from "../debug/index.js";
import {
  debugConnectionProperty,
  debugDatasetReference,
  debugErrorProto,
  parseErrorProto,
  serializeConnectionProperty,
  serializeDatasetReference,
  serializeErrorProto,
  type ConnectionProperty,
  type DatasetReference,
  type ErrorProto,
} from "./common.js";
import { createDmlStats, debugDmlStats, parseDmlStats, serializeDmlStats, type DmlStats } from "./job-stats.js";
import {
  createJobReference,
  debugJobReference,
  parseJobReference,
  serializeJobReference,
  type JobReference,
} from "./job.js";
import { debugQueryParameter, serializeQueryParameter, type QueryParameter } from "./parameter.js";
import { debugTableSchema, parseTableSchema, serializeTableSchema, type TableSchema } from "./schema.js";
import { debugStruct, parseStruct, serializeStruct, type Struct } from "./value.js";

export interface DataFormatOptions {
  /** Return TIMESTAMP values as int64 microseconds instead of floats. */
  use_int64_timestamp: boolean;
}

export interface SessionInfo {
  session_id: string;
}

/**
 * Body of a `jobs.query` call.
 */
export interface QueryRequest {
  query: string;
  kind: string;
  parameter_mode: string;
  location: string;
  request_id: string;

  dry_run: boolean;
  preserve_nulls: boolean;
  use_query_cache: boolean;
  use_legacy_sql: boolean;
  create_session: boolean;

  /** 0 means no limit. */
  max_results: number;
  maximum_bytes_billed: bigint;
  /** Milliseconds to wait for completion; 0 leaves the server default. */
  timeout: number;

  connection_properties: ConnectionProperty[];
  query_parameters: QueryParameter[];
  labels: Record<string, string>;

  default_dataset?: DatasetReference;
  format_options: DataFormatOptions;
}

/**
 * Results of `jobs.query` and `jobs.getQueryResults`.
 *
 * A dry run or an unfinished job leaves most of these at their defaults.
 */
export interface QueryResults {
  kind: string;
  etag: string;
  page_token: string;
  total_rows: bigint;
  total_bytes_processed: bigint;
  num_dml_affected_rows: bigint;
  job_complete: boolean;
  cache_hit: boolean;
  rows: Struct[];
  errors: ErrorProto[];
  schema: TableSchema;
  job_reference: JobReference;
  session_info: SessionInfo;
  dml_stats: DmlStats;
}

export function createQueryRequest(query: string): QueryRequest {
  return {
    query,
    kind: "",
    parameter_mode: "",
    location: "",
    request_id: "",
    dry_run: false,
    preserve_nulls: false,
    use_query_cache: true,
    use_legacy_sql: false,
    create_session: false,
    max_results: 0,
    maximum_bytes_billed: 0n,
    timeout: 0,
    connection_properties: [],
    query_parameters: [],
    labels: {},
    format_options: { use_int64_timestamp: false },
  };
}

/**
 * Serialize a query request body. Zero limits and empty strings other
 * than `query` are left out so the server applies its defaults.
 */
export function serializeQueryRequest(request: QueryRequest): Record<string, unknown> {
  const json: Record<string, unknown> = { query: request.query };

  if (request.kind) json.kind = request.kind;
  if (request.parameter_mode) json.parameterMode = request.parameter_mode;
  if (request.location) json.location = request.location;
  if (request.request_id) json.requestId = request.request_id;

  json.dryRun = request.dry_run;
  json.preserveNulls = request.preserve_nulls;
  json.useQueryCache = request.use_query_cache;
  json.useLegacySql = request.use_legacy_sql;
  json.createSession = request.create_session;

  if (request.max_results > 0) json.maxResults = request.max_results;
  if (request.maximum_bytes_billed > 0n) json.maximumBytesBilled = encodeInt64(request.maximum_bytes_billed);
  if (request.timeout > 0) json.timeoutMs = encodeDuration(request.timeout);

  if (request.connection_properties.length > 0) {
    json.connectionProperties = request.connection_properties.map(serializeConnectionProperty);
  }
  if (request.query_parameters.length > 0) {
    json.queryParameters = request.query_parameters.map(serializeQueryParameter);
  }
  if (Object.keys(request.labels).length > 0) json.labels = request.labels;
  if (request.default_dataset) json.defaultDataset = serializeDatasetReference(request.default_dataset);

  json.formatOptions = { useInt64Timestamp: request.format_options.use_int64_timestamp };
  return json;
}

export function createQueryResults(): QueryResults {
  return {
    kind: "",
    etag: "",
    page_token: "",
    total_rows: 0n,
    total_bytes_processed: 0n,
    num_dml_affected_rows: 0n,
    job_complete: false,
    cache_hit: false,
    rows: [],
    errors: [],
    schema: { fields: [] },
    job_reference: createJobReference(),
    session_info: { session_id: "" },
    dml_stats: createDmlStats(),
  };
}

function parseSessionInfo(json: JsonObject, path: string): SessionInfo {
  return { session_id: getOr(json, "sessionId", decodeString, "", path) };
}

/**
 * Parse query results from BigQuery JSON.
 */
export function parseQueryResults(json: JsonObject, path: string = ROOT_PATH): QueryResults {
  const results = createQueryResults();
  results.kind = getOr(json, "kind", decodeString, "", path);
  results.etag = getOr(json, "etag", decodeString, "", path);
  results.page_token = getOr(json, "pageToken", decodeString, "", path);
  results.total_rows = getOr(json, "totalRows", decodeInt64, 0n, path);
  results.total_bytes_processed = getOr(json, "totalBytesProcessed", decodeInt64, 0n, path);
  results.num_dml_affected_rows = getOr(json, "numDmlAffectedRows", decodeInt64, 0n, path);
  results.job_complete = getOr(json, "jobComplete", decodeBool, false, path);
  results.cache_hit = getOr(json, "cacheHit", decodeBool, false, path);
  results.rows = getOr(json, "rows", decodeArray(decodeResource(parseStruct)), [], path);
  results.errors = getOr(json, "errors", decodeArray(decodeResource(parseErrorProto)), [], path);
  results.schema = getOr(json, "schema", decodeResource(parseTableSchema), results.schema, path);
  results.job_reference = getOr(
    json,
    "jobReference",
    decodeResource(parseJobReference),
    results.job_reference,
    path
  );
  results.session_info = getOr(json, "sessionInfo", decodeResource(parseSessionInfo), results.session_info, path);

  const dmlStats = getOptional(json, "dmlStats", decodeResource(parseDmlStats), path);
  if (dmlStats) results.dml_stats = dmlStats;

  return results;
}

export function serializeQueryResults(results: QueryResults): Record<string, unknown> {
  return {
    kind: results.kind,
    etag: results.etag,
    pageToken: results.page_token,
    totalRows: encodeInt64(results.total_rows),
    totalBytesProcessed: encodeInt64(results.total_bytes_processed),
    numDmlAffectedRows: encodeInt64(results.num_dml_affected_rows),
    jobComplete: results.job_complete,
    cacheHit: results.cache_hit,
    rows: results.rows.map(serializeStruct),
    errors: results.errors.map(serializeErrorProto),
    schema: serializeTableSchema(results.schema),
    jobReference: serializeJobReference(results.job_reference),
    sessionInfo: { sessionId: results.session_info.session_id },
    dmlStats: serializeDmlStats(results.dml_stats),
  };
}

export const debugQueryRequest: DebugRenderer<QueryRequest> = (request, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("query", request.query)
    .stringField("kind", request.kind)
    .stringField("parameter_mode", request.parameter_mode)
    .stringField("location", request.location)
    .stringField("request_id", request.request_id)
    .field("dry_run", request.dry_run)
    .field("preserve_nulls", request.preserve_nulls)
    .field("use_query_cache", request.use_query_cache)
    .field("use_legacy_sql", request.use_legacy_sql)
    .field("create_session", request.create_session)
    .field("max_results", request.max_results)
    .field("maximum_bytes_billed", request.maximum_bytes_billed)
    .durationField("timeout", request.timeout)
    .subMessages("connection_properties", request.connection_properties, debugConnectionProperty)
    .subMessages("query_parameters", request.query_parameters, debugQueryParameter)
    .mapField("labels", request.labels)
    .optionalSubMessage("default_dataset", request.default_dataset, debugDatasetReference)
    .subMessage("format_options", request.format_options, (fo, foName, foOptions, foIndent) =>
      new DebugFormatter(foName, foOptions, foIndent).field("use_int64_timestamp", fo.use_int64_timestamp).build()
    )
    .build();

export const debugQueryResults: DebugRenderer<QueryResults> = (results, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("kind", results.kind)
    .stringField("etag", results.etag)
    .stringField("page_token", results.page_token)
    .field("total_rows", results.total_rows)
    .field("total_bytes_processed", results.total_bytes_processed)
    .field("num_dml_affected_rows", results.num_dml_affected_rows)
    .field("job_complete", results.job_complete)
    .field("cache_hit", results.cache_hit)
    .subMessages("rows", results.rows, debugStruct)
    .subMessages("errors", results.errors, debugErrorProto)
    .subMessage("schema", results.schema, debugTableSchema)
    .subMessage("job_reference", results.job_reference, debugJobReference)
    .subMessage("session_info", results.session_info, (info, infoName, infoOptions, infoIndent) =>
      new DebugFormatter(infoName, infoOptions, infoIndent).stringField("session_id", info.session_id).build()
    )
    .subMessage("dml_stats", results.dml_stats, debugDmlStats)
    .build();

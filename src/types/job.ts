/**
 * Job resources for BigQuery.
 *
 * Only query jobs carry a typed configuration; load, extract and copy jobs
 * round-trip their `jobType` and shared settings.
 */

import {
  decodeArray,
  decodeBool,
  decodeDuration,
  decodeInt64,
  decodeResource,
  decodeString,
  decodeStringArray,
  decodeStringMap,
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
  debugEncryptionConfiguration,
  debugErrorProto,
  debugScriptOptions,
  debugTableReference,
  parseConnectionProperty,
  parseDatasetReference,
  parseEncryptionConfiguration,
  parseErrorProto,
  parseScriptOptions,
  parseTableReference,
  serializeConnectionProperty,
  serializeDatasetReference,
  serializeEncryptionConfiguration,
  serializeErrorProto,
  serializeScriptOptions,
  serializeTableReference,
  type ConnectionProperty,
  type DatasetReference,
  type EncryptionConfiguration,
  type ErrorProto,
  type ScriptOptions,
  type TableReference,
} from "./common.js";
import { debugJobStatistics, parseJobStatistics, serializeJobStatistics, type JobStatistics } from "./job-stats.js";
import {
  debugQueryParameter,
  parseQueryParameter,
  serializeQueryParameter,
  type QueryParameter,
} from "./parameter.js";
import {
  debugSystemVariables,
  parseSystemVariables,
  serializeSystemVariables,
  type SystemVariables,
} from "./system-variables.js";
import {
  debugClustering,
  debugRangePartitioning,
  debugTimePartitioning,
  parseClustering,
  parseRangePartitioning,
  parseTimePartitioning,
  serializeClustering,
  serializeRangePartitioning,
  serializeTimePartitioning,
  type Clustering,
  type RangePartitioning,
  type TimePartitioning,
} from "./table.js";

/**
 * Job state enumeration.
 */
export enum JobState {
  PENDING = "PENDING",
  RUNNING = "RUNNING",
  DONE = "DONE",
}

/**
 * Job type enumeration.
 */
export enum JobType {
  QUERY = "QUERY",
  LOAD = "LOAD",
  EXTRACT = "EXTRACT",
  COPY = "COPY",
}

/**
 * Job reference.
 */
export interface JobReference {
  project_id: string;
  job_id: string;
  location: string;
}

/**
 * Job status. `error_result` is set when the job failed.
 */
export interface JobStatus {
  state: string;
  error_result?: ErrorProto;
  errors: ErrorProto[];
}

/**
 * Query job configuration.
 */
export interface JobConfigurationQuery {
  query: string;

  /** CREATE_IF_NEEDED or CREATE_NEVER. */
  create_disposition: string;
  /** WRITE_TRUNCATE, WRITE_APPEND or WRITE_EMPTY. */
  write_disposition: string;
  /** INTERACTIVE or BATCH. */
  priority: string;
  /** POSITIONAL or NAMED. */
  parameter_mode: string;

  preserve_nulls: boolean;
  allow_large_results: boolean;
  use_query_cache: boolean;
  flatten_results: boolean;
  use_legacy_sql: boolean;
  create_session: boolean;
  maximum_bytes_billed: bigint;

  query_parameters: QueryParameter[];
  schema_update_options: string[];
  connection_properties: ConnectionProperty[];

  default_dataset?: DatasetReference;
  destination_table?: TableReference;
  time_partitioning?: TimePartitioning;
  range_partitioning?: RangePartitioning;
  clustering?: Clustering;
  destination_encryption_configuration?: EncryptionConfiguration;
  script_options?: ScriptOptions;
  system_variables?: SystemVariables;
}

/**
 * Job configuration.
 */
export interface JobConfiguration {
  /** See {@link JobType}. */
  job_type: string;
  dry_run: boolean;
  /** Milliseconds; 0 when unset. */
  job_timeout: number;
  labels: Record<string, string>;
  query?: JobConfigurationQuery;
}

/**
 * Complete job resource.
 */
export interface Job {
  kind: string;
  etag: string;
  id: string;
  self_link: string;
  user_email: string;
  status: JobStatus;
  job_reference: JobReference;
  configuration: JobConfiguration;
  statistics?: JobStatistics;
}

/**
 * Job as returned by `jobs.list`.
 */
export interface ListFormatJob {
  id: string;
  kind: string;
  state: string;
  user_email: string;
  principal_subject: string;
  job_reference: JobReference;
  configuration: JobConfiguration;
  status: JobStatus;
  error_result?: ErrorProto;
  statistics?: JobStatistics;
}

export function createJobReference(projectId: string = "", jobId: string = "", location: string = ""): JobReference {
  return { project_id: projectId, job_id: jobId, location };
}

export function createJobStatus(): JobStatus {
  return { state: "", errors: [] };
}

/**
 * Create a query configuration with BigQuery's defaults: standard SQL,
 * query cache on.
 */
export function createJobConfigurationQuery(query: string): JobConfigurationQuery {
  return {
    query,
    create_disposition: "",
    write_disposition: "",
    priority: "",
    parameter_mode: "",
    preserve_nulls: false,
    allow_large_results: false,
    use_query_cache: true,
    flatten_results: false,
    use_legacy_sql: false,
    create_session: false,
    maximum_bytes_billed: 0n,
    query_parameters: [],
    schema_update_options: [],
    connection_properties: [],
  };
}

export function createJobConfiguration(jobType: string = ""): JobConfiguration {
  return { job_type: jobType, dry_run: false, job_timeout: 0, labels: {} };
}

/**
 * Create a job whose configuration runs `query`.
 */
export function createQueryJob(reference: JobReference, query: JobConfigurationQuery): Job {
  const configuration = createJobConfiguration(JobType.QUERY);
  configuration.query = query;
  return {
    kind: "bigquery#job",
    etag: "",
    id: "",
    self_link: "",
    user_email: "",
    status: createJobStatus(),
    job_reference: reference,
    configuration,
  };
}

export function parseJobReference(json: JsonObject, path: string = ROOT_PATH): JobReference {
  return {
    project_id: getOr(json, "projectId", decodeString, "", path),
    job_id: getOr(json, "jobId", decodeString, "", path),
    location: getOr(json, "location", decodeString, "", path),
  };
}

export function serializeJobReference(ref: JobReference): Record<string, unknown> {
  return { projectId: ref.project_id, jobId: ref.job_id, location: ref.location };
}

export function parseJobStatus(json: JsonObject, path: string = ROOT_PATH): JobStatus {
  const status: JobStatus = {
    state: getOr(json, "state", decodeString, "", path),
    errors: getOr(json, "errors", decodeArray(decodeResource(parseErrorProto)), [], path),
  };
  const errorResult = getOptional(json, "errorResult", decodeResource(parseErrorProto), path);
  if (errorResult) status.error_result = errorResult;
  return status;
}

export function serializeJobStatus(status: JobStatus): Record<string, unknown> {
  const json: Record<string, unknown> = {
    state: status.state,
    errors: status.errors.map(serializeErrorProto),
  };
  if (status.error_result) json.errorResult = serializeErrorProto(status.error_result);
  return json;
}

/**
 * Parse query job configuration from BigQuery JSON.
 */
export function parseJobConfigurationQuery(json: JsonObject, path: string = ROOT_PATH): JobConfigurationQuery {
  const config = createJobConfigurationQuery(getOr(json, "query", decodeString, "", path));

  config.create_disposition = getOr(json, "createDisposition", decodeString, "", path);
  config.write_disposition = getOr(json, "writeDisposition", decodeString, "", path);
  config.priority = getOr(json, "priority", decodeString, "", path);
  config.parameter_mode = getOr(json, "parameterMode", decodeString, "", path);
  config.preserve_nulls = getOr(json, "preserveNulls", decodeBool, false, path);
  config.allow_large_results = getOr(json, "allowLargeResults", decodeBool, false, path);
  config.use_query_cache = getOr(json, "useQueryCache", decodeBool, true, path);
  config.flatten_results = getOr(json, "flattenResults", decodeBool, false, path);
  config.use_legacy_sql = getOr(json, "useLegacySql", decodeBool, false, path);
  config.create_session = getOr(json, "createSession", decodeBool, false, path);
  config.maximum_bytes_billed = getOr(json, "maximumBytesBilled", decodeInt64, 0n, path);
  config.query_parameters = getOr(
    json,
    "queryParameters",
    decodeArray(decodeResource(parseQueryParameter)),
    [],
    path
  );
  config.schema_update_options = getOr(json, "schemaUpdateOptions", decodeStringArray, [], path);
  config.connection_properties = getOr(
    json,
    "connectionProperties",
    decodeArray(decodeResource(parseConnectionProperty)),
    [],
    path
  );

  const defaultDataset = getOptional(json, "defaultDataset", decodeResource(parseDatasetReference), path);
  if (defaultDataset) config.default_dataset = defaultDataset;

  const destination = getOptional(json, "destinationTable", decodeResource(parseTableReference), path);
  if (destination) config.destination_table = destination;

  const timePartitioning = getOptional(json, "timePartitioning", decodeResource(parseTimePartitioning), path);
  if (timePartitioning) config.time_partitioning = timePartitioning;

  const rangePartitioning = getOptional(json, "rangePartitioning", decodeResource(parseRangePartitioning), path);
  if (rangePartitioning) config.range_partitioning = rangePartitioning;

  const clustering = getOptional(json, "clustering", decodeResource(parseClustering), path);
  if (clustering) config.clustering = clustering;

  const encryption = getOptional(
    json,
    "destinationEncryptionConfiguration",
    decodeResource(parseEncryptionConfiguration),
    path
  );
  if (encryption) config.destination_encryption_configuration = encryption;

  const scriptOptions = getOptional(json, "scriptOptions", decodeResource(parseScriptOptions), path);
  if (scriptOptions) config.script_options = scriptOptions;

  const systemVariables = getOptional(json, "systemVariables", decodeResource(parseSystemVariables), path);
  if (systemVariables) config.system_variables = systemVariables;

  return config;
}

/**
 * Serialize query job configuration. Unset sub-resources are left out.
 */
export function serializeJobConfigurationQuery(config: JobConfigurationQuery): Record<string, unknown> {
  const json: Record<string, unknown> = {
    query: config.query,
    createDisposition: config.create_disposition,
    writeDisposition: config.write_disposition,
    priority: config.priority,
    parameterMode: config.parameter_mode,
    preserveNulls: config.preserve_nulls,
    allowLargeResults: config.allow_large_results,
    useQueryCache: config.use_query_cache,
    flattenResults: config.flatten_results,
    useLegacySql: config.use_legacy_sql,
    createSession: config.create_session,
    maximumBytesBilled: encodeInt64(config.maximum_bytes_billed),
    queryParameters: config.query_parameters.map(serializeQueryParameter),
    schemaUpdateOptions: config.schema_update_options,
    connectionProperties: config.connection_properties.map(serializeConnectionProperty),
  };

  if (config.default_dataset) json.defaultDataset = serializeDatasetReference(config.default_dataset);
  if (config.destination_table) json.destinationTable = serializeTableReference(config.destination_table);
  if (config.time_partitioning) json.timePartitioning = serializeTimePartitioning(config.time_partitioning);
  if (config.range_partitioning) json.rangePartitioning = serializeRangePartitioning(config.range_partitioning);
  if (config.clustering) json.clustering = serializeClustering(config.clustering);
  if (config.destination_encryption_configuration) {
    json.destinationEncryptionConfiguration = serializeEncryptionConfiguration(
      config.destination_encryption_configuration
    );
  }
  if (config.script_options) json.scriptOptions = serializeScriptOptions(config.script_options);
  if (config.system_variables) json.systemVariables = serializeSystemVariables(config.system_variables);

  return json;
}

export function parseJobConfiguration(json: JsonObject, path: string = ROOT_PATH): JobConfiguration {
  const config: JobConfiguration = {
    job_type: getOr(json, "jobType", decodeString, "", path),
    dry_run: getOr(json, "dryRun", decodeBool, false, path),
    job_timeout: getOr(json, "jobTimeoutMs", decodeDuration, 0, path),
    labels: getOr(json, "labels", decodeStringMap, {}, path),
  };
  const query = getOptional(json, "query", decodeResource(parseJobConfigurationQuery), path);
  if (query) config.query = query;
  return config;
}

export function serializeJobConfiguration(config: JobConfiguration): Record<string, unknown> {
  const json: Record<string, unknown> = {
    jobType: config.job_type,
    dryRun: config.dry_run,
    jobTimeoutMs: encodeDuration(config.job_timeout),
    labels: config.labels,
  };
  if (config.query) json.query = serializeJobConfigurationQuery(config.query);
  return json;
}

/**
 * Parse job from BigQuery JSON response.
 */
export function parseJob(json: JsonObject, path: string = ROOT_PATH): Job {
  const job: Job = {
    kind: getOr(json, "kind", decodeString, "", path),
    etag: getOr(json, "etag", decodeString, "", path),
    id: getOr(json, "id", decodeString, "", path),
    self_link: getOr(json, "selfLink", decodeString, "", path),
    user_email: getOr(json, "user_email", decodeString, "", path),
    status: getOr(json, "status", decodeResource(parseJobStatus), createJobStatus(), path),
    job_reference: getOr(json, "jobReference", decodeResource(parseJobReference), createJobReference(), path),
    configuration: getOr(
      json,
      "configuration",
      decodeResource(parseJobConfiguration),
      createJobConfiguration(),
      path
    ),
  };
  const statistics = getOptional(json, "statistics", decodeResource(parseJobStatistics), path);
  if (statistics) job.statistics = statistics;
  return job;
}

/**
 * Serialize job to BigQuery JSON format.
 */
export function serializeJob(job: Job): Record<string, unknown> {
  const json: Record<string, unknown> = {
    kind: job.kind,
    etag: job.etag,
    id: job.id,
    selfLink: job.self_link,
    user_email: job.user_email,
    status: serializeJobStatus(job.status),
    jobReference: serializeJobReference(job.job_reference),
    configuration: serializeJobConfiguration(job.configuration),
  };
  if (job.statistics) json.statistics = serializeJobStatistics(job.statistics);
  return json;
}

/**
 * Parse a `jobs.list` entry.
 */
export function parseListFormatJob(json: JsonObject, path: string = ROOT_PATH): ListFormatJob {
  const job: ListFormatJob = {
    id: getOr(json, "id", decodeString, "", path),
    kind: getOr(json, "kind", decodeString, "", path),
    state: getOr(json, "state", decodeString, "", path),
    user_email: getOr(json, "user_email", decodeString, "", path),
    principal_subject: getOr(json, "principal_subject", decodeString, "", path),
    job_reference: getOr(json, "jobReference", decodeResource(parseJobReference), createJobReference(), path),
    configuration: getOr(
      json,
      "configuration",
      decodeResource(parseJobConfiguration),
      createJobConfiguration(),
      path
    ),
    status: getOr(json, "status", decodeResource(parseJobStatus), createJobStatus(), path),
  };

  const errorResult = getOptional(json, "errorResult", decodeResource(parseErrorProto), path);
  if (errorResult) job.error_result = errorResult;

  const statistics = getOptional(json, "statistics", decodeResource(parseJobStatistics), path);
  if (statistics) job.statistics = statistics;

  return job;
}

export const debugJobReference: DebugRenderer<JobReference> = (ref, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("project_id", ref.project_id)
    .stringField("job_id", ref.job_id)
    .stringField("location", ref.location)
    .build();

export const debugJobStatus: DebugRenderer<JobStatus> = (status, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("state", status.state)
    .optionalSubMessage("error_result", status.error_result, debugErrorProto)
    .subMessages("errors", status.errors, debugErrorProto)
    .build();

export const debugJobConfigurationQuery: DebugRenderer<JobConfigurationQuery> = (config, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("query", config.query)
    .stringField("create_disposition", config.create_disposition)
    .stringField("write_disposition", config.write_disposition)
    .stringField("priority", config.priority)
    .stringField("parameter_mode", config.parameter_mode)
    .field("preserve_nulls", config.preserve_nulls)
    .field("allow_large_results", config.allow_large_results)
    .field("use_query_cache", config.use_query_cache)
    .field("flatten_results", config.flatten_results)
    .field("use_legacy_sql", config.use_legacy_sql)
    .field("create_session", config.create_session)
    .field("maximum_bytes_billed", config.maximum_bytes_billed)
    .subMessages("query_parameters", config.query_parameters, debugQueryParameter)
    .stringsField("schema_update_options", config.schema_update_options)
    .subMessages("connection_properties", config.connection_properties, debugConnectionProperty)
    .optionalSubMessage("default_dataset", config.default_dataset, debugDatasetReference)
    .optionalSubMessage("destination_table", config.destination_table, debugTableReference)
    .optionalSubMessage("time_partitioning", config.time_partitioning, debugTimePartitioning)
    .optionalSubMessage("range_partitioning", config.range_partitioning, debugRangePartitioning)
    .optionalSubMessage("clustering", config.clustering, debugClustering)
    .optionalSubMessage(
      "destination_encryption_configuration",
      config.destination_encryption_configuration,
      debugEncryptionConfiguration
    )
    .optionalSubMessage("script_options", config.script_options, debugScriptOptions)
    .optionalSubMessage("system_variables", config.system_variables, debugSystemVariables)
    .build();

export const debugJobConfiguration: DebugRenderer<JobConfiguration> = (config, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("job_type", config.job_type)
    .optionalSubMessage("query", config.query, debugJobConfigurationQuery)
    .field("dry_run", config.dry_run)
    .durationField("job_timeout", config.job_timeout)
    .mapField("labels", config.labels)
    .build();

export const debugJob: DebugRenderer<Job> = (job, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("etag", job.etag)
    .stringField("kind", job.kind)
    .stringField("self_link", job.self_link)
    .stringField("id", job.id)
    .subMessage("configuration", job.configuration, debugJobConfiguration)
    .subMessage("job_reference", job.job_reference, debugJobReference)
    .subMessage("status", job.status, debugJobStatus)
    .stringField("user_email", job.user_email)
    .optionalSubMessage("statistics", job.statistics, debugJobStatistics)
    .build();

export const debugListFormatJob: DebugRenderer<ListFormatJob> = (job, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("id", job.id)
    .stringField("kind", job.kind)
    .stringField("state", job.state)
    .stringField("user_email", job.user_email)
    .stringField("principal_subject", job.principal_subject)
    .subMessage("job_reference", job.job_reference, debugJobReference)
    .subMessage("configuration", job.configuration, debugJobConfiguration)
    .subMessage("status", job.status, debugJobStatus)
    .optionalSubMessage("error_result", job.error_result, debugErrorProto)
    .optionalSubMessage("statistics", job.statistics, debugJobStatistics)
    .build();

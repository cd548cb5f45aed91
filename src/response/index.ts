/**
 * HTTP response parsing for the BigQuery v2 API.
 *
 * Each builder checks the HTTP status, parses the payload, confirms the keys
 * its resource kind cannot do without, then hands the object to the codec.
 */

import { z } from "zod";
import {
  decodeArray,
  decodeInt32,
  decodeResource,
  decodeString,
  getOr,
  isJsonObject,
  ROOT_PATH,
  type JsonObject,
} from "../codec/json.js";
import { DebugFormatter, type DebugRenderer } from "../debug/index.js";
import { MalformedPayloadError, MissingRequiredKeyError, parseBigQueryError } from "../error/index.js";
import { logError, logResponse, NoopLogger, type Logger } from "../logging/index.js";
import {
  debugDataset,
  debugListFormatDataset,
  parseDataset,
  parseListFormatDataset,
  type Dataset,
  type ListFormatDataset,
} from "../types/dataset.js";
import {
  debugJob,
  debugListFormatJob,
  parseJob,
  parseListFormatJob,
  type Job,
  type ListFormatJob,
} from "../types/job.js";
import { debugProject, parseProject, type Project } from "../types/project.js";
import { debugQueryResults, parseQueryResults, type QueryResults } from "../types/query.js";
import {
  debugListFormatTable,
  debugTable,
  parseListFormatTable,
  parseTable,
  type ListFormatTable,
  type Table,
} from "../types/table.js";

/**
 * Raw HTTP response as handed over by a transport.
 */
export interface BigQueryHttpResponse {
  status_code: number;
  headers: Record<string, string[]>;
  payload: string;
}

export interface GetJobResponse {
  http_response: BigQueryHttpResponse;
  job: Job;
}

export type InsertJobResponse = GetJobResponse;

export type CancelJobResponse = GetJobResponse;

export interface ListJobsResponse {
  http_response: BigQueryHttpResponse;
  kind: string;
  etag: string;
  next_page_token: string;
  jobs: ListFormatJob[];
}

export interface QueryResponse {
  http_response: BigQueryHttpResponse;
  query_results: QueryResults;
}

export type GetQueryResultsResponse = QueryResponse;

export interface GetDatasetResponse {
  http_response: BigQueryHttpResponse;
  dataset: Dataset;
}

export interface ListDatasetsResponse {
  http_response: BigQueryHttpResponse;
  kind: string;
  etag: string;
  next_page_token: string;
  datasets: ListFormatDataset[];
}

export interface GetTableResponse {
  http_response: BigQueryHttpResponse;
  table: Table;
}

export interface ListTablesResponse {
  http_response: BigQueryHttpResponse;
  kind: string;
  etag: string;
  next_page_token: string;
  total_items: number;
  tables: ListFormatTable[];
}

export interface ListProjectsResponse {
  http_response: BigQueryHttpResponse;
  kind: string;
  etag: string;
  next_page_token: string;
  total_items: number;
  projects: Project[];
}

/** A key counts as present when it is there and not JSON `null`. */
const present = z.unknown().refine((value) => value !== undefined && value !== null, "Required");

function requiredKeys(keys: readonly string[]) {
  const shape: Record<string, typeof present> = {};
  for (const key of keys) shape[key] = present;
  return z.object(shape);
}

const REQUIRED_KEYS = {
  Job: requiredKeys(["kind", "etag", "id", "status", "jobReference", "configuration"]),
  CancelJobResponse: requiredKeys(["job"]),
  JobList: requiredKeys(["kind", "etag", "jobs"]),
  ListFormatJob: requiredKeys(["kind", "state", "id", "jobReference"]),
  Dataset: requiredKeys(["kind", "etag", "id", "datasetReference"]),
  DatasetList: requiredKeys(["kind", "etag"]),
  ListFormatDataset: requiredKeys(["kind", "id", "datasetReference"]),
  Table: requiredKeys(["kind", "etag", "id", "tableReference"]),
  TableList: requiredKeys(["kind", "etag", "tables"]),
  ListFormatTable: requiredKeys(["kind", "id", "tableReference"]),
  ProjectList: requiredKeys(["kind", "etag", "projects"]),
  Project: requiredKeys(["kind", "id", "projectReference"]),
} as const;

type ResourceKind = keyof typeof REQUIRED_KEYS;

/**
 * Throw {@link MissingRequiredKeyError} unless `json` has every key `kind`
 * requires.
 */
export function validateRequiredKeys(kind: ResourceKind, json: JsonObject): void {
  const result = REQUIRED_KEYS[kind].safeParse(json);
  if (!result.success) {
    const missing = result.error.issues.map((issue) => String(issue.path[0]));
    throw new MissingRequiredKeyError(kind, missing);
  }
}

/** Validate each object of an array-valued key; non-objects are left to the codec. */
function validateEach(kind: ResourceKind, json: JsonObject, key: string): void {
  const items = json[key];
  if (!Array.isArray(items)) return;
  for (const item of items) {
    if (isJsonObject(item)) validateRequiredKeys(kind, item);
  }
}

/**
 * Parse the payload into a JSON object.
 */
export function parseJsonPayload(response: BigQueryHttpResponse): JsonObject {
  if (response.payload.length === 0) {
    throw new MalformedPayloadError("Empty payload in HTTP response");
  }
  let json: unknown;
  try {
    json = JSON.parse(response.payload);
  } catch {
    throw new MalformedPayloadError("Error parsing Json from response payload");
  }
  if (!isJsonObject(json)) {
    throw new MalformedPayloadError("Error parsing Json from response payload");
  }
  return json;
}

/** Case-insensitive header lookup; first value wins. */
export function getHeader(response: BigQueryHttpResponse, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, values] of Object.entries(response.headers)) {
    if (key.toLowerCase() === wanted) return values[0];
  }
  return undefined;
}

export function isSuccess(response: BigQueryHttpResponse): boolean {
  return response.status_code >= 200 && response.status_code < 300;
}

function build<T>(
  resource: string,
  response: BigQueryHttpResponse,
  logger: Logger,
  decode: (json: JsonObject) => T
): T {
  try {
    if (!isSuccess(response)) {
      const requestId = getHeader(response, "x-goog-request-id");
      throw parseBigQueryError(response.status_code, response.payload, requestId);
    }
    const result = decode(parseJsonPayload(response));
    logResponse(logger, resource, response.status_code);
    return result;
  } catch (error) {
    if (error instanceof Error) logError(logger, error, `parse ${resource}`);
    throw error;
  }
}

function listFields(json: JsonObject): { kind: string; etag: string; next_page_token: string } {
  return {
    kind: getOr(json, "kind", decodeString, "", ROOT_PATH),
    etag: getOr(json, "etag", decodeString, "", ROOT_PATH),
    next_page_token: getOr(json, "nextPageToken", decodeString, "", ROOT_PATH),
  };
}

function decodeJob(json: JsonObject): Job {
  validateRequiredKeys("Job", json);
  return parseJob(json);
}

export function buildGetJobResponse(
  response: BigQueryHttpResponse,
  logger: Logger = new NoopLogger()
): GetJobResponse {
  return build("GetJobResponse", response, logger, (json) => ({ http_response: response, job: decodeJob(json) }));
}

export function buildInsertJobResponse(
  response: BigQueryHttpResponse,
  logger: Logger = new NoopLogger()
): InsertJobResponse {
  return build("InsertJobResponse", response, logger, (json) => ({ http_response: response, job: decodeJob(json) }));
}

/**
 * The cancelled job arrives wrapped as `{"kind": ..., "job": {...}}`.
 */
export function buildCancelJobResponse(
  response: BigQueryHttpResponse,
  logger: Logger = new NoopLogger()
): CancelJobResponse {
  return build("CancelJobResponse", response, logger, (json) => {
    validateRequiredKeys("CancelJobResponse", json);
    const job = json.job;
    if (!isJsonObject(job)) {
      throw new MalformedPayloadError("Not a valid Json Job object: job is not an object");
    }
    return { http_response: response, job: decodeJob(job) };
  });
}

export function buildListJobsResponse(
  response: BigQueryHttpResponse,
  logger: Logger = new NoopLogger()
): ListJobsResponse {
  return build("ListJobsResponse", response, logger, (json) => {
    validateRequiredKeys("JobList", json);
    validateEach("ListFormatJob", json, "jobs");
    return {
      http_response: response,
      ...listFields(json),
      jobs: getOr(json, "jobs", decodeArray(decodeResource(parseListFormatJob)), [], ROOT_PATH),
    };
  });
}

export function buildQueryResponse(
  response: BigQueryHttpResponse,
  logger: Logger = new NoopLogger()
): QueryResponse {
  return build("QueryResponse", response, logger, (json) => ({
    http_response: response,
    query_results: parseQueryResults(json),
  }));
}

export function buildGetQueryResultsResponse(
  response: BigQueryHttpResponse,
  logger: Logger = new NoopLogger()
): GetQueryResultsResponse {
  return build("GetQueryResultsResponse", response, logger, (json) => ({
    http_response: response,
    query_results: parseQueryResults(json),
  }));
}

export function buildGetDatasetResponse(
  response: BigQueryHttpResponse,
  logger: Logger = new NoopLogger()
): GetDatasetResponse {
  return build("GetDatasetResponse", response, logger, (json) => {
    validateRequiredKeys("Dataset", json);
    return { http_response: response, dataset: parseDataset(json) };
  });
}

export function buildListDatasetsResponse(
  response: BigQueryHttpResponse,
  logger: Logger = new NoopLogger()
): ListDatasetsResponse {
  return build("ListDatasetsResponse", response, logger, (json) => {
    validateRequiredKeys("DatasetList", json);
    validateEach("ListFormatDataset", json, "datasets");
    return {
      http_response: response,
      ...listFields(json),
      datasets: getOr(json, "datasets", decodeArray(decodeResource(parseListFormatDataset)), [], ROOT_PATH),
    };
  });
}

export function buildGetTableResponse(
  response: BigQueryHttpResponse,
  logger: Logger = new NoopLogger()
): GetTableResponse {
  return build("GetTableResponse", response, logger, (json) => {
    validateRequiredKeys("Table", json);
    return { http_response: response, table: parseTable(json) };
  });
}

export function buildListTablesResponse(
  response: BigQueryHttpResponse,
  logger: Logger = new NoopLogger()
): ListTablesResponse {
  return build("ListTablesResponse", response, logger, (json) => {
    validateRequiredKeys("TableList", json);
    validateEach("ListFormatTable", json, "tables");
    return {
      http_response: response,
      ...listFields(json),
      total_items: getOr(json, "totalItems", decodeInt32, 0, ROOT_PATH),
      tables: getOr(json, "tables", decodeArray(decodeResource(parseListFormatTable)), [], ROOT_PATH),
    };
  });
}

export function buildListProjectsResponse(
  response: BigQueryHttpResponse,
  logger: Logger = new NoopLogger()
): ListProjectsResponse {
  return build("ListProjectsResponse", response, logger, (json) => {
    validateRequiredKeys("ProjectList", json);
    validateEach("Project", json, "projects");
    return {
      http_response: response,
      ...listFields(json),
      total_items: getOr(json, "totalItems", decodeInt32, 0, ROOT_PATH),
      projects: getOr(json, "projects", decodeArray(decodeResource(parseProject)), [], ROOT_PATH),
    };
  });
}

/** The payload is never printed. */
export const debugHttpResponse: DebugRenderer<BigQueryHttpResponse> = (response, name, options, indent) => {
  const f = new DebugFormatter(name, options, indent).field("status_code", response.status_code);
  for (const key of Object.keys(response.headers).sort()) {
    for (const value of response.headers[key] ?? []) {
      f.subMessage("http_headers", { key, value }, (h, hName, hOptions, hIndent) =>
        new DebugFormatter(hName, hOptions, hIndent).stringField("key", h.key).stringField("value", h.value).build()
      );
    }
  }
  return f.redactedField("payload").build();
};

export const debugGetJobResponse: DebugRenderer<GetJobResponse> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .subMessage("http_response", r.http_response, debugHttpResponse)
    .subMessage("job", r.job, debugJob)
    .build();

export const debugListJobsResponse: DebugRenderer<ListJobsResponse> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .subMessage("http_response", r.http_response, debugHttpResponse)
    .stringField("kind", r.kind)
    .stringField("etag", r.etag)
    .stringField("next_page_token", r.next_page_token)
    .subMessages("jobs", r.jobs, debugListFormatJob)
    .build();

export const debugQueryResponse: DebugRenderer<QueryResponse> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .subMessage("http_response", r.http_response, debugHttpResponse)
    .subMessage("query_results", r.query_results, debugQueryResults)
    .build();

export const debugGetDatasetResponse: DebugRenderer<GetDatasetResponse> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .subMessage("http_response", r.http_response, debugHttpResponse)
    .subMessage("dataset", r.dataset, debugDataset)
    .build();

export const debugListDatasetsResponse: DebugRenderer<ListDatasetsResponse> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .subMessage("http_response", r.http_response, debugHttpResponse)
    .stringField("kind", r.kind)
    .stringField("etag", r.etag)
    .stringField("next_page_token", r.next_page_token)
    .subMessages("datasets", r.datasets, debugListFormatDataset)
    .build();

export const debugGetTableResponse: DebugRenderer<GetTableResponse> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .subMessage("http_response", r.http_response, debugHttpResponse)
    .subMessage("table", r.table, debugTable)
    .build();

export const debugListTablesResponse: DebugRenderer<ListTablesResponse> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .subMessage("http_response", r.http_response, debugHttpResponse)
    .stringField("kind", r.kind)
    .stringField("etag", r.etag)
    .stringField("next_page_token", r.next_page_token)
    .field("total_items", r.total_items)
    .subMessages("tables", r.tables, debugListFormatTable)
    .build();

export const debugListProjectsResponse: DebugRenderer<ListProjectsResponse> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .subMessage("http_response", r.http_response, debugHttpResponse)
    .stringField("kind", r.kind)
    .stringField("etag", r.etag)
    .stringField("next_page_token", r.next_page_token)
    .field("total_items", r.total_items)
    .subMessages("projects", r.projects, debugProject)
    .build();

/**
 * REST request construction for the BigQuery v2 API.
 *
 * Builders validate a typed request value and turn it into a method, a full
 * path and an ordered list of query parameters. Nothing here performs I/O.
 */

import { DEFAULT_CONFIG, resolveEndpoint, type ResourceConfig } from "../config/index.js";
import { formatRfc3339 } from "../codec/time.js";
import { DebugFormatter, type DebugRenderer, type TracingOptions } from "../debug/index.js";
import { InvalidRequestError } from "../error/index.js";
import { createLogger, logError, logRequest, type Logger } from "../logging/index.js";
import { debugJob, serializeJob, type Job } from "../types/job.js";
import {
  debugQueryRequest,
  serializeQueryRequest,
  type DataFormatOptions,
  type QueryRequest,
} from "../types/query.js";

export type HttpMethod = "GET" | "POST";

/**
 * A built REST request.
 */
export interface RestRequest {
  method: HttpMethod;
  /** Endpoint plus resource path, without the query string. */
  path: string;
  /** In the order they were added; values are not yet URL-encoded. */
  query_parameters: Array<[string, string]>;
  body?: Record<string, unknown>;
}

/** Job listing projection. */
export enum Projection {
  MINIMAL = "minimal",
  FULL = "full",
}

/** Job listing state filter. */
export enum StateFilter {
  PENDING = "pending",
  RUNNING = "running",
  DONE = "done",
}

/** Table view for `tables.get`. */
export enum TableMetadataView {
  BASIC = "BASIC",
  STORAGE_STATS = "STORAGE_STATS",
  FULL = "FULL",
}

export interface GetJobRequest {
  project_id: string;
  job_id: string;
  location: string;
}

export interface ListJobsRequest {
  project_id: string;
  all_users: boolean;
  /** 0 leaves the server default. */
  max_results: number;
  min_creation_time?: Date;
  max_creation_time?: Date;
  page_token: string;
  projection: string;
  state_filter: string;
  parent_job_id: string;
}

export interface InsertJobRequest {
  project_id: string;
  job: Job;
}

export interface CancelJobRequest {
  project_id: string;
  job_id: string;
  location: string;
}

export interface PostQueryRequest {
  project_id: string;
  query_request: QueryRequest;
}

export interface GetQueryResultsRequest {
  project_id: string;
  job_id: string;
  page_token: string;
  location: string;
  start_index: bigint;
  max_results: number;
  /** Milliseconds. */
  timeout: number;
  format_options: DataFormatOptions;
}

export interface GetDatasetRequest {
  project_id: string;
  dataset_id: string;
}

export interface ListDatasetsRequest {
  project_id: string;
  all: boolean;
  max_results: number;
  page_token: string;
  /** Label filter, e.g. `labels.env:prod`. */
  filter: string;
}

export interface GetTableRequest {
  project_id: string;
  dataset_id: string;
  table_id: string;
  selected_fields: string[];
  view: string;
}

export interface ListTablesRequest {
  project_id: string;
  dataset_id: string;
  max_results: number;
  page_token: string;
}

export interface ListProjectsRequest {
  max_results: number;
  page_token: string;
}

export function createGetJobRequest(projectId: string, jobId: string): GetJobRequest {
  return { project_id: projectId, job_id: jobId, location: "" };
}

export function createListJobsRequest(projectId: string): ListJobsRequest {
  return {
    project_id: projectId,
    all_users: false,
    max_results: 0,
    page_token: "",
    projection: "",
    state_filter: "",
    parent_job_id: "",
  };
}

export function createCancelJobRequest(projectId: string, jobId: string): CancelJobRequest {
  return { project_id: projectId, job_id: jobId, location: "" };
}

export function createGetQueryResultsRequest(projectId: string, jobId: string): GetQueryResultsRequest {
  return {
    project_id: projectId,
    job_id: jobId,
    page_token: "",
    location: "",
    start_index: 0n,
    max_results: 0,
    timeout: 0,
    format_options: { use_int64_timestamp: false },
  };
}

export function createListDatasetsRequest(projectId: string): ListDatasetsRequest {
  return { project_id: projectId, all: false, max_results: 0, page_token: "", filter: "" };
}

export function createGetTableRequest(projectId: string, datasetId: string, tableId: string): GetTableRequest {
  return { project_id: projectId, dataset_id: datasetId, table_id: tableId, selected_fields: [], view: "" };
}

export function createListTablesRequest(projectId: string, datasetId: string): ListTablesRequest {
  return { project_id: projectId, dataset_id: datasetId, max_results: 0, page_token: "" };
}

export function createListProjectsRequest(): ListProjectsRequest {
  return { max_results: 0, page_token: "" };
}

/**
 * Render the request as a URL with an encoded query string.
 */
export function requestUrl(request: RestRequest): string {
  if (request.query_parameters.length === 0) return request.path;
  const query = request.query_parameters
    .map(([key, value]) => `${key}=${encodeURIComponent(value)}`)
    .join("&");
  return `${request.path}?${query}`;
}

/**
 * Builds REST requests against one configured endpoint.
 *
 * @example
 * ```typescript
 * const builder = new RequestBuilder(configBuilder().endpoint("localhost:9050").build());
 * const request = builder.getJob(createGetJobRequest("my-project", "job_1"));
 * // request.path === "https://localhost:9050/bigquery/v2/projects/my-project/jobs/job_1"
 * ```
 */
export class RequestBuilder {
  private readonly baseUrl: string;
  private readonly tracing: TracingOptions;
  private readonly logger: Logger;

  constructor(config: ResourceConfig = DEFAULT_CONFIG, logger?: Logger) {
    this.baseUrl = resolveEndpoint(config.endpoint);
    this.tracing = { ...config.tracing };
    this.logger = logger ?? createLogger(config);
  }

  /**
   * Render a request value with the configured tracing options.
   *
   * @example
   * builder.debugString(builder.getJob(r), "request", debugRestRequest)
   */
  debugString<T>(value: T, name: string, render: DebugRenderer<T>): string {
    return render(value, name, this.tracing);
  }

  getJob(r: GetJobRequest): RestRequest {
    this.requireNonEmpty("GetJobRequest", "Project Id", r.project_id);
    this.requireNonEmpty("GetJobRequest", "Job Id", r.job_id);

    const request = this.create("GET", `/projects/${r.project_id}/jobs/${r.job_id}`);
    addIfNotEmpty(request, "location", r.location);
    return this.done(request);
  }

  listJobs(r: ListJobsRequest): RestRequest {
    this.requireNonEmpty("ListJobsRequest", "Project Id", r.project_id);

    const request = this.create("GET", `/projects/${r.project_id}/jobs`);
    if (r.all_users) request.query_parameters.push(["allUsers", "true"]);
    if (r.max_results > 0) request.query_parameters.push(["maxResults", String(r.max_results)]);
    if (r.min_creation_time) {
      request.query_parameters.push(["minCreationTime", formatRfc3339(r.min_creation_time)]);
    }
    if (r.max_creation_time) {
      request.query_parameters.push(["maxCreationTime", formatRfc3339(r.max_creation_time)]);
    }
    addIfNotEmpty(request, "pageToken", r.page_token);
    addIfNotEmpty(request, "projection", r.projection);
    addIfNotEmpty(request, "stateFilter", r.state_filter);
    addIfNotEmpty(request, "parentJobId", r.parent_job_id);
    return this.done(request);
  }

  insertJob(r: InsertJobRequest): RestRequest {
    this.requireNonEmpty("InsertJobRequest", "Project Id", r.project_id);
    if (!r.job.configuration.job_type) {
      this.fail("InsertJobRequest", "Invalid Job object");
    }

    const request = this.create("POST", `/projects/${r.project_id}/jobs`);
    request.body = serializeJob(r.job);
    return this.done(request);
  }

  cancelJob(r: CancelJobRequest): RestRequest {
    this.requireNonEmpty("CancelJobRequest", "Project Id", r.project_id);
    this.requireNonEmpty("CancelJobRequest", "Job Id", r.job_id);

    const request = this.create("POST", `/projects/${r.project_id}/jobs/${r.job_id}/cancel`);
    addIfNotEmpty(request, "location", r.location);
    return this.done(request);
  }

  postQuery(r: PostQueryRequest): RestRequest {
    this.requireNonEmpty("PostQueryRequest", "Project Id", r.project_id);
    if (!r.query_request.query) {
      this.fail("PostQueryRequest", "Missing required query field");
    }

    const request = this.create("POST", `/projects/${r.project_id}/queries`);
    request.body = serializeQueryRequest(r.query_request);
    return this.done(request);
  }

  getQueryResults(r: GetQueryResultsRequest): RestRequest {
    this.requireNonEmpty("GetQueryResultsRequest", "Project Id", r.project_id);
    this.requireNonEmpty("GetQueryResultsRequest", "Job Id", r.job_id);

    const request = this.create("GET", `/projects/${r.project_id}/queries/${r.job_id}`);
    addIfNotEmpty(request, "pageToken", r.page_token);
    addIfNotEmpty(request, "location", r.location);
    request.query_parameters.push(["startIndex", r.start_index.toString()]);
    if (r.max_results > 0) request.query_parameters.push(["maxResults", String(r.max_results)]);
    if (r.timeout > 0) request.query_parameters.push(["timeoutMs", String(Math.trunc(r.timeout))]);
    request.query_parameters.push([
      "formatOptions",
      JSON.stringify({ useInt64Timestamp: r.format_options.use_int64_timestamp }),
    ]);
    return this.done(request);
  }

  getDataset(r: GetDatasetRequest): RestRequest {
    this.requireNonEmpty("GetDatasetRequest", "Project Id", r.project_id);
    this.requireNonEmpty("GetDatasetRequest", "Dataset Id", r.dataset_id);

    return this.done(this.create("GET", `/projects/${r.project_id}/datasets/${r.dataset_id}`));
  }

  listDatasets(r: ListDatasetsRequest): RestRequest {
    this.requireNonEmpty("ListDatasetsRequest", "Project Id", r.project_id);

    const request = this.create("GET", `/projects/${r.project_id}/datasets`);
    if (r.all) request.query_parameters.push(["all", "true"]);
    if (r.max_results > 0) request.query_parameters.push(["maxResults", String(r.max_results)]);
    addIfNotEmpty(request, "pageToken", r.page_token);
    addIfNotEmpty(request, "filter", r.filter);
    return this.done(request);
  }

  getTable(r: GetTableRequest): RestRequest {
    this.requireNonEmpty("GetTableRequest", "Project Id", r.project_id);
    this.requireNonEmpty("GetTableRequest", "Dataset Id", r.dataset_id);
    this.requireNonEmpty("GetTableRequest", "Table Id", r.table_id);

    const request = this.create(
      "GET",
      `/projects/${r.project_id}/datasets/${r.dataset_id}/tables/${r.table_id}`
    );
    addIfNotEmpty(request, "selectedFields", r.selected_fields.join(","));
    addIfNotEmpty(request, "view", r.view);
    return this.done(request);
  }

  listTables(r: ListTablesRequest): RestRequest {
    this.requireNonEmpty("ListTablesRequest", "Project Id", r.project_id);
    this.requireNonEmpty("ListTablesRequest", "Dataset Id", r.dataset_id);

    const request = this.create("GET", `/projects/${r.project_id}/datasets/${r.dataset_id}/tables`);
    if (r.max_results > 0) request.query_parameters.push(["maxResults", String(r.max_results)]);
    addIfNotEmpty(request, "pageToken", r.page_token);
    return this.done(request);
  }

  listProjects(r: ListProjectsRequest): RestRequest {
    const request = this.create("GET", "/projects");
    if (r.max_results > 0) request.query_parameters.push(["maxResults", String(r.max_results)]);
    addIfNotEmpty(request, "pageToken", r.page_token);
    return this.done(request);
  }

  private create(method: HttpMethod, resourcePath: string): RestRequest {
    return { method, path: `${this.baseUrl}${resourcePath}`, query_parameters: [] };
  }

  private done(request: RestRequest): RestRequest {
    logRequest(this.logger, request.method, request.path, request.query_parameters.length);
    return request;
  }

  private requireNonEmpty(requestType: string, label: string, value: string): void {
    if (!value) this.fail(requestType, `${label} is empty`);
  }

  private fail(requestType: string, detail: string): never {
    const error = new InvalidRequestError(requestType, detail);
    logError(this.logger, error, "build request");
    throw error;
  }
}

function addIfNotEmpty(request: RestRequest, key: string, value: string): void {
  if (value) request.query_parameters.push([key, value]);
}

export const debugRestRequest: DebugRenderer<RestRequest> = (request, name, options, indent) => {
  const f = new DebugFormatter(name, options, indent)
    .stringField("method", request.method)
    .stringField("path", request.path);
  for (const [key, value] of request.query_parameters) {
    f.subMessage("query_parameters", { key, value }, (p, pName, pOptions, pIndent) =>
      new DebugFormatter(pName, pOptions, pIndent).stringField("key", p.key).stringField("value", p.value).build()
    );
  }
  return f.build();
};

export const debugGetJobRequest: DebugRenderer<GetJobRequest> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("project_id", r.project_id)
    .stringField("job_id", r.job_id)
    .stringField("location", r.location)
    .build();

export const debugListJobsRequest: DebugRenderer<ListJobsRequest> = (r, name, options, indent) => {
  const f = new DebugFormatter(name, options, indent)
    .stringField("project_id", r.project_id)
    .field("all_users", r.all_users)
    .field("max_results", r.max_results);
  if (r.min_creation_time) f.timestampField("min_creation_time", r.min_creation_time);
  if (r.max_creation_time) f.timestampField("max_creation_time", r.max_creation_time);
  return f
    .stringField("page_token", r.page_token)
    .stringField("projection", r.projection)
    .stringField("state_filter", r.state_filter)
    .stringField("parent_job_id", r.parent_job_id)
    .build();
};

export const debugInsertJobRequest: DebugRenderer<InsertJobRequest> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("project_id", r.project_id)
    .subMessage("job", r.job, debugJob)
    .build();

export const debugCancelJobRequest: DebugRenderer<CancelJobRequest> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("project_id", r.project_id)
    .stringField("job_id", r.job_id)
    .stringField("location", r.location)
    .build();

export const debugPostQueryRequest: DebugRenderer<PostQueryRequest> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("project_id", r.project_id)
    .subMessage("query_request", r.query_request, debugQueryRequest)
    .build();

export const debugGetQueryResultsRequest: DebugRenderer<GetQueryResultsRequest> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("project_id", r.project_id)
    .stringField("job_id", r.job_id)
    .stringField("page_token", r.page_token)
    .stringField("location", r.location)
    .field("start_index", r.start_index)
    .field("max_results", r.max_results)
    .durationField("timeout", r.timeout)
    .subMessage("format_options", r.format_options, (fo, foName, foOptions, foIndent) =>
      new DebugFormatter(foName, foOptions, foIndent).field("use_int64_timestamp", fo.use_int64_timestamp).build()
    )
    .build();

export const debugGetDatasetRequest: DebugRenderer<GetDatasetRequest> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("project_id", r.project_id)
    .stringField("dataset_id", r.dataset_id)
    .build();

export const debugListDatasetsRequest: DebugRenderer<ListDatasetsRequest> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("project_id", r.project_id)
    .field("all_datasets", r.all)
    .field("max_results", r.max_results)
    .stringField("page_token", r.page_token)
    .stringField("filter", r.filter)
    .build();

export const debugGetTableRequest: DebugRenderer<GetTableRequest> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("project_id", r.project_id)
    .stringField("dataset_id", r.dataset_id)
    .stringField("table_id", r.table_id)
    .stringsField("selected_fields", r.selected_fields)
    .stringField("view", r.view)
    .build();

export const debugListTablesRequest: DebugRenderer<ListTablesRequest> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("project_id", r.project_id)
    .stringField("dataset_id", r.dataset_id)
    .field("max_results", r.max_results)
    .stringField("page_token", r.page_token)
    .build();

export const debugListProjectsRequest: DebugRenderer<ListProjectsRequest> = (r, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .field("max_results", r.max_results)
    .stringField("page_token", r.page_token)
    .build();

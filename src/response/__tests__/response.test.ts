/**
 * HTTP response parser tests.
 */

import { describe, it, expect } from "vitest";
import {
  buildCancelJobResponse,
  buildGetDatasetResponse,
  buildGetJobResponse,
  buildGetQueryResultsResponse,
  buildGetTableResponse,
  buildInsertJobResponse,
  buildListDatasetsResponse,
  buildListJobsResponse,
  buildListProjectsResponse,
  buildListTablesResponse,
  buildQueryResponse,
  debugHttpResponse,
  getHeader,
  validateRequiredKeys,
  type BigQueryHttpResponse,
} from "../index.js";
import { ApiError, MalformedPayloadError, MissingRequiredKeyError } from "../../error/index.js";
import { ConsoleLogger } from "../../logging/index.js";

function ok(body: unknown): BigQueryHttpResponse {
  return { status_code: 200, headers: {}, payload: JSON.stringify(body) };
}

const JOB = {
  kind: "bigquery#job",
  etag: "etag-1",
  id: "p:US.job_1",
  status: { state: "DONE" },
  jobReference: { projectId: "p", jobId: "job_1", location: "US" },
  configuration: { jobType: "QUERY", query: { query: "SELECT 1" } },
};

describe("job responses", () => {
  it("should decode a job and keep the raw response", () => {
    const response = ok(JOB);

    const result = buildGetJobResponse(response);

    expect(result.http_response).toBe(response);
    expect(result.job.job_reference.job_id).toBe("job_1");
    expect(result.job.configuration.query?.query).toBe("SELECT 1");
  });

  it("should decode an inserted job", () => {
    expect(buildInsertJobResponse(ok(JOB)).job.status.state).toBe("DONE");
  });

  it("should name every missing key", () => {
    expect(() => buildGetJobResponse(ok({ kind: "bigquery#job", id: "x" }))).toThrow(
      "Not a valid Json Job object: missing etag, status, jobReference, configuration"
    );
  });

  it("should count null keys as missing", () => {
    try {
      buildGetJobResponse(ok({ ...JOB, status: null }));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingRequiredKeyError);
      if (error instanceof MissingRequiredKeyError) {
        expect(error.resourceKind).toBe("Job");
        expect(error.missingKeys).toEqual(["status"]);
      }
    }
  });

  it("should unwrap a cancelled job", () => {
    const result = buildCancelJobResponse(ok({ kind: "bigquery#jobCancelResponse", job: JOB }));

    expect(result.job.id).toBe("p:US.job_1");
  });

  it("should reject a cancel response whose job is not an object", () => {
    expect(() => buildCancelJobResponse(ok({ job: "job_1" }))).toThrow(
      new MalformedPayloadError("Not a valid Json Job object: job is not an object")
    );
  });

  it("should validate each listed job", () => {
    const body = {
      kind: "bigquery#jobList",
      etag: "e",
      nextPageToken: "next",
      jobs: [
        { kind: "bigquery#job", state: "DONE", id: "a", jobReference: { jobId: "a" } },
        { kind: "bigquery#job", id: "b", jobReference: { jobId: "b" } },
      ],
    };

    expect(() => buildListJobsResponse(ok(body))).toThrow("Not a valid Json ListFormatJob object: missing state");
  });

  it("should decode a job list", () => {
    const result = buildListJobsResponse(
      ok({
        kind: "bigquery#jobList",
        etag: "e",
        nextPageToken: "next",
        jobs: [{ kind: "bigquery#job", state: "RUNNING", id: "a", jobReference: { jobId: "a" } }],
      })
    );

    expect(result.next_page_token).toBe("next");
    expect(result.jobs.map((j) => j.state)).toEqual(["RUNNING"]);
  });
});

describe("payload handling", () => {
  it("should reject an empty payload", () => {
    expect(() => buildGetDatasetResponse({ status_code: 200, headers: {}, payload: "" })).toThrow(
      "Empty payload in HTTP response"
    );
  });

  it("should reject a payload that is not json", () => {
    expect(() => buildGetTableResponse({ status_code: 200, headers: {}, payload: "{not json" })).toThrow(
      MalformedPayloadError
    );
  });

  it("should reject a json payload that is not an object", () => {
    expect(() => buildGetTableResponse(ok([1, 2]))).toThrow("Error parsing Json from response payload");
  });

  it("should turn error statuses into api errors", () => {
    const response: BigQueryHttpResponse = {
      status_code: 404,
      headers: { "X-Goog-Request-Id": ["req-42"] },
      payload: JSON.stringify({ error: { message: "Not found: Dataset p:d", errors: [{ reason: "notFound" }] } }),
    };

    try {
      buildGetDatasetResponse(response);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ApiError);
      if (error instanceof ApiError) {
        expect(error.code).toBe("Api.notFound");
        expect(error.statusCode).toBe(404);
        expect(error.requestId).toBe("req-42");
        expect(error.message).toBe("Not found: Dataset p:d");
      }
    }
  });

  it("should propagate decode errors", () => {
    const body = { kind: "bigquery#table", etag: "e", id: "p:d.t", tableReference: {}, numRows: true };

    expect(() => buildGetTableResponse(ok(body))).toThrow("Type mismatch at $.numRows: expected int64, got boolean");
  });

  it("should look headers up case-insensitively", () => {
    const response: BigQueryHttpResponse = { status_code: 200, headers: { ETag: ["a", "b"] }, payload: "{}" };

    expect(getHeader(response, "etag")).toBe("a");
    expect(getHeader(response, "x-missing")).toBeUndefined();
  });

  it("should log parsed responses and failures", () => {
    const lines: string[] = [];
    const logger = new ConsoleLogger({ level: "debug", format: "compact" }, (line) => lines.push(line));

    buildQueryResponse(ok({ jobComplete: true }), logger);
    expect(() => buildGetQueryResultsResponse({ status_code: 200, headers: {}, payload: "" }, logger)).toThrow();

    expect(lines).toEqual([
      '[DEBUG] Parsed response {"resource":"QueryResponse","status":200}',
      '[DEBUG] Error occurred {"context":"parse GetQueryResultsResponse","errorName":"MalformedPayloadError",' +
        '"errorCode":"Response.MalformedPayload","errorMessage":"Empty payload in HTTP response"}',
    ]);
  });
});

describe("dataset, table and project responses", () => {
  it("should decode a dataset", () => {
    const result = buildGetDatasetResponse(
      ok({ kind: "bigquery#dataset", etag: "e", id: "p:d", datasetReference: { projectId: "p", datasetId: "d" } })
    );

    expect(result.dataset.dataset_reference).toEqual({ project_id: "p", dataset_id: "d" });
  });

  it("should treat a missing dataset list as empty", () => {
    const result = buildListDatasetsResponse(ok({ kind: "bigquery#datasetList", etag: "e" }));

    expect(result.datasets).toEqual([]);
    expect(result.next_page_token).toBe("");
  });

  it("should validate listed datasets", () => {
    expect(() =>
      buildListDatasetsResponse(ok({ kind: "bigquery#datasetList", etag: "e", datasets: [{ kind: "k", id: "i" }] }))
    ).toThrow("Not a valid Json ListFormatDataset object: missing datasetReference");
  });

  it("should decode a table list with its total", () => {
    const result = buildListTablesResponse(
      ok({
        kind: "bigquery#tableList",
        etag: "e",
        totalItems: 1,
        tables: [{ kind: "bigquery#table", id: "p:d.t", tableReference: { tableId: "t" } }],
      })
    );

    expect(result.total_items).toBe(1);
    expect(result.tables[0]?.table_reference.table_id).toBe("t");
  });

  it("should require the tables key", () => {
    expect(() => buildListTablesResponse(ok({ kind: "bigquery#tableList", etag: "e" }))).toThrow(
      "Not a valid Json TableList object: missing tables"
    );
  });

  it("should decode a project list", () => {
    const result = buildListProjectsResponse(
      ok({
        kind: "bigquery#projectList",
        etag: "e",
        totalItems: 1,
        projects: [{ kind: "bigquery#project", id: "p", numericId: "42", projectReference: { projectId: "p" } }],
      })
    );

    expect(result.projects[0]?.numeric_id).toBe(42n);
  });
});

describe("validateRequiredKeys", () => {
  it("should accept falsy but present values", () => {
    expect(() => validateRequiredKeys("DatasetList", { kind: "", etag: "" })).not.toThrow();
  });
});

describe("debugHttpResponse", () => {
  it("should list headers by key and redact the payload", () => {
    const response: BigQueryHttpResponse = {
      status_code: 200,
      headers: { "x-b": ["2"], "content-type": ["application/json"] },
      payload: '{"secret":"test-secret"}',
    };

    expect(debugHttpResponse(response, "http_response")).toBe(
      'http_response { status_code: 200 http_headers { key: "content-type" value: "application/json" } ' +
        'http_headers { key: "x-b" value: "2" } payload: REDACTED }'
    );
  });
});

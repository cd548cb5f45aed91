/**
 * Job, job statistics and query result codec tests.
 */

import { describe, it, expect } from "vitest";
import {
  JobState,
  JobType,
  createJobConfiguration,
  createJobConfigurationQuery,
  createJobReference,
  createQueryJob,
  debugJobConfiguration,
  debugJobReference,
  parseJob,
  parseJobConfiguration,
  parseListFormatJob,
  serializeJob,
  serializeJobConfigurationQuery,
} from "../job.js";
import {
  createDmlStats,
  debugDmlStats,
  debugQueryTimelineSample,
  parseExplainQueryStage,
  parseJobStatistics,
  serializeJobStatistics,
} from "../job-stats.js";
import { createQueryRequest, parseQueryResults, serializeQueryRequest, serializeQueryResults } from "../query.js";
import { createStringParameter } from "../parameter.js";
import { stringValue } from "../value.js";

describe("Job", () => {
  it("should decode a completed query job", () => {
    const job = parseJob({
      kind: "bigquery#job",
      etag: "etag-1",
      id: "p:US.job_1",
      user_email: "someone@example.com",
      status: { state: "DONE", errorResult: { reason: "invalidQuery", message: "Syntax error" } },
      jobReference: { projectId: "p", jobId: "job_1", location: "US" },
      configuration: {
        jobType: "QUERY",
        jobTimeoutMs: "60000",
        query: { query: "SELECT 1", destinationTable: { projectId: "p", datasetId: "d", tableId: "t" } },
      },
    });

    expect(job.status.state).toBe(JobState.DONE);
    expect(job.status.error_result?.reason).toBe("invalidQuery");
    expect(job.user_email).toBe("someone@example.com");
    expect(job.configuration.job_timeout).toBe(60000);
    expect(job.configuration.query?.use_query_cache).toBe(true);
    expect(job.configuration.query?.destination_table?.table_id).toBe("t");
    expect(job.statistics).toBeUndefined();
  });

  it("should tolerate an empty status object", () => {
    const job = parseJob({ kind: "bigquery#job", status: {} });

    expect(job.status).toEqual({ state: "", errors: [] });
    expect(job.configuration).toEqual(createJobConfiguration());
  });

  it("should round-trip a query job with parameters", () => {
    const query = createJobConfigurationQuery("SELECT @name");
    query.parameter_mode = "NAMED";
    query.query_parameters = [createStringParameter("name", "abc")];
    query.maximum_bytes_billed = 1000000n;
    const job = createQueryJob(createJobReference("p", "job_2", "EU"), query);

    const wire = serializeJob(job);

    expect(wire.kind).toBe("bigquery#job");
    expect(parseJob(JSON.parse(JSON.stringify(wire)))).toEqual(job);
  });

  it("should leave unset sub-resources out of the query configuration", () => {
    const wire = serializeJobConfigurationQuery(createJobConfigurationQuery("SELECT 1"));

    expect(wire.maximumBytesBilled).toBe("0");
    expect("defaultDataset" in wire).toBe(false);
    expect("scriptOptions" in wire).toBe(false);
  });

  it("should decode list entries with their literal wire keys", () => {
    const entry = parseListFormatJob({
      id: "p:US.job_3",
      kind: "bigquery#job",
      state: "RUNNING",
      principal_subject: "user:someone@example.com",
      jobReference: { projectId: "p", jobId: "job_3" },
      errorResult: { reason: "stopped" },
    });

    expect(entry.state).toBe(JobState.RUNNING);
    expect(entry.principal_subject).toBe("user:someone@example.com");
    expect(entry.error_result).toEqual({ reason: "stopped", location: "", message: "" });
    expect(entry.job_reference.location).toBe("");
  });

  it("should render references and configurations", () => {
    expect(debugJobReference(createJobReference("p", "j", "US"), "job_reference")).toBe(
      'job_reference { project_id: "p" job_id: "j" location: "US" }'
    );
    expect(debugJobConfiguration(parseJobConfiguration({ jobType: JobType.LOAD }), "configuration")).toBe(
      'configuration { job_type: "LOAD" dry_run: false job_timeout { "0" } }'
    );
  });
});

describe("JobStatistics", () => {
  const json = {
    creationTime: "1700000000000",
    startTime: "1700000001000",
    endTime: "1700000005000",
    totalSlotMs: "4200",
    totalBytesProcessed: "1048576",
    reservation_id: "reservation-1",
    sessionInfo: { sessionId: "session-1" },
    rowLevelSecurityStatistics: { rowLevelSecurityApplied: true },
    query: {
      cacheHit: false,
      statementType: "INSERT",
      dmlStats: { insertedRowCount: "12" },
      queryPlan: [
        {
          name: "S00: Input",
          id: "0",
          inputStages: [],
          recordsRead: "100",
          slotMs: "30",
          waitRatioAvg: 0.25,
          steps: [{ kind: "READ", substeps: ["FROM t"] }],
        },
        { name: "S01: Output", id: "1", inputStages: ["0"] },
      ],
      timeline: [{ elapsedMs: "1500", totalSlotMs: "250", completedUnits: "2" }],
    },
  };

  it("should unwrap nested info objects", () => {
    const stats = parseJobStatistics(json);

    expect(stats.reservation_id).toBe("reservation-1");
    expect(stats.session_id).toBe("session-1");
    expect(stats.transaction_id).toBe("");
    expect(stats.row_level_security_applied).toBe(true);
    expect(stats.data_masking_applied).toBe(false);
    expect(stats.end_time.getTime() - stats.start_time.getTime()).toBe(4000);
  });

  it("should decode the query plan", () => {
    const query = parseJobStatistics(json).query;

    expect(query?.dml_stats).toEqual({ ...createDmlStats(), inserted_row_count: 12n });
    expect(query?.query_plan.map((s) => s.id)).toEqual([0n, 1n]);
    expect(query?.query_plan[1]?.input_stages).toEqual([0n]);
    expect(query?.query_plan[0]?.steps).toEqual([{ kind: "READ", substeps: ["FROM t"] }]);
    expect(query?.query_plan[0]?.wait_ratio_avg).toBe(0.25);
  });

  it("should survive a round trip", () => {
    const stats = parseJobStatistics(json);

    expect(parseJobStatistics(JSON.parse(JSON.stringify(serializeJobStatistics(stats))))).toEqual(stats);
  });

  it("should reject a plan stage id that is not an integer", () => {
    expect(() => parseExplainQueryStage({ id: "stage-0" }, "$.query.queryPlan[0]")).toThrow(
      'Type mismatch at $.query.queryPlan[0].id: expected int64, got string "stage-0"'
    );
  });

  it("should render timeline samples and dml stats", () => {
    const timeline = parseJobStatistics(json).query?.timeline[0];
    if (!timeline) throw new Error("missing timeline sample");

    expect(debugQueryTimelineSample(timeline, "timeline")).toBe(
      'timeline { elapsed_time { "1.5s" } total_slot_time { "250ms" } pending_units: 0 completed_units: 2 ' +
        "active_units: 0 estimated_runnable_units: 0 }"
    );
    expect(debugDmlStats(createDmlStats(), "dml_stats")).toBe(
      "dml_stats { inserted_row_count: 0 deleted_row_count: 0 updated_row_count: 0 }"
    );
  });
});

describe("QueryRequest", () => {
  it("should leave defaults out of the body", () => {
    expect(serializeQueryRequest(createQueryRequest("SELECT 1"))).toEqual({
      query: "SELECT 1",
      dryRun: false,
      preserveNulls: false,
      useQueryCache: true,
      useLegacySql: false,
      createSession: false,
      formatOptions: { useInt64Timestamp: false },
    });
  });

  it("should include limits, parameters and labels once set", () => {
    const request = createQueryRequest("SELECT @x");
    request.parameter_mode = "NAMED";
    request.max_results = 10;
    request.maximum_bytes_billed = 5000n;
    request.timeout = 10000;
    request.labels = { team: "data" };
    request.query_parameters = [createStringParameter("x", "y")];

    const body = serializeQueryRequest(request);

    expect(body.parameterMode).toBe("NAMED");
    expect(body.maxResults).toBe(10);
    expect(body.maximumBytesBilled).toBe("5000");
    expect(body.timeoutMs).toBe("10000");
    expect(body.labels).toEqual({ team: "data" });
    expect(body.queryParameters).toEqual([
      {
        name: "x",
        parameterType: { type: "STRING", structTypes: [] },
        parameterValue: { value: "y", arrayValues: [], structValues: {} },
      },
    ]);
  });
});

describe("QueryResults", () => {
  it("should decode rows and counters", () => {
    const results = parseQueryResults({
      kind: "bigquery#queryResponse",
      jobComplete: true,
      totalRows: "1",
      rows: [{ fields: { name: { kind_index: 2, valueKind: "alice" } } }],
      jobReference: { projectId: "p", jobId: "j" },
      sessionInfo: { sessionId: "s" },
    });

    expect(results.job_complete).toBe(true);
    expect(results.total_rows).toBe(1n);
    expect(results.rows).toEqual([{ fields: { name: stringValue("alice") } }]);
    expect(results.session_info.session_id).toBe("s");
    expect(results.dml_stats).toEqual(createDmlStats());
  });

  it("should survive a round trip", () => {
    const results = parseQueryResults({
      totalBytesProcessed: "42",
      cacheHit: true,
      errors: [{ reason: "invalid", location: "q", message: "bad" }],
      dmlStats: { updatedRowCount: "3" },
    });

    expect(parseQueryResults(serializeQueryResults(results))).toEqual(results);
  });
});

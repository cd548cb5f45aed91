/**
 * Job statistics: timing, bytes processed, query plans and DML/DDL outcomes.
 */

import {
  decodeArray,
  decodeBool,
  decodeDuration,
  decodeInt32,
  decodeInt64,
  decodeNumber,
  decodeResource,
  decodeString,
  decodeStringArray,
  decodeTimestamp,
  encodeDuration,
  encodeInt64,
  encodeTimestamp,
  getOptional,
  getOr,
  ROOT_PATH,
  type Decoder,
  type JsonObject,
} from "../codec/json.js";
import { DebugFormatter, type DebugRenderer } from "../debug/index.js";
import {
  debugDatasetReference,
  debugRoutineReference,
  debugTableReference,
  parseDatasetReference,
  parseRoutineReference,
  parseTableReference,
  serializeDatasetReference,
  serializeRoutineReference,
  serializeTableReference,
  type DatasetReference,
  type RoutineReference,
  type TableReference,
} from "./common.js";
import {
  debugQueryParameter,
  parseQueryParameter,
  serializeQueryParameter,
  type QueryParameter,
} from "./parameter.js";
import { debugTableSchema, parseTableSchema, serializeTableSchema, type TableSchema } from "./schema.js";

/** One step inside a query plan stage. */
export interface ExplainQueryStep {
  kind: string;
  substeps: string[];
}

/** One stage of a query plan. */
export interface ExplainQueryStage {
  name: string;
  status: string;
  id: bigint;
  input_stages: bigint[];
  records_read: bigint;
  records_written: bigint;
  parallel_inputs: bigint;
  completed_parallel_inputs: bigint;
  shuffle_output_bytes: bigint;
  shuffle_output_bytes_spilled: bigint;

  start_time: Date;
  end_time: Date;

  /** Durations in milliseconds. */
  slot_time: number;
  wait_avg_time_spent: number;
  wait_max_time_spent: number;
  read_avg_time_spent: number;
  read_max_time_spent: number;
  compute_avg_time_spent: number;
  compute_max_time_spent: number;
  write_avg_time_spent: number;
  write_max_time_spent: number;

  wait_ratio_avg: number;
  wait_ratio_max: number;
  read_ratio_avg: number;
  read_ratio_max: number;
  compute_ratio_avg: number;
  compute_ratio_max: number;
  write_ratio_avg: number;
  write_ratio_max: number;

  steps: ExplainQueryStep[];

  /** BIGQUERY or BI_ENGINE. */
  compute_mode: string;
}

/** Progress snapshot taken while a query runs. */
export interface QueryTimelineSample {
  /** Milliseconds since the job started. */
  elapsed_time: number;
  /** Cumulative slot milliseconds. */
  total_slot_time: number;
  pending_units: bigint;
  completed_units: bigint;
  active_units: bigint;
  estimated_runnable_units: bigint;
}

export interface DmlStats {
  inserted_row_count: bigint;
  deleted_row_count: bigint;
  updated_row_count: bigint;
}

export interface RowAccessPolicyReference {
  project_id: string;
  dataset_id: string;
  table_id: string;
  policy_id: string;
}

export interface IndexUnusedReason {
  code: string;
  message: string;
  index_name: string;
  base_table: TableReference;
}

export interface SearchStatistics {
  /** UNUSED, PARTIALLY_USED or FULLY_USED. */
  index_usage_mode: string;
  index_unused_reasons: IndexUnusedReason[];
}

export interface PerformanceInsights {
  /** Milliseconds. */
  avg_previous_execution_time: number;
  stage_performance_standalone_insights: {
    stage_id: bigint;
    slot_contention: boolean;
    insufficient_shuffle_quota: boolean;
  };
  stage_performance_change_insights: {
    stage_id: bigint;
    records_read_diff_percentage: number;
  };
}

/** Statistics specific to query jobs. */
export interface JobQueryStatistics {
  billing_tier: number;
  cache_hit: boolean;
  estimated_bytes_processed: bigint;
  total_bytes_processed: bigint;
  total_bytes_billed: bigint;
  total_partitions_processed: bigint;
  num_dml_affected_rows: bigint;
  ddl_affected_row_access_policy_count: bigint;
  transferred_bytes: bigint;
  total_bytes_processed_accuracy: string;
  statement_type: string;
  ddl_operation_performed: string;
  /** Milliseconds. */
  total_slot_time: number;

  query_plan: ExplainQueryStage[];
  timeline: QueryTimelineSample[];
  referenced_tables: TableReference[];
  referenced_routines: RoutineReference[];
  undeclared_query_parameters: QueryParameter[];
  schema: TableSchema;
  dml_stats: DmlStats;

  ddl_target_table?: TableReference;
  ddl_target_routine?: RoutineReference;
  ddl_target_dataset?: DatasetReference;
  ddl_target_row_access_policy?: RowAccessPolicyReference;
  search_statistics?: SearchStatistics;
  performance_insights?: PerformanceInsights;
}

export interface ScriptStackFrame {
  start_line: number;
  start_column: number;
  end_line: number;
  end_column: number;
  procedure_id: string;
  text: string;
}

export interface ScriptStatistics {
  /** STATEMENT or EXPRESSION. */
  evaluation_kind: string;
  stack_frames: ScriptStackFrame[];
}

/** Statistics common to all jobs. */
export interface JobStatistics {
  creation_time: Date;
  start_time: Date;
  end_time: Date;
  /** Milliseconds. */
  total_slot_time: number;
  /** Milliseconds. */
  final_execution_duration: number;
  total_bytes_processed: bigint;
  num_child_jobs: bigint;
  completion_ratio: number;
  parent_job_id: string;
  reservation_id: string;
  session_id: string;
  transaction_id: string;
  row_level_security_applied: boolean;
  data_masking_applied: boolean;
  quota_deferments: string[];

  script_statistics?: ScriptStatistics;
  query?: JobQueryStatistics;
}

const EPOCH = 0;

/** Decode a nested `{ key: value }` wrapper object down to one field. */
function nestedField<T>(key: string, decoder: Decoder<T>, fallback: T): Decoder<T> {
  return decodeResource((json, path) => getOr(json, key, decoder, fallback, path));
}

export function parseExplainQueryStep(json: JsonObject, path: string = ROOT_PATH): ExplainQueryStep {
  return {
    kind: getOr(json, "kind", decodeString, "", path),
    substeps: getOr(json, "substeps", decodeStringArray, [], path),
  };
}

export function parseExplainQueryStage(json: JsonObject, path: string = ROOT_PATH): ExplainQueryStage {
  const int64 = (key: string): bigint => getOr(json, key, decodeInt64, 0n, path);
  const ms = (key: string): number => getOr(json, key, decodeDuration, 0, path);
  const ratio = (key: string): number => getOr(json, key, decodeNumber, 0, path);

  return {
    name: getOr(json, "name", decodeString, "", path),
    status: getOr(json, "status", decodeString, "", path),
    id: int64("id"),
    input_stages: getOr(json, "inputStages", decodeArray(decodeInt64), [], path),
    records_read: int64("recordsRead"),
    records_written: int64("recordsWritten"),
    parallel_inputs: int64("parallelInputs"),
    completed_parallel_inputs: int64("completedParallelInputs"),
    shuffle_output_bytes: int64("shuffleOutputBytes"),
    shuffle_output_bytes_spilled: int64("shuffleOutputBytesSpilled"),
    start_time: getOr(json, "startMs", decodeTimestamp, new Date(EPOCH), path),
    end_time: getOr(json, "endMs", decodeTimestamp, new Date(EPOCH), path),
    slot_time: ms("slotMs"),
    wait_avg_time_spent: ms("waitMsAvg"),
    wait_max_time_spent: ms("waitMsMax"),
    read_avg_time_spent: ms("readMsAvg"),
    read_max_time_spent: ms("readMsMax"),
    compute_avg_time_spent: ms("computeMsAvg"),
    compute_max_time_spent: ms("computeMsMax"),
    write_avg_time_spent: ms("writeMsAvg"),
    write_max_time_spent: ms("writeMsMax"),
    wait_ratio_avg: ratio("waitRatioAvg"),
    wait_ratio_max: ratio("waitRatioMax"),
    read_ratio_avg: ratio("readRatioAvg"),
    read_ratio_max: ratio("readRatioMax"),
    compute_ratio_avg: ratio("computeRatioAvg"),
    compute_ratio_max: ratio("computeRatioMax"),
    write_ratio_avg: ratio("writeRatioAvg"),
    write_ratio_max: ratio("writeRatioMax"),
    steps: getOr(json, "steps", decodeArray(decodeResource(parseExplainQueryStep)), [], path),
    compute_mode: getOr(json, "computeMode", decodeString, "", path),
  };
}

export function serializeExplainQueryStage(stage: ExplainQueryStage): Record<string, unknown> {
  return {
    name: stage.name,
    status: stage.status,
    id: encodeInt64(stage.id),
    inputStages: stage.input_stages.map(encodeInt64),
    recordsRead: encodeInt64(stage.records_read),
    recordsWritten: encodeInt64(stage.records_written),
    parallelInputs: encodeInt64(stage.parallel_inputs),
    completedParallelInputs: encodeInt64(stage.completed_parallel_inputs),
    shuffleOutputBytes: encodeInt64(stage.shuffle_output_bytes),
    shuffleOutputBytesSpilled: encodeInt64(stage.shuffle_output_bytes_spilled),
    startMs: encodeTimestamp(stage.start_time),
    endMs: encodeTimestamp(stage.end_time),
    slotMs: encodeDuration(stage.slot_time),
    waitMsAvg: encodeDuration(stage.wait_avg_time_spent),
    waitMsMax: encodeDuration(stage.wait_max_time_spent),
    readMsAvg: encodeDuration(stage.read_avg_time_spent),
    readMsMax: encodeDuration(stage.read_max_time_spent),
    computeMsAvg: encodeDuration(stage.compute_avg_time_spent),
    computeMsMax: encodeDuration(stage.compute_max_time_spent),
    writeMsAvg: encodeDuration(stage.write_avg_time_spent),
    writeMsMax: encodeDuration(stage.write_max_time_spent),
    waitRatioAvg: stage.wait_ratio_avg,
    waitRatioMax: stage.wait_ratio_max,
    readRatioAvg: stage.read_ratio_avg,
    readRatioMax: stage.read_ratio_max,
    computeRatioAvg: stage.compute_ratio_avg,
    computeRatioMax: stage.compute_ratio_max,
    writeRatioAvg: stage.write_ratio_avg,
    writeRatioMax: stage.write_ratio_max,
    steps: stage.steps.map((step) => ({ kind: step.kind, substeps: step.substeps })),
    computeMode: stage.compute_mode,
  };
}

export function parseQueryTimelineSample(json: JsonObject, path: string = ROOT_PATH): QueryTimelineSample {
  return {
    elapsed_time: getOr(json, "elapsedMs", decodeDuration, 0, path),
    total_slot_time: getOr(json, "totalSlotMs", decodeDuration, 0, path),
    pending_units: getOr(json, "pendingUnits", decodeInt64, 0n, path),
    completed_units: getOr(json, "completedUnits", decodeInt64, 0n, path),
    active_units: getOr(json, "activeUnits", decodeInt64, 0n, path),
    estimated_runnable_units: getOr(json, "estimatedRunnableUnits", decodeInt64, 0n, path),
  };
}

export function serializeQueryTimelineSample(sample: QueryTimelineSample): Record<string, unknown> {
  return {
    elapsedMs: encodeDuration(sample.elapsed_time),
    totalSlotMs: encodeDuration(sample.total_slot_time),
    pendingUnits: encodeInt64(sample.pending_units),
    completedUnits: encodeInt64(sample.completed_units),
    activeUnits: encodeInt64(sample.active_units),
    estimatedRunnableUnits: encodeInt64(sample.estimated_runnable_units),
  };
}

export function createDmlStats(): DmlStats {
  return { inserted_row_count: 0n, deleted_row_count: 0n, updated_row_count: 0n };
}

export function parseDmlStats(json: JsonObject, path: string = ROOT_PATH): DmlStats {
  return {
    inserted_row_count: getOr(json, "insertedRowCount", decodeInt64, 0n, path),
    deleted_row_count: getOr(json, "deletedRowCount", decodeInt64, 0n, path),
    updated_row_count: getOr(json, "updatedRowCount", decodeInt64, 0n, path),
  };
}

export function serializeDmlStats(stats: DmlStats): Record<string, unknown> {
  return {
    insertedRowCount: encodeInt64(stats.inserted_row_count),
    deletedRowCount: encodeInt64(stats.deleted_row_count),
    updatedRowCount: encodeInt64(stats.updated_row_count),
  };
}

export function parseRowAccessPolicyReference(
  json: JsonObject,
  path: string = ROOT_PATH
): RowAccessPolicyReference {
  return {
    project_id: getOr(json, "projectId", decodeString, "", path),
    dataset_id: getOr(json, "datasetId", decodeString, "", path),
    table_id: getOr(json, "tableId", decodeString, "", path),
    policy_id: getOr(json, "policyId", decodeString, "", path),
  };
}

export function serializeRowAccessPolicyReference(ref: RowAccessPolicyReference): Record<string, unknown> {
  return {
    projectId: ref.project_id,
    datasetId: ref.dataset_id,
    tableId: ref.table_id,
    policyId: ref.policy_id,
  };
}

export function parseSearchStatistics(json: JsonObject, path: string = ROOT_PATH): SearchStatistics {
  const parseReason = (reason: JsonObject, reasonPath: string): IndexUnusedReason => ({
    code: getOr(reason, "code", decodeString, "", reasonPath),
    message: getOr(reason, "message", decodeString, "", reasonPath),
    index_name: getOr(reason, "indexName", decodeString, "", reasonPath),
    base_table: getOr(
      reason,
      "baseTable",
      decodeResource(parseTableReference),
      { project_id: "", dataset_id: "", table_id: "" },
      reasonPath
    ),
  });
  return {
    index_usage_mode: getOr(json, "indexUsageMode", decodeString, "", path),
    index_unused_reasons: getOr(json, "indexUnusedReasons", decodeArray(decodeResource(parseReason)), [], path),
  };
}

export function serializeSearchStatistics(stats: SearchStatistics): Record<string, unknown> {
  return {
    indexUsageMode: stats.index_usage_mode,
    indexUnusedReasons: stats.index_unused_reasons.map((reason) => ({
      code: reason.code,
      message: reason.message,
      indexName: reason.index_name,
      baseTable: serializeTableReference(reason.base_table),
    })),
  };
}

export function parsePerformanceInsights(json: JsonObject, path: string = ROOT_PATH): PerformanceInsights {
  const standalone = (obj: JsonObject, p: string): PerformanceInsights["stage_performance_standalone_insights"] => ({
    stage_id: getOr(obj, "stageId", decodeInt64, 0n, p),
    slot_contention: getOr(obj, "slotContention", decodeBool, false, p),
    insufficient_shuffle_quota: getOr(obj, "insufficientShuffleQuota", decodeBool, false, p),
  });
  const change = (obj: JsonObject, p: string): PerformanceInsights["stage_performance_change_insights"] => ({
    stage_id: getOr(obj, "stageId", decodeInt64, 0n, p),
    records_read_diff_percentage: getOr(
      obj,
      "inputDataChange",
      nestedField("recordsReadDiffPercentage", decodeNumber, 0),
      0,
      p
    ),
  });

  return {
    avg_previous_execution_time: getOr(json, "avgPreviousExecutionMs", decodeDuration, 0, path),
    stage_performance_standalone_insights: getOr(
      json,
      "stagePerformanceStandaloneInsights",
      decodeResource(standalone),
      { stage_id: 0n, slot_contention: false, insufficient_shuffle_quota: false },
      path
    ),
    stage_performance_change_insights: getOr(
      json,
      "stagePerformanceChangeInsights",
      decodeResource(change),
      { stage_id: 0n, records_read_diff_percentage: 0 },
      path
    ),
  };
}

export function serializePerformanceInsights(insights: PerformanceInsights): Record<string, unknown> {
  const standalone = insights.stage_performance_standalone_insights;
  const change = insights.stage_performance_change_insights;
  return {
    avgPreviousExecutionMs: encodeDuration(insights.avg_previous_execution_time),
    stagePerformanceStandaloneInsights: {
      stageId: encodeInt64(standalone.stage_id),
      slotContention: standalone.slot_contention,
      insufficientShuffleQuota: standalone.insufficient_shuffle_quota,
    },
    stagePerformanceChangeInsights: {
      stageId: encodeInt64(change.stage_id),
      inputDataChange: { recordsReadDiffPercentage: change.records_read_diff_percentage },
    },
  };
}

/**
 * Parse query statistics from BigQuery JSON.
 */
export function parseJobQueryStatistics(json: JsonObject, path: string = ROOT_PATH): JobQueryStatistics {
  const int64 = (key: string): bigint => getOr(json, key, decodeInt64, 0n, path);

  const stats: JobQueryStatistics = {
    billing_tier: getOr(json, "billingTier", decodeInt32, 0, path),
    cache_hit: getOr(json, "cacheHit", decodeBool, false, path),
    estimated_bytes_processed: int64("estimatedBytesProcessed"),
    total_bytes_processed: int64("totalBytesProcessed"),
    total_bytes_billed: int64("totalBytesBilled"),
    total_partitions_processed: int64("totalPartitionsProcessed"),
    num_dml_affected_rows: int64("numDmlAffectedRows"),
    ddl_affected_row_access_policy_count: int64("ddlAffectedRowAccessPolicyCount"),
    transferred_bytes: int64("transferredBytes"),
    total_bytes_processed_accuracy: getOr(json, "totalBytesProcessedAccuracy", decodeString, "", path),
    statement_type: getOr(json, "statementType", decodeString, "", path),
    ddl_operation_performed: getOr(json, "ddlOperationPerformed", decodeString, "", path),
    total_slot_time: getOr(json, "totalSlotMs", decodeDuration, 0, path),
    query_plan: getOr(json, "queryPlan", decodeArray(decodeResource(parseExplainQueryStage)), [], path),
    timeline: getOr(json, "timeline", decodeArray(decodeResource(parseQueryTimelineSample)), [], path),
    referenced_tables: getOr(json, "referencedTables", decodeArray(decodeResource(parseTableReference)), [], path),
    referenced_routines: getOr(
      json,
      "referencedRoutines",
      decodeArray(decodeResource(parseRoutineReference)),
      [],
      path
    ),
    undeclared_query_parameters: getOr(
      json,
      "undeclaredQueryParameters",
      decodeArray(decodeResource(parseQueryParameter)),
      [],
      path
    ),
    schema: getOr(json, "schema", decodeResource(parseTableSchema), { fields: [] }, path),
    dml_stats: getOr(json, "dmlStats", decodeResource(parseDmlStats), createDmlStats(), path),
  };

  const ddlTargetTable = getOptional(json, "ddlTargetTable", decodeResource(parseTableReference), path);
  if (ddlTargetTable) stats.ddl_target_table = ddlTargetTable;

  const ddlTargetRoutine = getOptional(json, "ddlTargetRoutine", decodeResource(parseRoutineReference), path);
  if (ddlTargetRoutine) stats.ddl_target_routine = ddlTargetRoutine;

  const ddlTargetDataset = getOptional(json, "ddlTargetDataset", decodeResource(parseDatasetReference), path);
  if (ddlTargetDataset) stats.ddl_target_dataset = ddlTargetDataset;

  const policy = getOptional(
    json,
    "ddlTargetRowAccessPolicy",
    decodeResource(parseRowAccessPolicyReference),
    path
  );
  if (policy) stats.ddl_target_row_access_policy = policy;

  const search = getOptional(json, "searchStatistics", decodeResource(parseSearchStatistics), path);
  if (search) stats.search_statistics = search;

  const insights = getOptional(json, "performanceInsights", decodeResource(parsePerformanceInsights), path);
  if (insights) stats.performance_insights = insights;

  return stats;
}

export function serializeJobQueryStatistics(stats: JobQueryStatistics): Record<string, unknown> {
  const json: Record<string, unknown> = {
    billingTier: stats.billing_tier,
    cacheHit: stats.cache_hit,
    estimatedBytesProcessed: encodeInt64(stats.estimated_bytes_processed),
    totalBytesProcessed: encodeInt64(stats.total_bytes_processed),
    totalBytesBilled: encodeInt64(stats.total_bytes_billed),
    totalPartitionsProcessed: encodeInt64(stats.total_partitions_processed),
    numDmlAffectedRows: encodeInt64(stats.num_dml_affected_rows),
    ddlAffectedRowAccessPolicyCount: encodeInt64(stats.ddl_affected_row_access_policy_count),
    transferredBytes: encodeInt64(stats.transferred_bytes),
    totalBytesProcessedAccuracy: stats.total_bytes_processed_accuracy,
    statementType: stats.statement_type,
    ddlOperationPerformed: stats.ddl_operation_performed,
    totalSlotMs: encodeDuration(stats.total_slot_time),
    queryPlan: stats.query_plan.map(serializeExplainQueryStage),
    timeline: stats.timeline.map(serializeQueryTimelineSample),
    referencedTables: stats.referenced_tables.map(serializeTableReference),
    referencedRoutines: stats.referenced_routines.map(serializeRoutineReference),
    undeclaredQueryParameters: stats.undeclared_query_parameters.map(serializeQueryParameter),
    schema: serializeTableSchema(stats.schema),
    dmlStats: serializeDmlStats(stats.dml_stats),
  };

  if (stats.ddl_target_table) json.ddlTargetTable = serializeTableReference(stats.ddl_target_table);
  if (stats.ddl_target_routine) json.ddlTargetRoutine = serializeRoutineReference(stats.ddl_target_routine);
  if (stats.ddl_target_dataset) json.ddlTargetDataset = serializeDatasetReference(stats.ddl_target_dataset);
  if (stats.ddl_target_row_access_policy) {
    json.ddlTargetRowAccessPolicy = serializeRowAccessPolicyReference(stats.ddl_target_row_access_policy);
  }
  if (stats.search_statistics) json.searchStatistics = serializeSearchStatistics(stats.search_statistics);
  if (stats.performance_insights) {
    json.performanceInsights = serializePerformanceInsights(stats.performance_insights);
  }

  return json;
}

export function parseScriptStatistics(json: JsonObject, path: string = ROOT_PATH): ScriptStatistics {
  const parseFrame = (frame: JsonObject, framePath: string): ScriptStackFrame => ({
    start_line: getOr(frame, "startLine", decodeInt32, 0, framePath),
    start_column: getOr(frame, "startColumn", decodeInt32, 0, framePath),
    end_line: getOr(frame, "endLine", decodeInt32, 0, framePath),
    end_column: getOr(frame, "endColumn", decodeInt32, 0, framePath),
    procedure_id: getOr(frame, "procedureId", decodeString, "", framePath),
    text: getOr(frame, "text", decodeString, "", framePath),
  });
  return {
    evaluation_kind: getOr(json, "evaluationKind", decodeString, "", path),
    stack_frames: getOr(json, "stackFrames", decodeArray(decodeResource(parseFrame)), [], path),
  };
}

export function serializeScriptStatistics(stats: ScriptStatistics): Record<string, unknown> {
  return {
    evaluationKind: stats.evaluation_kind,
    stackFrames: stats.stack_frames.map((frame) => ({
      startLine: frame.start_line,
      startColumn: frame.start_column,
      endLine: frame.end_line,
      endColumn: frame.end_column,
      procedureId: frame.procedure_id,
      text: frame.text,
    })),
  };
}

/**
 * Parse job statistics from BigQuery JSON.
 */
export function parseJobStatistics(json: JsonObject, path: string = ROOT_PATH): JobStatistics {
  const stats: JobStatistics = {
    creation_time: getOr(json, "creationTime", decodeTimestamp, new Date(EPOCH), path),
    start_time: getOr(json, "startTime", decodeTimestamp, new Date(EPOCH), path),
    end_time: getOr(json, "endTime", decodeTimestamp, new Date(EPOCH), path),
    total_slot_time: getOr(json, "totalSlotMs", decodeDuration, 0, path),
    final_execution_duration: getOr(json, "finalExecutionDurationMs", decodeDuration, 0, path),
    total_bytes_processed: getOr(json, "totalBytesProcessed", decodeInt64, 0n, path),
    num_child_jobs: getOr(json, "numChildJobs", decodeInt64, 0n, path),
    completion_ratio: getOr(json, "completionRatio", decodeNumber, 0, path),
    parent_job_id: getOr(json, "parentJobId", decodeString, "", path),
    reservation_id: getOr(json, "reservation_id", decodeString, "", path),
    session_id: getOr(json, "sessionInfo", nestedField("sessionId", decodeString, ""), "", path),
    transaction_id: getOr(json, "transactionInfo", nestedField("transactionId", decodeString, ""), "", path),
    row_level_security_applied: getOr(
      json,
      "rowLevelSecurityStatistics",
      nestedField("rowLevelSecurityApplied", decodeBool, false),
      false,
      path
    ),
    data_masking_applied: getOr(
      json,
      "dataMaskingStatistics",
      nestedField("dataMaskingApplied", decodeBool, false),
      false,
      path
    ),
    quota_deferments: getOr(json, "quotaDeferments", decodeStringArray, [], path),
  };

  const script = getOptional(json, "scriptStatistics", decodeResource(parseScriptStatistics), path);
  if (script) stats.script_statistics = script;

  const query = getOptional(json, "query", decodeResource(parseJobQueryStatistics), path);
  if (query) stats.query = query;

  return stats;
}

export function serializeJobStatistics(stats: JobStatistics): Record<string, unknown> {
  const json: Record<string, unknown> = {
    creationTime: encodeTimestamp(stats.creation_time),
    startTime: encodeTimestamp(stats.start_time),
    endTime: encodeTimestamp(stats.end_time),
    totalSlotMs: encodeDuration(stats.total_slot_time),
    finalExecutionDurationMs: encodeDuration(stats.final_execution_duration),
    totalBytesProcessed: encodeInt64(stats.total_bytes_processed),
    numChildJobs: encodeInt64(stats.num_child_jobs),
    completionRatio: stats.completion_ratio,
    parentJobId: stats.parent_job_id,
    reservation_id: stats.reservation_id,
    sessionInfo: { sessionId: stats.session_id },
    transactionInfo: { transactionId: stats.transaction_id },
    rowLevelSecurityStatistics: { rowLevelSecurityApplied: stats.row_level_security_applied },
    dataMaskingStatistics: { dataMaskingApplied: stats.data_masking_applied },
    quotaDeferments: stats.quota_deferments,
  };

  if (stats.script_statistics) json.scriptStatistics = serializeScriptStatistics(stats.script_statistics);
  if (stats.query) json.query = serializeJobQueryStatistics(stats.query);

  return json;
}

export const debugDmlStats: DebugRenderer<DmlStats> = (stats, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .field("inserted_row_count", stats.inserted_row_count)
    .field("deleted_row_count", stats.deleted_row_count)
    .field("updated_row_count", stats.updated_row_count)
    .build();

export const debugExplainQueryStage: DebugRenderer<ExplainQueryStage> = (stage, name, options, indent) => {
  const f = new DebugFormatter(name, options, indent)
    .stringField("name", stage.name)
    .stringField("status", stage.status)
    .field("id", stage.id);
  for (const input of stage.input_stages) f.field("input_stages", input);
  return f
    .field("records_read", stage.records_read)
    .field("records_written", stage.records_written)
    .field("parallel_inputs", stage.parallel_inputs)
    .field("completed_parallel_inputs", stage.completed_parallel_inputs)
    .field("shuffle_output_bytes", stage.shuffle_output_bytes)
    .field("shuffle_output_bytes_spilled", stage.shuffle_output_bytes_spilled)
    .timestampField("start_time", stage.start_time)
    .timestampField("end_time", stage.end_time)
    .durationField("slot_time", stage.slot_time)
    .durationField("wait_avg_time_spent", stage.wait_avg_time_spent)
    .durationField("wait_max_time_spent", stage.wait_max_time_spent)
    .durationField("read_avg_time_spent", stage.read_avg_time_spent)
    .durationField("read_max_time_spent", stage.read_max_time_spent)
    .durationField("compute_avg_time_spent", stage.compute_avg_time_spent)
    .durationField("compute_max_time_spent", stage.compute_max_time_spent)
    .durationField("write_avg_time_spent", stage.write_avg_time_spent)
    .durationField("write_max_time_spent", stage.write_max_time_spent)
    .field("wait_ratio_avg", stage.wait_ratio_avg)
    .field("wait_ratio_max", stage.wait_ratio_max)
    .field("read_ratio_avg", stage.read_ratio_avg)
    .field("read_ratio_max", stage.read_ratio_max)
    .field("compute_ratio_avg", stage.compute_ratio_avg)
    .field("compute_ratio_max", stage.compute_ratio_max)
    .field("write_ratio_avg", stage.write_ratio_avg)
    .field("write_ratio_max", stage.write_ratio_max)
    .subMessages("steps", stage.steps, (step, stepName, stepOptions, stepIndent) =>
      new DebugFormatter(stepName, stepOptions, stepIndent)
        .stringField("kind", step.kind)
        .stringsField("substeps", step.substeps)
        .build()
    )
    .stringField("compute_mode", stage.compute_mode)
    .build();
};

export const debugQueryTimelineSample: DebugRenderer<QueryTimelineSample> = (sample, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .durationField("elapsed_time", sample.elapsed_time)
    .durationField("total_slot_time", sample.total_slot_time)
    .field("pending_units", sample.pending_units)
    .field("completed_units", sample.completed_units)
    .field("active_units", sample.active_units)
    .field("estimated_runnable_units", sample.estimated_runnable_units)
    .build();

const debugRowAccessPolicyReference: DebugRenderer<RowAccessPolicyReference> = (ref, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("project_id", ref.project_id)
    .stringField("dataset_id", ref.dataset_id)
    .stringField("table_id", ref.table_id)
    .stringField("policy_id", ref.policy_id)
    .build();

const debugSearchStatistics: DebugRenderer<SearchStatistics> = (stats, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("index_usage_mode", stats.index_usage_mode)
    .subMessages("index_unused_reasons", stats.index_unused_reasons, (reason, rName, rOptions, rIndent) =>
      new DebugFormatter(rName, rOptions, rIndent)
        .stringField("code", reason.code)
        .stringField("message", reason.message)
        .stringField("index_name", reason.index_name)
        .subMessage("base_table", reason.base_table, debugTableReference)
        .build()
    )
    .build();

const debugPerformanceInsights: DebugRenderer<PerformanceInsights> = (insights, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .durationField("avg_previous_execution_time", insights.avg_previous_execution_time)
    .subMessage(
      "stage_performance_standalone_insights",
      insights.stage_performance_standalone_insights,
      (s, sName, sOptions, sIndent) =>
        new DebugFormatter(sName, sOptions, sIndent)
          .field("stage_id", s.stage_id)
          .field("slot_contention", s.slot_contention)
          .field("insufficient_shuffle_quota", s.insufficient_shuffle_quota)
          .build()
    )
    .subMessage(
      "stage_performance_change_insights",
      insights.stage_performance_change_insights,
      (c, cName, cOptions, cIndent) =>
        new DebugFormatter(cName, cOptions, cIndent)
          .field("stage_id", c.stage_id)
          .field("records_read_diff_percentage", c.records_read_diff_percentage)
          .build()
    )
    .build();

export const debugJobQueryStatistics: DebugRenderer<JobQueryStatistics> = (stats, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .field("estimated_bytes_processed", stats.estimated_bytes_processed)
    .field("total_partitions_processed", stats.total_partitions_processed)
    .field("total_bytes_processed", stats.total_bytes_processed)
    .field("total_bytes_billed", stats.total_bytes_billed)
    .field("billing_tier", stats.billing_tier)
    .field("num_dml_affected_rows", stats.num_dml_affected_rows)
    .field("ddl_affected_row_access_policy_count", stats.ddl_affected_row_access_policy_count)
    .field("transferred_bytes", stats.transferred_bytes)
    .stringField("total_bytes_processed_accuracy", stats.total_bytes_processed_accuracy)
    .stringField("statement_type", stats.statement_type)
    .stringField("ddl_operation_performed", stats.ddl_operation_performed)
    .durationField("total_slot_time", stats.total_slot_time)
    .field("cache_hit", stats.cache_hit)
    .subMessages("query_plan", stats.query_plan, debugExplainQueryStage)
    .subMessages("timeline", stats.timeline, debugQueryTimelineSample)
    .subMessages("referenced_tables", stats.referenced_tables, debugTableReference)
    .subMessages("referenced_routines", stats.referenced_routines, debugRoutineReference)
    .subMessage("schema", stats.schema, debugTableSchema)
    .subMessage("dml_stats", stats.dml_stats, debugDmlStats)
    .subMessages("undeclared_query_parameters", stats.undeclared_query_parameters, debugQueryParameter)
    .optionalSubMessage("ddl_target_table", stats.ddl_target_table, debugTableReference)
    .optionalSubMessage("ddl_target_routine", stats.ddl_target_routine, debugRoutineReference)
    .optionalSubMessage("ddl_target_dataset", stats.ddl_target_dataset, debugDatasetReference)
    .optionalSubMessage(
      "ddl_target_row_access_policy",
      stats.ddl_target_row_access_policy,
      debugRowAccessPolicyReference
    )
    .optionalSubMessage("search_statistics", stats.search_statistics, debugSearchStatistics)
    .optionalSubMessage("performance_insights", stats.performance_insights, debugPerformanceInsights)
    .build();

const debugScriptStatistics: DebugRenderer<ScriptStatistics> = (stats, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .stringField("evaluation_kind", stats.evaluation_kind)
    .subMessages("stack_frames", stats.stack_frames, (frame, fName, fOptions, fIndent) =>
      new DebugFormatter(fName, fOptions, fIndent)
        .field("start_line", frame.start_line)
        .field("start_column", frame.start_column)
        .field("end_line", frame.end_line)
        .field("end_column", frame.end_column)
        .stringField("procedure_id", frame.procedure_id)
        .stringField("text", frame.text)
        .build()
    )
    .build();

export const debugJobStatistics: DebugRenderer<JobStatistics> = (stats, name, options, indent) =>
  new DebugFormatter(name, options, indent)
    .timestampField("creation_time", stats.creation_time)
    .timestampField("start_time", stats.start_time)
    .timestampField("end_time", stats.end_time)
    .durationField("total_slot_time", stats.total_slot_time)
    .durationField("final_execution_duration", stats.final_execution_duration)
    .field("total_bytes_processed", stats.total_bytes_processed)
    .field("num_child_jobs", stats.num_child_jobs)
    .field("completion_ratio", stats.completion_ratio)
    .stringField("parent_job_id", stats.parent_job_id)
    .stringField("reservation_id", stats.reservation_id)
    .stringField("session_id", stats.session_id)
    .stringField("transaction_id", stats.transaction_id)
    .field("row_level_security_applied", stats.row_level_security_applied)
    .field("data_masking_applied", stats.data_masking_applied)
    .stringsField("quota_deferments", stats.quota_deferments)
    .optionalSubMessage("script_statistics", stats.script_statistics, debugScriptStatistics)
    .optionalSubMessage("query", stats.query, debugJobQueryStatistics)
    .build();

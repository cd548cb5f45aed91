/**
 * Table, schema, dataset, project and system variable codec tests.
 */

import { describe, it, expect } from "vitest";
import {
  createTableFieldSchema,
  findField,
  parseTableFieldSchema,
  parseTableSchema,
  serializeTableFieldSchema,
} from "../schema.js";
import {
  debugTimePartitioning,
  parseListFormatTable,
  parseTable,
  parseTimePartitioning,
  serializeTable,
} from "../table.js";
import { debugListFormatDataset, parseDataset, parseListFormatDataset, serializeDataset } from "../dataset.js";
import { debugProject, parseProject, serializeProject } from "../project.js";
import { debugSystemVariables, parseSystemVariables, serializeSystemVariables } from "../system-variables.js";
import { createArrayDataType, createStandardSqlDataType } from "../standard-sql.js";
import { stringValue } from "../value.js";
import { formatTableReference } from "../common.js";

describe("TableFieldSchema", () => {
  it("should decode nested RECORD fields", () => {
    const schema = parseTableSchema({
      fields: [
        { name: "id", type: "INT64", mode: "REQUIRED" },
        {
          name: "address",
          type: "RECORD",
          fields: [{ name: "city", type: "STRING", maxLength: "64", policyTags: { names: ["tag/pii"] } }],
        },
      ],
    });

    const city = findField(schema, "address.city");

    expect(city?.max_length).toBe(64n);
    expect(city?.policy_tags).toEqual(["tag/pii"]);
    expect(findField(schema, "address.zip")).toBeUndefined();
    expect(findField(schema, "id")?.mode).toBe("REQUIRED");
  });

  it("should omit empty attributes when serializing", () => {
    const field = createTableFieldSchema("amount", "NUMERIC");
    field.precision = 10n;
    field.scale = 2n;

    expect(serializeTableFieldSchema(field)).toEqual({
      name: "amount",
      type: "NUMERIC",
      precision: "10",
      scale: "2",
    });
  });

  it("should round-trip a RANGE element type", () => {
    const json = { name: "span", type: "RANGE", rangeElementType: { type: "DATE" } };

    const field = parseTableFieldSchema(json);

    expect(field.range_element_type).toBe("DATE");
    expect(serializeTableFieldSchema(field)).toEqual(json);
  });
});

describe("Table", () => {
  const json = {
    kind: "bigquery#table",
    etag: "etag-1",
    id: "p:d.t",
    tableReference: { projectId: "p", datasetId: "d", tableId: "t" },
    schema: { fields: [{ name: "ts", type: "TIMESTAMP" }] },
    numRows: "1000",
    numBytes: 2048,
    creationTime: "1700000000000",
    labels: { owner: "data" },
    timePartitioning: { type: "DAY", field: "ts", expirationMs: "86400000" },
    clustering: { fields: ["country"] },
  };

  it("should decode counters, times and optional sub-resources", () => {
    const table = parseTable(json);

    expect(table.num_rows).toBe(1000n);
    expect(table.num_bytes).toBe(2048n);
    expect(table.creation_time.getTime()).toBe(1700000000000);
    expect(table.expiration_time.getTime()).toBe(0);
    expect(table.time_partitioning).toEqual({ type: "DAY", field: "ts", expiration_time: 86400000 });
    expect(table.clustering?.fields).toEqual(["country"]);
    expect(table.range_partitioning).toBeUndefined();
    expect(formatTableReference(table.table_reference)).toBe("p.d.t");
  });

  it("should encode int64 counters as strings", () => {
    const wire = serializeTable(parseTable(json));

    expect(wire.numRows).toBe("1000");
    expect(wire.numBytes).toBe("2048");
    expect(wire.creationTime).toBe("1700000000000");
    expect("rangePartitioning" in wire).toBe(false);
  });

  it("should survive a round trip", () => {
    const table = parseTable(json);

    expect(parseTable(serializeTable(table))).toEqual(table);
  });

  it("should decode a list entry", () => {
    const entry = parseListFormatTable({
      kind: "bigquery#table",
      id: "p:d.t",
      type: "VIEW",
      view: { query: "SELECT 1", useLegacySql: false },
    });

    expect(entry.type).toBe("VIEW");
    expect(entry.view).toEqual({ query: "SELECT 1", use_legacy_sql: false });
    expect(entry.table_reference).toEqual({ project_id: "", dataset_id: "", table_id: "" });
  });

  it("should render partitioning durations", () => {
    const tp = parseTimePartitioning({ type: "DAY", field: "ts", expirationMs: "86400000" });

    expect(debugTimePartitioning(tp, "time_partitioning")).toBe(
      'time_partitioning { type: "DAY" expiration_time { "24h0m" } field: "ts" }'
    );
  });

  it("should reject a string where a record list is expected", () => {
    expect(() => parseTable({ schema: { fields: "id" } })).toThrow(
      "Type mismatch at $.schema.fields: expected array, got string"
    );
  });
});

describe("Dataset", () => {
  it("should round-trip access entries and expirations", () => {
    const dataset = parseDataset({
      kind: "bigquery#dataset",
      etag: "e",
      id: "p:d",
      datasetReference: { projectId: "p", datasetId: "d" },
      defaultTableExpirationMs: "3600000",
      access: [
        { role: "READER", specialGroup: "projectReaders" },
        { view: { projectId: "p", datasetId: "v", tableId: "view1" } },
      ],
      linkedDatasetSource: { sourceDataset: { projectId: "q", datasetId: "src" } },
    });

    expect(dataset.default_table_expiration).toBe(3600000);
    expect(dataset.access[1]?.view?.table_id).toBe("view1");
    expect(dataset.linked_dataset_source?.source_dataset.dataset_id).toBe("src");
    expect(parseDataset(serializeDataset(dataset))).toEqual(dataset);
  });

  it("should render a list entry", () => {
    const entry = parseListFormatDataset({
      kind: "bigquery#dataset",
      id: "p:d",
      datasetReference: { projectId: "p", datasetId: "d" },
      labels: { env: "dev" },
    });

    expect(debugListFormatDataset(entry, "dataset")).toBe(
      'dataset { kind: "bigquery#dataset" id: "p:d" friendly_name: "" location: "" type: "" ' +
        'labels { key: "env" value: "dev" } dataset_reference { project_id: "p" dataset_id: "d" } }'
    );
  });
});

describe("Project", () => {
  it("should decode numeric ids as int64", () => {
    const project = parseProject({
      kind: "bigquery#project",
      id: "my-project",
      numericId: "123456789012",
      projectReference: { projectId: "my-project" },
    });

    expect(project.numeric_id).toBe(123456789012n);
    expect(serializeProject(project)).toEqual({
      kind: "bigquery#project",
      id: "my-project",
      friendlyName: "",
      numericId: "123456789012",
      projectReference: { projectId: "my-project" },
    });
    expect(debugProject(project, "project")).toBe(
      'project { kind: "bigquery#project" id: "my-project" friendly_name: "" numeric_id: 123456789012 ' +
        'project_reference { project_id: "my-project" } }'
    );
  });
});

describe("SystemVariables", () => {
  it("should round-trip types and values", () => {
    const vars = {
      types: { "@@project_id": createStandardSqlDataType("STRING"), ids: createArrayDataType(createStandardSqlDataType("INT64")) },
      values: { fields: { "@@project_id": stringValue("p") } },
    };

    expect(parseSystemVariables(serializeSystemVariables(vars))).toEqual(vars);
  });

  it("should render types by key", () => {
    const vars = parseSystemVariables({
      types: { b: { typeKind: "BOOL" } },
      values: { fields: { b: { kind_index: 3, valueKind: true } } },
    });

    expect(debugSystemVariables(vars, "system_variables")).toBe(
      'system_variables { types { key: "b" value { type_kind: "BOOL" } } ' +
        'values { fields { key: "b" value { value_kind: true } } } }'
    );
  });
});

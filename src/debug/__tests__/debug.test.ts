/**
 * Debug formatter tests.
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_TRACING_OPTIONS, DebugFormatter, parseTracingOptions, type TracingOptions } from "../index.js";

const MULTI_LINE: TracingOptions = { single_line_mode: false, truncate_string_field_longer_than: 128 };

interface Point {
  x: number;
  label: string;
}

function debugPoint(value: Point, name: string, options?: TracingOptions, indent?: number): string {
  return new DebugFormatter(name, options, indent).field("x", value.x).stringField("label", value.label).build();
}

describe("DebugFormatter", () => {
  it("should render a single-line block", () => {
    const text = new DebugFormatter("dataset_reference")
      .stringField("project_id", "p")
      .stringField("dataset_id", "d")
      .build();

    expect(text).toBe('dataset_reference { project_id: "p" dataset_id: "d" }');
  });

  it("should render an empty block", () => {
    expect(new DebugFormatter("labels").build()).toBe("labels { }");
  });

  it("should render nested blocks over several lines", () => {
    const text = new DebugFormatter("outer", MULTI_LINE)
      .field("count", 2)
      .subMessage("point", { x: 1, label: "a" }, debugPoint)
      .build();

    expect(text).toBe('outer {\n  count: 2\n  point {\n    x: 1\n    label: "a"\n  }\n}');
  });

  it("should truncate long strings", () => {
    const options: TracingOptions = { single_line_mode: true, truncate_string_field_longer_than: 3 };
    const text = new DebugFormatter("t", options).stringField("s", "abcdef").stringField("short", "abc").build();

    expect(text).toBe('t { s: "abc...<truncated>..." short: "abc" }');
  });

  it("should cut before a split surrogate pair", () => {
    const options: TracingOptions = { single_line_mode: true, truncate_string_field_longer_than: 2 };

    expect(new DebugFormatter("t", options).stringField("s", "a\u{1F600}b").build()).toBe(
      't { s: "a...<truncated>..." }'
    );
    expect(new DebugFormatter("t", options).stringField("s", "ab\u{1F600}").build()).toBe(
      't { s: "ab...<truncated>..." }'
    );
  });

  it("should escape quotes in strings", () => {
    expect(new DebugFormatter("t").stringField("q", 'say "hi"').build()).toBe('t { q: "say \\"hi\\"" }');
  });

  it("should render durations and timestamps as wrapped values", () => {
    const text = new DebugFormatter("stats")
      .durationField("elapsed", 10)
      .timestampField("start", new Date(0))
      .build();

    expect(text).toBe('stats { elapsed { "10ms" } start { "1970-01-01T00:00:00Z" } }');
  });

  it("should wrap durations over several lines", () => {
    const text = new DebugFormatter("stats", MULTI_LINE).durationField("elapsed", 1500).build();

    expect(text).toBe('stats {\n  elapsed {\n    "1.5s"\n  }\n}');
  });

  it("should order map entries by key", () => {
    const text = new DebugFormatter("t").mapField("labels", { b: "2", a: "1" }).build();

    expect(text).toBe('t { labels { key: "a" value: "1" } labels { key: "b" value: "2" } }');
  });

  it("should render message maps with nested values", () => {
    const text = new DebugFormatter("t").messageMap("points", { p: { x: 3, label: "z" } }, debugPoint).build();

    expect(text).toBe('t { points { key: "p" value { x: 3 label: "z" } } }');
  });

  it("should redact payloads", () => {
    expect(new DebugFormatter("r").redactedField("payload").build()).toBe("r { payload: REDACTED }");
  });

  it("should round fractional numbers to six significant digits", () => {
    expect(new DebugFormatter("n").field("ratio", 1 / 3).field("big", 7n).build()).toBe(
      "n { ratio: 0.333333 big: 7 }"
    );
  });

  it("should skip unset optional fields", () => {
    const text = new DebugFormatter("o")
      .optionalField("a", undefined)
      .optionalSubMessage("p", undefined, debugPoint)
      .optionalField("b", false)
      .build();

    expect(text).toBe("o { b: false }");
  });
});

describe("parseTracingOptions", () => {
  it("should apply recognised keys", () => {
    expect(parseTracingOptions("single_line_mode=F,truncate_string_field_longer_than=7")).toEqual({
      single_line_mode: false,
      truncate_string_field_longer_than: 7,
    });
  });

  it("should ignore unknown keys and unparseable values", () => {
    expect(parseTracingOptions("bogus=1,single_line_mode=maybe,truncate_string_field_longer_than=-2")).toEqual(
      DEFAULT_TRACING_OPTIONS
    );
  });

  it("should layer on top of the given base", () => {
    const base: TracingOptions = { single_line_mode: false, truncate_string_field_longer_than: 5 };

    expect(parseTracingOptions("truncate_string_field_longer_than=9", base)).toEqual({
      single_line_mode: false,
      truncate_string_field_longer_than: 9,
    });
  });
});

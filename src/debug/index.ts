/**
 * Structured debug strings for resources, requests and responses.
 *
 * Output is a nested `name { field: value ... }` form. In single-line mode
 * everything sits on one line; otherwise every field gets its own line,
 * indented two spaces per nesting level, with the closing brace on a line of
 * its own.
 */

import { formatDuration, formatRfc3339 } from "../codec/time.js";

export interface TracingOptions {
  single_line_mode: boolean;
  /** Strings longer than this are cut and suffixed with `...<truncated>...`. */
  truncate_string_field_longer_than: number;
}

export const DEFAULT_TRACING_OPTIONS: Readonly<TracingOptions> = {
  single_line_mode: true,
  truncate_string_field_longer_than: 128,
};

const TRUNCATION_MARKER = "...<truncated>...";

function parseBoolOption(value: string): boolean | undefined {
  switch (value.toLowerCase()) {
    case "t":
    case "true":
    case "on":
    case "yes":
    case "y":
    case "1":
      return true;
    case "f":
    case "false":
    case "off":
    case "no":
    case "n":
    case "0":
      return false;
    default:
      return undefined;
  }
}

/**
 * Apply a comma separated `key=value` list on top of `base`.
 *
 * Unknown keys and values that do not parse are ignored.
 *
 * @example
 * parseTracingOptions("single_line_mode=F,truncate_string_field_longer_than=7")
 */
export function parseTracingOptions(
  text: string,
  base: Readonly<TracingOptions> = DEFAULT_TRACING_OPTIONS
): TracingOptions {
  const options: TracingOptions = { ...base };
  for (const item of text.split(",")) {
    const eq = item.indexOf("=");
    if (eq < 0) continue;
    const key = item.slice(0, eq).trim();
    const value = item.slice(eq + 1).trim();

    if (key === "single_line_mode") {
      const parsed = parseBoolOption(value);
      if (parsed !== undefined) options.single_line_mode = parsed;
    } else if (key === "truncate_string_field_longer_than") {
      if (/^\d+$/.test(value)) options.truncate_string_field_longer_than = Number(value);
    }
  }
  return options;
}

/** Renders one value as a named sub-message at the given indent. */
export type DebugRenderer<T> = (
  value: T,
  name: string,
  options?: TracingOptions,
  indent?: number
) => string;

function formatNumber(value: number): string {
  if (Number.isInteger(value) || !Number.isFinite(value)) return String(value);
  return String(Number(value.toPrecision(6)));
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Builds one `name { ... }` block.
 */
export class DebugFormatter {
  private readonly fields: string[] = [];

  constructor(
    private readonly name: string,
    private readonly options: TracingOptions = DEFAULT_TRACING_OPTIONS,
    private readonly indent: number = 0
  ) {}

  private quote(value: string): string {
    const limit = this.options.truncate_string_field_longer_than;
    if (value.length <= limit) return JSON.stringify(value);
    // Never split a surrogate pair
    const cut = isHighSurrogate(value.charCodeAt(limit - 1)) ? limit - 1 : limit;
    return JSON.stringify(`${value.slice(0, cut)}${TRUNCATION_MARKER}`);
  }

  stringField(name: string, value: string): this {
    this.fields.push(`${name}: ${this.quote(value)}`);
    return this;
  }

  field(name: string, value: boolean | number | bigint): this {
    const text = typeof value === "number" ? formatNumber(value) : String(value);
    this.fields.push(`${name}: ${text}`);
    return this;
  }

  /** Emitted only when the value is set. */
  optionalField(name: string, value: boolean | number | bigint | undefined): this {
    return value === undefined ? this : this.field(name, value);
  }

  /** Repeated `name: "value"` entries. */
  stringsField(name: string, values: readonly string[]): this {
    for (const value of values) this.stringField(name, value);
    return this;
  }

  durationField(name: string, ms: number): this {
    return this.wrapped(name, JSON.stringify(formatDuration(ms)));
  }

  timestampField(name: string, value: Date): this {
    return this.wrapped(name, JSON.stringify(formatRfc3339(value)));
  }

  /** One `name { key: "k" value: "v" }` block per entry, ordered by key. */
  mapField(name: string, map: Readonly<Record<string, string>>): this {
    for (const key of Object.keys(map).sort()) {
      const value = map[key] ?? "";
      this.fields.push(
        new DebugFormatter(name, this.options, this.indent + 1)
          .stringField("key", key)
          .stringField("value", value)
          .build()
      );
    }
    return this;
  }

  /** Sensitive payloads are never printed. */
  redactedField(name: string): this {
    this.fields.push(`${name}: REDACTED`);
    return this;
  }

  subMessage<T>(name: string, value: T, render: DebugRenderer<T>): this {
    this.fields.push(render(value, name, this.options, this.indent + 1));
    return this;
  }

  /** Skipped when the value is unset. */
  optionalSubMessage<T>(name: string, value: T | undefined, render: DebugRenderer<T>): this {
    return value === undefined ? this : this.subMessage(name, value, render);
  }

  subMessages<T>(name: string, values: readonly T[], render: DebugRenderer<T>): this {
    for (const value of values) this.subMessage(name, value, render);
    return this;
  }

  /** One `name { key: "k" value { ... } }` block per entry, ordered by key. */
  messageMap<T>(name: string, map: Readonly<Record<string, T>>, render: DebugRenderer<T>): this {
    for (const key of Object.keys(map).sort()) {
      const value = map[key];
      if (value === undefined) continue;
      this.fields.push(
        new DebugFormatter(name, this.options, this.indent + 1)
          .stringField("key", key)
          .subMessage("value", value, render)
          .build()
      );
    }
    return this;
  }

  /** Adds a pre-rendered `name: literal` entry. */
  literal(name: string, text: string): this {
    this.fields.push(`${name}: ${text}`);
    return this;
  }

  build(): string {
    if (this.options.single_line_mode) {
      return `${this.name} {${this.fields.map((f) => ` ${f}`).join("")} }`;
    }
    const inner = "  ".repeat(this.indent + 1);
    const lines = this.fields.map((f) => `${inner}${f}\n`).join("");
    return `${this.name} {\n${lines}${"  ".repeat(this.indent)}}`;
  }

  private wrapped(name: string, text: string): this {
    if (this.options.single_line_mode) {
      this.fields.push(`${name} { ${text} }`);
    } else {
      const inner = "  ".repeat(this.indent + 2);
      this.fields.push(`${name} {\n${inner}${text}\n${"  ".repeat(this.indent + 1)}}`);
    }
    return this;
  }
}

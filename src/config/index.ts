/**
 * Configuration for the BigQuery resource layer.
 */

import { z } from "zod";
import { DEFAULT_TRACING_OPTIONS, parseTracingOptions, type TracingOptions } from "../debug/index.js";
import { ConfigurationError } from "../error/index.js";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "../logging/index.js";

export const DEFAULT_ENDPOINT = "https://bigquery.googleapis.com";

/**
 * Resource layer configuration.
 */
export interface ResourceConfig {
  /** Service root, with or without scheme; `/bigquery/v2` is appended. */
  endpoint: string;
  /** Debug-string rendering options. */
  tracing: TracingOptions;
  /** Log built requests and parse failures. */
  enableLogging: boolean;
  logLevel: LogLevel;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Readonly<ResourceConfig> = {
  endpoint: DEFAULT_ENDPOINT,
  tracing: DEFAULT_TRACING_OPTIONS,
  enableLogging: false,
  logLevel: "info",
};

const ResourceConfigSchema = z.object({
  endpoint: z.string().trim().min(1, "Endpoint cannot be empty"),
  tracing: z.object({
    single_line_mode: z.boolean(),
    truncate_string_field_longer_than: z
      .number()
      .int("Truncation threshold must be an integer")
      .positive("Truncation threshold must be positive"),
  }),
  enableLogging: z.boolean(),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error"]),
});

/**
 * Resource configuration builder.
 */
export class ResourceConfigBuilder {
  private config: Partial<ResourceConfig> = {};

  /**
   * Set the service endpoint, e.g. `bigquery.googleapis.com` or an emulator.
   */
  endpoint(endpoint: string): this {
    this.config.endpoint = endpoint;
    return this;
  }

  /**
   * Replace the tracing options.
   */
  tracing(options: TracingOptions): this {
    this.config.tracing = { ...options };
    return this;
  }

  /**
   * Apply a `key=value,...` tracing string on top of the current options.
   */
  tracingOptions(text: string): this {
    this.config.tracing = parseTracingOptions(text, this.config.tracing ?? DEFAULT_TRACING_OPTIONS);
    return this;
  }

  enableLogging(enable: boolean = true): this {
    this.config.enableLogging = enable;
    return this;
  }

  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Load configuration from environment variables.
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): this {
    // Emulator wins over an explicit endpoint
    const endpoint = env.BIGQUERY_EMULATOR_HOST ?? env.BIGQUERY_ENDPOINT;
    if (endpoint) {
      this.config.endpoint = endpoint;
    }

    const tracing = env.BIGQUERY_TRACING_OPTIONS;
    if (tracing) {
      this.tracingOptions(tracing);
    }

    const enableLogging = env.BIGQUERY_ENABLE_LOGGING;
    if (enableLogging !== undefined) {
      this.config.enableLogging = enableLogging.toLowerCase() === "true";
    }

    const logLevel = env.BIGQUERY_LOG_LEVEL?.toLowerCase();
    if (logLevel !== undefined) {
      if (!isLogLevel(logLevel)) {
        throw new ConfigurationError(
          `Invalid log level: ${logLevel} (expected one of ${LOG_LEVELS.join(", ")})`,
          "InvalidConfig"
        );
      }
      this.config.logLevel = logLevel;
    }

    return this;
  }

  /**
   * Build the configuration.
   */
  build(): ResourceConfig {
    const merged: ResourceConfig = { ...DEFAULT_CONFIG, ...this.config };
    const result = ResourceConfigSchema.safeParse(merged);

    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue?.path[0];
      if (where === "endpoint") {
        throw new ConfigurationError(issue?.message ?? "Invalid endpoint", "InvalidEndpoint");
      }
      if (where === "tracing") {
        throw new ConfigurationError(issue?.message ?? "Invalid tracing options", "InvalidTracingOptions");
      }
      throw new ConfigurationError(issue?.message ?? "Invalid configuration", "InvalidConfig");
    }

    return { ...merged, endpoint: merged.endpoint.trim(), tracing: { ...merged.tracing } };
  }
}

/**
 * Create a new configuration builder.
 */
export function configBuilder(): ResourceConfigBuilder {
  return new ResourceConfigBuilder();
}

/**
 * Turn a configured endpoint into the REST base URL.
 *
 * @example
 * resolveEndpoint("localhost:9050/") // "https://localhost:9050/bigquery/v2"
 */
export function resolveEndpoint(endpoint: string): string {
  let base = endpoint.trim();
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(base)) {
    base = `https://${base}`;
  }
  while (base.endsWith("/")) {
    base = base.slice(0, -1);
  }
  return `${base}/bigquery/v2`;
}

/**
 * Configuration tests.
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_CONFIG,
  configBuilder,
  resolveEndpoint,
} from "../index.js";
import { ConfigurationError } from "../../error/index.js";

describe("ResourceConfigBuilder", () => {
  it("should build the defaults", () => {
    const config = configBuilder().build();

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.tracing).not.toBe(DEFAULT_CONFIG.tracing);
  });

  it("should trim the endpoint", () => {
    expect(configBuilder().endpoint("  localhost:9050 ").build().endpoint).toBe("localhost:9050");
  });

  it("should reject an empty endpoint", () => {
    expect(() => configBuilder().endpoint("   ").build()).toThrow("Endpoint cannot be empty");
  });

  it("should apply tracing options text", () => {
    const config = configBuilder().tracingOptions("single_line_mode=off,truncate_string_field_longer_than=8").build();

    expect(config.tracing).toEqual({ single_line_mode: false, truncate_string_field_longer_than: 8 });
  });

  it("should reject a non-positive truncation threshold", () => {
    const build = () =>
      configBuilder().tracing({ single_line_mode: true, truncate_string_field_longer_than: 0 }).build();

    expect(build).toThrow(ConfigurationError);
    expect(build).toThrow("Truncation threshold must be positive");
  });

  it("should report the tracing code for tracing failures", () => {
    try {
      configBuilder().tracing({ single_line_mode: true, truncate_string_field_longer_than: 1.5 }).build();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe("Configuration.InvalidTracingOptions");
        expect(error.message).toBe("Truncation threshold must be an integer");
      }
    }
  });

  describe("fromEnv", () => {
    it("should prefer the emulator host", () => {
      const config = configBuilder()
        .fromEnv({ BIGQUERY_EMULATOR_HOST: "localhost:9050", BIGQUERY_ENDPOINT: "https://example.test" })
        .build();

      expect(config.endpoint).toBe("localhost:9050");
    });

    it("should read logging settings", () => {
      const config = configBuilder()
        .fromEnv({ BIGQUERY_ENABLE_LOGGING: "TRUE", BIGQUERY_LOG_LEVEL: "Debug" })
        .build();

      expect(config.enableLogging).toBe(true);
      expect(config.logLevel).toBe("debug");
    });

    it("should read tracing options", () => {
      const config = configBuilder()
        .fromEnv({ BIGQUERY_TRACING_OPTIONS: "truncate_string_field_longer_than=32" })
        .build();

      expect(config.tracing.truncate_string_field_longer_than).toBe(32);
      expect(config.tracing.single_line_mode).toBe(true);
    });

    it("should reject an unknown log level", () => {
      expect(() => configBuilder().fromEnv({ BIGQUERY_LOG_LEVEL: "verbose" })).toThrow(
        "Invalid log level: verbose (expected one of trace, debug, info, warn, error)"
      );
    });

    it("should leave defaults alone for an empty environment", () => {
      expect(configBuilder().fromEnv({}).build()).toEqual(DEFAULT_CONFIG);
    });
  });
});

describe("resolveEndpoint", () => {
  it("should append the API root to the default endpoint", () => {
    expect(resolveEndpoint("https://bigquery.googleapis.com")).toBe(
      "https://bigquery.googleapis.com/bigquery/v2"
    );
  });

  it("should add a scheme and drop trailing slashes", () => {
    expect(resolveEndpoint("localhost:9050//")).toBe("https://localhost:9050/bigquery/v2");
  });

  it("should keep an explicit http scheme", () => {
    expect(resolveEndpoint("http://127.0.0.1:9050")).toBe("http://127.0.0.1:9050/bigquery/v2");
  });
});

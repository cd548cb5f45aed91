/**
 * Logging tests.
 */

import { describe, it, expect } from "vitest";
import {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  isLogLevel,
  logError,
  logRequest,
} from "../index.js";
import { InvalidRequestError } from "../../error/index.js";

function collect(): { lines: string[]; sink: (line: string) => void } {
  const lines: string[] = [];
  return { lines, sink: (line) => lines.push(line) };
}

describe("ConsoleLogger", () => {
  it("should drop messages below the configured level", () => {
    const { lines, sink } = collect();
    const logger = new ConsoleLogger({ level: "warn", format: "compact" }, sink);

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(lines).toEqual(["[WARN] shown"]);
  });

  it("should render json lines with bigint context as strings", () => {
    const { lines, sink } = collect();
    const logger = new ConsoleLogger({ format: "json", includeTimestamps: false }, sink);

    logger.info("hello", { count: 5n });

    expect(lines).toEqual(['{"level":"info","message":"hello","count":"5"}']);
  });

  it("should render compact lines with context", () => {
    const { lines, sink } = collect();
    const logger = new ConsoleLogger({ level: "trace", format: "compact" }, sink);

    logger.trace("step", { path: "/projects/p" });

    expect(lines).toEqual(['[TRACE] step {"path":"/projects/p"}']);
  });

  it("should render pretty lines without timestamps when disabled", () => {
    const { lines, sink } = collect();
    const logger = new ConsoleLogger({ format: "pretty", includeTimestamps: false }, sink);

    logger.error("boom", { code: "Api.notFound" });

    expect(lines).toEqual(['[ERROR] boom \n  code: "Api.notFound"']);
  });
});

describe("createLogger", () => {
  it("should return a NoopLogger when logging is disabled", () => {
    expect(createLogger({ enableLogging: false, logLevel: "trace" })).toBeInstanceOf(NoopLogger);
  });

  it("should pass the level through to the console logger", () => {
    const { lines, sink } = collect();
    const logger = createLogger({ enableLogging: true, logLevel: "debug" }, sink);

    logRequest(logger, "GET", "/projects/p/jobs/j", 0);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("[DEBUG] Built request");
    expect(lines[0]).toContain('method: "GET"');
  });
});

describe("logError", () => {
  it("should include the error code when the error carries one", () => {
    const { lines, sink } = collect();
    const logger = new ConsoleLogger({ level: "debug", format: "json", includeTimestamps: false }, sink);

    logError(logger, new InvalidRequestError("GetJobRequest", "Job Id is empty"), "getJob");

    expect(JSON.parse(lines[0] ?? "")).toEqual({
      level: "debug",
      message: "Error occurred",
      context: "getJob",
      errorName: "InvalidRequestError",
      errorCode: "Request.InvalidArgument",
      errorMessage: "Invalid GetJobRequest: Job Id is empty",
    });
  });
});

describe("isLogLevel", () => {
  it("should accept known levels only", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});

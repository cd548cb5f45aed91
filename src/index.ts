/**
 * BigQuery v2 REST resource layer.
 *
 * Typed resources with their JSON codecs, REST request builders, HTTP
 * response parsers and debug-string rendering.
 *
 * @example
 * ```typescript
 * import { configBuilder, RequestBuilder, createGetJobRequest, buildGetJobResponse } from "bigquery-rest-resources";
 *
 * const builder = new RequestBuilder(configBuilder().fromEnv().build());
 * const request = builder.getJob(createGetJobRequest("my-project", "job_123"));
 * // ...send it with any HTTP client, then:
 * const { job } = buildGetJobResponse({ status_code: 200, headers: {}, payload: body });
 * ```
 */

export * from "./codec/json.js";
export * from "./codec/time.js";
export * from "./config/index.js";
export * from "./debug/index.js";
export * from "./error/index.js";
export * from "./logging/index.js";
export * from "./request/index.js";
export * from "./response/index.js";
export * from "./types/index.js";

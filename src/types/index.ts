/**
 * BigQuery v2 resource types and their JSON codecs.
 */

export * from "./common.js";
export * from "./parameter.js";
export * from "./standard-sql.js";
export * from "./value.js";
export * from "./system-variables.js";
export * from "./schema.js";
export * from "./table.js";
export * from "./dataset.js";
export * from "./project.js";
export * from "./job-stats.js";
export * from "./job.js";
export * from "./query.js";

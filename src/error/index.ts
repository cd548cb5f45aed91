/**
 * BigQuery resource error types.
 *
 * Every failure raised by the codec, the request builders and the response
 * parsers is a subclass of {@link BigQueryError}.
 */

import { z } from "zod";

/**
 * Base BigQuery error class.
 */
export class BigQueryError extends Error {
  public readonly code: string;
  public readonly requestId?: string;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: { requestId?: string; retryable?: boolean }
  ) {
    super(message);
    this.name = "BigQueryError";
    this.code = code;
    this.requestId = options?.requestId;
    this.retryable = options?.retryable ?? false;
    Object.setPrototypeOf(this, BigQueryError.prototype);
  }

  /**
   * HTTP status code if applicable.
   */
  get statusCode(): number | undefined {
    return undefined;
  }
}

/**
 * Configuration error.
 */
export class ConfigurationError extends BigQueryError {
  constructor(
    message: string,
    code: "InvalidEndpoint" | "InvalidTracingOptions" | "InvalidConfig" = "InvalidConfig"
  ) {
    super(message, `Configuration.${code}`);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * A request value failed validation before a REST request could be built.
 */
export class InvalidRequestError extends BigQueryError {
  /** Name of the request type, e.g. `GetJobRequest`. */
  public readonly requestType: string;

  constructor(requestType: string, detail: string) {
    super(`Invalid ${requestType}: ${detail}`, "Request.InvalidArgument");
    this.name = "InvalidRequestError";
    this.requestType = requestType;
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

/**
 * The HTTP payload was empty, was not JSON, or was not a JSON object.
 */
export class MalformedPayloadError extends BigQueryError {
  constructor(message: string) {
    super(message, "Response.MalformedPayload");
    this.name = "MalformedPayloadError";
    Object.setPrototypeOf(this, MalformedPayloadError.prototype);
  }
}

/**
 * A resource object lacks one or more keys its kind requires.
 */
export class MissingRequiredKeyError extends BigQueryError {
  public readonly resourceKind: string;
  public readonly missingKeys: readonly string[];

  constructor(resourceKind: string, missingKeys: readonly string[]) {
    const suffix = missingKeys.length > 0 ? `: missing ${missingKeys.join(", ")}` : "";
    super(`Not a valid Json ${resourceKind} object${suffix}`, "Response.MissingRequiredKey");
    this.name = "MissingRequiredKeyError";
    this.resourceKind = resourceKind;
    this.missingKeys = missingKeys;
    Object.setPrototypeOf(this, MissingRequiredKeyError.prototype);
  }
}

/**
 * A present JSON key carried a value of the wrong JSON type.
 */
export class DecodeError extends BigQueryError {
  /** JSON path of the offending value, e.g. `$.structTypes[0].type`. */
  public readonly path: string;
  public readonly expected: string;
  public readonly actual: string;

  constructor(path: string, expected: string, actual: string) {
    super(`Type mismatch at ${path}: expected ${expected}, got ${actual}`, "Decode.TypeMismatch");
    this.name = "DecodeError";
    this.path = path;
    this.expected = expected;
    this.actual = actual;
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * A tagged union carried a tag outside its known range.
 *
 * Raised for `Value.kind_index`. The library never catches it: callers that
 * see one are looking at a payload this version cannot represent.
 */
export class UnknownDiscriminatorError extends BigQueryError {
  public readonly fatal = true;
  public readonly typeName: string;
  public readonly tag: number;
  public readonly path: string;

  constructor(typeName: string, tag: number, path: string) {
    super(`Unknown ${typeName} discriminator ${tag} at ${path}`, "Decode.UnknownDiscriminator");
    this.name = "UnknownDiscriminatorError";
    this.typeName = typeName;
    this.tag = tag;
    this.path = path;
    Object.setPrototypeOf(this, UnknownDiscriminatorError.prototype);
  }
}

/**
 * Error reported by the BigQuery API in a non-2xx response.
 */
export class ApiError extends BigQueryError {
  public readonly reasons: readonly string[];
  private readonly _statusCode: number;

  constructor(
    message: string,
    reason: string,
    options: { statusCode: number; reasons?: readonly string[]; requestId?: string; retryable: boolean }
  ) {
    super(message, `Api.${reason}`, {
      requestId: options.requestId,
      retryable: options.retryable,
    });
    this.name = "ApiError";
    this._statusCode = options.statusCode;
    this.reasons = options.reasons ?? [];
    Object.setPrototypeOf(this, ApiError.prototype);
  }

  override get statusCode(): number {
    return this._statusCode;
  }
}

const errorResponseSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
    errors: z
      .array(
        z.object({
          domain: z.string().optional(),
          reason: z.string().optional(),
          message: z.string().optional(),
          location: z.string().optional(),
        })
      )
      .optional(),
  }),
});

/**
 * BigQuery error response body.
 */
export type BigQueryErrorResponse = z.infer<typeof errorResponseSchema>["error"];

const RETRYABLE_REASONS = new Set([
  "backendError",
  "internalError",
  "rateLimitExceeded",
  "userRateLimitExceeded",
  "concurrentRateLimitExceeded",
  "jobRateLimitExceeded",
  "serviceUnavailable",
]);

function statusReason(status: number): string {
  switch (status) {
    case 400:
      return "invalid";
    case 401:
      return "unauthenticated";
    case 403:
      return "accessDenied";
    case 404:
      return "notFound";
    case 408:
      return "timeout";
    case 409:
      return "duplicate";
    case 429:
      return "rateLimitExceeded";
    case 503:
      return "serviceUnavailable";
    default:
      return status >= 500 ? "internalError" : `HTTP_${status}`;
  }
}

function parseErrorBody(body: string): BigQueryErrorResponse | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return undefined;
  }
  const parsed = errorResponseSchema.safeParse(json);
  return parsed.success ? parsed.data.error : undefined;
}

/**
 * Parse BigQuery error from HTTP response.
 *
 * The first `errors[].reason` wins; without one the reason is derived from the
 * status code. 429 and 5xx responses are marked retryable.
 */
export function parseBigQueryError(status: number, body: string, requestId?: string): ApiError {
  const errorResponse = parseErrorBody(body);
  const message = errorResponse?.message ?? `HTTP ${status}`;
  const reasons = (errorResponse?.errors ?? []).flatMap((e) => (e.reason ? [e.reason] : []));
  const reason = reasons[0] ?? statusReason(status);

  return new ApiError(message, reason, {
    statusCode: status,
    reasons,
    requestId,
    retryable: RETRYABLE_REASONS.has(reason) || status === 429 || status >= 500,
  });
}

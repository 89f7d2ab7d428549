/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json"
  | "not_found"
  | "datastore_error"
  | "unexpected";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: "provider" | "datastore" | "config" | "tickers" | "ingestion";
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Wraps unknown thrown values so callers that catch can keep working with boundary errors.
 */
export const toUnexpectedError = (
  source: AppBoundaryError["source"],
  provider: string,
  error: unknown,
): AppBoundaryError => ({
  source,
  code: "unexpected",
  provider,
  message: error instanceof Error ? error.message : String(error),
  cause: error,
});

import { err, ok, type Result } from "neverthrow";

export type QueryRequest = {
  baseUrl: string;
  path: string;
  query: Record<string, string>;
  // Query parameters masked in every URL that reaches an error message.
  secretParams?: string[];
  timeoutMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  cause?: unknown;
};

const REDACTED = "***";

export const buildQueryUrl = (request: QueryRequest): URL => {
  const url = new URL(request.path, request.baseUrl);
  for (const [key, value] of Object.entries(request.query)) {
    url.searchParams.set(key, value);
  }
  return url;
};

export const redactUrl = (url: URL, secretParams: string[] = []): string => {
  const safe = new URL(url);
  for (const key of secretParams) {
    if (safe.searchParams.has(key)) {
      safe.searchParams.set(key, REDACTED);
    }
  }
  return safe.toString();
};

/**
 * One GET per call against a query-string API. Retries belong to the ingestion retry policy.
 */
export class HttpJsonClient {
  async getQuery(request: QueryRequest): Promise<Result<unknown, HttpClientError>> {
    const url = buildQueryUrl(request);
    const label = redactUrl(url, request.secretParams);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });

      if (!response.ok) {
        return err({
          code: "non_success_status",
          message: `GET ${label} answered ${response.status}.`,
          httpStatus: response.status,
        });
      }

      const text = await response.text();
      try {
        const body: unknown = JSON.parse(text);
        return ok(body);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: `GET ${label} returned a body that is not JSON.`,
          cause: jsonError,
        });
      }
    } catch (error) {
      if (error instanceof DOMException && error.name === "AbortError") {
        return err({
          code: "timeout",
          message: `GET ${label} timed out after ${request.timeoutMs}ms.`,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message: `GET ${label} failed: ${error instanceof Error ? error.message : String(error)}`,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}

import { err, ok, type Result } from "neverthrow";

export type HttpJsonRequest = {
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  url: string;
  httpStatus?: number;
  bodySnippet?: string;
  retryable: boolean;
  cause?: unknown;
};

const BODY_SNIPPET_LENGTH = 200;

/**
 * Issues one GET per call and reports every failure as a value; callers decide what a failure means.
 */
export class HttpJsonClient {
  async getJson(request: HttpJsonRequest): Promise<Result<unknown, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: "GET",
        headers: request.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        const bodySnippet = await this.readSnippet(response);

        return err({
          code: "non_success_status",
          message: `HTTP ${response.status} ${response.statusText}`.trim(),
          url: request.url,
          httpStatus: response.status,
          bodySnippet,
          retryable: response.status === 429 || response.status >= 500,
        });
      }

      try {
        const body: unknown = await response.json();
        return ok(body);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          url: request.url,
          retryable: false,
          cause: jsonError,
        });
      }
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${request.timeoutMs}ms.`,
          url: request.url,
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        url: request.url,
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async readSnippet(response: Response): Promise<string | undefined> {
    try {
      const text = await response.text();
      return text.slice(0, BODY_SNIPPET_LENGTH) || undefined;
    } catch {
      // The status line is enough when the body cannot be read.
      return undefined;
    }
  }
}

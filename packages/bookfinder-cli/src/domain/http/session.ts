import { CliAppError, type Logger } from "bookfinder-cli-core";

export interface HttpSessionOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  userAgent?: string;
  logger?: Logger;
}

export interface SessionRequestOptions {
  pathOrUrl: string;
  params?: URLSearchParams;
  headers?: Record<string, string>;
}

export interface SessionResponse {
  status: number;
  text: string;
}

export const DEFAULT_TIMEOUT_MS = 15_000;

export class HttpSession {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly userAgent: string;
  private readonly logger?: Logger;

  public constructor(options: HttpSessionOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.timeoutMs = sanitizeTimeout(options.timeoutMs);
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
    this.userAgent = options.userAgent ?? "bookfinder-cli";
    this.logger = options.logger;

    if (typeof this.fetchImpl !== "function") {
      throw new CliAppError({
        code: "E_UNKNOWN",
        message: "Global fetch is unavailable. Use Node 18+ or provide fetchImpl.",
      });
    }
  }

  public buildUrl(pathOrUrl: string, params?: URLSearchParams): URL {
    const url = resolveUrl(this.baseUrl, pathOrUrl);
    if (params !== undefined) {
      url.search = params.toString();
    }
    return url;
  }

  /**
   * Issues a single GET and reads the whole body. `timeoutMs` covers the
   * headers and the body; a non-2xx status is raised before the body is read.
   */
  public async getText(
    options: SessionRequestOptions,
    contextMessage: string,
  ): Promise<SessionResponse> {
    const headers = new Headers(options.headers);
    if (!headers.has("user-agent")) {
      headers.set("user-agent", this.userAgent);
    }
    if (!headers.has("accept")) {
      headers.set("accept", "application/json");
    }

    const url = this.buildUrl(options.pathOrUrl, options.params);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    this.logger?.debug(`GET ${url.toString()}`);

    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers,
        signal: controller.signal,
      });
      this.logger?.debug(`HTTP ${response.status} from ${url.host}`);

      if (!response.ok) {
        throw mapNonOkResponse(response, contextMessage);
      }

      return {
        status: response.status,
        text: await readBody(response, controller.signal),
      };
    } catch (error) {
      if (error instanceof CliAppError) {
        throw error;
      }

      if (isAbortError(error)) {
        throw new CliAppError({
          code: "E_UPSTREAM_TIMEOUT",
          message: `Search request timed out after ${this.timeoutMs}ms`,
          details: {
            url: url.toString(),
          },
          cause: error,
        });
      }

      throw new CliAppError({
        code: "E_UPSTREAM_NETWORK",
        message: "Failed to reach the O'Reilly search API",
        details: {
          url: url.toString(),
          reason: error instanceof Error ? error.message : String(error),
        },
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  public async getJson(options: SessionRequestOptions, contextMessage: string): Promise<unknown> {
    const { status, text } = await this.getText(options, contextMessage);
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new CliAppError({
        code: "E_UPSTREAM_PARSE",
        message: `${contextMessage}: response body is not valid JSON`,
        details: {
          status,
          snippet: text.slice(0, 120),
        },
        cause: error,
      });
    }
  }
}

export function mapNonOkResponse(response: Response, contextMessage: string): CliAppError {
  return new CliAppError({
    code: "E_UPSTREAM_HTTP",
    message: `${contextMessage} (status ${response.status})`,
    details: {
      status: response.status,
      statusText: response.statusText,
    },
  });
}

function isAbortError(error: unknown): boolean {
  return (
    typeof error === "object" && error !== null && "name" in error && error.name === "AbortError"
  );
}

/**
 * Reads the body until it ends or `signal` aborts. An abort rejects with the
 * signal's AbortError even when the body stream ignores the signal.
 */
function readBody(response: Response, signal: AbortSignal): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });

    void response.text().then(
      (text) => {
        signal.removeEventListener("abort", onAbort);
        resolve(text);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(
          isAbortError(error)
            ? error
            : new CliAppError({
                code: "E_UPSTREAM_NETWORK",
                message: "Connection dropped while reading the search response",
                details: {
                  reason: error instanceof Error ? error.message : String(error),
                },
                cause: error,
              }),
        );
      },
    );
  });
}

function sanitizeTimeout(timeoutMs: number | undefined): number {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return DEFAULT_TIMEOUT_MS;
  }

  return Math.floor(timeoutMs);
}

function normalizeBaseUrl(baseUrl: string): string {
  const normalized = baseUrl.trim();
  if (normalized.length === 0) {
    return "https://learning.oreilly.com/";
  }

  return normalized.endsWith("/") ? normalized : `${normalized}/`;
}

function resolveUrl(baseUrl: string, pathOrUrl: string): URL {
  if (/^https?:\/\//i.test(pathOrUrl)) {
    return new URL(pathOrUrl);
  }

  return new URL(pathOrUrl.replace(/^\/+/, ""), baseUrl);
}

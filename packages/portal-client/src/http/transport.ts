import { IntegrationApiError } from "../errors";
import { interpretResponse } from "./interpret";

export type HttpMethod = "GET" | "POST";

export type RequestOptions = {
  headers?: Record<string, string>;
  body?: string;
  maxRedirects?: number;
};

export type ProcessResponse<T> = (response: Response) => Promise<T>;

/** A caller-supplied transport. It owns redirects, retries and connection reuse. */
export interface NetworkRequester {
  request<T>(
    method: HttpMethod,
    url: string,
    processResponse: ProcessResponse<T>,
    options: RequestOptions
  ): Promise<T>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type Logger = Pick<Console, "log" | "warn" | "error">;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export function isRedirectStatus(status: number) {
  return REDIRECT_STATUSES.has(status);
}

function buildInit(method: HttpMethod, options: RequestOptions, redirect: "follow" | "manual"): RequestInit {
  return {
    method,
    headers: options.headers,
    body: method === "GET" ? undefined : options.body,
    redirect
  };
}

/**
 * Follows redirects one hop at a time. A 303 always continues as a GET; other
 * redirect codes keep the original method and body.
 */
export async function walkRedirects(
  fetchImpl: FetchLike,
  method: HttpMethod,
  url: string,
  options: RequestOptions,
  maxRedirects: number,
  logger?: Logger
): Promise<string> {
  let redirectCount = 0;
  let currentUrl = url;
  let currentMethod = method;

  while (redirectCount < maxRedirects) {
    const response = await fetchImpl(currentUrl, buildInit(currentMethod, options, "manual"));

    if (!isRedirectStatus(response.status)) {
      return interpretResponse(response);
    }

    await response.body?.cancel();
    redirectCount += 1;
    const location = response.headers.get("location");

    if (!location) {
      throw new IntegrationApiError(
        `Received redirect status ${response.status} but no Location header`,
        response.status
      );
    }

    currentUrl = new URL(location, currentUrl).toString();
    logger?.log(`[brightree] Following manual redirect ${redirectCount}/${maxRedirects}: ${currentUrl}`);

    if (response.status === 303) {
      currentMethod = "GET";
    }
  }

  throw new IntegrationApiError(`Too many redirects (max: ${maxRedirects})`);
}

export class FetchTransport {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly maxRedirects: number,
    fetchImpl?: FetchLike,
    private readonly logger: Logger = console
  ) {
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<string> {
    const maxRedirects = options.maxRedirects ?? this.maxRedirects;
    let response: Response;

    try {
      response = await this.fetchImpl(url, buildInit(method, options, "follow"));
    } catch (error) {
      this.logger.warn(
        `[brightree] Automatic redirect failed with error: ${error instanceof Error ? error.message : String(error)}, attempting manual redirect`
      );
      return walkRedirects(this.fetchImpl, method, url, options, maxRedirects, this.logger);
    }

    if (isRedirectStatus(response.status)) {
      await response.body?.cancel();
      this.logger.warn("[brightree] Automatic redirect failed, handling manually");
      return walkRedirects(this.fetchImpl, method, url, options, maxRedirects, this.logger);
    }

    return interpretResponse(response);
  }
}

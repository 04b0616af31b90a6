import { HTML_CONTENT_TYPES } from "./constants";
import { buildCookieHeader } from "./cookies";
import { logger } from "./logger";
import type { CliOptions, CookieEntry, PageFetcher, PageResponse } from "./types";

export interface FetcherOptions
  extends Pick<CliOptions, "timeoutMs" | "userAgent" | "cookieHeader"> {
  cookieJar?: CookieEntry[];
}

/**
 * One timed request. The abort timer stays armed until the body has been
 * read, so a server that stalls mid-body fails like any other timeout.
 */
async function fetchPageWithTimeout(
  targetUrl: string,
  timeoutMs: number,
  headers: Record<string, string>
): Promise<PageResponse> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(targetUrl, {
      headers,
      redirect: "follow",
      signal: controller.signal,
    });
    const body = await response.text();
    return {
      url: response.url || targetUrl,
      status: response.status,
      contentType: response.headers.get("content-type") ?? "",
      body,
    };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`Timed out after ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

export function buildRequestHeaders(
  targetUrl: string,
  options: FetcherOptions
): Record<string, string> {
  const headers: Record<string, string> = { "User-Agent": options.userAgent };
  const cookie = [
    options.cookieJar ? buildCookieHeader(options.cookieJar, targetUrl) : "",
    options.cookieHeader ?? "",
  ]
    .filter((part) => part.length > 0)
    .join("; ");
  if (cookie) {
    headers.Cookie = cookie;
  }
  return headers;
}

/**
 * Single-attempt fetcher. Non-2xx responses resolve normally; only transport
 * errors and timeouts reject.
 */
export function createPageFetcher(options: FetcherOptions): PageFetcher {
  return async (targetUrl: string): Promise<PageResponse> => {
    logger.debug(`Fetching ${targetUrl}`);
    return fetchPageWithTimeout(
      targetUrl,
      options.timeoutMs,
      buildRequestHeaders(targetUrl, options)
    );
  };
}

export function isHtmlResponse(page: PageResponse): boolean {
  const contentType = page.contentType.toLowerCase();
  return HTML_CONTENT_TYPES.some((type) => contentType.includes(type));
}

export function isXmlResponse(page: PageResponse): boolean {
  return page.contentType.toLowerCase().includes("xml");
}

import type { PageFetcher, PageResponse } from "../src/types";

export type FakeRoute =
  | { status?: number; contentType?: string; body: string }
  | Error;

/**
 * In-process stand-in for the HTTP client. Unknown URLs answer 404; an
 * `Error` route rejects like a transport failure.
 */
export function createFakeFetcher(routes: Record<string, FakeRoute>): {
  fetchPage: PageFetcher;
  calls: string[];
} {
  const calls: string[] = [];
  const fetchPage: PageFetcher = async (url: string): Promise<PageResponse> => {
    calls.push(url);
    const route = routes[url];
    if (route instanceof Error) {
      throw route;
    }
    if (!route) {
      return { url, status: 404, contentType: "text/html", body: "Not found" };
    }
    return {
      url,
      status: route.status ?? 200,
      contentType: route.contentType ?? "text/html; charset=utf-8",
      body: route.body,
    };
  };
  return { fetchPage, calls };
}

export const urlset = (urls: string[]): string =>
  [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
    ...urls.map((url) => `  <url><loc>${url}</loc></url>`),
    "</urlset>",
  ].join("\n");

export const sitemapIndex = (urls: string[]): string =>
  [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
    ...urls.map((url) => `  <sitemap><loc>${url}</loc></sitemap>`),
    "</sitemapindex>",
  ].join("\n");

export const paragraph = (sentence: string, times: number): string =>
  `<p>${Array.from({ length: times }, () => sentence).join(" ")}</p>`;

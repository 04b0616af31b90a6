import { JSDOM } from "jsdom";
import { SITEMAP_PATHS } from "./constants";
import { logger } from "./logger";
import { isXmlResponse } from "./network";
import type { PageFetcher, PageResponse } from "./types";
import { describeError } from "./utils";

export type SitemapDocument =
  | { kind: "index"; locations: string[] }
  | { kind: "urlset"; locations: string[] };

/**
 * Reads `<loc>` entries from a sitemap or sitemap index. Returns null for
 * malformed XML or for documents that are neither.
 */
export function parseSitemap(xml: string): SitemapDocument | null {
  let document: Document;
  try {
    document = new JSDOM(xml, { contentType: "text/xml" }).window.document;
  } catch (error) {
    logger.debug(`Unparseable sitemap: ${describeError(error)}`);
    return null;
  }

  const locations = Array.from(document.getElementsByTagName("loc"))
    .map((element) => element.textContent?.trim() ?? "")
    .filter((location) => location.length > 0);

  if (document.getElementsByTagName("sitemapindex").length > 0) {
    return { kind: "index", locations };
  }
  if (document.getElementsByTagName("urlset").length > 0) {
    return { kind: "urlset", locations };
  }
  return null;
}

async function tryFetch(
  fetchPage: PageFetcher,
  url: string
): Promise<PageResponse | null> {
  try {
    return await fetchPage(url);
  } catch (error) {
    logger.debug(`Sitemap fetch failed for ${url}: ${describeError(error)}`);
    return null;
  }
}

async function collectChildLocations(
  fetchPage: PageFetcher,
  childUrls: string[]
): Promise<string[]> {
  const locations: string[] = [];
  for (const childUrl of childUrls) {
    const response = await tryFetch(fetchPage, childUrl);
    if (!response || response.status !== 200) {
      logger.logSkipped(`child sitemap ${childUrl}`);
      continue;
    }
    const child = parseSitemap(response.body);
    if (!child) {
      logger.logSkipped(`unparseable child sitemap ${childUrl}`);
      continue;
    }
    locations.push(...child.locations);
  }
  return locations;
}

const uniqueSorted = (values: string[]): string[] =>
  Array.from(new Set(values)).sort();

/**
 * Looks for `/sitemap.xml`, then `/sitemap_index.xml`, at the origin of
 * `baseUrl`. The first usable candidate wins; an index is expanded into the
 * union of its child sitemaps. Empty when the site has no usable sitemap.
 */
export async function discoverSitemapUrls(
  baseUrl: string,
  fetchPage: PageFetcher
): Promise<string[]> {
  const origin = new URL(baseUrl).origin;

  for (const sitemapPath of SITEMAP_PATHS) {
    const candidate = new URL(sitemapPath, origin).toString();
    const response = await tryFetch(fetchPage, candidate);
    if (!response || response.status !== 200 || !isXmlResponse(response)) {
      logger.debug(`No usable sitemap at ${candidate}`);
      continue;
    }

    const sitemap = parseSitemap(response.body);
    if (!sitemap) {
      continue;
    }

    if (sitemap.kind === "index") {
      const childLocations = await collectChildLocations(
        fetchPage,
        sitemap.locations
      );
      logger.info(
        `Sitemap index ${candidate} listed ${sitemap.locations.length} sitemap(s)`
      );
      return uniqueSorted(childLocations);
    }

    logger.info(`Using sitemap ${candidate}`);
    return uniqueSorted(sitemap.locations);
  }

  return [];
}

import { JSDOM } from "jsdom";
import { chunkSections } from "./chunker";
import { extractDocument, isViableBody } from "./content";
import { loadCookieJar } from "./cookies";
import { Frontier } from "./frontier";
import { extractLinksFromDom } from "./links";
import { logger } from "./logger";
import { createPageFetcher, isHtmlResponse } from "./network";
import { PassageWriter } from "./output";
import { buildExcludeRules, normalizeUrl } from "./scope";
import { splitSections } from "./sections";
import { discoverSitemapUrls } from "./sitemap";
import type {
  CliOptions,
  CrawlSummary,
  ExtractionStrategy,
  PageFetcher,
  PageResponse,
  PathRule,
} from "./types";
import { codePointLength, describeError, sleep } from "./utils";

export interface CrawlSettings
  extends Pick<
    CliOptions,
    | "outFile"
    | "delayMs"
    | "maxPages"
    | "minTokens"
    | "maxTokens"
    | "minContentChars"
  > {
  baseUrl: string;
  source: string;
  rules: readonly PathRule[];
}

export interface CrawlDependencies {
  fetchPage: PageFetcher;
  wait?: (ms: number) => Promise<void>;
  strategies?: readonly ExtractionStrategy[];
  /** Aborting stops the crawl before the next URL is taken. */
  signal?: AbortSignal;
}

/**
 * One crawl run. Owns the frontier (queue and visited set) and the open
 * output file; `close` must run on every exit path, including an abort
 * through `CrawlDependencies.signal`.
 */
export class CrawlSession {
  private readonly failures: string[] = [];
  private requests = 0;
  private pagesWritten = 0;
  private readonly wait: (ms: number) => Promise<void>;

  private constructor(
    private readonly settings: CrawlSettings,
    readonly frontier: Frontier,
    private readonly writer: PassageWriter,
    private readonly deps: CrawlDependencies
  ) {
    this.wait = deps.wait ?? sleep;
  }

  static async open(
    settings: CrawlSettings,
    deps: CrawlDependencies
  ): Promise<CrawlSession> {
    const frontierOptions = {
      baseUrl: settings.baseUrl,
      maxPages: settings.maxPages,
      rules: settings.rules,
    };
    const sitemapUrls = await discoverSitemapUrls(
      settings.baseUrl,
      deps.fetchPage
    );
    let frontier = Frontier.fromSitemap(sitemapUrls, frontierOptions);
    if (frontier.plannedCount === 0) {
      if (sitemapUrls.length > 0) {
        logger.info("Sitemap has no URLs in scope, discovering links instead");
      }
      frontier = Frontier.fromSeed(frontierOptions);
    }
    logger.info(
      `Frontier ready (${frontier.mode}, ${frontier.plannedCount} URL(s) queued)`
    );

    const writer = await PassageWriter.open(settings.outFile);
    return new CrawlSession(settings, frontier, writer, deps);
  }

  private get interrupted(): boolean {
    return this.deps.signal?.aborted ?? false;
  }

  async run(): Promise<CrawlSummary> {
    logger.startProgress(this.frontier.plannedCount);

    try {
      while (!this.interrupted) {
        const url = this.frontier.next();
        if (url === null) {
          break;
        }
        logger.updateProgress(
          this.frontier.consumedCount - 1,
          url,
          this.frontier.plannedCount
        );
        // No pause before the very first request.
        if (this.requests > 0) {
          await this.wait(this.settings.delayMs);
        }
        await this.processUrl(url);
        logger.updateProgress(
          this.frontier.consumedCount,
          url,
          this.frontier.plannedCount
        );
      }
    } finally {
      logger.endProgress();
    }

    return this.summary();
  }

  async close(): Promise<void> {
    await this.writer.close();
  }

  summary(): CrawlSummary {
    return {
      pagesFetched: this.requests,
      pagesWritten: this.pagesWritten,
      passagesWritten: this.writer.count,
      failures: [...this.failures],
      interrupted: this.interrupted,
    };
  }

  private async fetch(url: string): Promise<PageResponse | null> {
    this.requests += 1;
    try {
      return await this.deps.fetchPage(url);
    } catch (error) {
      const reason = `${url}: ${describeError(error)}`;
      this.failures.push(reason);
      logger.recordSkip();
      logger.error(`Failed ${reason}`);
      return null;
    }
  }

  private async processUrl(url: string): Promise<void> {
    const page = await this.fetch(url);
    if (!page) {
      return;
    }
    logger.logPageFetched(
      url,
      page.status,
      page.contentType,
      codePointLength(page.body)
    );

    if (page.status !== 200 || !isHtmlResponse(page)) {
      logger.recordSkip();
      logger.logSkipped(`${url} (status ${page.status}, ${page.contentType || "no content-type"})`);
      return;
    }

    // One parse serves link discovery and then readability, which mutates it
    const dom = new JSDOM(page.body, { url: page.url });
    if (this.frontier.acceptsLinks) {
      for (const link of extractLinksFromDom(dom.window.document, page.url)) {
        this.frontier.offer(link);
      }
    }

    const document = extractDocument(page.body, page.url, {
      minContentChars: this.settings.minContentChars,
      strategies: this.deps.strategies,
      domContext: { readabilityDom: dom },
    });
    logger.logExtracted(
      url,
      codePointLength(document.body),
      document.title,
      document.strategy
    );
    if (!isViableBody(document.body, this.settings.minContentChars)) {
      logger.recordSkip();
      logger.logSkipped(`${url} (too little content)`);
      return;
    }

    const passages = chunkSections(splitSections(document.body), {
      url,
      title: document.title,
      source: this.settings.source,
      minTokens: this.settings.minTokens,
      maxTokens: this.settings.maxTokens,
    });
    for (const passage of passages) {
      await this.writer.write(passage);
    }
    if (passages.length > 0) {
      this.pagesWritten += 1;
    }
    logger.recordPassages(passages.length);
    logger.logPassagesWritten(url, passages.length);
  }
}

export function resolveSettings(options: CliOptions): CrawlSettings {
  if (!options.baseUrl) {
    throw new Error("Provide a base URL to crawl");
  }
  const baseUrl = normalizeUrl(options.baseUrl);
  if (options.minTokens > options.maxTokens) {
    throw new Error(
      `--minTokens (${options.minTokens}) must not exceed --maxTokens (${options.maxTokens})`
    );
  }
  return {
    baseUrl,
    source: options.source ?? new URL(baseUrl).hostname,
    rules: buildExcludeRules(options.exclude),
    outFile: options.outFile,
    delayMs: options.delayMs,
    maxPages: options.maxPages,
    minTokens: options.minTokens,
    maxTokens: options.maxTokens,
    minContentChars: options.minContentChars,
  };
}

export async function createFetcherFromOptions(
  options: CliOptions
): Promise<PageFetcher> {
  const cookieJar = options.cookiesFile
    ? await loadCookieJar(options.cookiesFile)
    : undefined;
  return createPageFetcher({
    timeoutMs: options.timeoutMs,
    userAgent: options.userAgent,
    cookieHeader: options.cookieHeader,
    cookieJar,
  });
}

export async function crawlSite(
  options: CliOptions,
  deps?: Partial<CrawlDependencies>
): Promise<CrawlSummary> {
  const settings = resolveSettings(options);
  const fetchPage = deps?.fetchPage ?? (await createFetcherFromOptions(options));

  logger.logCrawlStart(settings.baseUrl, {
    out: settings.outFile,
    source: settings.source,
    maxPages: settings.maxPages,
    delay: `${settings.delayMs}ms`,
    tokens: `${settings.minTokens}-${settings.maxTokens}`,
    minContentChars: settings.minContentChars,
  });

  const session = await CrawlSession.open(settings, { ...deps, fetchPage });
  try {
    const summary = await session.run();
    logger.info(
      `Wrote ${summary.passagesWritten} passage(s) from ${summary.pagesWritten} page(s) to ${settings.outFile}`
    );
    logger.printFailureSummary(summary.failures);
    if (summary.interrupted) {
      logger.warn("Crawl interrupted; the output holds the pages finished so far");
    }
    return summary;
  } finally {
    await session.close();
  }
}

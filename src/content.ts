import { Readability } from "@mozilla/readability";
import { JSDOM } from "jsdom";
import {
  BLANK_LINES_REGEX,
  FALLBACK_CONTAINER_SELECTORS,
  FALLBACK_STRIP_SELECTORS,
  READABILITY_STRIP_SELECTORS,
  turndownService,
} from "./constants";
import { logger } from "./logger";
import type {
  ContentDomContext,
  ExtractedDocument,
  ExtractionAttempt,
  ExtractionStrategy,
} from "./types";
import { codePointLength, describeError } from "./utils";

export function collapseBlankLines(markdown: string): string {
  return markdown.replace(BLANK_LINES_REGEX, "\n\n").trim();
}

function removeAll(root: ParentNode, selectors: string): void {
  for (const element of Array.from(root.querySelectorAll(selectors))) {
    element.remove();
  }
}

export function htmlToMarkdown(html: string): string {
  return collapseBlankLines(turndownService.turndown(html));
}

export const readabilityStrategy: ExtractionStrategy = {
  name: "readability",
  extract(
    html: string,
    url: string,
    domContext?: ContentDomContext
  ): ExtractionAttempt {
    const dom = domContext?.readabilityDom ?? new JSDOM(html, { url });
    const article = new Readability(dom.window.document).parse();
    const title = article?.title?.trim() ?? "";
    const content = article?.content;
    if (!content) {
      return { title, body: "" };
    }

    const container = dom.window.document.createElement("div");
    container.innerHTML = content;
    removeAll(container, READABILITY_STRIP_SELECTORS);
    return { title, body: htmlToMarkdown(container.innerHTML) };
  },
};

/**
 * Fallback for wiki portals and index pages readability trims to almost
 * nothing: converts the first matching content container of the raw page.
 * Reports no title.
 */
export const structuralStrategy: ExtractionStrategy = {
  name: "structural",
  extract(html: string, url: string): ExtractionAttempt {
    const document = new JSDOM(html, { url }).window.document;
    const container = FALLBACK_CONTAINER_SELECTORS.map((selector) =>
      document.querySelector(selector)
    ).find((element) => element !== null);
    if (!container) {
      return { body: "" };
    }
    removeAll(container, FALLBACK_STRIP_SELECTORS);
    return { body: htmlToMarkdown(container.outerHTML) };
  },
};

export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  readabilityStrategy,
  structuralStrategy,
];

export interface ExtractOptions {
  minContentChars: number;
  strategies?: readonly ExtractionStrategy[];
  domContext?: ContentDomContext;
}

function runStrategy(
  strategy: ExtractionStrategy,
  html: string,
  url: string,
  domContext?: ContentDomContext
): ExtractionAttempt {
  try {
    return strategy.extract(html, url, domContext);
  } catch (error) {
    logger.debug(
      `Extraction strategy ${strategy.name} failed for ${url}: ${describeError(error)}`
    );
    return { body: "" };
  }
}

export function isViableBody(body: string, minContentChars: number): boolean {
  return codePointLength(body) >= minContentChars;
}

/**
 * Runs the strategies in order and keeps the first body of at least
 * `minContentChars`. When none qualifies the last body is returned and the
 * caller decides to drop the page. The title comes from the first strategy
 * that reports one.
 */
export function extractDocument(
  html: string,
  url: string,
  options: ExtractOptions
): ExtractedDocument {
  const strategies = options.strategies ?? DEFAULT_STRATEGIES;
  let title: string | undefined;
  let body = "";
  let used = "none";

  for (const strategy of strategies) {
    const attempt = runStrategy(strategy, html, url, options.domContext);
    if (title === undefined) {
      title = attempt.title;
    }
    body = collapseBlankLines(attempt.body);
    used = strategy.name;
    if (isViableBody(body, options.minContentChars)) {
      break;
    }
    logger.logFallback(
      `${strategy.name} produced ${codePointLength(body)} chars for ${url}`
    );
  }

  return { title: title ?? "", body, strategy: used };
}

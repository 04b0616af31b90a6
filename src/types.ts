import type { JSDOM } from "jsdom";

export interface CliOptions {
  baseUrl?: string;
  outFile: string;
  delayMs: number;
  maxPages: number;
  timeoutMs: number;
  userAgent: string;
  cookiesFile?: string;
  cookieHeader?: string;
  minTokens: number;
  maxTokens: number;
  minContentChars: number;
  source?: string;
  exclude: string[];
  verbose: boolean;
  progress: boolean;
}

export interface PathRule {
  kind: "contains" | "prefix";
  value: string;
}

export interface PageResponse {
  url: string;
  status: number;
  contentType: string;
  body: string;
}

export type PageFetcher = (url: string) => Promise<PageResponse>;

export interface ExtractionAttempt {
  title?: string;
  body: string;
}

/**
 * Parses of the page the driver already made. `readabilityDom` may be
 * consumed (mutated) by the readability strategy.
 */
export interface ContentDomContext {
  readabilityDom?: JSDOM;
}

export interface ExtractionStrategy {
  name: string;
  extract: (
    html: string,
    url: string,
    domContext?: ContentDomContext
  ) => ExtractionAttempt;
}

export interface ExtractedDocument {
  title: string;
  body: string;
  strategy: string;
}

export interface Section {
  heading: string;
  text: string;
}

export interface PassageMetadata {
  source: string;
  url: string;
  title: string;
  section_path: string;
}

export interface Passage {
  id: string;
  text: string;
  metadata: PassageMetadata;
}

export interface CookieEntry {
  domain: string;
  includeSubdomains: boolean;
  path: string;
  secure: boolean;
  expires: number;
  name: string;
  value: string;
}

export interface CrawlSummary {
  pagesFetched: number;
  pagesWritten: number;
  passagesWritten: number;
  failures: string[];
  interrupted: boolean;
}

import { isCrawlable, tryNormalizeUrl } from "./scope";
import type { PathRule } from "./types";

export type FrontierMode = "sitemap" | "seed";

export interface FrontierOptions {
  baseUrl: string;
  maxPages: number;
  rules: readonly PathRule[];
}

/**
 * FIFO crawl queue plus visited set. A sitemap frontier is fixed at
 * construction and declines every offer; a seed frontier starts from the base
 * URL and grows with the links offered to it. At most `maxPages` entries are
 * ever taken from the queue.
 */
export class Frontier {
  private readonly queue: string[] = [];
  private readonly known = new Set<string>();
  private readonly visited = new Set<string>();
  private position = 0;

  private constructor(
    readonly mode: FrontierMode,
    private readonly options: FrontierOptions
  ) {}

  static fromSitemap(urls: string[], options: FrontierOptions): Frontier {
    const frontier = new Frontier("sitemap", options);
    for (const url of urls) {
      if (isCrawlable(url, options.baseUrl, options.rules)) {
        frontier.enqueue(url);
      }
    }
    return frontier;
  }

  static fromSeed(options: FrontierOptions): Frontier {
    const frontier = new Frontier("seed", options);
    frontier.enqueue(options.baseUrl);
    return frontier;
  }

  /** Only a seed frontier grows from discovered links. */
  get acceptsLinks(): boolean {
    return this.mode === "seed";
  }

  private enqueue(url: string): void {
    this.queue.push(url);
    const normalized = tryNormalizeUrl(url);
    if (normalized) {
      this.known.add(normalized);
    }
  }

  /**
   * Next unvisited canonical URL, marked visited before it is returned.
   * Null once the queue or the page cap is exhausted.
   */
  next(): string | null {
    while (
      this.position < this.queue.length &&
      this.position < this.options.maxPages
    ) {
      const raw = this.queue[this.position];
      this.position += 1;
      if (raw === undefined) {
        continue;
      }
      const url = tryNormalizeUrl(raw);
      if (!url || this.visited.has(url)) {
        continue;
      }
      this.visited.add(url);
      return url;
    }
    return null;
  }

  /**
   * Queues a discovered link. Returns false when the link was declined:
   * sitemap mode, out of scope, excluded, already seen, or queue full.
   */
  offer(candidate: string): boolean {
    if (this.mode === "sitemap") {
      return false;
    }
    if (this.queue.length >= this.options.maxPages) {
      return false;
    }
    const url = tryNormalizeUrl(candidate);
    if (!url || this.known.has(url) || this.visited.has(url)) {
      return false;
    }
    if (!isCrawlable(url, this.options.baseUrl, this.options.rules)) {
      return false;
    }
    this.enqueue(url);
    return true;
  }

  hasVisited(url: string): boolean {
    const normalized = tryNormalizeUrl(url);
    return normalized !== null && this.visited.has(normalized);
  }

  /** Entries that will be taken before the cap stops the crawl. */
  get plannedCount(): number {
    return Math.min(this.queue.length, this.options.maxPages);
  }

  get consumedCount(): number {
    return this.position;
  }

  get visitedCount(): number {
    return this.visited.size;
  }
}

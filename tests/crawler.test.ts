import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test, vi } from "vitest";
import { passageId } from "../src/chunker";
import { DEFAULT_OPTIONS } from "../src/constants";
import { crawlSite } from "../src/crawler";
import type { CliOptions, Passage } from "../src/types";
import { type FakeRoute, createFakeFetcher, paragraph, urlset } from "./helpers";

const BASE = "https://docs.example.com/";
const GUIDE = "https://docs.example.com/guide";
const SENTENCE =
  "The widget service stores configuration in a single file that every node reads at startup.";

const page = (title: string, links: string[]): string => `<!DOCTYPE html>
<html><head><title>${title}</title></head><body>
<nav>${links.map((href) => `<a href="${href}">${href}</a>`).join(" ")}</nav>
<main>
<h1>${title}</h1>
${paragraph(SENTENCE, 4)}
<h2>Details</h2>
${paragraph(SENTENCE, 4)}
</main>
</body></html>`;

async function withTempDir(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "docpassages-crawl-"));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

const crawlOptions = (outFile: string, overrides: Partial<CliOptions> = {}) => ({
  ...DEFAULT_OPTIONS,
  baseUrl: BASE,
  outFile,
  delayMs: 25,
  progress: false,
  ...overrides,
});

async function readPassages(outFile: string): Promise<Passage[]> {
  const content = await readFile(outFile, "utf8");
  return content
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line): Passage => JSON.parse(line));
}

describe("crawlSite", () => {
  test("discovers links from the seed and fetches each page once", async () => {
    await withTempDir(async (dir) => {
      const outFile = path.join(dir, "out", "passages.jsonl");
      const routes: Record<string, FakeRoute> = {
        [BASE]: {
          body: page("Docs Home", [
            "/guide",
            "/guide#install",
            "/wiki/Special:Random",
            "/extensions/Foo/foo.js",
            "https://other.example.com/a",
            "mailto:team@example.com",
          ]),
        },
        [GUIDE]: {
          body: page("Guide", [
            "/",
            "/guide",
            "/missing",
            "/files/manual.pdf",
            "/broken",
          ]),
        },
        "https://docs.example.com/files/manual.pdf": {
          contentType: "application/pdf",
          body: "%PDF-1.7",
        },
        "https://docs.example.com/broken": new Error("connection refused"),
      };
      const { fetchPage, calls } = createFakeFetcher(routes);
      const wait = vi.fn(async (_ms: number) => undefined);

      const summary = await crawlSite(crawlOptions(outFile), { fetchPage, wait });

      expect(calls).toEqual([
        "https://docs.example.com/sitemap.xml",
        "https://docs.example.com/sitemap_index.xml",
        BASE,
        GUIDE,
        "https://docs.example.com/missing",
        "https://docs.example.com/files/manual.pdf",
        "https://docs.example.com/broken",
      ]);
      expect(summary.pagesFetched).toBe(5);
      expect(summary.pagesWritten).toBe(2);
      expect(summary.failures).toEqual([
        "https://docs.example.com/broken: connection refused",
      ]);
      expect(wait).toHaveBeenCalledTimes(4);
      expect(wait).toHaveBeenCalledWith(25);

      const passages = await readPassages(outFile);
      expect(passages).toHaveLength(summary.passagesWritten);
      expect(new Set(passages.map((passage) => passage.metadata.url))).toEqual(
        new Set([BASE, GUIDE])
      );
      for (const passage of passages) {
        expect(passage.id).toBe(passageId(passage.metadata.url, passage.text));
        expect(passage.metadata.source).toBe("docs.example.com");
        expect(passage.text.trim()).toBe(passage.text);
        expect(passage.text.length).toBeGreaterThan(0);
      }
    });
  });

  test("walks the sitemap without following links", async () => {
    await withTempDir(async (dir) => {
      const outFile = path.join(dir, "passages.jsonl");
      const { fetchPage, calls } = createFakeFetcher({
        "https://docs.example.com/sitemap.xml": {
          contentType: "application/xml",
          body: urlset([GUIDE, BASE, "https://other.example.com/x"]),
        },
        [BASE]: { body: page("Docs Home", ["/extra"]) },
        [GUIDE]: { body: page("Guide", ["/extra"]) },
      });

      const summary = await crawlSite(
        crawlOptions(outFile, { source: "Widget Docs" }),
        { fetchPage, wait: async () => undefined }
      );

      expect(calls).toEqual([
        "https://docs.example.com/sitemap.xml",
        BASE,
        GUIDE,
      ]);
      expect(summary.pagesWritten).toBe(2);
      const passages = await readPassages(outFile);
      expect(passages.every((passage) => passage.metadata.source === "Widget Docs")).toBe(
        true
      );
    });
  });

  test("stops at the page cap", async () => {
    await withTempDir(async (dir) => {
      const outFile = path.join(dir, "passages.jsonl");
      const { fetchPage, calls } = createFakeFetcher({
        [BASE]: { body: page("Docs Home", ["/guide"]) },
        [GUIDE]: { body: page("Guide", []) },
      });

      const summary = await crawlSite(crawlOptions(outFile, { maxPages: 1 }), {
        fetchPage,
        wait: async () => undefined,
      });

      expect(calls.slice(2)).toEqual([BASE]);
      expect(summary.pagesFetched).toBe(1);
    });
  });

  test("an abort stops before the next URL and still closes the output", async () => {
    await withTempDir(async (dir) => {
      const outFile = path.join(dir, "passages.jsonl");
      const fake = createFakeFetcher({
        [BASE]: { body: page("Docs Home", ["/guide", "/next"]) },
        [GUIDE]: { body: page("Guide", []) },
        "https://docs.example.com/next": { body: page("Next", []) },
      });
      const controller = new AbortController();
      const fetchPage = async (url: string) => {
        if (url === GUIDE) {
          controller.abort();
        }
        return fake.fetchPage(url);
      };

      const summary = await crawlSite(crawlOptions(outFile), {
        fetchPage,
        wait: async () => undefined,
        signal: controller.signal,
      });

      expect(fake.calls.slice(2)).toEqual([BASE, GUIDE]);
      expect(summary.interrupted).toBe(true);
      expect(summary.pagesWritten).toBe(2);
      const passages = await readPassages(outFile);
      expect(passages).toHaveLength(summary.passagesWritten);
      expect(passages.at(-1)?.metadata.url).toBe(GUIDE);
    });
  });

  test("truncates earlier output and skips thin pages", async () => {
    await withTempDir(async (dir) => {
      const outFile = path.join(dir, "passages.jsonl");
      await writeFile(outFile, '{"id":"stale"}\n', "utf8");
      const { fetchPage } = createFakeFetcher({
        [BASE]: { body: "<html><body><p>Hi</p></body></html>" },
      });

      const summary = await crawlSite(crawlOptions(outFile), {
        fetchPage,
        wait: async () => undefined,
      });

      expect(summary).toEqual({
        pagesFetched: 1,
        pagesWritten: 0,
        passagesWritten: 0,
        failures: [],
        interrupted: false,
      });
      expect(await readFile(outFile, "utf8")).toBe("");
    });
  });
});

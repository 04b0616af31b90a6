import { JSDOM } from "jsdom";
import { describe, expect, test } from "vitest";
import { chunkSections, estimateTokens } from "../src/chunker";
import {
  collapseBlankLines,
  extractDocument,
  htmlToMarkdown,
  isViableBody,
  readabilityStrategy,
  structuralStrategy,
} from "../src/content";
import { splitSections } from "../src/sections";
import type { ExtractionStrategy } from "../src/types";
import { paragraph } from "./helpers";

const PAGE_URL = "https://docs.example.com/guide";
const SENTENCE =
  "Widgets can be configured with a small set of options that control how they render and behave.";

const fakeStrategy = (
  name: string,
  result: { title?: string; body: string },
  calls: string[]
): ExtractionStrategy => ({
  name,
  extract: () => {
    calls.push(name);
    return result;
  },
});

const ARTICLE_HTML = `<!DOCTYPE html>
<html><head><title>Widget Guide</title></head><body>
<nav><a href="/">Home</a> <a href="/guide">Guide</a></nav>
<article>
<h1>Widget Guide</h1>
${paragraph(SENTENCE, 4)}
<h2>Getting started</h2>
${paragraph(SENTENCE, 4)}
<h2>Configuration</h2>
${paragraph(SENTENCE, 4)}
<script>console.log("tracked")</script>
</article>
<footer>Footer links</footer>
</body></html>`;

const TOPICS = [
  ["Installing", "Installing widgets"],
  ["Configuring", "Configuring the widget service"],
  ["Upgrading", "Upgrading between releases"],
  ["Backups", "Backing up widget data"],
  ["Monitoring", "Monitoring widget health"],
  ["Troubleshooting", "Troubleshooting common errors"],
];

const PORTAL_HTML = `<!DOCTYPE html>
<html><head><title>Widget Reference Portal</title></head><body>
<div id="mw-content-text">
<p>Pick a topic from the lists below to get started.</p>
<aside>
<h2>Topics</h2>
<ul>${TOPICS.map(([slug, label]) => `<li><a href="/wiki/${slug}">${label}</a></li>`).join("")}</ul>
</aside>
</div>
</body></html>`;

describe("markdown conversion", () => {
  test("collapses runs of blank lines and trims", () => {
    expect(collapseBlankLines("\n\na\n\n\n\nb\n\n\nc  \n")).toBe("a\n\nb\n\nc");
  });

  test("renders headings as ATX markers", () => {
    expect(
      htmlToMarkdown("<h2>Install</h2><p>Run it.</p><h3>Deep</h3><p>More.</p>")
    ).toBe("## Install\n\nRun it.\n\n### Deep\n\nMore.");
  });

  test("drops wiki edit links next to headings", () => {
    expect(
      htmlToMarkdown(
        '<h2><span class="mw-headline">Setup</span><span class="mw-editsection">[<a href="/edit">edit</a>]</span></h2>'
      )
    ).toBe("## Setup");
  });

  test("keeps link text on one line", () => {
    expect(
      htmlToMarkdown('<p><a href="/x">First\n      Second</a></p>')
    ).toBe("[First Second](/x)");
  });

  test("renders tables as pipe tables", () => {
    expect(
      htmlToMarkdown(
        "<table><tr><th>Name</th><th>Value</th></tr><tr><td>a|b</td><td>1</td></tr></table>"
      )
    ).toBe("| Name | Value |\n| --- | --- |\n| a\\|b | 1 |");
  });

  test("keeps a nested table's text inside its cell", () => {
    expect(
      htmlToMarkdown(
        "<table><tr><th>Key</th><th>Details</th></tr><tr><td>a</td><td><table><tr><td>Inner</td></tr></table></td></tr></table>"
      )
    ).toBe("| Key | Details |\n| --- | --- |\n| a | Inner |");
  });
});

describe("structural strategy", () => {
  test("prefers the wiki content container", () => {
    const html =
      '<html><body><div id="mw-content-text"><p>Wiki text</p></div><main><p>Main text</p></main></body></html>';
    expect(structuralStrategy.extract(html, PAGE_URL)).toEqual({
      body: "Wiki text",
    });
  });

  test("uses main and strips scripts", () => {
    const html =
      "<html><body><nav>Menu</nav><main><p>Main text</p><script>var tracked = 1;</script></main></body></html>";
    expect(structuralStrategy.extract(html, PAGE_URL).body).toBe("Main text");
  });

  test("falls back to the body and strips svg", () => {
    const html =
      "<html><body><p>Only body</p><svg><text>icon</text></svg></body></html>";
    expect(structuralStrategy.extract(html, PAGE_URL).body).toBe("Only body");
  });
});

describe("extractDocument", () => {
  test("stops at the first viable strategy", () => {
    const calls: string[] = [];
    const document = extractDocument("<html></html>", PAGE_URL, {
      minContentChars: 10,
      strategies: [
        fakeStrategy("first", { title: "First", body: "long enough body" }, calls),
        fakeStrategy("second", { body: "unused" }, calls),
      ],
    });
    expect(document).toEqual({
      title: "First",
      body: "long enough body",
      strategy: "first",
    });
    expect(calls).toEqual(["first"]);
  });

  test("falls back but keeps the first strategy's title", () => {
    const calls: string[] = [];
    const document = extractDocument("<html></html>", PAGE_URL, {
      minContentChars: 200,
      strategies: [
        fakeStrategy("heuristic", { title: "", body: "short" }, calls),
        fakeStrategy("fallback", { title: "Ignored", body: "y".repeat(250) }, calls),
      ],
    });
    expect(document.title).toBe("");
    expect(document.body).toBe("y".repeat(250));
    expect(document.strategy).toBe("fallback");
    expect(calls).toEqual(["heuristic", "fallback"]);
  });

  test("returns the last body when nothing is viable", () => {
    const document = extractDocument("<html></html>", PAGE_URL, {
      minContentChars: 200,
      strategies: [
        fakeStrategy("heuristic", { title: "T", body: "tiny" }, []),
        fakeStrategy("fallback", { body: "\n\n\nsmall\n\n\n\nbody\n" }, []),
      ],
    });
    expect(document).toEqual({
      title: "T",
      body: "small\n\nbody",
      strategy: "fallback",
    });
    expect(isViableBody(document.body, 200)).toBe(false);
  });

  test("treats a throwing strategy as empty", () => {
    const failing: ExtractionStrategy = {
      name: "failing",
      extract: () => {
        throw new Error("parser exploded");
      },
    };
    const document = extractDocument("<html></html>", PAGE_URL, {
      minContentChars: 5,
      strategies: [failing, fakeStrategy("backup", { body: "backup body" }, [])],
    });
    expect(document).toEqual({
      title: "",
      body: "backup body",
      strategy: "backup",
    });
  });

  test("extracts an article with readability", () => {
    const document = extractDocument(ARTICLE_HTML, PAGE_URL, {
      minContentChars: 200,
    });
    expect(document.strategy).toBe("readability");
    expect(document.title).toBe("Widget Guide");
    expect(document.body).toContain("## Getting started");
    expect(document.body).toContain("## Configuration");
    expect(document.body).not.toContain("console.log");
  });

  test("falls back to the content container when readability drops the portal lists", () => {
    const document = extractDocument(PORTAL_HTML, "https://wiki.example.com/wiki/Portal", {
      minContentChars: 200,
    });
    expect(document.strategy).toBe("structural");
    expect(document.title).toBe("Widget Reference Portal");
    expect(document.body).toContain("Pick a topic from the lists below to get started.");
    expect(document.body).toContain("## Topics");
    expect(document.body).toContain("[Installing widgets](/wiki/Installing)");
    expect(isViableBody(document.body, 200)).toBe(true);
  });

  test("readability reuses a page the caller already parsed", () => {
    const readabilityDom = new JSDOM(ARTICLE_HTML, { url: PAGE_URL });
    const attempt = readabilityStrategy.extract("<html></html>", PAGE_URL, {
      readabilityDom,
    });
    expect(attempt.title).toBe("Widget Guide");
    expect(attempt.body).toContain("## Getting started");
  });

  test("html with three headings chunks into two passages", () => {
    const html = [
      "<html><body><main>",
      `<h2>One</h2><p>${"a".repeat(392)}</p>`,
      `<h2>Two</h2><p>${"b".repeat(1592)}</p>`,
      `<h2>Three</h2><p>${"c".repeat(1990)}</p>`,
      "</main></body></html>",
    ].join("");

    const document = extractDocument(html, PAGE_URL, {
      minContentChars: 200,
      strategies: [structuralStrategy],
    });
    const sections = splitSections(document.body);
    expect(sections.map((section) => section.heading)).toEqual([
      "One",
      "Two",
      "Three",
    ]);
    expect(sections.map((section) => estimateTokens(section.text))).toEqual([
      100, 400, 500,
    ]);

    const passages = chunkSections(sections, {
      url: PAGE_URL,
      title: document.title,
      source: "docs.example.com",
      minTokens: 250,
      maxTokens: 900,
    });
    expect(passages).toHaveLength(2);
    expect(passages[0]?.text).toBe(
      `## One\n\n${"a".repeat(392)}\n\n## Two\n\n${"b".repeat(1592)}`
    );
    expect(passages[0]?.metadata.section_path).toBe("One");
    expect(passages[1]?.text).toBe(`## Three\n\n${"c".repeat(1990)}`);
  });
});

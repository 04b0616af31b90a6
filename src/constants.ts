import TurndownService from "turndown";
import type { CliOptions, PathRule } from "./types";

export const DEFAULT_OPTIONS: CliOptions = {
  outFile: "passages.jsonl",
  delayMs: 1000,
  maxPages: 5000,
  timeoutMs: 30_000,
  userAgent: "docpassages/1.0",
  minTokens: 250,
  maxTokens: 900,
  minContentChars: 200,
  exclude: [],
  verbose: false,
  progress: true,
};

// MediaWiki special pages and extension assets
export const DEFAULT_EXCLUDE_RULES: readonly PathRule[] = [
  { kind: "contains", value: "Special:" },
  { kind: "prefix", value: "/extensions/" },
];

export const SITEMAP_PATHS = ["/sitemap.xml", "/sitemap_index.xml"] as const;

export const READABILITY_STRIP_SELECTORS = "script, style, noscript";
export const FALLBACK_STRIP_SELECTORS = "script, style, noscript, svg";

// Priority order: wiki content, wiki parser output, generic main, whole body
export const FALLBACK_CONTAINER_SELECTORS = [
  "#mw-content-text",
  ".mw-parser-output",
  "main",
  "body",
] as const;

export const HTML_CONTENT_TYPES = ["text/html", "application/xhtml+xml"];

export const LINE_SPLIT_REGEX = /\r?\n/;
export const BLANK_LINES_REGEX = /\n{3,}/g;
export const HEADING_LINE_REGEX = /^(#{1,6})\s+(.*)$/;
export const SECTION_PATH_SEPARATOR = " > ";
export const PASSAGE_ID_LENGTH = 16;
export const CHARS_PER_TOKEN = 4;

export const turndownService = new TurndownService({
  headingStyle: "atx",
  bulletListMarker: "-",
  codeBlockStyle: "fenced",
});

const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, " ").trim();

const escapeCell = (value: string): string =>
  collapseWhitespace(value).replace(/\|/g, "\\|");

// "[edit]" links next to every MediaWiki heading
turndownService.addRule("wikiEditSections", {
  filter: (node) =>
    node.nodeName === "SPAN" &&
    (node.getAttribute("class") ?? "").split(/\s+/).includes("mw-editsection"),
  replacement: () => "",
});

// A line break inside link text would split a heading line in two
turndownService.addRule("singleLineAnchors", {
  filter: "a",
  replacement(content, node): string {
    const text = collapseWhitespace(node.textContent ?? "") || content.trim();
    const href = node.getAttribute("href");
    if (!text) {
      return "";
    }
    return href ? `[${text}](${href})` : text;
  },
});

const TABLE_SECTIONS = ["THEAD", "TBODY", "TFOOT"];
const TABLE_CELLS = ["TH", "TD"];

// Rows of this table only; nested tables stay inside their cell's text
const collectTableRows = (element: Node, rows: Node[]): void => {
  for (const child of Array.from(element.childNodes)) {
    if (child.nodeName === "TR") {
      rows.push(child);
    } else if (TABLE_SECTIONS.includes(child.nodeName)) {
      collectTableRows(child, rows);
    }
  }
};

const extractCellsFromRow = (row: Node): Node[] =>
  Array.from(row.childNodes).filter((cell) => TABLE_CELLS.includes(cell.nodeName));

turndownService.addRule("tables", {
  filter: "table",
  replacement(content, node): string {
    const tableRows: Node[] = [];
    collectTableRows(node, tableRows);

    const rows: string[][] = [];
    for (const row of tableRows) {
      const cells = extractCellsFromRow(row).map((cell) =>
        escapeCell(cell.textContent ?? "")
      );
      if (cells.length > 0) {
        rows.push(cells);
      }
    }

    const [header, ...body] = rows;
    if (!header) {
      return content;
    }

    const lines = [
      `| ${header.join(" | ")} |`,
      `| ${header.map(() => "---").join(" | ")} |`,
      ...body.map((cells) => `| ${cells.join(" | ")} |`),
    ];
    return `\n\n${lines.join("\n")}\n\n`;
  },
});

turndownService.addRule("strikethrough", {
  filter: ["del", "s"],
  replacement(content): string {
    return `~~${content}~~`;
  },
});

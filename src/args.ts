import { DEFAULT_OPTIONS } from "./constants";
import { logger } from "./logger";
import type { CliOptions } from "./types";
import { parseNonNegativeInt, parsePositiveInt } from "./utils";

export interface ParseResult {
  options: CliOptions;
  showHelp: boolean;
  showVersion: boolean;
}

export function printHelp(): void {
  const lines = [
    "Usage:",
    "  npm start -- <baseUrl> [options]",
    "",
    "Crawls a documentation site (sitemap first, link discovery otherwise) and",
    "writes heading-aware text passages as JSON Lines.",
    "",
    "Options:",
    `  --out <path>             Output file (default ${DEFAULT_OPTIONS.outFile})`,
    `  --delay <ms>             Pause between requests (default ${DEFAULT_OPTIONS.delayMs})`,
    `  --maxPages <n>           Max URLs taken from the frontier (default ${DEFAULT_OPTIONS.maxPages})`,
    `  --timeout <ms>           Per-request timeout (default ${DEFAULT_OPTIONS.timeoutMs})`,
    "  --userAgent <string>     Custom User-Agent header",
    "  --cookies <path>         Netscape cookies.txt file",
    "  --cookieHeader <value>   Raw Cookie header value",
    `  --minTokens <n>          Flush passages at this size (default ${DEFAULT_OPTIONS.minTokens})`,
    `  --maxTokens <n>          Never grow passages past this size (default ${DEFAULT_OPTIONS.maxTokens})`,
    `  --minContentChars <n>    Drop pages with less text (default ${DEFAULT_OPTIONS.minContentChars})`,
    "  --source <label>         Source label in passage metadata (default: host)",
    "  --exclude <pattern>      Extra excluded path (/prefix or substring), repeatable",
    "  --no-progress            Hide the progress bar",
    "  --verbose                Verbose logging",
    "  --version                Print the version",
    "  --help                   Show this help",
    "",
    "Examples:",
    "  npm start -- https://docs.example.com/",
    "  npm start -- https://wiki.example.com/Manual/ --out manual.jsonl --delay 500",
  ];
  console.info(lines.join("\n"));
}

export function parseArgs(args: string[]): ParseResult {
  const opts: CliOptions = { ...DEFAULT_OPTIONS, exclude: [] };

  const iterator = args[Symbol.iterator]();
  const positionalArgs: string[] = [];
  let showHelp = false;
  let showVersion = false;

  const consumeNext = (valueFromEq: string | undefined): string | undefined => {
    if (valueFromEq) {
      return valueFromEq;
    }
    const next = iterator.next();
    return next.done ? undefined : next.value;
  };

  const handlers: Record<string, (valueFromEq: string | undefined) => void> = {
    "--out": (valueFromEq) => {
      opts.outFile = consumeNext(valueFromEq) ?? DEFAULT_OPTIONS.outFile;
    },
    "--delay": (valueFromEq) => {
      opts.delayMs = parseNonNegativeInt(
        consumeNext(valueFromEq),
        DEFAULT_OPTIONS.delayMs
      );
    },
    "--maxPages": (valueFromEq) => {
      opts.maxPages = parsePositiveInt(
        consumeNext(valueFromEq),
        DEFAULT_OPTIONS.maxPages
      );
    },
    "--timeout": (valueFromEq) => {
      opts.timeoutMs = parsePositiveInt(
        consumeNext(valueFromEq),
        DEFAULT_OPTIONS.timeoutMs
      );
    },
    "--userAgent": (valueFromEq) => {
      opts.userAgent = consumeNext(valueFromEq) ?? DEFAULT_OPTIONS.userAgent;
    },
    "--cookies": (valueFromEq) => {
      opts.cookiesFile = consumeNext(valueFromEq);
    },
    "--cookieHeader": (valueFromEq) => {
      opts.cookieHeader = consumeNext(valueFromEq);
    },
    "--minTokens": (valueFromEq) => {
      opts.minTokens = parsePositiveInt(
        consumeNext(valueFromEq),
        DEFAULT_OPTIONS.minTokens
      );
    },
    "--maxTokens": (valueFromEq) => {
      opts.maxTokens = parsePositiveInt(
        consumeNext(valueFromEq),
        DEFAULT_OPTIONS.maxTokens
      );
    },
    "--minContentChars": (valueFromEq) => {
      opts.minContentChars = parseNonNegativeInt(
        consumeNext(valueFromEq),
        DEFAULT_OPTIONS.minContentChars
      );
    },
    "--source": (valueFromEq) => {
      opts.source = consumeNext(valueFromEq);
    },
    "--exclude": (valueFromEq) => {
      const pattern = consumeNext(valueFromEq);
      if (pattern) {
        opts.exclude.push(pattern);
      }
    },
    "--progress": () => {
      opts.progress = true;
    },
    "--no-progress": () => {
      opts.progress = false;
    },
    "--verbose": () => {
      opts.verbose = true;
    },
    "--version": () => {
      showVersion = true;
    },
    "--help": () => {
      showHelp = true;
    },
  };

  for (const arg of iterator) {
    const eqIndex = arg.indexOf("=");
    const flag = arg.startsWith("--") && eqIndex > 0 ? arg.slice(0, eqIndex) : arg;
    const valueFromEq =
      flag === arg ? undefined : arg.slice(eqIndex + 1);
    const handler = handlers[flag];
    if (handler) {
      handler(valueFromEq);
    } else {
      positionalArgs.push(arg);
    }
  }

  const [first, ...rest] = positionalArgs;
  if (first === undefined) {
    if (!showVersion) {
      showHelp = true;
    }
    return { options: opts, showHelp, showVersion };
  }

  try {
    new URL(first);
  } catch {
    throw new Error(`"${first}" is not a valid URL. Provide the base URL to crawl`);
  }
  opts.baseUrl = first;
  if (rest.length > 0) {
    logger.warn(`Ignoring extra positional arguments: ${rest.join(", ")}`);
  }

  return { options: opts, showHelp, showVersion };
}

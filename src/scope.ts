import { DEFAULT_EXCLUDE_RULES } from "./constants";
import type { PathRule } from "./types";

export class InvalidUrlError extends Error {
  constructor(readonly input: string) {
    super(`Invalid URL: ${input}`);
    this.name = "InvalidUrlError";
  }
}

function parseUrl(input: string, base?: string): URL {
  try {
    return new URL(input, base);
  } catch {
    throw new InvalidUrlError(input);
  }
}

/**
 * Canonical form of a URL: fragment removed, query kept as-is (some wikis
 * carry the page title in `?title=`). Relative input needs `base`.
 */
export function normalizeUrl(input: string, base?: string): string {
  const url = parseUrl(input, base);
  url.hash = "";
  return url.toString();
}

export function tryNormalizeUrl(input: string, base?: string): string | null {
  try {
    return normalizeUrl(input, base);
  } catch (error) {
    if (error instanceof InvalidUrlError) {
      return null;
    }
    throw error;
  }
}

export function isInScope(url: string, base: string): boolean {
  try {
    const target = new URL(url);
    const scope = new URL(base);
    return target.protocol === scope.protocol && target.host === scope.host;
  } catch {
    return false;
  }
}

function decodePath(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function matchesRule(rule: PathRule, pathname: string, search: string): boolean {
  if (rule.kind === "prefix") {
    return pathname.startsWith(rule.value);
  }
  return `${pathname}${search}`.includes(rule.value);
}

export function isAllowedPath(
  url: string,
  rules: readonly PathRule[] = DEFAULT_EXCLUDE_RULES
): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  const variants: Array<[string, string]> = [
    [parsed.pathname, parsed.search],
    [decodePath(parsed.pathname), decodePath(parsed.search)],
  ];
  return !rules.some((rule) =>
    variants.some(([pathname, search]) => matchesRule(rule, pathname, search))
  );
}

/**
 * Turns `--exclude` values into rules: a leading slash means a path prefix,
 * anything else is matched as a substring.
 */
export function buildExcludeRules(patterns: readonly string[]): PathRule[] {
  const extra = patterns
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern.length > 0)
    .map<PathRule>((pattern) =>
      pattern.startsWith("/")
        ? { kind: "prefix", value: pattern }
        : { kind: "contains", value: pattern }
    );
  return [...DEFAULT_EXCLUDE_RULES, ...extra];
}

export function isCrawlable(
  url: string,
  base: string,
  rules: readonly PathRule[]
): boolean {
  return isInScope(url, base) && isAllowedPath(url, rules);
}

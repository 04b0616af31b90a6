import { readFile } from "node:fs/promises";
import { LINE_SPLIT_REGEX } from "./constants";
import { logger } from "./logger";
import type { CookieEntry } from "./types";

const HTTP_ONLY_PREFIX = "#HttpOnly_";
const NETSCAPE_FIELD_COUNT = 7;

function parseCookieLine(rawLine: string): CookieEntry | null {
  let line = rawLine.trim();
  if (line.startsWith(HTTP_ONLY_PREFIX)) {
    line = line.slice(HTTP_ONLY_PREFIX.length);
  } else if (!line || line.startsWith("#")) {
    return null;
  }

  const fields = line.split("\t");
  if (fields.length < NETSCAPE_FIELD_COUNT) {
    return null;
  }
  const [domain, includeSubdomains, path, secure, expires, name, value] =
    fields;
  if (!(domain && name) || value === undefined) {
    return null;
  }

  const expiresAt = Number.parseInt(expires ?? "0", 10);
  return {
    domain: domain.toLowerCase(),
    includeSubdomains: includeSubdomains?.toUpperCase() === "TRUE",
    path: path || "/",
    secure: secure?.toUpperCase() === "TRUE",
    expires: Number.isFinite(expiresAt) ? expiresAt : 0,
    name,
    value,
  };
}

/**
 * Parses a Netscape/curl `cookies.txt` file. Comment lines, blank lines and
 * lines with fewer than seven tab-separated fields are skipped.
 */
export function parseCookieJar(text: string): CookieEntry[] {
  const entries: CookieEntry[] = [];
  for (const line of text.split(LINE_SPLIT_REGEX)) {
    const entry = parseCookieLine(line);
    if (entry) {
      entries.push(entry);
    }
  }
  return entries;
}

export async function loadCookieJar(filePath: string): Promise<CookieEntry[]> {
  const text = await readFile(filePath, "utf8");
  const jar = parseCookieJar(text);
  logger.debug(`Loaded ${jar.length} cookie(s) from ${filePath}`);
  return jar;
}

function domainMatches(entry: CookieEntry, hostname: string): boolean {
  const bare = entry.domain.startsWith(".")
    ? entry.domain.slice(1)
    : entry.domain;
  if (hostname === bare) {
    return true;
  }
  const allowsSubdomains =
    entry.includeSubdomains || entry.domain.startsWith(".");
  return allowsSubdomains && hostname.endsWith(`.${bare}`);
}

export function buildCookieHeader(jar: CookieEntry[], targetUrl: string): string {
  const url = new URL(targetUrl);
  const hostname = url.hostname.toLowerCase();
  return jar
    .filter(
      (entry) =>
        domainMatches(entry, hostname) &&
        url.pathname.startsWith(entry.path) &&
        (!entry.secure || url.protocol === "https:")
    )
    .map((entry) => `${entry.name}=${entry.value}`)
    .join("; ");
}

import { tryNormalizeUrl } from "./scope";

const FOLLOWABLE_PROTOCOLS = new Set(["http:", "https:"]);

export function resolveDocumentBaseUrl(document: Document, base: URL): URL {
  const baseHref = document.querySelector("base[href]")?.getAttribute("href");
  if (!baseHref) {
    return base;
  }
  try {
    return new URL(baseHref, base);
  } catch {
    return base;
  }
}

/**
 * Canonical targets of every `a[href]` in document order, without duplicates.
 * Scope and path rules are left to the frontier.
 */
export function extractLinksFromDom(document: Document, pageUrl: string): string[] {
  const base = resolveDocumentBaseUrl(document, new URL(pageUrl)).toString();
  const results = new Set<string>();

  for (const anchor of Array.from(document.querySelectorAll("a[href]"))) {
    const href = anchor.getAttribute("href")?.trim();
    if (!href || href.startsWith("#")) {
      continue;
    }
    const normalized = tryNormalizeUrl(href, base);
    if (!normalized) {
      continue;
    }
    if (!FOLLOWABLE_PROTOCOLS.has(new URL(normalized).protocol)) {
      continue;
    }
    results.add(normalized);
  }

  return Array.from(results);
}

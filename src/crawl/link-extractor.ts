/**
 * Extract outbound links and the declared canonical URL from HTML
 */
import { parseHTML } from 'linkedom';
import { normalizeUrl } from './url-frontier.js';

function toDocument(source: string | Document): Document {
  return typeof source === 'string' ? parseHTML(source).document : source;
}

/**
 * Extract normalized HTTP(S) URLs from <a href> tags, in document order.
 * Relative URLs resolve against the base URL; duplicates keep their first position.
 */
export function extractLinks(source: string | Document, baseUrl: string): string[] {
  const document = toDocument(source);
  const links: string[] = [];
  const seen = new Set<string>();

  for (const anchor of document.querySelectorAll('a[href]')) {
    const href = anchor.getAttribute('href')?.trim();
    if (!href) continue;

    let resolved: string;
    try {
      resolved = new URL(href, baseUrl).href;
    } catch {
      continue;
    }

    const normalized = normalizeUrl(resolved);
    if (normalized && !seen.has(normalized)) {
      seen.add(normalized);
      links.push(normalized);
    }
  }

  return links;
}

/** Absolute, normalized href of the first <link rel="canonical">, if any. */
export function extractCanonical(source: string | Document, baseUrl: string): string | null {
  const document = toDocument(source);

  for (const link of document.querySelectorAll('link[rel][href]')) {
    const rel = (link.getAttribute('rel') ?? '').toLowerCase().split(/\s+/);
    if (!rel.includes('canonical')) continue;

    const href = link.getAttribute('href')?.trim();
    if (!href) continue;

    try {
      return normalizeUrl(new URL(href, baseUrl).href);
    } catch {
      return null;
    }
  }

  return null;
}

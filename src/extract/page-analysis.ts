/**
 * CPU-bound page analysis: one HTML parse yields text, links, canonical URL,
 * declared language and the simhash fingerprint. Runs inline or inside a
 * worker thread (see process/page-worker.ts), so it must stay free of shared state.
 */
import { parseHTML } from 'linkedom';
import { extractCanonical, extractLinks } from '../crawl/link-extractor.js';
import { simhash, type Fingerprint } from '../dedupe/simhash.js';
import { detectDeclaredLanguage } from './language.js';
import { collapseWhitespace, countWords, NON_CONTENT_SELECTORS } from './utils.js';

export interface PageTask {
  url: string;
  html: string;
  shingleSize: number;
}

export interface PageAnalysis {
  canonicalUrl: string | null;
  lang: string | null;
  text: string;
  wordCount: number;
  fingerprint: Fingerprint;
  links: string[];
}

/** Visible text of the document body, without script/style content. */
export function extractText(document: Document): string {
  for (const el of document.querySelectorAll(NON_CONTENT_SELECTORS.join(', '))) {
    el.remove();
  }
  const body = document.body ?? document.documentElement;
  return collapseWhitespace(body?.textContent ?? '');
}

export function analyzePage({ url, html, shingleSize }: PageTask): PageAnalysis {
  const { document } = parseHTML(html);

  // Links and canonical first: text extraction mutates the document.
  const links = extractLinks(document, url);
  const canonicalUrl = extractCanonical(document, url);
  const lang = detectDeclaredLanguage(document);
  const text = extractText(document);

  return {
    canonicalUrl,
    lang,
    text,
    wordCount: countWords(text),
    fingerprint: simhash(text, shingleSize),
    links,
  };
}

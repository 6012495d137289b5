/**
 * Shared test helpers for unit and integration tests.
 *
 * Provides response builders, HTML generators, deterministic text and a
 * scripted HTTP fetcher so crawl tests never touch the network.
 */
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FetchError } from '../errors.js';
import type { FetchRequestOptions, HttpFetcher, HttpResponse } from '../fetch/types.js';
import { seededRandom } from '../fetch/user-agents.js';

// ---------------------------------------------------------------------------
// HTTP response builders
// ---------------------------------------------------------------------------

/** Build an HTML HttpResponse. */
export function makeResponse(
  url: string,
  body: string,
  statusCode = 200,
  contentType: string | undefined = 'text/html; charset=utf-8'
): HttpResponse {
  return { url, statusCode, contentType, body };
}

export type Route =
  | HttpResponse
  | FetchError
  | ((url: string, options: FetchRequestOptions) => Promise<HttpResponse>);

/**
 * Fetcher answering from a URL → route table. Unknown URLs get a 404, which
 * also covers robots.txt lookups.
 */
export class ScriptedFetcher implements HttpFetcher {
  readonly requests: Array<{ url: string; userAgent: string }> = [];

  constructor(private readonly routes: Record<string, Route> = {}) {}

  set(url: string, route: Route): void {
    this.routes[url] = route;
  }

  async get(url: string, options: FetchRequestOptions): Promise<HttpResponse> {
    this.requests.push({ url, userAgent: options.userAgent });
    const route = this.routes[url];
    if (route === undefined) return makeResponse(url, 'not found', 404, 'text/plain');
    if (route instanceof FetchError) throw route;
    if (typeof route === 'function') return route(url, options);
    return route;
  }

  requestedUrls(): string[] {
    return this.requests.map((request) => request.url);
  }
}

// ---------------------------------------------------------------------------
// Content factories
// ---------------------------------------------------------------------------

const SYLLABLES = [
  'ka', 'lo', 'mi', 'ne', 'ru', 'sa', 'ti', 'vo',
  'be', 'du', 'fa', 'gi', 'ho', 'ju', 'ly', 'pe',
];

/** Deterministic pseudo-English text of `wordCount` words. */
export function generateText(seed: number, wordCount: number): string {
  const random = seededRandom(seed);
  const pick = () => SYLLABLES[Math.floor(random.next() * SYLLABLES.length)];
  const words: string[] = [];
  for (let i = 0; i < wordCount; i++) {
    const length = random.next() < 0.5 ? 2 : 3;
    words.push(Array.from({ length }, pick).join(''));
  }
  return words.join(' ');
}

export interface PageOptions {
  lang?: string | null;
  canonical?: string;
  links?: string[];
  title?: string;
}

/** Minimal HTML page around `text`. */
export function makeHtml(text: string, options: PageOptions = {}): string {
  const lang = options.lang === undefined ? 'en' : options.lang;
  const langAttr = lang === null ? '' : ` lang="${lang}"`;
  const canonical = options.canonical
    ? `<link rel="canonical" href="${options.canonical}">`
    : '';
  const links = (options.links ?? []).map((href) => `<a href="${href}">${href}</a>`).join('\n');

  return `<!DOCTYPE html>
<html${langAttr}>
<head><title>${options.title ?? 'Test page'}</title>${canonical}</head>
<body>
<p>${text}</p>
${links}
<script>var tracking = "ignored";</script>
</body>
</html>`;
}

// ---------------------------------------------------------------------------
// Filesystem
// ---------------------------------------------------------------------------

export async function makeTempDir(prefix = 'driftnet-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

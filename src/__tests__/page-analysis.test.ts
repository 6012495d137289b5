import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { parseHTML } from 'linkedom';
import { simhash } from '../dedupe/simhash.js';
import { ParseError } from '../errors.js';
import { createLanguageFilter, detectDeclaredLanguage } from '../extract/language.js';
import { analyzePage, extractText } from '../extract/page-analysis.js';
import { logger } from '../logger.js';
import {
  createPageProcessor,
  InlinePageProcessor,
  ThreadedPageProcessor,
} from '../process/page-processor.js';
import { makeHtml } from './test-helpers.js';

const ANALYSIS_WORKER = new URL('./fixtures/analysis-worker.mjs', import.meta.url);

describe('page analysis', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('analyzePage', () => {
    it('extracts text, word count, language and fingerprint', () => {
      const analysis = analyzePage({
        url: 'https://a.test/page',
        html: makeHtml('Hello brave new world'),
        shingleSize: 3,
      });

      expect(analysis).toEqual({
        canonicalUrl: null,
        lang: 'en',
        text: 'Hello brave new world',
        wordCount: 4,
        fingerprint: simhash('Hello brave new world', 3),
        links: [],
      });
    });

    it('resolves links and the canonical URL against the page URL', () => {
      const analysis = analyzePage({
        url: 'https://a.test/dir/page',
        html: makeHtml('Body text', {
          canonical: '/canon',
          links: ['next', 'https://b.test/x#frag'],
        }),
        shingleSize: 3,
      });

      expect(analysis.canonicalUrl).toBe('https://a.test/canon');
      expect(analysis.links).toEqual(['https://a.test/dir/next', 'https://b.test/x']);
    });

    it('reports no language when the page declares none', () => {
      const analysis = analyzePage({
        url: 'https://a.test/',
        html: makeHtml('text', { lang: null }),
        shingleSize: 3,
      });
      expect(analysis.lang).toBeNull();
    });
  });

  describe('extractText', () => {
    it('drops script, style and noscript content', () => {
      const { document } = parseHTML(
        '<html><body><style>p{}</style><p>Visible</p>\n<noscript>Enable JS</noscript>\n' +
          '<script>var x = 1;</script>\n<p>text</p></body></html>'
      );
      expect(extractText(document)).toBe('Visible text');
    });
  });

  describe('detectDeclaredLanguage', () => {
    it('reads the html lang attribute', () => {
      const { document } = parseHTML('<html lang=" en-GB "><body></body></html>');
      expect(detectDeclaredLanguage(document)).toBe('en-GB');
    });

    it('falls back to the content-language meta tag', () => {
      const { document } = parseHTML(
        '<html><head><meta http-equiv="Content-Language" content="de"></head><body></body></html>'
      );
      expect(detectDeclaredLanguage(document)).toBe('de');
    });

    it('returns null when nothing is declared', () => {
      const { document } = parseHTML('<html><body>text</body></html>');
      expect(detectDeclaredLanguage(document)).toBeNull();
    });
  });

  describe('createLanguageFilter', () => {
    const isEnglish = createLanguageFilter('en');

    it('matches on the primary subtag', () => {
      expect(isEnglish({ lang: 'en-US', text: '' })).toBe(true);
      expect(isEnglish({ lang: 'EN_gb', text: '' })).toBe(true);
      expect(isEnglish({ lang: 'de', text: '' })).toBe(false);
    });

    it('accepts a list containing the target', () => {
      expect(isEnglish({ lang: 'de, en', text: '' })).toBe(true);
    });

    it('rejects pages that declare no language', () => {
      expect(isEnglish({ lang: null, text: 'plain english words' })).toBe(false);
      expect(isEnglish({ lang: '', text: '' })).toBe(false);
    });
  });
});

describe('page processors', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('analyses inline', async () => {
    const processor = new InlinePageProcessor();
    const analysis = await processor.analyze({
      url: 'https://a.test/',
      html: makeHtml('inline text'),
      shingleSize: 3,
    });
    expect(analysis.text).toBe('inline text');
    await processor.close();
  });

  it('falls back to inline analysis when the compiled worker is missing', () => {
    expect(createPageProcessor(0)).toBeInstanceOf(InlinePageProcessor);
    expect(logger.warn).not.toHaveBeenCalled();

    // Sources run from src/, where only page-worker.ts exists.
    expect(createPageProcessor(2)).toBeInstanceOf(InlinePageProcessor);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  describe('ThreadedPageProcessor', () => {
    it('returns the analysis computed by a worker thread', async () => {
      const processor = new ThreadedPageProcessor(1, ANALYSIS_WORKER);
      try {
        const analysis = await processor.analyze({
          url: 'https://a.test/',
          html: 'worker text',
          shingleSize: 3,
        });
        expect(analysis).toEqual({
          canonicalUrl: null,
          lang: 'en',
          text: 'worker text',
          wordCount: 2,
          fingerprint: 42n,
          links: ['https://a.test/'],
        });
      } finally {
        await processor.close();
      }
    });

    it('wraps malformed worker results in ParseError', async () => {
      const processor = new ThreadedPageProcessor(1, ANALYSIS_WORKER);
      try {
        await expect(
          processor.analyze({ url: 'https://a.test/bad', html: 'malformed', shingleSize: 3 })
        ).rejects.toBeInstanceOf(ParseError);
      } finally {
        await processor.close();
      }
    });

    it('wraps worker failures in ParseError', async () => {
      const processor = new ThreadedPageProcessor(1, ANALYSIS_WORKER);
      try {
        await expect(
          processor.analyze({ url: 'https://a.test/boom', html: 'throw', shingleSize: 3 })
        ).rejects.toThrow('Could not parse page https://a.test/boom');
      } finally {
        await processor.close();
      }
    });
  });
});

/**
 * Declared-language detection and the target-language predicate
 */

export interface LanguageSignals {
  /** Language declared by the page, e.g. `en-US`; null when none is declared. */
  lang: string | null;
  text: string;
}

export type LanguagePredicate = (page: LanguageSignals) => boolean;

/**
 * Language declared by `<html lang>` (or `xml:lang`), falling back to
 * `<meta http-equiv="content-language">`.
 */
export function detectDeclaredLanguage(document: Document): string | null {
  const root = document.documentElement;
  const htmlLang = root?.getAttribute('lang') ?? root?.getAttribute('xml:lang');
  if (htmlLang?.trim()) return htmlLang.trim();

  for (const meta of document.querySelectorAll('meta[http-equiv]')) {
    if (meta.getAttribute('http-equiv')?.toLowerCase() !== 'content-language') continue;
    const content = meta.getAttribute('content')?.trim();
    if (content) return content;
  }

  return null;
}

/**
 * Accept pages whose declared language has `target` as its primary subtag.
 * A meta value may list several languages (`de, en`); any match accepts.
 * Pages that declare nothing are rejected.
 */
export function createLanguageFilter(target: string): LanguagePredicate {
  const wanted = target.toLowerCase();

  return ({ lang }) => {
    if (!lang) return false;
    return lang
      .split(',')
      .map((tag) => tag.trim().toLowerCase().split(/[-_]/)[0])
      .some((primary) => primary === wanted);
  };
}

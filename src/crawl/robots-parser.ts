/**
 * Parse robots.txt and evaluate Allow/Disallow rules for the crawler's identity
 */
import { logger } from '../logger.js';

export interface RobotsRule {
  allow: boolean;
  pattern: string;
}

export interface RobotsRules {
  rules: RobotsRule[];
}

export type TextFetchFn = (url: string) => Promise<{ ok: boolean; text: string } | null>;

interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
}

const MAX_CACHED_ORIGINS = 10_000;

/**
 * Parse robots.txt content into the rules that apply to `userAgent`.
 *
 * Groups naming a token contained in the user agent win over `*`; among those,
 * the longest token wins. Groups for the same agent are merged.
 */
export function parseRobotsTxt(content: string, userAgent: string): RobotsRules {
  const groups: RobotsGroup[] = [];
  let current: RobotsGroup | null = null;
  let lastWasAgent = false;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    const field = line.slice(0, colonIdx).trim().toLowerCase();
    const value = line.slice(colonIdx + 1).trim();

    if (field === 'user-agent') {
      if (!current || !lastWasAgent) {
        current = { agents: [], rules: [] };
        groups.push(current);
      }
      current.agents.push(value.toLowerCase());
      lastWasAgent = true;
      continue;
    }
    lastWasAgent = false;

    if ((field === 'allow' || field === 'disallow') && current && value) {
      current.rules.push({ allow: field === 'allow', pattern: value });
    }
  }

  return { rules: selectRules(groups, userAgent.toLowerCase()) };
}

function selectRules(groups: RobotsGroup[], userAgent: string): RobotsRule[] {
  let bestLength = 0;
  let best: RobotsRule[] = [];
  const wildcard: RobotsRule[] = [];

  for (const group of groups) {
    for (const agent of group.agents) {
      if (agent === '*') {
        wildcard.push(...group.rules);
      } else if (userAgent.includes(agent)) {
        if (agent.length > bestLength) {
          bestLength = agent.length;
          best = [...group.rules];
        } else if (agent.length === bestLength) {
          best.push(...group.rules);
        }
      }
    }
  }

  return bestLength > 0 ? best : wildcard;
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}${anchored ? '$' : ''}`);
}

/**
 * Check a URL path (with query string) against robots rules.
 * The longest matching pattern decides; Allow wins a tie.
 */
export function isAllowedByRobots(urlPath: string, rules: RobotsRule[]): boolean {
  let matchLength = -1;
  let allowed = true;

  for (const rule of rules) {
    if (!patternToRegExp(rule.pattern).test(urlPath)) continue;
    const length = rule.pattern.length;
    if (length > matchLength || (length === matchLength && rule.allow)) {
      matchLength = length;
      allowed = rule.allow;
    }
  }

  return allowed;
}

/**
 * Fetch and parse robots.txt for a given origin.
 * Returns null if robots.txt is not found or cannot be fetched.
 */
export async function fetchRobotsTxt(
  origin: string,
  userAgent: string,
  fetchFn: TextFetchFn
): Promise<RobotsRules | null> {
  try {
    const response = await fetchFn(`${origin}/robots.txt`);
    if (!response?.ok || !response.text) return null;

    const rules = parseRobotsTxt(response.text, userAgent);
    logger.debug({ origin, ruleCount: rules.rules.length }, 'Parsed robots.txt');
    return rules;
  } catch (e) {
    logger.debug({ origin, error: String(e) }, 'Failed to fetch robots.txt');
    return null;
  }
}

/**
 * Per-origin cache of robots rules. Concurrent lookups for the same origin
 * share one fetch.
 */
export class RobotsPolicy {
  private cache = new Map<string, Promise<RobotsRules | null>>();

  constructor(
    private readonly userAgent: string,
    private readonly fetchFn: TextFetchFn
  ) {}

  async isAllowed(url: string): Promise<boolean> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }

    const rules = await this.rulesFor(parsed.origin);
    if (!rules) return true;
    return isAllowedByRobots(parsed.pathname + parsed.search, rules.rules);
  }

  /** Number of origins with cached rules. */
  get cachedOrigins(): number {
    return this.cache.size;
  }

  private rulesFor(origin: string): Promise<RobotsRules | null> {
    const cached = this.cache.get(origin);
    if (cached) return cached;

    if (this.cache.size >= MAX_CACHED_ORIGINS) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }

    const pending = fetchRobotsTxt(origin, this.userAgent, this.fetchFn);
    this.cache.set(origin, pending);
    return pending;
  }
}

/**
 * Crawl module barrel exports
 */
export { CrawlOrchestrator } from './crawler.js';
export type {
  CrawlDependencies,
  CrawlOptions,
  PageOutcome,
  PageSink,
  StateSaver,
} from './crawler.js';
export { HostLimiter } from './host-limiter.js';
export { UrlFrontier, normalizeUrl } from './url-frontier.js';
export type {
  FrontierFullPolicy,
  FrontierOptions,
  RestoreOptions,
  RobotsGate,
} from './url-frontier.js';
export { RobotsPolicy, parseRobotsTxt, isAllowedByRobots, fetchRobotsTxt } from './robots-parser.js';
export { extractLinks, extractCanonical } from './link-extractor.js';
export { createCrawlSession, loadCrawlStatus, robotsFetch } from './session.js';
export type { CrawlSession, CrawlStatus, SessionOverrides } from './session.js';
export type {
  CrawlSummary,
  FailedUrl,
  FrontierSnapshot,
  StopReason,
  UrlRecord,
  UrlStatus,
} from './types.js';

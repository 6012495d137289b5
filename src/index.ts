/**
 * driftnet - resumable, polite, duplicate-aware web crawler.
 *
 * @module driftnet
 */
export { loadConfig, parseConfig, readEnvConfig, CrawlConfigSchema } from './config.js';
export type { CrawlConfig, CrawlConfigInput, LoadConfigOptions } from './config.js';
export {
  CrawlOrchestrator,
  HostLimiter,
  UrlFrontier,
  normalizeUrl,
  RobotsPolicy,
  parseRobotsTxt,
  isAllowedByRobots,
  extractLinks,
  extractCanonical,
  createCrawlSession,
  loadCrawlStatus,
} from './crawl/index.js';
export type {
  CrawlDependencies,
  CrawlOptions,
  CrawlSession,
  CrawlStatus,
  CrawlSummary,
  FrontierOptions,
  FrontierSnapshot,
  PageOutcome,
  PageSink,
  StateSaver,
  StopReason,
  UrlRecord,
  UrlStatus,
} from './crawl/index.js';
export { DuplicateDetector } from './dedupe/duplicate-detector.js';
export type { DuplicateDetectorOptions, DuplicateIndexSnapshot } from './dedupe/duplicate-detector.js';
export { simhash, hammingDistance, fingerprintToHex, fingerprintFromHex } from './dedupe/simhash.js';
export type { Fingerprint } from './dedupe/simhash.js';
export { analyzePage } from './extract/page-analysis.js';
export type { PageAnalysis, PageTask } from './extract/page-analysis.js';
export { createLanguageFilter, detectDeclaredLanguage } from './extract/language.js';
export { createHttpClient } from './fetch/http-client.js';
export { validateResponse } from './fetch/content-validator.js';
export { UserAgentPool, DEFAULT_USER_AGENTS, seededRandom } from './fetch/user-agents.js';
export type { HttpFetcher, HttpResponse, ValidationResult } from './fetch/types.js';
export { PageWriter, pageFileKey } from './persist/page-writer.js';
export { Snapshotter } from './persist/snapshotter.js';
export { StateStore, writeJsonAtomic } from './persist/state-store.js';
export type { PageRecord, UrlMap } from './persist/state-store.js';
export { createPageProcessor, InlinePageProcessor, ThreadedPageProcessor } from './process/page-processor.js';
export type { PageProcessor } from './process/page-processor.js';
export {
  CrawlError,
  FetchError,
  ParseError,
  InvalidTransitionError,
  StateIOError,
  ConfigError,
} from './errors.js';

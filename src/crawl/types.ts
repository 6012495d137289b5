/**
 * Types for the crawl module
 */

export type UrlStatus = 'queued' | 'in-flight' | 'visited' | 'failed';

export interface UrlRecord {
  url: string;
  status: UrlStatus;
  /** epoch milliseconds */
  discoveredAt: number;
}

export interface FailedUrl {
  url: string;
  reason: string;
}

export interface FrontierSnapshot {
  version: 1;
  savedAt: string;
  pending: Array<Pick<UrlRecord, 'url' | 'discoveredAt'>>;
  visited: string[];
  failed: FailedUrl[];
}

export type StopReason =
  | 'target_reached'
  | 'frontier_exhausted'
  | 'interrupted'
  | 'invariant_violation';

export interface CrawlSummary {
  type: 'summary';
  stopReason: StopReason;
  pagesAccepted: number;
  pagesDuplicate: number;
  pagesFiltered: number;
  pagesRedirected: number;
  pagesFailed: number;
  pending: number;
  visited: number;
  failed: number;
  durationMs: number;
}

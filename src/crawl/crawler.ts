/**
 * Crawl orchestrator: a fixed set of worker loops pulling from the frontier.
 *
 * Each loop takes a URL, fetches it, classifies the response, hands the HTML
 * to the page processor, checks the fingerprint against the duplicate index
 * and, for accepted pages, waits for the write and feeds extracted links back
 * to the frontier. Link feeding runs detached from the worker so a full
 * frontier suspends the feeder instead of the loop that would otherwise drain
 * it. Links found after shutdown began are retained for the next run.
 */
import { setTimeout as sleep } from 'node:timers/promises';
import type { DuplicateDetector } from '../dedupe/duplicate-detector.js';
import { failureReason, InvalidTransitionError } from '../errors.js';
import type { LanguagePredicate } from '../extract/language.js';
import { validateResponse } from '../fetch/content-validator.js';
import type { HttpFetcher, HttpResponse } from '../fetch/types.js';
import { UserAgentPool } from '../fetch/user-agents.js';
import { logger } from '../logger.js';
import type { PageWriteRequest } from '../persist/page-writer.js';
import type { PageProcessor } from '../process/page-processor.js';
import { HostLimiter } from './host-limiter.js';
import type { CrawlSummary, StopReason } from './types.js';
import type { UrlFrontier } from './url-frontier.js';

/** Where accepted pages go. Implemented by PageWriter. */
export interface PageSink {
  /** Resolves true once the page is saved, false when it could not be. */
  enqueue(page: PageWriteRequest): Promise<boolean>;
  close(): Promise<void>;
}

/** Periodic state saving. Implemented by Snapshotter. */
export interface StateSaver {
  start(): void;
  saveNow(): Promise<void>;
  stop(): Promise<void>;
}

export interface CrawlDependencies {
  frontier: UrlFrontier;
  detector: DuplicateDetector;
  fetcher: HttpFetcher;
  processor: PageProcessor;
  writer: PageSink;
  snapshotter?: StateSaver | null;
  userAgents?: UserAgentPool;
  isTargetLanguage?: LanguagePredicate;
  /** Whether a page declaring `canonical` should be skipped in its favour. */
  isCanonicalRedirect?: (canonical: string, fetchedUrl: string) => boolean;
}

export interface CrawlOptions {
  numWorkers: number;
  targetPages: number;
  /** How long shutdown waits for in-flight pages before aborting fetches. */
  drainTimeoutMs?: number;
  /** Pages with fewer words are skipped; 0 disables the check. */
  minWords?: number;
  /** Pause before every request. */
  requestDelayMs?: number;
  /** Requests allowed against one host at a time; unlimited when omitted. */
  maxConnectionsPerHost?: number;
}

export type PageOutcome =
  | { kind: 'failed'; reason: string }
  | { kind: 'aborted' }
  | { kind: 'redirected'; canonicalUrl: string }
  | { kind: 'filtered'; reason: 'language' | 'too_short' }
  | { kind: 'duplicate' }
  | { kind: 'accepted'; page: PageWriteRequest; links: string[] };

const DEFAULT_DRAIN_TIMEOUT_MS = 15_000;

const acceptAll: LanguagePredicate = () => true;
const differsFromFetched = (canonical: string, fetchedUrl: string): boolean =>
  canonical !== fetchedUrl;

export class CrawlOrchestrator {
  private readonly frontier: UrlFrontier;
  private readonly userAgents: UserAgentPool;
  private readonly isTargetLanguage: LanguagePredicate;
  private readonly isCanonicalRedirect: (canonical: string, fetchedUrl: string) => boolean;
  private readonly drainTimeoutMs: number;
  private readonly minWords: number;
  private readonly requestDelayMs: number;
  private readonly hostLimiter: HostLimiter | null;

  private readonly controllers = new Set<AbortController>();
  private readonly feeds = new Set<Promise<void>>();
  private readonly stopped: Promise<void>;
  private signalStop: () => void = () => undefined;

  private stopReason: StopReason | null = null;
  private fatalError: InvalidTransitionError | null = null;
  private running = false;

  private pagesAccepted = 0;
  private pagesDuplicate = 0;
  private pagesFiltered = 0;
  private pagesRedirected = 0;
  private pagesFailed = 0;

  constructor(
    private readonly deps: CrawlDependencies,
    private readonly options: CrawlOptions
  ) {
    if (!Number.isInteger(options.numWorkers) || options.numWorkers < 1) {
      throw new RangeError(`numWorkers must be a positive integer, got ${options.numWorkers}`);
    }
    this.frontier = deps.frontier;
    this.userAgents = deps.userAgents ?? new UserAgentPool();
    this.isTargetLanguage = deps.isTargetLanguage ?? acceptAll;
    this.isCanonicalRedirect = deps.isCanonicalRedirect ?? differsFromFetched;
    this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
    this.minWords = options.minWords ?? 0;
    this.requestDelayMs = options.requestDelayMs ?? 0;
    this.hostLimiter =
      options.maxConnectionsPerHost === undefined
        ? null
        : new HostLimiter(options.maxConnectionsPerHost);
    this.stopped = new Promise<void>((resolve) => {
      this.signalStop = resolve;
    });
  }

  /**
   * Run until the target is reached, the frontier is exhausted, stop() is
   * called or a frontier invariant breaks. The final snapshot is written
   * before this resolves; an invariant violation is rethrown after it.
   */
  async run(): Promise<CrawlSummary> {
    if (this.running) throw new Error('CrawlOrchestrator.run() called twice');
    this.running = true;
    const startedAt = Date.now();

    logger.info(
      {
        numWorkers: this.options.numWorkers,
        targetPages: this.options.targetPages,
        pending: this.frontier.size(),
        visited: this.frontier.visitedCount,
      },
      'Crawl started'
    );

    this.deps.snapshotter?.start();
    this.checkExhausted();

    const workers = Promise.all(
      Array.from({ length: this.options.numWorkers }, (_, id) => this.workerLoop(id))
    );

    await this.stopped;
    await this.drain(workers);
    await this.shutdown();

    const summary: CrawlSummary = {
      type: 'summary',
      stopReason: this.stopReason ?? 'interrupted',
      pagesAccepted: this.pagesAccepted,
      pagesDuplicate: this.pagesDuplicate,
      pagesFiltered: this.pagesFiltered,
      pagesRedirected: this.pagesRedirected,
      pagesFailed: this.pagesFailed,
      pending: this.frontier.size() + this.frontier.inFlightCount,
      visited: this.frontier.visitedCount,
      failed: this.frontier.failedCount,
      durationMs: Date.now() - startedAt,
    };
    logger.info(summary, 'Crawl finished');

    if (this.fatalError) throw this.fatalError;
    return summary;
  }

  /** Begin graceful shutdown. The first reason given wins. */
  stop(reason: StopReason = 'interrupted'): void {
    if (this.stopReason) return;
    this.stopReason = reason;
    logger.info(
      { reason, accepted: this.pagesAccepted, inFlight: this.frontier.inFlightCount },
      'Stopping crawl'
    );
    this.frontier.close();
    this.signalStop();
  }

  get acceptedCount(): number {
    return this.pagesAccepted;
  }

  get pendingFeeds(): number {
    return this.feeds.size;
  }

  private async workerLoop(id: number): Promise<void> {
    for (;;) {
      const entry = await this.frontier.take();
      if (entry === null) break;

      try {
        const outcome = await this.crawlPage(entry.url);
        await this.settle(entry.url, outcome);
      } catch (error) {
        if (error instanceof InvalidTransitionError) {
          this.fatalError ??= error;
          logger.error(
            { worker: id, url: entry.url, error: error.message },
            'Frontier invariant violated'
          );
          this.stop('invariant_violation');
          break;
        }
        logger.error(
          { worker: id, url: entry.url, error: String(error) },
          'Unexpected error in worker'
        );
        if (this.frontier.status(entry.url) === 'in-flight') {
          this.frontier.markFailed(entry.url, failureReason(error));
          this.pagesFailed++;
        }
      }

      this.checkExhausted();
    }
    logger.debug({ worker: id }, 'Worker exited');
  }

  /** Fetch, classify and fingerprint one URL. Never touches the frontier. */
  private async crawlPage(url: string): Promise<PageOutcome> {
    const controller = new AbortController();
    this.controllers.add(controller);
    try {
      const response = await this.fetchPage(url, controller.signal);

      const validation = validateResponse(response.statusCode, response.contentType);
      if (!validation.valid) {
        return { kind: 'failed', reason: validation.reason ?? 'invalid_response' };
      }

      const analysis = await this.deps.processor.analyze({
        url: response.url,
        html: response.body,
        shingleSize: this.deps.detector.shingleSize,
      });

      if (analysis.canonicalUrl && this.isCanonicalRedirect(analysis.canonicalUrl, url)) {
        return { kind: 'redirected', canonicalUrl: analysis.canonicalUrl };
      }
      if (!this.isTargetLanguage({ lang: analysis.lang, text: analysis.text })) {
        return { kind: 'filtered', reason: 'language' };
      }
      if (this.minWords > 0 && analysis.wordCount < this.minWords) {
        return { kind: 'filtered', reason: 'too_short' };
      }
      if (!this.deps.detector.admit(analysis.fingerprint)) {
        return { kind: 'duplicate' };
      }

      return {
        kind: 'accepted',
        page: { url, html: response.body, fingerprint: analysis.fingerprint },
        links: analysis.links,
      };
    } catch (error) {
      if (controller.signal.aborted) return { kind: 'aborted' };
      return { kind: 'failed', reason: failureReason(error) };
    } finally {
      this.controllers.delete(controller);
    }
  }

  /** Delay and GET inside the host's connection slot. */
  private fetchPage(url: string, signal: AbortSignal): Promise<HttpResponse> {
    const request = async (): Promise<HttpResponse> => {
      signal.throwIfAborted();
      if (this.requestDelayMs > 0) {
        await sleep(this.requestDelayMs, undefined, { signal });
      }
      return this.deps.fetcher.get(url, { userAgent: this.userAgents.pick(), signal });
    };
    return this.hostLimiter ? this.hostLimiter.run(url, request) : request();
  }

  /** Apply an outcome to the frontier and the counters. */
  private async settle(url: string, outcome: PageOutcome): Promise<void> {
    switch (outcome.kind) {
      case 'aborted':
        // Stays in flight; the snapshot puts it back at the head of pending.
        logger.debug({ url }, 'Fetch aborted during shutdown');
        return;

      case 'failed':
        this.frontier.markFailed(url, outcome.reason);
        this.pagesFailed++;
        logger.debug({ url, reason: outcome.reason }, 'Page failed');
        return;

      case 'redirected':
        this.frontier.markVisited(url);
        this.pagesRedirected++;
        logger.debug({ url, canonical: outcome.canonicalUrl }, 'Following canonical link');
        this.feed([outcome.canonicalUrl]);
        return;

      case 'filtered':
        this.frontier.markVisited(url);
        this.pagesFiltered++;
        logger.debug({ url, reason: outcome.reason }, 'Page filtered');
        return;

      case 'duplicate':
        this.frontier.markVisited(url);
        this.pagesDuplicate++;
        logger.debug({ url }, 'Near-duplicate page skipped');
        return;

      case 'accepted': {
        const { fingerprint } = outcome.page;
        const saved = await this.deps.writer.enqueue(outcome.page).catch((error: unknown) => {
          logger.error({ url, error: String(error) }, 'Failed to queue page for writing');
          return false;
        });
        if (!saved) {
          this.deps.detector.discard(fingerprint);
          this.frontier.markFailed(url, 'write_error');
          this.pagesFailed++;
          return;
        }

        this.frontier.markVisited(url);
        this.deps.detector.commit(fingerprint);
        this.pagesAccepted++;
        logger.info(
          { url, accepted: this.pagesAccepted, links: outcome.links.length },
          'Page accepted'
        );
        if (this.pagesAccepted >= this.options.targetPages) {
          this.stop('target_reached');
        }
        this.feed(outcome.links);
        return;
      }
    }
  }

  /** Add links to the frontier in order, tracked so exhaustion waits for them. */
  private feed(links: string[]): void {
    if (links.length === 0) return;

    const task: Promise<void> = this.addLinks(links)
      .catch((error: unknown) => {
        logger.error({ error: String(error) }, 'Failed to feed links to the frontier');
      })
      .finally(() => {
        this.feeds.delete(task);
        this.checkExhausted();
      });
    this.feeds.add(task);
  }

  private async addLinks(links: string[]): Promise<void> {
    let added = 0;
    let retained = 0;
    for (const link of links) {
      if (await this.frontier.add(link)) {
        added++;
      } else if (this.frontier.isClosed && (await this.frontier.retain(link))) {
        retained++;
      }
    }
    logger.debug({ offered: links.length, added, retained }, 'Fed links to frontier');
  }

  private checkExhausted(): void {
    if (this.stopReason) return;
    if (this.frontier.isEmpty() && this.frontier.inFlightCount === 0 && this.feeds.size === 0) {
      this.stop('frontier_exhausted');
    }
  }

  /** Wait for workers up to the drain timeout, then abort their fetches. */
  private async drain(workers: Promise<void[]>): Promise<void> {
    const finished = await new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), this.drainTimeoutMs);
      workers.then(
        () => {
          clearTimeout(timer);
          resolve(true);
        },
        () => {
          clearTimeout(timer);
          resolve(true);
        }
      );
    });

    if (!finished) {
      logger.warn(
        { inFlight: this.controllers.size, drainTimeoutMs: this.drainTimeoutMs },
        'Drain timeout reached; aborting in-flight fetches'
      );
      for (const controller of this.controllers) controller.abort();
    }
    await workers;
    await Promise.all(this.feeds);
  }

  private async shutdown(): Promise<void> {
    await this.deps.writer.close();
    await this.deps.processor.close();

    const snapshotter = this.deps.snapshotter;
    if (snapshotter) {
      await snapshotter.stop();
      await snapshotter.saveNow();
    }
  }
}

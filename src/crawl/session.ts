/**
 * Wires a crawl from configuration: HTTP client, robots policy, frontier,
 * duplicate index, page writer, page processor and snapshotter. Saved state
 * in the state folder is restored before the seeds are added.
 */
import type { CrawlConfig } from '../config.js';
import { DuplicateDetector } from '../dedupe/duplicate-detector.js';
import { createLanguageFilter } from '../extract/language.js';
import { createHttpClient } from '../fetch/http-client.js';
import type { HttpFetcher } from '../fetch/types.js';
import { mathRandom, UserAgentPool, type RandomSource } from '../fetch/user-agents.js';
import { logger } from '../logger.js';
import { PageWriter } from '../persist/page-writer.js';
import { Snapshotter } from '../persist/snapshotter.js';
import { loadUrlMap, StateStore } from '../persist/state-store.js';
import { createPageProcessor, type PageProcessor } from '../process/page-processor.js';
import { CrawlOrchestrator } from './crawler.js';
import { RobotsPolicy, type TextFetchFn } from './robots-parser.js';
import { UrlFrontier } from './url-frontier.js';

export interface SessionOverrides {
  fetcher?: HttpFetcher;
  processor?: PageProcessor;
  random?: RandomSource;
}

export interface CrawlSession {
  orchestrator: CrawlOrchestrator;
  frontier: UrlFrontier;
  detector: DuplicateDetector;
  writer: PageWriter;
  processor: PageProcessor;
  store: StateStore;
  /** True when saved frontier state was restored. */
  resumed: boolean;
  seedsAdded: number;
}

export interface CrawlStatus {
  savedAt: string | null;
  pending: number;
  visited: number;
  failed: number;
  fingerprints: number;
  pages: number;
}

/** robots.txt fetches go through the same client, under the crawler's own identity. */
export function robotsFetch(fetcher: HttpFetcher, userAgent: string): TextFetchFn {
  return async (url) => {
    const response = await fetcher.get(url, { userAgent });
    return {
      ok: response.statusCode >= 200 && response.statusCode < 300,
      text: response.body,
    };
  };
}

export async function createCrawlSession(
  config: CrawlConfig,
  overrides: SessionOverrides = {}
): Promise<CrawlSession> {
  const fetcher =
    overrides.fetcher ??
    createHttpClient({
      timeoutMs: config.requestTimeoutMs,
      maxRedirects: config.maxRedirects,
      maxResponseBytes: config.maxResponseBytes,
    });

  const robots = config.disableRobots
    ? null
    : new RobotsPolicy(config.robotsUserAgent, robotsFetch(fetcher, config.robotsUserAgent));

  const frontier = new UrlFrontier({
    maxSize: config.frontierMaxSize,
    fullPolicy: config.frontierFullPolicy,
    include: config.include,
    exclude: config.exclude,
    robots,
  });

  const detector = new DuplicateDetector({
    hammingThreshold: config.hammingThreshold,
    bandCount: config.bandCount,
    shingleSize: config.shingleSize,
  });

  const store = new StateStore(config.stateFolder);
  const [frontierSnapshot, indexSnapshot] = await Promise.all([
    store.loadFrontier(),
    store.loadDuplicateIndex(),
  ]);

  if (frontierSnapshot) {
    frontier.restore(frontierSnapshot, { requeueFailed: config.retryFailedOnResume });
    logger.info(
      {
        savedAt: frontierSnapshot.savedAt,
        pending: frontier.size(),
        visited: frontier.visitedCount,
        failed: frontier.failedCount,
      },
      'Resuming from saved frontier'
    );
  }
  if (indexSnapshot) {
    detector.restore(indexSnapshot);
    logger.info({ fingerprints: detector.size }, 'Restored duplicate index');
  }

  let seedsAdded = 0;
  for (const seed of config.seeds) {
    // Nothing drains the frontier yet, so a blocking add would never return.
    if (config.frontierMaxSize !== undefined && frontier.size() >= config.frontierMaxSize) {
      logger.warn(
        { seed, frontierMaxSize: config.frontierMaxSize },
        'Frontier full; seed skipped'
      );
      continue;
    }
    if (await frontier.add(seed)) seedsAdded++;
  }
  logger.info({ seeds: config.seeds.length, added: seedsAdded }, 'Seeds queued');

  const writer = new PageWriter({
    dataFolder: config.dataFolder,
    urlMapFile: config.urlMapFile,
    capacity: config.writeQueueCapacity,
  });
  await writer.start();

  const processor = overrides.processor ?? createPageProcessor(config.parseThreads);
  const snapshotter = new Snapshotter({
    store,
    frontier,
    detector,
    saveInterval: config.saveInterval,
  });

  const orchestrator = new CrawlOrchestrator(
    {
      frontier,
      detector,
      fetcher,
      processor,
      writer,
      snapshotter,
      userAgents: new UserAgentPool(config.userAgents, overrides.random ?? mathRandom),
      isTargetLanguage: createLanguageFilter(config.targetLanguage),
    },
    {
      numWorkers: config.numWorkers,
      targetPages: config.targetPages,
      drainTimeoutMs: config.drainTimeoutMs,
      minWords: config.minWords,
      requestDelayMs: config.requestDelayMs,
      maxConnectionsPerHost: config.maxConnectionsPerHost,
    }
  );

  return {
    orchestrator,
    frontier,
    detector,
    writer,
    processor,
    store,
    resumed: frontierSnapshot !== null,
    seedsAdded,
  };
}

/** Counts from the saved state, without starting a crawl. */
export async function loadCrawlStatus(
  config: Pick<CrawlConfig, 'stateFolder' | 'urlMapFile'>
): Promise<CrawlStatus> {
  const store = new StateStore(config.stateFolder);
  const [frontier, index, urlMap] = await Promise.all([
    store.loadFrontier(),
    store.loadDuplicateIndex(),
    loadUrlMap(config.urlMapFile),
  ]);

  return {
    savedAt: frontier?.savedAt ?? null,
    pending: frontier?.pending.length ?? 0,
    visited: frontier?.visited.length ?? 0,
    failed: frontier?.failed.length ?? 0,
    fingerprints: index?.fingerprints.length ?? 0,
    pages: urlMap ? Object.keys(urlMap).length : 0,
  };
}

/**
 * Page analysis behind one interface: inline on the event loop, or offloaded
 * to a worker_threads pool so parsing never stalls fetch scheduling.
 */
import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ParseError } from '../errors.js';
import { analyzePage, type PageAnalysis, type PageTask } from '../extract/page-analysis.js';
import { logger } from '../logger.js';
import { WorkerPool } from './worker-pool.js';

export interface PageProcessor {
  analyze(task: PageTask): Promise<PageAnalysis>;
  close(): Promise<void>;
}

/** Compiled worker entry; only present in the build output. */
export const PAGE_WORKER_URL = new URL('./page-worker.js', import.meta.url);

const PageAnalysisSchema = z.object({
  canonicalUrl: z.string().nullable(),
  lang: z.string().nullable(),
  text: z.string(),
  wordCount: z.number().int().nonnegative(),
  fingerprint: z.bigint(),
  links: z.array(z.string()),
});

/** Runs analysis on the calling thread. Used for tests and `parseThreads: 0`. */
export class InlinePageProcessor implements PageProcessor {
  async analyze(task: PageTask): Promise<PageAnalysis> {
    try {
      return analyzePage(task);
    } catch (error) {
      throw new ParseError(task.url, { cause: error });
    }
  }

  async close(): Promise<void> {}
}

export class ThreadedPageProcessor implements PageProcessor {
  private readonly pool: WorkerPool<PageTask, PageAnalysis>;

  constructor(threads: number, workerUrl: URL = PAGE_WORKER_URL) {
    this.pool = new WorkerPool<PageTask, PageAnalysis>({
      size: threads,
      workerUrl,
      decode: (value) => PageAnalysisSchema.parse(value),
      name: 'page-analysis',
    });
  }

  async analyze(task: PageTask): Promise<PageAnalysis> {
    try {
      return await this.pool.run(task);
    } catch (error) {
      throw new ParseError(task.url, { cause: error });
    }
  }

  close(): Promise<void> {
    return this.pool.close();
  }
}

/**
 * Threaded processor when `threads > 0` and the compiled worker exists,
 * inline processor otherwise.
 */
export function createPageProcessor(threads: number): PageProcessor {
  if (threads <= 0) return new InlinePageProcessor();

  if (!existsSync(fileURLToPath(PAGE_WORKER_URL))) {
    logger.warn(
      { worker: PAGE_WORKER_URL.href },
      'Page worker not built; analysing pages on the main thread'
    );
    return new InlinePageProcessor();
  }

  return new ThreadedPageProcessor(threads);
}

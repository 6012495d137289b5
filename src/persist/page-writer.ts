/**
 * Single consumer that saves accepted pages to disk and keeps the url map.
 *
 * Workers enqueue pages and learn once the file is on disk whether it was
 * saved; the queue is bounded, so a slow disk slows acceptance instead of
 * growing memory. The url map is rewritten whenever the queue runs dry and
 * once more on close.
 */
import { createHash } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fingerprintToHex, type Fingerprint } from '../dedupe/simhash.js';
import { logger } from '../logger.js';
import { loadUrlMap, writeJsonAtomic, type PageRecord } from './state-store.js';
import { BoundedQueue } from './write-queue.js';

export interface PageWriteRequest {
  url: string;
  html: string;
  fingerprint: Fingerprint;
}

export interface PageWriterOptions {
  dataFolder: string;
  urlMapFile: string;
  capacity?: number;
  now?: () => Date;
}

interface QueuedPage {
  request: PageWriteRequest;
  settle: (saved: boolean) => void;
}

export const DEFAULT_WRITE_QUEUE_CAPACITY = 256;

/** First 16 hex digits of the URL's SHA-256; names the page file. */
export function pageFileKey(url: string): string {
  return createHash('sha256').update(url).digest('hex').slice(0, 16);
}

export class PageWriter {
  private readonly queue: BoundedQueue<QueuedPage>;
  private readonly records = new Map<string, PageRecord>();
  private readonly now: () => Date;
  private consumer: Promise<void> | null = null;
  private dirty = false;
  private written = 0;
  private failures = 0;

  constructor(private readonly options: PageWriterOptions) {
    this.queue = new BoundedQueue(options.capacity ?? DEFAULT_WRITE_QUEUE_CAPACITY);
    this.now = options.now ?? (() => new Date());
  }

  /** Load the existing url map (if any) and start the consumer. */
  async start(): Promise<void> {
    if (this.consumer) return;

    const existing = await loadUrlMap(this.options.urlMapFile);
    if (existing) {
      for (const [key, record] of Object.entries(existing)) this.records.set(key, record);
      logger.info(
        { urlMapFile: this.options.urlMapFile, pages: this.records.size },
        'Loaded url map'
      );
    }

    await mkdir(this.options.dataFolder, { recursive: true });
    this.consumer = this.consume();
  }

  /**
   * Queue a page for writing; suspends while the queue is full. Resolves true
   * once the page is saved, false when its file could not be written.
   */
  enqueue(request: PageWriteRequest): Promise<boolean> {
    if (!this.consumer) {
      return Promise.reject(new Error('PageWriter.enqueue() called before start()'));
    }
    return new Promise<boolean>((resolve, reject) => {
      this.queue.push({ request, settle: resolve }).catch(reject);
    });
  }

  /** Stop accepting pages, write everything queued and flush the url map. */
  async close(): Promise<void> {
    this.queue.close();
    if (this.consumer) await this.consumer;
    if (this.dirty) await this.flush();
  }

  get pageCount(): number {
    return this.records.size;
  }

  get writtenCount(): number {
    return this.written;
  }

  get failedCount(): number {
    return this.failures;
  }

  get queued(): number {
    return this.queue.size;
  }

  record(url: string): PageRecord | undefined {
    return this.records.get(pageFileKey(url));
  }

  private async consume(): Promise<void> {
    for (;;) {
      const item = await this.queue.pull();
      if (item === null) return;

      item.settle(await this.write(item.request));

      if (this.queue.size === 0 && this.dirty) {
        try {
          await this.flush();
        } catch (error) {
          // Still dirty: the next flush retries.
          logger.error({ error: String(error) }, 'Failed to write url map');
        }
      }
    }
  }

  private async write({ url, html, fingerprint }: PageWriteRequest): Promise<boolean> {
    const key = pageFileKey(url);
    const file = `${key}.html`;
    try {
      await writeFile(join(this.options.dataFolder, file), html, 'utf-8');
    } catch (error) {
      this.failures++;
      logger.error({ url, file, error: String(error) }, 'Failed to save page; skipping');
      return false;
    }

    this.records.set(key, {
      url,
      file,
      fingerprint: fingerprintToHex(fingerprint),
      acceptedAt: this.now().toISOString(),
    });
    this.dirty = true;
    this.written++;
    logger.debug({ url, file }, 'Saved page');
    return true;
  }

  private async flush(): Promise<void> {
    this.dirty = false;
    try {
      await writeJsonAtomic(this.options.urlMapFile, Object.fromEntries(this.records));
    } catch (error) {
      this.dirty = true;
      throw error;
    }
  }
}

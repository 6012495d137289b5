/**
 * FIFO URL frontier with normalization, dedup, robots gating, backpressure and
 * snapshot/restore.
 *
 * Every URL lives in exactly one of pending, in-flight, visited or failed; the
 * seen set is their union and is consulted before any insert. Check-then-act
 * sequences never await in between, so they are atomic on the event loop.
 */
import picomatch from 'picomatch';
import { InvalidTransitionError } from '../errors.js';
import type { FailedUrl, FrontierSnapshot, UrlRecord, UrlStatus } from './types.js';

/** Anything that can answer a robots.txt question for a URL. */
export interface RobotsGate {
  isAllowed(url: string): Promise<boolean>;
}

export type FrontierFullPolicy = 'block' | 'reject';

export interface FrontierOptions {
  /** Maximum pending URLs; unbounded when omitted. */
  maxSize?: number;
  /** `block` suspends add() while full, `reject` returns false. */
  fullPolicy?: FrontierFullPolicy;
  include?: string[];
  exclude?: string[];
  robots?: RobotsGate | null;
  now?: () => number;
}

export interface RestoreOptions {
  /** Move failed URLs back to the pending queue. */
  requeueFailed?: boolean;
}

const COMPACT_THRESHOLD = 1024;

/**
 * Normalize a URL for deduplication.
 * Strips fragments, removes trailing slashes (except root), lowercases scheme+host.
 * Returns null for unparsable and non-HTTP(S) URLs.
 */
export function normalizeUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return null;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return null;

  parsed.hash = '';

  // Remove trailing slash unless it's the root path
  if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/';
  }

  return parsed.href;
}

export class UrlFrontier {
  private queue: UrlRecord[] = [];
  private head = 0;
  private seen = new Set<string>();
  private inFlight = new Map<string, UrlRecord>();
  private visited = new Set<string>();
  private failed = new Map<string, string>();
  private takers: Array<(entry: UrlRecord | null) => void> = [];
  private spaceWaiters: Array<() => void> = [];
  private closed = false;

  private readonly maxSize: number | undefined;
  private readonly fullPolicy: FrontierFullPolicy;
  private readonly robots: RobotsGate | null;
  private readonly includeMatcher: ((path: string) => boolean) | null;
  private readonly excludeMatcher: ((path: string) => boolean) | null;
  private readonly now: () => number;

  constructor(options: FrontierOptions = {}) {
    this.maxSize = options.maxSize;
    this.fullPolicy = options.fullPolicy ?? 'block';
    this.robots = options.robots ?? null;
    this.now = options.now ?? Date.now;

    this.includeMatcher =
      options.include && options.include.length > 0
        ? picomatch(options.include, { dot: true })
        : null;

    this.excludeMatcher =
      options.exclude && options.exclude.length > 0
        ? picomatch(options.exclude, { dot: true })
        : null;
  }

  /**
   * Queue a URL. Resolves false for invalid, already seen, filtered or
   * robots-disallowed URLs, and for any add still waiting when the frontier
   * closes.
   */
  async add(url: string): Promise<boolean> {
    const normalized = normalizeUrl(url);
    if (!normalized || this.closed || this.seen.has(normalized)) return false;
    if (!this.passesFilters(normalized)) return false;

    if (this.robots && !(await this.robots.isAllowed(normalized))) return false;

    while (!this.closed && this.isFull()) {
      if (this.fullPolicy === 'reject') return false;
      await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
    }

    // Another add may have claimed the URL while this one was suspended.
    if (this.closed || this.seen.has(normalized)) return false;

    this.seen.add(normalized);
    this.queue.push({ url: normalized, status: 'queued', discoveredAt: this.now() });
    this.deliver();
    return true;
  }

  /**
   * Keep a URL found after close() for the next run. It goes to the pending
   * tail regardless of capacity and is never handed out, only snapshotted.
   * Resolves false where add() would, and while the frontier is still open.
   */
  async retain(url: string): Promise<boolean> {
    const normalized = normalizeUrl(url);
    if (!normalized || !this.closed || this.seen.has(normalized)) return false;
    if (!this.passesFilters(normalized)) return false;

    if (this.robots && !(await this.robots.isAllowed(normalized))) return false;
    if (this.seen.has(normalized)) return false;

    this.seen.add(normalized);
    this.queue.push({ url: normalized, status: 'queued', discoveredAt: this.now() });
    return true;
  }

  /**
   * Remove the head of the queue and mark it in flight. Suspends while the
   * queue is empty; resolves null once the frontier is closed.
   */
  take(): Promise<UrlRecord | null> {
    if (this.closed) return Promise.resolve(null);

    const entry = this.dequeue();
    if (entry) return Promise.resolve(entry);

    return new Promise((resolve) => this.takers.push(resolve));
  }

  markVisited(url: string): void {
    const key = this.release(url, 'visited');
    this.visited.add(key);
  }

  markFailed(url: string, reason: string): void {
    const key = this.release(url, 'failed');
    this.failed.set(key, reason);
  }

  /** Wake every blocked take() with null and every blocked add() with false. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const taker of this.takers.splice(0)) taker(null);
    this.wakeSpaceWaiters();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of pending (not yet taken) URLs. */
  size(): number {
    return this.queue.length - this.head;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  get failedCount(): number {
    return this.failed.size;
  }

  /** Total URLs ever accepted (pending ∪ in-flight ∪ visited ∪ failed). */
  get seenCount(): number {
    return this.seen.size;
  }

  status(url: string): UrlStatus | undefined {
    const key = normalizeUrl(url) ?? url;
    if (this.inFlight.has(key)) return 'in-flight';
    if (this.visited.has(key)) return 'visited';
    if (this.failed.has(key)) return 'failed';
    if (this.seen.has(key)) return 'queued';
    return undefined;
  }

  failureReason(url: string): string | undefined {
    return this.failed.get(normalizeUrl(url) ?? url);
  }

  /** Pending URLs in queue order. */
  pendingUrls(): string[] {
    return this.queue.slice(this.head).map((entry) => entry.url);
  }

  /**
   * Export the frontier. In-flight URLs come first in `pending`, in the order
   * they were taken, so a resumed crawl fetches them again.
   */
  snapshot(): FrontierSnapshot {
    const pending = [...this.inFlight.values(), ...this.queue.slice(this.head)].map((entry) => ({
      url: entry.url,
      discoveredAt: entry.discoveredAt,
    }));
    const failed: FailedUrl[] = [...this.failed].map(([url, reason]) => ({ url, reason }));

    return {
      version: 1,
      savedAt: new Date(this.now()).toISOString(),
      pending,
      visited: [...this.visited],
      failed,
    };
  }

  /** Replace all state with a snapshot. Not allowed while workers are active. */
  restore(snapshot: FrontierSnapshot, options: RestoreOptions = {}): void {
    if (this.inFlight.size > 0 || this.takers.length > 0 || this.spaceWaiters.length > 0) {
      throw new InvalidTransitionError('Cannot restore the frontier while workers are active');
    }

    this.queue = [];
    this.head = 0;
    this.seen = new Set();
    this.visited = new Set();
    this.failed = new Map();
    this.closed = false;

    for (const url of snapshot.visited) {
      this.visited.add(url);
      this.seen.add(url);
    }

    const requeue: string[] = [];
    for (const { url, reason } of snapshot.failed) {
      if (this.seen.has(url)) continue;
      if (options.requeueFailed) {
        requeue.push(url);
      } else {
        this.failed.set(url, reason);
        this.seen.add(url);
      }
    }

    for (const { url, discoveredAt } of snapshot.pending) {
      if (this.seen.has(url)) continue;
      this.seen.add(url);
      this.queue.push({ url, status: 'queued', discoveredAt });
    }

    const requeuedAt = this.now();
    for (const url of requeue) {
      if (this.seen.has(url)) continue;
      this.seen.add(url);
      this.queue.push({ url, status: 'queued', discoveredAt: requeuedAt });
    }
  }

  private passesFilters(url: string): boolean {
    if (!this.includeMatcher && !this.excludeMatcher) return true;
    const { pathname } = new URL(url);
    if (this.includeMatcher && !this.includeMatcher(pathname)) return false;
    if (this.excludeMatcher && this.excludeMatcher(pathname)) return false;
    return true;
  }

  private isFull(): boolean {
    return this.maxSize !== undefined && this.size() >= this.maxSize;
  }

  private dequeue(): UrlRecord | null {
    if (this.head >= this.queue.length) return null;

    const entry = this.queue[this.head];
    this.head++;
    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }

    entry.status = 'in-flight';
    this.inFlight.set(entry.url, entry);
    this.wakeSpaceWaiters();
    return entry;
  }

  private deliver(): void {
    while (this.takers.length > 0 && !this.isEmpty()) {
      const taker = this.takers.shift();
      const entry = this.dequeue();
      if (!taker || !entry) break;
      taker(entry);
    }
  }

  /** Blocked adds re-check capacity themselves, so waking all of them is safe. */
  private wakeSpaceWaiters(): void {
    for (const resume of this.spaceWaiters.splice(0)) resume();
  }

  private release(url: string, target: 'visited' | 'failed'): string {
    const key = normalizeUrl(url) ?? url;
    if (this.inFlight.delete(key)) return key;

    for (let i = this.head; i < this.queue.length; i++) {
      if (this.queue[i].url === key) {
        this.queue.splice(i, 1);
        this.wakeSpaceWaiters();
        return key;
      }
    }

    throw new InvalidTransitionError(
      `Cannot mark ${key} as ${target}: it is ${this.status(key) ?? 'unknown to the frontier'}`
    );
  }
}

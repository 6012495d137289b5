/**
 * Periodic and on-demand snapshots of the frontier and the duplicate index.
 * Both snapshots are taken synchronously at the same instant, then written.
 */
import type { FrontierSnapshot } from '../crawl/types.js';
import type { DuplicateIndexSnapshot } from '../dedupe/duplicate-detector.js';
import { logger } from '../logger.js';
import type { StateStore } from './state-store.js';

export interface SnapshotSources {
  frontier: { snapshot(): FrontierSnapshot };
  detector: { snapshot(): DuplicateIndexSnapshot };
}

export interface SnapshotterOptions extends SnapshotSources {
  store: StateStore;
  /** Seconds between periodic saves. */
  saveInterval: number;
}

export class Snapshotter {
  private timer: NodeJS.Timeout | null = null;
  private inProgress: Promise<void> | null = null;
  private saves = 0;
  private consecutiveFailures = 0;

  constructor(private readonly options: SnapshotterOptions) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.options.saveInterval * 1000);
    this.timer.unref();
  }

  /** Write both snapshots now, after any save already running. Throws on failure. */
  async saveNow(): Promise<void> {
    if (this.inProgress) await this.inProgress;
    await this.save();
  }

  /** Cancel the timer and wait for a running save. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inProgress) await this.inProgress;
  }

  get saveCount(): number {
    return this.saves;
  }

  get failureCount(): number {
    return this.consecutiveFailures;
  }

  private tick(): void {
    if (this.inProgress) {
      logger.debug('Snapshot still running; skipping this interval');
      return;
    }
    this.inProgress = this.save()
      .then(() => {
        this.consecutiveFailures = 0;
      })
      .catch((error: unknown) => {
        this.consecutiveFailures++;
        logger.error(
          { error: String(error), failures: this.consecutiveFailures },
          'Periodic snapshot failed; retrying next interval'
        );
      })
      .finally(() => {
        this.inProgress = null;
      });
  }

  private async save(): Promise<void> {
    const { store, frontier, detector } = this.options;
    const frontierSnapshot = frontier.snapshot();
    const indexSnapshot = detector.snapshot();

    await store.saveFrontier(frontierSnapshot);
    await store.saveDuplicateIndex(indexSnapshot);

    this.saves++;
    logger.info(
      {
        pending: frontierSnapshot.pending.length,
        visited: frontierSnapshot.visited.length,
        failed: frontierSnapshot.failed.length,
        fingerprints: indexSnapshot.fingerprints.length,
      },
      'Saved crawl state'
    );
  }
}

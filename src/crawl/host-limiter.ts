/**
 * Per-host connection cap. At most `maxPerHost` tasks run against one host at
 * a time; waiting tasks start in the order they arrived. Idle hosts are
 * forgotten.
 */
import pLimit, { type LimitFunction } from 'p-limit';

interface HostSlot {
  limit: LimitFunction;
  users: number;
}

export class HostLimiter {
  private readonly hosts = new Map<string, HostSlot>();

  constructor(readonly maxPerHost: number) {
    if (!Number.isInteger(maxPerHost) || maxPerHost < 1) {
      throw new RangeError(`maxPerHost must be a positive integer, got ${maxPerHost}`);
    }
  }

  async run<T>(url: string, task: () => Promise<T>): Promise<T> {
    const host = new URL(url).host;
    let slot = this.hosts.get(host);
    if (!slot) {
      slot = { limit: pLimit(this.maxPerHost), users: 0 };
      this.hosts.set(host, slot);
    }

    slot.users++;
    try {
      return await slot.limit(task);
    } finally {
      slot.users--;
      if (slot.users === 0) this.hosts.delete(host);
    }
  }

  /** Tasks running or waiting for `host`. */
  load(host: string): number {
    return this.hosts.get(host)?.users ?? 0;
  }
}

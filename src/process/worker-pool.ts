/**
 * Fixed-size worker_threads pool. Each thread handles one task at a time;
 * tasks queue in FIFO order while every thread is busy.
 *
 * Protocol: the pool posts `{ id, task }`; the worker replies with
 * `{ id, ok: true, result }` or `{ id, ok: false, error }`.
 */
import { Worker } from 'node:worker_threads';
import { logger } from '../logger.js';

export interface WorkerPoolOptions<TResult> {
  size: number;
  workerUrl: URL;
  /** Validates a worker's result before it reaches the caller. */
  decode: (value: unknown) => TResult;
  name?: string;
}

interface QueuedTask<TTask, TResult> {
  id: number;
  task: TTask;
  resolve: (result: TResult) => void;
  reject: (error: Error) => void;
}

interface Slot<TTask, TResult> {
  worker: Worker;
  current: QueuedTask<TTask, TResult> | null;
}

type WorkerReply =
  | { id: number; ok: true; result: unknown }
  | { id: number; ok: false; error: string };

function isWorkerReply(value: unknown): value is WorkerReply {
  if (typeof value !== 'object' || value === null) return false;
  if (!('id' in value) || typeof value.id !== 'number' || !('ok' in value)) return false;
  return value.ok === true ? 'result' in value : 'error' in value && typeof value.error === 'string';
}

export class WorkerPool<TTask, TResult> {
  private readonly slots: Array<Slot<TTask, TResult>> = [];
  private readonly queue: Array<QueuedTask<TTask, TResult>> = [];
  private nextId = 0;
  private closing = false;
  private readonly name: string;

  constructor(private readonly options: WorkerPoolOptions<TResult>) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${options.size}`);
    }
    this.name = options.name ?? 'worker-pool';
    for (let i = 0; i < options.size; i++) {
      this.slots.push(this.spawn());
    }
  }

  run(task: TTask): Promise<TResult> {
    if (this.closing) {
      return Promise.reject(new Error(`${this.name} is closed`));
    }
    return new Promise<TResult>((resolve, reject) => {
      this.queue.push({ id: this.nextId++, task, resolve, reject });
      this.dispatch();
    });
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  get busyCount(): number {
    return this.slots.filter((slot) => slot.current !== null).length;
  }

  /** Reject queued tasks and terminate every thread. */
  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;

    for (const queued of this.queue.splice(0)) {
      queued.reject(new Error(`${this.name} closed before the task ran`));
    }
    await Promise.all(
      this.slots.map(async (slot) => {
        slot.current?.reject(new Error(`${this.name} closed while the task was running`));
        slot.current = null;
        await slot.worker.terminate();
      })
    );
  }

  private spawn(): Slot<TTask, TResult> {
    const worker = new Worker(this.options.workerUrl);
    const slot: Slot<TTask, TResult> = { worker, current: null };

    worker.on('message', (message: unknown) => this.handleReply(slot, message));
    worker.on('error', (error: Error) => {
      logger.error({ pool: this.name, error: error.message }, 'Worker thread crashed');
      this.replace(slot, error);
    });
    // Threads only stop on close(); any other exit, clean or not, is a crash.
    worker.on('exit', (code: number) => {
      if (!this.closing) {
        this.replace(slot, new Error(`Worker thread exited with code ${code}`));
      }
    });

    return slot;
  }

  private handleReply(slot: Slot<TTask, TResult>, message: unknown): void {
    const current = slot.current;
    if (!current || !isWorkerReply(message) || message.id !== current.id) {
      logger.warn({ pool: this.name }, 'Ignoring unexpected worker message');
      return;
    }

    slot.current = null;
    if (message.ok) {
      try {
        current.resolve(this.options.decode(message.result));
      } catch (error) {
        current.reject(error instanceof Error ? error : new Error(String(error)));
      }
    } else {
      current.reject(new Error(message.error));
    }
    this.dispatch();
  }

  private replace(slot: Slot<TTask, TResult>, cause: Error): void {
    const index = this.slots.indexOf(slot);
    if (index === -1) return;

    slot.current?.reject(cause);
    slot.current = null;
    slot.worker.removeAllListeners();
    if (this.closing) return;

    this.slots[index] = this.spawn();
    this.dispatch();
  }

  private dispatch(): void {
    for (const slot of this.slots) {
      if (this.queue.length === 0) return;
      if (slot.current) continue;

      const next = this.queue.shift();
      if (!next) return;
      slot.current = next;
      slot.worker.postMessage({ id: next.id, task: next.task });
    }
  }
}

/**
 * Worker thread entry point for page analysis
 */
import { parentPort } from 'node:worker_threads';
import { analyzePage, type PageTask } from '../extract/page-analysis.js';

if (!parentPort) {
  throw new Error('page-worker must be started as a worker thread');
}

const port = parentPort;

port.on('message', ({ id, task }: { id: number; task: PageTask }) => {
  try {
    port.postMessage({ id, ok: true, result: analyzePage(task) });
  } catch (error) {
    port.postMessage({ id, ok: false, error: error instanceof Error ? error.message : String(error) });
  }
});

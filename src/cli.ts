#!/usr/bin/env node
/**
 * CLI entry point for driftnet
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { loadConfig, type CrawlConfigInput } from './config.js';
import { createCrawlSession, loadCrawlStatus } from './crawl/session.js';
import type { CrawlSummary } from './crawl/types.js';
import { CrawlError } from './errors.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
      return typeof pkg.version === 'string' ? pkg.version : 'unknown';
    }
    return 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export type Command = 'crawl' | 'status';

export interface CliOptions {
  command: Command;
  seeds: string[];
  configFile?: string;
  json: boolean;
  overrides: Partial<CrawlConfigInput>;
}

type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

type IntegerFlagKey = 'numWorkers' | 'targetPages' | 'saveInterval' | 'frontierMaxSize';
type PathFlagKey = 'dataFolder' | 'urlMapFile' | 'stateFolder';

const INTEGER_FLAGS = new Map<string, IntegerFlagKey>([
  ['--workers', 'numWorkers'],
  ['--target', 'targetPages'],
  ['--save-interval', 'saveInterval'],
  ['--frontier-max', 'frontierMaxSize'],
]);

const PATH_FLAGS = new Map<string, PathFlagKey>([
  ['--data-folder', 'dataFolder'],
  ['--url-map', 'urlMapFile'],
  ['--state-folder', 'stateFolder'],
]);

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  const overrides: Partial<CrawlConfigInput> = {};
  let command: Command = 'crawl';
  let configFile: string | undefined;
  let json = false;

  let start = 0;
  const first = args[0];
  if (first === 'crawl' || first === 'status') {
    command = first;
    start = 1;
  }

  for (let i = start; i < args.length; i++) {
    const arg = args[i];

    const integerKey = INTEGER_FLAGS.get(arg);
    if (integerKey) {
      if (i + 1 >= args.length) return { kind: 'error', message: `${arg} requires a value` };
      const v = parseInt(args[++i], 10);
      if (isNaN(v) || v <= 0) {
        return { kind: 'error', message: `${arg} must be a positive integer` };
      }
      overrides[integerKey] = v;
      continue;
    }

    const pathKey = PATH_FLAGS.get(arg);
    if (pathKey) {
      if (i + 1 >= args.length) return { kind: 'error', message: `${arg} requires a value` };
      overrides[pathKey] = args[++i];
      continue;
    }

    switch (arg) {
      case '--config':
        if (i + 1 >= args.length) return { kind: 'error', message: '--config requires a value' };
        configFile = args[++i];
        break;
      case '--no-robots':
        overrides.disableRobots = true;
        break;
      case '--retry-failed':
        overrides.retryFailedOnResume = true;
        break;
      case '--json':
        json = true;
        break;
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (command === 'status' && positional.length > 0) {
    return { kind: 'error', message: 'status takes no seed URLs' };
  }

  for (const seed of positional) {
    if (!seed.startsWith('http://') && !seed.startsWith('https://')) {
      return { kind: 'error', message: `Seed URL must start with http:// or https://: ${seed}` };
    }
  }
  if (positional.length > 0) overrides.seeds = positional;

  return {
    kind: 'ok',
    opts: { command, seeds: positional, configFile, json, overrides },
    warnings,
  };
}

function printUsage(): void {
  console.log(`Usage: driftnet [crawl] [seed-url...] [options]
       driftnet status [options]

Crawls from the seed URLs (or SEED_URLS), keeping English, non-duplicate HTML
pages. Interrupted crawls resume from the state folder.

Options:
  --config <path>         JSON config file
  --workers <n>           Concurrent fetch loops (env: NUM_WORKERS, default: 5)
  --target <n>            Pages to accept before stopping (env: TARGET_PAGES, default: 100)
  --data-folder <path>    Where accepted pages are saved (env: DATA_FOLDER)
  --url-map <path>        URL map file (env: URL_MAP_FILE)
  --state-folder <path>   Frontier and fingerprint snapshots (env: STATE_FOLDER)
  --save-interval <s>     Seconds between snapshots (env: SAVE_INTERVAL, default: 30)
  --frontier-max <n>      Maximum pending URLs (env: FRONTIER_MAX_SIZE)
  --no-robots             Ignore robots.txt (env: DISABLE_ROBOTS)
  --retry-failed          Requeue URLs that failed in the previous run
  --json                  Print the result as JSON
  -v, --version           Show version number
  -h, --help              Show this help message

Logs go to stderr; set LOG_LEVEL to change verbosity.`);
}

export function formatSummary(summary: CrawlSummary): string {
  const seconds = (summary.durationMs / 1000).toFixed(1);
  return [
    `Crawl stopped: ${summary.stopReason} after ${seconds}s`,
    `  accepted:   ${summary.pagesAccepted}`,
    `  duplicates: ${summary.pagesDuplicate}`,
    `  filtered:   ${summary.pagesFiltered}`,
    `  canonical:  ${summary.pagesRedirected}`,
    `  failed:     ${summary.pagesFailed}`,
    `Frontier: ${summary.pending} pending, ${summary.visited} visited, ${summary.failed} failed`,
  ].join('\n');
}

async function runCrawl(opts: CliOptions): Promise<number> {
  const config = await loadConfig({ configFile: opts.configFile, overrides: opts.overrides });
  const session = await createCrawlSession(config);

  if (session.frontier.isEmpty() && !session.resumed) {
    console.error('Error: Nothing to crawl. Pass seed URLs or set SEED_URLS.');
    await session.writer.close();
    await session.processor.close();
    return 1;
  }

  const onSignal = (signal: NodeJS.Signals): void => {
    console.error(`\nReceived ${signal}, saving state and shutting down...`);
    session.orchestrator.stop('interrupted');
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  let summary: CrawlSummary;
  try {
    summary = await session.orchestrator.run();
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }

  console.log(opts.json ? JSON.stringify(summary) : formatSummary(summary));
  return 0;
}

async function runStatus(opts: CliOptions): Promise<number> {
  const config = await loadConfig({ configFile: opts.configFile, overrides: opts.overrides });
  const status = await loadCrawlStatus(config);

  if (opts.json) {
    console.log(JSON.stringify(status));
    return 0;
  }

  console.log(`State folder: ${config.stateFolder}`);
  console.log(`Last saved:   ${status.savedAt ?? 'never'}`);
  console.log(`Pending:      ${status.pending}`);
  console.log(`Visited:      ${status.visited}`);
  console.log(`Failed:       ${status.failed}`);
  console.log(`Fingerprints: ${status.fingerprints}`);
  console.log(`Saved pages:  ${status.pages}`);
  return 0;
}

export async function main(): Promise<void> {
  const result = parseArgs(process.argv.slice(2));

  switch (result.kind) {
    case 'version':
      console.log(`driftnet ${getVersion()}`);
      process.exit(0);
      return;
    case 'help':
      printUsage();
      process.exit(0);
      return;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      process.exit(1);
      return;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  try {
    const code = opts.command === 'status' ? await runStatus(opts) : await runCrawl(opts);
    if (code !== 0) process.exit(code);
  } catch (error) {
    if (error instanceof CrawlError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then(() => {
      // Parse worker threads are closed by now; exit without waiting on idle sockets.
      process.exit(0);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}

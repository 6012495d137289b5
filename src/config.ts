/**
 * Crawl configuration.
 *
 * Sources, lowest precedence first: built-in defaults, a JSON config file,
 * environment variables, explicit overrides (CLI flags). The merged object is
 * validated once with zod; every issue is reported together in a ConfigError.
 */
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_USER_AGENTS } from './fetch/user-agents.js';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const CrawlConfigSchema = z
  .object({
    dataFolder: z.string().min(1).default('crawl_data/raw'),
    urlMapFile: z.string().min(1).default('crawl_data/url_map.json'),
    stateFolder: z.string().min(1).default('crawl_data/state'),
    numWorkers: positiveInt.default(5),
    targetPages: positiveInt.default(100),
    /** seconds */
    saveInterval: z.number().positive().default(30),
    disableRobots: z.boolean().default(false),
    frontierMaxSize: positiveInt.optional(),
    frontierFullPolicy: z.enum(['block', 'reject']).default('block'),
    seeds: z.array(z.string().url()).default([]),
    userAgents: z
      .array(z.string().min(1))
      .min(1)
      .default(() => [...DEFAULT_USER_AGENTS]),
    robotsUserAgent: z.string().min(1).default('driftnet'),
    hammingThreshold: nonNegativeInt.max(64).default(3),
    bandCount: positiveInt.default(4),
    shingleSize: positiveInt.default(3),
    requestTimeoutMs: positiveInt.default(10_000),
    maxRedirects: nonNegativeInt.default(5),
    maxResponseBytes: positiveInt.default(10 * 1024 * 1024),
    requestDelayMs: nonNegativeInt.default(0),
    maxConnectionsPerHost: positiveInt.default(4),
    drainTimeoutMs: nonNegativeInt.default(15_000),
    writeQueueCapacity: positiveInt.default(256),
    parseThreads: nonNegativeInt.default(2),
    targetLanguage: z.string().min(1).default('en'),
    minWords: nonNegativeInt.default(200),
    include: z.array(z.string().min(1)).default([]),
    exclude: z.array(z.string().min(1)).default([]),
    retryFailedOnResume: z.boolean().default(false),
  })
  .strict()
  .refine((config) => 64 % config.bandCount === 0, {
    message: 'bandCount must divide 64',
    path: ['bandCount'],
  });

export type CrawlConfig = z.infer<typeof CrawlConfigSchema>;
export type CrawlConfigInput = z.input<typeof CrawlConfigSchema>;

export interface LoadConfigOptions {
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<CrawlConfigInput>;
}

type EnvParser = (value: string) => unknown;

const asNumber: EnvParser = (value) => Number(value.trim());
const asString: EnvParser = (value) => value;
const asList: EnvParser = (value) =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);

function asBoolean(value: string): unknown {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
  return value;
}

const ENV_VARS: Record<string, [keyof CrawlConfigInput, EnvParser]> = {
  DATA_FOLDER: ['dataFolder', asString],
  URL_MAP_FILE: ['urlMapFile', asString],
  STATE_FOLDER: ['stateFolder', asString],
  NUM_WORKERS: ['numWorkers', asNumber],
  TARGET_PAGES: ['targetPages', asNumber],
  SAVE_INTERVAL: ['saveInterval', asNumber],
  DISABLE_ROBOTS: ['disableRobots', asBoolean],
  FRONTIER_MAX_SIZE: ['frontierMaxSize', asNumber],
  SEED_URLS: ['seeds', asList],
  ROBOTS_USER_AGENT: ['robotsUserAgent', asString],
  REQUEST_TIMEOUT_MS: ['requestTimeoutMs', asNumber],
  MAX_CONNECTIONS_PER_HOST: ['maxConnectionsPerHost', asNumber],
  PARSE_THREADS: ['parseThreads', asNumber],
};

/** Config values taken from environment variables; unset variables are skipped. */
export function readEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [name, [key, parse]] of Object.entries(ENV_VARS)) {
    const value = env[name];
    if (value !== undefined) result[key] = parse(value);
  }
  return result;
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError([`${path}: ${error instanceof Error ? error.message : String(error)}`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError([`${path}: ${error instanceof Error ? error.message : String(error)}`]);
  }

  const result = z.record(z.string(), z.unknown()).safeParse(parsed);
  if (!result.success) {
    throw new ConfigError([`${path}: expected a JSON object`]);
  }
  return result.data;
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/** Validate a merged config object. */
export function parseConfig(input: unknown): CrawlConfig {
  const result = CrawlConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<CrawlConfig> {
  const fromFile = options.configFile ? await readConfigFile(options.configFile) : {};
  const fromEnv = readEnvConfig(options.env ?? process.env);

  return parseConfig({
    ...fromFile,
    ...fromEnv,
    ...withoutUndefined(options.overrides ?? {}),
  });
}

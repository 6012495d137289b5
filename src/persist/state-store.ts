/**
 * On-disk crawl state: frontier and duplicate-index snapshots plus the url
 * map. Writes go to a temp file in the target directory and are renamed into
 * place, so a reader never sees a partial file.
 */
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import type { FrontierSnapshot } from '../crawl/types.js';
import type { DuplicateIndexSnapshot } from '../dedupe/duplicate-detector.js';
import { StateIOError } from '../errors.js';
import { logger } from '../logger.js';

export const FRONTIER_FILE = 'frontier.json';
export const DUPLICATE_INDEX_FILE = 'simhash.json';

const HexFingerprint = z.string().regex(/^[0-9a-f]{1,16}$/i);

export const FrontierSnapshotSchema = z.object({
  version: z.literal(1),
  savedAt: z.string(),
  pending: z.array(z.object({ url: z.string(), discoveredAt: z.number() })),
  visited: z.array(z.string()),
  failed: z.array(z.object({ url: z.string(), reason: z.string() })),
});

export const DuplicateIndexSnapshotSchema = z.object({
  version: z.literal(1),
  savedAt: z.string(),
  bits: z.literal(64),
  bandCount: z.number().int().positive(),
  hammingThreshold: z.number().int().nonnegative(),
  fingerprints: z.array(HexFingerprint),
  bands: z.array(z.record(z.string(), z.array(HexFingerprint))),
});

export const PageRecordSchema = z.object({
  url: z.string(),
  file: z.string(),
  fingerprint: HexFingerprint,
  acceptedAt: z.string(),
});

export type PageRecord = z.infer<typeof PageRecordSchema>;

/** File key (file name without extension) → record of the page saved there. */
export const UrlMapSchema = z.record(z.string(), PageRecordSchema);

export type UrlMap = z.infer<typeof UrlMapSchema>;

let tempCounter = 0;

/** Write JSON atomically: temp file beside the target, then rename. */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
  const tempPath = `${path}.${process.pid}.${tempCounter++}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await rename(tempPath, path);
  } catch (error) {
    try {
      await rm(tempPath, { force: true });
    } catch (cleanupError) {
      logger.warn({ path: tempPath, error: String(cleanupError) }, 'Could not remove temp file');
    }
    throw new StateIOError(path, 'write', { cause: error });
  }
}

/**
 * Read and validate a JSON file. Resolves null when the file does not exist;
 * unreadable or malformed content throws StateIOError.
 */
export async function readJsonFile<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw new StateIOError(path, 'read', { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StateIOError(path, 'read', { cause: error });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new StateIOError(path, 'read', { cause: result.error });
  }
  return result.data;
}

export class StateStore {
  constructor(readonly stateFolder: string) {}

  get frontierPath(): string {
    return join(this.stateFolder, FRONTIER_FILE);
  }

  get duplicateIndexPath(): string {
    return join(this.stateFolder, DUPLICATE_INDEX_FILE);
  }

  loadFrontier(): Promise<FrontierSnapshot | null> {
    return readJsonFile(this.frontierPath, FrontierSnapshotSchema);
  }

  loadDuplicateIndex(): Promise<DuplicateIndexSnapshot | null> {
    return readJsonFile(this.duplicateIndexPath, DuplicateIndexSnapshotSchema);
  }

  saveFrontier(snapshot: FrontierSnapshot): Promise<void> {
    return writeJsonAtomic(this.frontierPath, snapshot);
  }

  saveDuplicateIndex(snapshot: DuplicateIndexSnapshot): Promise<void> {
    return writeJsonAtomic(this.duplicateIndexPath, snapshot);
  }
}

export function loadUrlMap(path: string): Promise<UrlMap | null> {
  return readJsonFile(path, UrlMapSchema);
}

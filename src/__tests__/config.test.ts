import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { loadConfig, parseConfig, readEnvConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { DEFAULT_USER_AGENTS } from '../fetch/user-agents.js';
import { makeTempDir, removeTempDir } from './test-helpers.js';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  return [];
}

describe('config', () => {
  describe('parseConfig', () => {
    it('fills in defaults', () => {
      const config = parseConfig({});

      expect(config).toMatchObject({
        dataFolder: 'crawl_data/raw',
        urlMapFile: 'crawl_data/url_map.json',
        stateFolder: 'crawl_data/state',
        numWorkers: 5,
        targetPages: 100,
        saveInterval: 30,
        disableRobots: false,
        frontierFullPolicy: 'block',
        seeds: [],
        hammingThreshold: 3,
        bandCount: 4,
        shingleSize: 3,
        targetLanguage: 'en',
        minWords: 200,
        maxConnectionsPerHost: 4,
      });
      expect(config.frontierMaxSize).toBeUndefined();
      expect(config.userAgents).toEqual([...DEFAULT_USER_AGENTS]);
    });

    it('reports every invalid field at once', () => {
      const issues = issuesOf(() => parseConfig({ numWorkers: 0, seeds: ['not a url'] }));

      expect(issues).toEqual([
        'numWorkers: Number must be greater than 0',
        'seeds.0: Invalid url',
      ]);
    });

    it('rejects unknown keys', () => {
      expect(issuesOf(() => parseConfig({ workerz: 3 }))).toEqual([
        "(root): Unrecognized key(s) in object: 'workerz'",
      ]);
    });

    it('requires bandCount to divide 64', () => {
      expect(issuesOf(() => parseConfig({ bandCount: 5 }))).toEqual([
        'bandCount: bandCount must divide 64',
      ]);
      expect(parseConfig({ bandCount: 8 }).bandCount).toBe(8);
    });

    it('throws a ConfigError with a readable message', () => {
      expect(() => parseConfig({ targetPages: -1 })).toThrow(
        'Invalid configuration:\n  targetPages: Number must be greater than 0'
      );
    });
  });

  describe('readEnvConfig', () => {
    it('maps environment variables onto config keys', () => {
      expect(
        readEnvConfig({
          DATA_FOLDER: '/srv/pages',
          NUM_WORKERS: ' 8 ',
          SAVE_INTERVAL: '2.5',
          DISABLE_ROBOTS: 'yes',
          SEED_URLS: 'https://a.test/, https://b.test/,,',
          MAX_CONNECTIONS_PER_HOST: '2',
        })
      ).toEqual({
        dataFolder: '/srv/pages',
        numWorkers: 8,
        saveInterval: 2.5,
        disableRobots: true,
        seeds: ['https://a.test/', 'https://b.test/'],
        maxConnectionsPerHost: 2,
      });
    });

    it('ignores unrelated and unset variables', () => {
      expect(readEnvConfig({ HOME: '/root', PATH: '/usr/bin' })).toEqual({});
    });

    it('reads false-ish booleans', () => {
      expect(readEnvConfig({ DISABLE_ROBOTS: 'off' })).toEqual({ disableRobots: false });
      expect(readEnvConfig({ DISABLE_ROBOTS: '' })).toEqual({ disableRobots: false });
    });

    it('passes unparseable values through for validation to reject', () => {
      expect(readEnvConfig({ DISABLE_ROBOTS: 'maybe' })).toEqual({ disableRobots: 'maybe' });
      expect(() => parseConfig(readEnvConfig({ NUM_WORKERS: 'many' }))).toThrow(ConfigError);
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it('layers file, environment and overrides in that order', async () => {
      const configFile = join(dir, 'driftnet.json');
      await writeFile(
        configFile,
        JSON.stringify({ numWorkers: 2, targetPages: 10, dataFolder: '/from/file' })
      );

      const config = await loadConfig({
        configFile,
        env: { NUM_WORKERS: '3', TARGET_PAGES: '20' },
        overrides: { targetPages: 30, stateFolder: undefined },
      });

      expect(config.numWorkers).toBe(3);
      expect(config.targetPages).toBe(30);
      expect(config.dataFolder).toBe('/from/file');
      expect(config.stateFolder).toBe('crawl_data/state');
    });

    it('uses only the given environment', async () => {
      const config = await loadConfig({ env: {} });
      expect(config.numWorkers).toBe(5);
    });

    it('reports a missing config file', async () => {
      const configFile = join(dir, 'missing.json');
      await expect(loadConfig({ configFile, env: {} })).rejects.toBeInstanceOf(ConfigError);
    });

    it('reports malformed JSON in the config file', async () => {
      const configFile = join(dir, 'broken.json');
      await writeFile(configFile, '{ numWorkers: 2 }');
      await expect(loadConfig({ configFile, env: {} })).rejects.toBeInstanceOf(ConfigError);
    });

    it('requires the config file to hold an object', async () => {
      const configFile = join(dir, 'list.json');
      await writeFile(configFile, '[1, 2]');

      await expect(loadConfig({ configFile, env: {} })).rejects.toMatchObject({
        issues: [`${configFile}: expected a JSON object`],
      });
    });
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { LoggerOptions } from 'pino';

const captured = vi.hoisted(() => {
  const state: { options?: LoggerOptions; destination?: unknown } = {};
  return state;
});

vi.mock('pino', () => {
  const mockPino = Object.assign(
    vi.fn((options: LoggerOptions, destination?: unknown) => {
      captured.options = options;
      captured.destination = destination;
      return { level: options.level ?? 'info' };
    }),
    { destination: vi.fn((fd: number) => `fd:${fd}`) }
  );
  return { default: mockPino };
});

describe('logger', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    vi.resetModules();
    captured.options = undefined;
    captured.destination = undefined;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  describe('resolveLogLevel', () => {
    it('defaults to info', async () => {
      const { resolveLogLevel } = await import('../logger.js');
      expect(resolveLogLevel({})).toBe('info');
    });

    it('reads LOG_LEVEL case-insensitively', async () => {
      const { resolveLogLevel } = await import('../logger.js');
      expect(resolveLogLevel({ LOG_LEVEL: 'DEBUG' })).toBe('debug');
      expect(resolveLogLevel({ LOG_LEVEL: 'silent' })).toBe('silent');
    });

    it('falls back to info for unknown levels', async () => {
      const { resolveLogLevel } = await import('../logger.js');
      expect(resolveLogLevel({ LOG_LEVEL: 'banana' })).toBe('info');
    });
  });

  describe('logger instance', () => {
    it('takes its level from the environment', async () => {
      process.env.LOG_LEVEL = 'warn';
      await import('../logger.js');
      expect(captured.options?.level).toBe('warn');
    });

    it('tags every line with the service name', async () => {
      await import('../logger.js');
      expect(captured.options?.base).toMatchObject({ service: 'driftnet' });
    });

    it('formats the level as its label', async () => {
      await import('../logger.js');
      expect(captured.options?.formatters?.level?.('error', 50)).toEqual({ level: 'error' });
    });

    it('writes JSON to stderr outside development', async () => {
      process.env.NODE_ENV = 'production';
      await import('../logger.js');
      expect(captured.options?.transport).toBeUndefined();
      expect(captured.destination).toBe('fd:2');
    });

    it('uses pino-pretty on stderr in development', async () => {
      process.env.NODE_ENV = 'development';
      await import('../logger.js');
      expect(captured.options?.transport).toMatchObject({
        target: 'pino-pretty',
        options: { destination: 2 },
      });
    });
  });
});

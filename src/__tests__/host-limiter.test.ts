import { describe, it, expect } from 'vitest';
import { HostLimiter } from '../crawl/host-limiter.js';

describe('HostLimiter', () => {
  it('holds back a second request to a busy host but not to other hosts', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const started: string[] = [];
    const limiter = new HostLimiter(1);

    const first = limiter.run('https://a.test/1', async () => {
      started.push('a1');
      await gate;
      return 1;
    });
    const second = limiter.run('https://a.test/2', async () => {
      started.push('a2');
      return 2;
    });
    const other = limiter.run('https://b.test/1', async () => {
      started.push('b1');
      return 3;
    });

    expect(await other).toBe(3);
    expect(started).toEqual(['a1', 'b1']);
    expect(limiter.load('a.test')).toBe(2);

    release();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(started).toEqual(['a1', 'b1', 'a2']);
    expect(limiter.load('a.test')).toBe(0);
  });

  it('frees the slot when a task fails', async () => {
    const limiter = new HostLimiter(1);

    await expect(
      limiter.run('https://a.test/', async () => {
        throw new Error('connection reset');
      })
    ).rejects.toThrow('connection reset');
    expect(await limiter.run('https://a.test/', async () => 'ok')).toBe('ok');
  });

  it('rejects a limit below one', () => {
    expect(() => new HostLimiter(0)).toThrow(RangeError);
    expect(() => new HostLimiter(1.5)).toThrow(RangeError);
  });
});

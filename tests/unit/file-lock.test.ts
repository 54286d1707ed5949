import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { acquireFileLock, withFileLock } from '../../src/cache/file-lock';

jest.mock('../../src/observability/logger', () => {
  const log = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  return { logger: log, componentLogger: () => log };
});

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('File Lock', () => {
  let dir: string;
  let lockPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'file-lock-'));
    lockPath = path.join(dir, 'cache.json.lock');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should run the work and release the lock', async () => {
    const result = await withFileLock(lockPath, { timeoutMs: 500 }, async () => {
      expect(fs.existsSync(lockPath)).toBe(true);
      return 42;
    });

    expect(result).toBe(42);
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('should release the lock when the work fails', async () => {
    await expect(
      withFileLock(lockPath, { timeoutMs: 500 }, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('should serialize overlapping holders', async () => {
    const events: string[] = [];
    const work = (id: string) => async () => {
      events.push(`start-${id}`);
      await sleep(30);
      events.push(`end-${id}`);
    };

    await Promise.all([
      withFileLock(lockPath, { timeoutMs: 2000, retryDelayMs: 5 }, work('a')),
      withFileLock(lockPath, { timeoutMs: 2000, retryDelayMs: 5 }, work('b')),
    ]);

    expect(events).toHaveLength(4);
    expect(events[1]).toBe(events[0].replace('start', 'end'));
    expect(events[3]).toBe(events[2].replace('start', 'end'));
  });

  it('should give up waiting and run unlocked when the lock is held', async () => {
    fs.writeFileSync(lockPath, 'other-process');
    let ran = false;

    await withFileLock(lockPath, { timeoutMs: 40, retryDelayMs: 10 }, async () => {
      ran = true;
    });

    expect(ran).toBe(true);
    // Not ours to remove
    expect(fs.readFileSync(lockPath, 'utf-8')).toBe('other-process');
  });

  it('should time out when the lock stays held', async () => {
    fs.writeFileSync(lockPath, 'other-process');
    expect(await acquireFileLock(lockPath, { timeoutMs: 30, retryDelayMs: 10 })).toBeNull();
  });

  it('should take over a stale lock', async () => {
    fs.writeFileSync(lockPath, 'crashed-process');
    const past = new Date(Date.now() - 60_000);
    fs.utimesSync(lockPath, past, past);

    const lock = await acquireFileLock(lockPath, { timeoutMs: 30, staleMs: 10_000 });

    expect(lock).not.toBeNull();
    expect(fs.readFileSync(lockPath, 'utf-8')).toMatch(new RegExp(`^${process.pid}:[0-9a-f]{16}$`));
    await lock?.release();
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('should not remove a lock file that another holder has taken over', async () => {
    const lock = await acquireFileLock(lockPath, { timeoutMs: 30 });
    // Another process judged ours stale and replaced it
    fs.writeFileSync(lockPath, 'other-holder');

    await lock?.release();

    expect(lock).not.toBeNull();
    expect(fs.readFileSync(lockPath, 'utf-8')).toBe('other-holder');
  });

  it('should write a distinct token per acquisition', async () => {
    const first = await acquireFileLock(lockPath, { timeoutMs: 30 });
    const firstToken = fs.readFileSync(lockPath, 'utf-8');
    await first?.release();

    const second = await acquireFileLock(lockPath, { timeoutMs: 30 });
    const secondToken = fs.readFileSync(lockPath, 'utf-8');
    await second?.release();

    expect(secondToken).not.toBe(firstToken);
    expect(fs.existsSync(lockPath)).toBe(false);
  });
});

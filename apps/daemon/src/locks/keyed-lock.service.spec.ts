import { SettingsService } from '../settings/settings.service';
import { KeyedLockService } from './keyed-lock.service';

describe('KeyedLockService', () => {
  function createService() {
    return new KeyedLockService(new SettingsService({ LOCK_WAIT_MS: '50' }));
  }

  it('hands out a key once and reports the second attempt as locked', async () => {
    const locks = createService();

    const first = await locks.acquire('multi');
    const second = await locks.acquire('multi', 10);

    expect(first).not.toBeNull();
    expect(second).toBeNull();
    expect(locks.isLocked('multi')).toBe(true);
    first?.release();
  });

  it('does not block unrelated keys', async () => {
    const locks = createService();

    const a = await locks.acquire('a');
    const b = await locks.acquire('b', 10);

    expect(a?.key).toBe('a');
    expect(b?.key).toBe('b');
    expect(locks.size).toBe(2);
    a?.release();
    b?.release();
  });

  it('removes the entry on release so the map does not grow', async () => {
    const locks = createService();

    for (const key of ['one', 'two', 'three']) {
      const handle = await locks.acquire(key);
      handle?.release();
    }

    expect(locks.size).toBe(0);
    const again = await locks.acquire('one', 10);
    expect(again).not.toBeNull();
    again?.release();
  });

  it('drops a second attempt at once instead of waiting for the holder', async () => {
    const locks = new KeyedLockService(new SettingsService({ LOCK_WAIT_MS: '5000' }));
    const holder = await locks.acquire('grp');
    setTimeout(() => holder?.release(), 50);

    const started = Date.now();
    const second = await locks.acquire('grp');

    expect(second).toBeNull();
    expect(Date.now() - started).toBeLessThan(50);
    expect(locks.isLocked('grp')).toBe(true);
    holder?.release();
  });

  it('lets only one of two same-tick attempts through', async () => {
    const locks = createService();

    const [a, b] = await Promise.all([locks.acquire('grp'), locks.acquire('grp')]);

    expect([a, b].filter((handle) => handle !== null)).toHaveLength(1);
    a?.release();
    b?.release();
  });

  it('hands the key out again once the holder has released it', async () => {
    const locks = createService();
    const holder = await locks.acquire('grp');
    holder?.release();

    const next = await locks.acquire('grp');

    expect(next).not.toBeNull();
    next?.release();
  });

  it('releases by key and ignores keys that are not held', async () => {
    const locks = createService();
    await locks.acquire('k');

    locks.release('k');
    locks.release('never-held');

    expect(locks.isLocked('k')).toBe(false);
    expect(locks.size).toBe(0);
  });

  it('does not let a stale handle release the next holder', async () => {
    const locks = createService();
    const first = await locks.acquire('k');
    first?.release();
    const second = await locks.acquire('k');

    first?.release();

    expect(locks.isLocked('k')).toBe(true);
    second?.release();
  });

  it('runs exclusively and releases when the task throws', async () => {
    const locks = createService();

    const ok = await locks.runExclusive('job', async () => 42);
    expect(ok).toEqual({ acquired: true, value: 42 });

    await expect(
      locks.runExclusive('job', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(locks.isLocked('job')).toBe(false);
  });

  it('reports not acquired while another task holds the key', async () => {
    const locks = createService();
    let finish = () => {};
    const running = locks.runExclusive(
      'job',
      () =>
        new Promise<void>((resolve) => {
          finish = () => resolve();
        }),
    );
    await new Promise((resolve) => setImmediate(resolve));

    const contended = await locks.runExclusive('job', async () => 'never');

    expect(contended).toEqual({ acquired: false });
    finish();
    await expect(running).resolves.toEqual({ acquired: true, value: undefined });
  });
});

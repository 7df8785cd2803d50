import { backoffDelayMs, sleepUnlessAborted } from './backoff';

describe('backoffDelayMs', () => {
  it('starts at one second and doubles', () => {
    expect([1, 2, 3, 4, 5, 6].map((n) => backoffDelayMs(n))).toEqual([
      1_000, 2_000, 4_000, 8_000, 16_000, 32_000,
    ]);
  });

  it('caps at sixty seconds', () => {
    expect(backoffDelayMs(7)).toBe(60_000);
    expect(backoffDelayMs(500)).toBe(60_000);
  });

  it('honours custom bounds', () => {
    expect(backoffDelayMs(3, { initialDelayMs: 5, maxDelayMs: 15 })).toBe(15);
    expect(backoffDelayMs(2, { initialDelayMs: 5, maxDelayMs: 15 })).toBe(10);
  });
});

describe('sleepUnlessAborted', () => {
  it('resolves true when the delay elapses', async () => {
    await expect(sleepUnlessAborted(5)).resolves.toBe(true);
  });

  it('resolves false immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleepUnlessAborted(60_000, controller.signal)).resolves.toBe(false);
  });

  it('wakes up early on abort', async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    const pending = sleepUnlessAborted(60_000, controller.signal);
    setTimeout(() => controller.abort(), 10);
    await expect(pending).resolves.toBe(false);
    expect(Date.now() - startedAt).toBeLessThan(5_000);
  });
});

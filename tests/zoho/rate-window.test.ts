import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { RateWindow } from '@/lib/zoho/http/rate-window';

describe('RateWindow', () => {
  let now: number;
  let sleep: jest.Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    now = 0;
    sleep = jest.fn(async (ms: number) => {
      now += ms;
    });
  });

  const createWindow = (maxRequests: number) =>
    new RateWindow({ maxRequests, windowMs: 60_000, clock: () => now, sleep });

  it('admits requests without waiting while under capacity', async () => {
    const window = createWindow(3);

    await window.acquire();
    now = 10_000;
    await window.acquire();
    now = 20_000;
    await window.acquire();

    expect(sleep).not.toHaveBeenCalled();
    expect(window.getUsage()).toEqual({ inWindow: 3, capacity: 3, oldestAgeMs: 20_000 });
  });

  it('waits exactly until the oldest request leaves the window', async () => {
    const window = createWindow(3);

    await window.acquire();
    now = 10_000;
    await window.acquire();
    now = 20_000;
    await window.acquire();
    now = 30_000;
    await window.acquire();

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(30_000);
    expect(now).toBe(60_000);
    expect(window.getUsage()).toEqual({ inWindow: 3, capacity: 3, oldestAgeMs: 50_000 });
  });

  it('does not wait once the oldest request has expired', async () => {
    const window = createWindow(1);

    await window.acquire();
    now = 60_000;
    await window.acquire();

    expect(sleep).not.toHaveBeenCalled();
  });

  it('admits concurrent callers one at a time', async () => {
    const window = createWindow(1);

    await Promise.all([window.acquire(), window.acquire()]);

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(60_000);
    expect(window.getUsage().inWindow).toBe(1);
  });

  it('keeps admitting after a failed sleep', async () => {
    const window = createWindow(1);
    await window.acquire();

    sleep.mockRejectedValueOnce(new Error('interrupted'));
    await expect(window.acquire()).rejects.toThrow('interrupted');

    now = 120_000;
    await expect(window.acquire()).resolves.toBeUndefined();
  });
});

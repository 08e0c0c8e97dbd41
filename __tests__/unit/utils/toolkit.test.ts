import { describe, it, expect, vi } from 'vitest';
import { todayStr, stampStr, clockStr, pad2, sleep, clamp } from '../../../src/utils/toolkit';

describe('utils/toolkit', () => {
  const d = new Date(2024, 0, 5, 7, 3, 9);

  it('formats local dates and times', () => {
    expect(pad2(3)).toBe('03');
    expect(todayStr(d)).toBe('2024-01-05');
    expect(stampStr(d)).toBe('2024-01-05 07:03:09');
    expect(clockStr(d)).toBe('07:03:09');
  });

  it('clamps into a range', () => {
    expect(clamp(5, 1, 3)).toBe(3);
    expect(clamp(-1, 1, 3)).toBe(1);
    expect(clamp(2, 1, 3)).toBe(2);
  });

  it('sleep waits for the timer', async () => {
    vi.useFakeTimers();
    let done = false;
    const p = sleep(1000).then(() => { done = true; });
    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await p;
    expect(done).toBe(true);
  });

  it('sleep resolves early on abort', async () => {
    vi.useFakeTimers();
    const ac = new AbortController();
    let done = false;
    const p = sleep(60_000, ac.signal).then(() => { done = true; });
    ac.abort();
    await p;
    expect(done).toBe(true);
    await expect(sleep(60_000, ac.signal)).resolves.toBeUndefined();
  });

  it('sleep is capped under FAST_CI', async () => {
    vi.useFakeTimers();
    process.env.FAST_CI = '1';
    let done = false;
    const p = sleep(60_000).then(() => { done = true; });
    await vi.advanceTimersByTimeAsync(5);
    await p;
    expect(done).toBe(true);
  });
});

/** Return YYYY-MM-DD for given date (defaults to now), local time. */
export function todayStr(d: Date = new Date()): string {
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

export function pad2(n: number): string { return n.toString().padStart(2, "0"); }

/** Local `YYYY-MM-DD HH:MM:SS`. */
export function stampStr(d: Date = new Date()): string {
  return `${todayStr(d)} ${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

/** Local `HH:MM:SS`. */
export function clockStr(d: Date = new Date()): string {
  return `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

/**
 * Sleep helper. Resolves early (without throwing) when the signal aborts.
 * When FAST_CI=1, waits are capped at TEST_SLEEP_MS (default 5ms).
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  let delay = ms;
  if (process.env.FAST_CI === '1') {
    const cap = Math.max(0, Number(process.env.TEST_SLEEP_MS || '5'));
    delay = Math.min(delay, cap);
  }
  if (signal?.aborted) return Promise.resolve();
  return new Promise(resolve => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, delay);
    signal?.addEventListener('abort', done, { once: true });
  });
}

export function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

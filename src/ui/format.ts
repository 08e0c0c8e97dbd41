import type { AlertLevel } from '../contracts';

/** `EURUSD=X` -> `EURUSD`. */
export function displayPair(pair: string): string { return pair.replace('=X', ''); }

/** `EURUSD=X` -> `EUR/USD`; other tickers are only stripped of the suffix. */
export function slashPair(pair: string): string {
  const p = displayPair(pair);
  return /^[A-Z]{6}$/.test(p) ? `${p.slice(0, 3)}/${p.slice(3)}` : p;
}

export function fmtPrice(p: number): string { return p.toFixed(5); }

/** Signed, two decimals: `+0.62%`, `-0.05%`. */
export function fmtPct(p: number): string { return `${p >= 0 ? '+' : ''}${p.toFixed(2)}%`; }

export function arrow(p: number): string { return p > 0 ? '▲' : '▼'; }

export function levelLabel(level: AlertLevel): string { return level === 'major' ? 'MAJOR ALERT' : 'MINOR ALERT'; }

export function colorFns() {
  const disable = process.env.NO_COLOR === '1' || process.env.FORCE_COLOR === '0';
  const wrap = (code: string) => (s: string) => disable ? s : `\u001b[${code}m${s}\u001b[0m`;
  return {
    red: wrap('31'),
    yellow: wrap('33'),
    green: wrap('32'),
    cyan: wrap('36'),
    bold: wrap('1'),
    dim: wrap('2'),
    inverse: wrap('7'),
  };
}

export function stripAnsi(s: string): string { return s.replace(/\u001b\[[0-9;]*m/g, ''); }

/** Pads to a visible width, ignoring colour codes. */
export function padVisible(s: string, width: number): string {
  const len = stripAnsi(s).length;
  return len >= width ? s : s + ' '.repeat(width - len);
}

export const SPARK_GLYPHS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'];

/** One glyph per value over the last `width` values, scaled between their min and max. */
export function buildSparkline(values: readonly number[], width = 30): string {
  if (!values.length) return '';
  const arr = values.slice(-width);
  const min = Math.min(...arr);
  const max = Math.max(...arr);
  const span = Math.max(1e-12, max - min);
  return arr.map(v => {
    const idx = Math.min(SPARK_GLYPHS.length - 1, Math.max(0, Math.floor(((v - min) / span) * (SPARK_GLYPHS.length - 1))));
    return SPARK_GLYPHS[idx];
  }).join('');
}

/** Index of each spike bar within the sparkline window, or -1 when it scrolled off. */
export function sparkPositions(barTs: readonly number[], spikeTs: readonly number[], width = 30): number[] {
  const window = barTs.slice(-width);
  return spikeTs.map(t => window.indexOf(t));
}

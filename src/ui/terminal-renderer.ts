import type { CycleReport, MonitorSummary, PairStatus, RenderContext, Renderer } from '../contracts';
import { MAJOR_THRESHOLD_PCT } from '../core/volatility';
import { stampStr } from '../utils/toolkit';
import { displayPair, fmtPct, fmtPrice } from './format';

const RULE = '='.repeat(60);
const THIN = '-'.repeat(60);

export type LineSink = (line: string) => void;

export function formatAlert(s: PairStatus, at: Date): string[] {
  const dir = s.change > 0 ? '📈' : '📉';
  return [
    '',
    RULE,
    `🚨 ALERT - ${displayPair(s.pair)}`,
    `   Time: ${stampStr(at)}`,
    `   Current Price: $${fmtPrice(s.price)}`,
    `   Change: ${dir} ${fmtPct(s.change)}`,
    RULE,
    '',
  ];
}

export function formatStatusLine(s: PairStatus): string {
  return `✓ ${displayPair(s.pair)}: $${fmtPrice(s.price)} (${fmtPct(s.change)})`;
}

export function formatBanner(pairs: string[], refreshSec: number): string[] {
  return [
    '',
    RULE,
    '🚀 FX Volatility Monitoring Engine Started',
    RULE,
    `Monitoring: ${pairs.length} currency pairs`,
    `Update interval: ${refreshSec} seconds`,
    `Alert threshold: ±${MAJOR_THRESHOLD_PCT}%`,
    'Press Ctrl+C to stop',
    RULE,
    '',
  ];
}

/** Terminal-only variant: alert blocks for threshold breaches, a tick line for the rest. */
export class TerminalRenderer implements Renderer {
  readonly name = 'terminal';

  constructor(private readonly write: LineSink = (l) => console.log(l)) {}

  start(pairs: string[], ctx: RenderContext) {
    for (const l of formatBanner(pairs, ctx.refreshSec)) this.write(l);
  }

  render(report: CycleReport, ctx: RenderContext) {
    const at = new Date(report.at);
    this.write('');
    this.write(`[Cycle ${report.cycle}] ${stampStr(at)}`);
    this.write(THIN);
    for (const s of report.statuses) {
      if (s.alerted) {
        for (const l of formatAlert(s, at)) this.write(l);
      } else {
        this.write(formatStatusLine(s));
      }
    }
    const alerts = report.statuses.filter(s => s.alerted).length;
    this.write('');
    this.write(`Status: ${report.statuses.length}/${report.pairs.length} pairs checked | ${alerts} alerts`);
    this.write(`Next update in ${ctx.refreshSec} seconds...`);
    this.write('');
  }

  stop(summary: MonitorSummary) {
    this.write('');
    this.write('');
    this.write(RULE);
    this.write('🛑 Monitoring stopped by user');
    this.write(`Total cycles completed: ${summary.cycles}`);
    if (summary.requests !== undefined) this.write(`Feed requests sent: ${summary.requests}`);
    this.write(RULE);
    this.write('');
  }
}

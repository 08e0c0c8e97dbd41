import { describe, it, expect } from 'vitest';
import { TerminalRenderer, formatAlert, formatStatusLine, formatBanner } from '../../../src/ui/terminal-renderer';
import { SpikeTracker } from '../../../src/core/spike-tracker';
import type { RenderContext } from '../../../src/contracts';
import { makeReport, makeStatus, T0 } from '../../helpers/series';

const RULE = '='.repeat(60);
const ctx: RenderContext = { refreshSec: 60, lookback: 5, spikes: new SpikeTracker() };

describe('ui/terminal-renderer', () => {
  it('formats an alert block', () => {
    const s = makeStatus('GBPUSD=X', -0.75, [1.27, 1.265]);
    expect(formatAlert(s, new Date(T0))).toEqual([
      '',
      RULE,
      '🚨 ALERT - GBPUSD',
      '   Time: 2024-01-15 09:00:00',
      '   Current Price: $1.26500',
      '   Change: 📉 -0.75%',
      RULE,
      '',
    ]);
  });

  it('formats a status line', () => {
    expect(formatStatusLine(makeStatus('USDJPY=X', 0.05, [148.5]))).toBe('✓ USDJPY: $148.50000 (+0.05%)');
  });

  it('prints the start banner', () => {
    const lines = formatBanner(['EURUSD=X', 'USDJPY=X'], 60);
    expect(lines).toContain('🚀 FX Volatility Monitoring Engine Started');
    expect(lines).toContain('Monitoring: 2 currency pairs');
    expect(lines).toContain('Update interval: 60 seconds');
    expect(lines).toContain('Alert threshold: ±0.5%');
  });

  it('renders a cycle with alerts first-class and a status footer', () => {
    const out: string[] = [];
    const r = new TerminalRenderer((l) => out.push(l));
    const report = makeReport(
      ['EURUSD=X', 'USDJPY=X', 'USDCHF=X'],
      [makeStatus('EURUSD=X', 0.62, [1.08, 1.085]), makeStatus('USDJPY=X', 0.05, [148.5])],
    );
    r.render(report, ctx);
    expect(out).toEqual([
      '',
      '[Cycle 1] 2024-01-15 09:00:00',
      '-'.repeat(60),
      '',
      RULE,
      '🚨 ALERT - EURUSD',
      '   Time: 2024-01-15 09:00:00',
      '   Current Price: $1.08500',
      '   Change: 📈 +0.62%',
      RULE,
      '',
      '✓ USDJPY: $148.50000 (+0.05%)',
      '',
      'Status: 2/3 pairs checked | 1 alerts',
      'Next update in 60 seconds...',
      '',
    ]);
  });

  it('does not raise a terminal alert for a minor move', () => {
    const out: string[] = [];
    const r = new TerminalRenderer((l) => out.push(l));
    r.render(makeReport(['EURUSD=X'], [makeStatus('EURUSD=X', 0.2, [1.08, 1.085])]), ctx);
    expect(out).toContain('✓ EURUSD: $1.08500 (+0.20%)');
    expect(out).toContain('Status: 1/1 pairs checked | 0 alerts');
  });

  it('prints the stop summary', () => {
    const out: string[] = [];
    new TerminalRenderer((l) => out.push(l)).stop({ cycles: 4, startedAt: 0, stoppedAt: 1, alerts: 2 });
    expect(out).toEqual(['', '', RULE, '🛑 Monitoring stopped by user', 'Total cycles completed: 4', RULE, '']);
  });

  it('adds the feed request count when known', () => {
    const out: string[] = [];
    new TerminalRenderer((l) => out.push(l)).stop({ cycles: 2, startedAt: 0, stoppedAt: 1, alerts: 0, requests: 10 });
    expect(out.slice(3, 6)).toEqual(['🛑 Monitoring stopped by user', 'Total cycles completed: 2', 'Feed requests sent: 10']);
  });
});

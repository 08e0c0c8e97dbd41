#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();
import type { CycleReport } from '../contracts';
import { loadAppConfig, parsePairs } from '../utils/config';
import { createMonitor } from '../app';
import { errorMessage } from '../application/errors';

export interface OnceArgs {
  pairs?: string;
  lookback?: number;
  help?: boolean;
}

export function parseArgs(argv: string[]): OnceArgs {
  const out: OnceArgs = {};
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--pairs' && argv[i + 1]) { out.pairs = argv[++i]; continue; }
    if (a === '--lookback' && argv[i + 1]) { out.lookback = Number(argv[++i]); continue; }
    if (a === '--help' || a === '-h') { out.help = true; }
  }
  return out;
}

/** Report without the raw bars, for printing. */
export function summarizeReport(report: CycleReport) {
  return {
    cycle: report.cycle,
    at: new Date(report.at).toISOString(),
    statuses: report.statuses.map(s => ({
      pair: s.pair,
      price: s.price,
      change: Number(s.change.toFixed(4)),
      level: s.level,
      alerted: s.alerted,
      bars: s.series.bars.length,
    })),
    missing: report.missing,
  };
}

async function run() {
  const args = parseArgs(process.argv);
  if (args.help) {
    console.log('Usage: fx-once [--pairs EURUSD=X,USDJPY=X] [--lookback 5]');
    return;
  }
  if (args.pairs) process.env.FX_PAIRS = parsePairs(args.pairs).join(',');
  if (args.lookback !== undefined) process.env.LOOKBACK_MIN = String(args.lookback);
  const cfg = loadAppConfig();
  const reports: CycleReport[] = [];
  const monitor = createMonitor(cfg, {
    renderers: [{ name: 'json', render: (r) => { reports.push(r); } }],
    maxCycles: 1,
  });
  await monitor.start();
  for (const r of reports) console.log(JSON.stringify(summarizeReport(r), null, 2));
}

if (require.main === module) {
  run().catch(err => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  });
}

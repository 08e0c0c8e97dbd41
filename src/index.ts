#!/usr/bin/env node
// Application entrypoint: runs the poll loop in the mode chosen by FX_MODE.
// Ctrl+C (or q in focus mode) stops after the cycle in flight and prints the summary.

import dotenv from 'dotenv';
dotenv.config();

import { loadAppConfig } from './utils/config';
import { log } from './utils/logger';
import { errorMessage } from './application/errors';
import { registerLoggerSubscriber } from './application/events';
import { bindStopSignals, createMonitor } from './app';
export { createMonitor, buildRenderers, buildMarketService, bindStopSignals } from './app';
export * from './contracts';

export async function main(): Promise<void> {
	const cfg = loadAppConfig();
	registerLoggerSubscriber();
	const monitor = createMonitor(cfg);
	const unbind = bindStopSignals(monitor);
	log('INFO', 'CYCLE', 'monitor starting', { mode: cfg.mode, pairs: cfg.pairs, lookback: cfg.lookback, refreshSec: cfg.refreshSec });
	try {
		const summary = await monitor.start();
		log('INFO', 'CYCLE', 'monitor stopped', summary);
	} finally {
		unbind();
	}
}

if (require.main === module) {
	main().catch((err) => {
		console.error('[FATAL] entry runner error', errorMessage(err));
		process.exitCode = 1;
	});
}

import { describe, it, expect } from 'vitest';
import { loadAppConfig, resetConfigCache, normalizePair, parsePairs, defaultPairs, TOP_5_PAIRS, DASHBOARD_PAIRS } from '../../../src/utils/config';
import { ConfigError } from '../../../src/application/errors';

function configError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadAppConfig(env);
  } catch (e) {
    if (e instanceof ConfigError) return e;
    throw e;
  }
  throw new Error('expected a ConfigError');
}

describe('utils/config pairs', () => {
  it.each([
    ['EUR/USD', 'EURUSD=X'],
    ['eur_usd', 'EURUSD=X'],
    ['gbp-usd', 'GBPUSD=X'],
    [' usdjpy ', 'USDJPY=X'],
    ['USDCHF=X', 'USDCHF=X'],
    ['^gspc', '^GSPC'],
  ])('normalizes %s to %s', (raw, expected) => {
    expect(normalizePair(raw)).toBe(expected);
  });

  it('parses a list, skipping blanks and duplicates', () => {
    expect(parsePairs('EUR/USD, eurusd,,usd_jpy')).toEqual(['EURUSD=X', 'USDJPY=X']);
  });

  it('uses the top five for the terminal and the dashboard set otherwise', () => {
    expect(defaultPairs('terminal')).toEqual(TOP_5_PAIRS);
    expect(defaultPairs('dashboard')).toEqual(DASHBOARD_PAIRS);
    expect(DASHBOARD_PAIRS).toHaveLength(6);
  });
});

describe('utils/config loadAppConfig', () => {
  it('applies defaults', () => {
    const cfg = loadAppConfig({});
    expect(cfg).toEqual({
      mode: 'terminal',
      pairs: TOP_5_PAIRS,
      lookback: 5,
      refreshSec: 60,
      range: '1d',
      interval: '1m',
      chartDir: 'charts',
      chartEnabled: false,
      spikeMarkersMax: 50,
      yahooBaseUrl: 'https://query1.finance.yahoo.com',
      httpTimeoutMs: 10000,
      cacheTtlMs: 30000,
    });
  });

  it('reads and normalizes overrides', () => {
    const cfg = loadAppConfig({
      FX_MODE: ' Chart ',
      FX_PAIRS: 'eur/usd,usd/jpy',
      LOOKBACK_MIN: '10',
      REFRESH_SEC: '30',
      YAHOO_BASE_URL: 'https://feed.test/',
      MARKET_CACHE_TTL_MS: '0',
    });
    expect(cfg.mode).toBe('chart');
    expect(cfg.pairs).toEqual(['EURUSD=X', 'USDJPY=X']);
    expect(cfg.lookback).toBe(10);
    expect(cfg.refreshSec).toBe(30);
    expect(cfg.chartEnabled).toBe(true);
    expect(cfg.yahooBaseUrl).toBe('https://feed.test');
    expect(cfg.cacheTtlMs).toBe(0);
  });

  it('lets CHART_ENABLED override the mode default', () => {
    expect(loadAppConfig({ FX_MODE: 'dashboard', CHART_ENABLED: 'yes' }).chartEnabled).toBe(true);
    resetConfigCache();
    expect(loadAppConfig({ FX_MODE: 'chart', CHART_ENABLED: '0' }).chartEnabled).toBe(false);
  });

  it('treats blank values as unset', () => {
    const cfg = loadAppConfig({ LOOKBACK_MIN: '  ', REFRESH_SEC: '' });
    expect(cfg.lookback).toBe(5);
    expect(cfg.refreshSec).toBe(60);
  });

  it('caches until reset', () => {
    const a = loadAppConfig({ LOOKBACK_MIN: '3' });
    expect(loadAppConfig({ LOOKBACK_MIN: '4' })).toBe(a);
    resetConfigCache();
    expect(loadAppConfig({ LOOKBACK_MIN: '4' }).lookback).toBe(4);
  });

  it('lists every out-of-range variable', () => {
    const e = configError({ LOOKBACK_MIN: '31', REFRESH_SEC: '5', FX_MODE: 'web' });
    expect(e.code).toBe('CONFIG');
    expect(e.issues).toHaveLength(3);
    expect(e.issues.some(i => i.startsWith('LOOKBACK_MIN: '))).toBe(true);
    expect(e.issues.some(i => i.startsWith('REFRESH_SEC: '))).toBe(true);
    expect(e.issues.some(i => i.startsWith('FX_MODE: '))).toBe(true);
  });

  it('rejects a pair list with no pairs', () => {
    const e = configError({ FX_PAIRS: ' , ' });
    expect(e.issues).toEqual(['FX_PAIRS: empty']);
  });
});

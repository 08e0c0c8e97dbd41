import type { PriceSeries } from '../contracts';

export interface SeriesQuery {
  range: string;
  interval: string;
}

/** Common base for public market data clients. */
export abstract class BaseMarketDataPublic {
  /** An aborted `signal` cancels the request in flight. */
  abstract getIntradaySeries(symbol: string, query: SeriesQuery, signal?: AbortSignal): Promise<PriceSeries>;
}

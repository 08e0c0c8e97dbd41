export { YahooChartPublic, YAHOO_BASE, toPriceSeries, chartResponseSchema } from './yahoo';
export type { ChartResponse, YahooOptions } from './yahoo';

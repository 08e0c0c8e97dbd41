import type { AlertLevel } from '../../contracts';
import type { ErrorCode } from '../errors';

export interface EventBaseMeta {
  ts: number;
  eventId?: string;
}

/** Per-pair status after a successful fetch. */
export type QuoteEvent = {
  type: 'EVENT/QUOTE';
  pair: string;
  price: number;
  change: number;
  level: AlertLevel | null;
  lookback: number;
} & EventBaseMeta;

/** A move classified minor or major. `ts` is the bar the move was measured at. */
export type AlertEvent = {
  type: 'EVENT/ALERT';
  pair: string;
  price: number;
  change: number;
  level: AlertLevel;
  lookback: number;
  cycle: number;
} & EventBaseMeta;

export type ErrorEvent = {
  type: 'EVENT/ERROR';
  pair: string;
  code: ErrorCode;
  cause: { code: ErrorCode; message: string; status?: number };
} & EventBaseMeta;

export type CycleEvent = {
  type: 'EVENT/CYCLE';
  cycle: number;
  checked: number;
  total: number;
  alerts: number;
  missing: string[];
} & EventBaseMeta;

export type AppEvent = QuoteEvent | AlertEvent | ErrorEvent | CycleEvent;
export type AppEventType = AppEvent['type'];
export type EventOf<K extends AppEventType> = Extract<AppEvent, { type: K }>;

import { getEventBus, type EventBus } from '../bus';
import type { SpikeTracker } from '../../../core/spike-tracker';

/** Every classified move becomes a marker on its bar. */
export function registerSpikeSubscriber(tracker: SpikeTracker, bus: EventBus = getEventBus()): () => void {
  return bus.subscribe('EVENT/ALERT', (ev) => {
    tracker.record({ pair: ev.pair, ts: ev.ts, price: ev.price, pct: ev.change, level: ev.level, lookback: ev.lookback });
  });
}

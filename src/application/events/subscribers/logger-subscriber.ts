import { getEventBus, type EventBus } from '../bus';
import { log } from '../../../utils/logger';

// Fetch failures are logged where they happen (market service), not here.
export function registerLoggerSubscriber(bus: EventBus = getEventBus()): () => void {
  const offs = [
    bus.subscribe('EVENT/ALERT', (ev) => {
      log(ev.level === 'major' ? 'WARN' : 'INFO', 'ALERT', `${ev.level} move`, { pair: ev.pair, change: Number(ev.change.toFixed(4)), price: ev.price, lookback: ev.lookback, cycle: ev.cycle });
    }),
    bus.subscribe('EVENT/CYCLE', (ev) => {
      log('DEBUG', 'CYCLE', 'done', { cycle: ev.cycle, checked: ev.checked, total: ev.total, alerts: ev.alerts, missing: ev.missing });
    }),
  ];
  return () => { for (const off of offs) off(); };
}

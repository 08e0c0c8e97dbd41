import type { AppEvent, AppEventType, EventOf } from './types';
import { log as logCat } from '../../utils/logger';
import { errorMessage } from '../errors';

export type EventHandler<T extends AppEvent = AppEvent> = (event: T) => void | Promise<void>;
export type EventBusErrorHandler = (error: unknown, event: AppEvent) => void;

export interface EventBus {
  publish(event: AppEvent, opts?: { async?: boolean }): void;
  subscribe<K extends AppEventType>(type: K, handler: EventHandler<EventOf<K>>): () => void;
  subscribeOnce<K extends AppEventType>(type: K, handler: EventHandler<EventOf<K>>): () => void;
  has(type: AppEventType): boolean;
  clear(): void;
  flush(): Promise<void>;
}

function defaultErrorHandler(error: unknown, event: AppEvent) {
  logCat('ERROR', 'EVENT', 'handler failed', { type: event.type, error: errorMessage(error) });
}

export class InMemoryEventBus implements EventBus {
  private handlers = new Map<AppEventType, Set<EventHandler>>();
  private onError: EventBusErrorHandler = defaultErrorHandler;

  setErrorHandler(h: EventBusErrorHandler) { this.onError = h; }

  private invoke(handler: EventHandler, event: AppEvent) {
    try {
      const r = handler(event);
      if (r instanceof Promise) r.catch((err: unknown) => this.onError(err, event));
    } catch (err) {
      this.onError(err, event);
    }
  }

  has(type: AppEventType): boolean { const set = this.handlers.get(type); return !!(set && set.size > 0); }

  /**
   * Delivers to a snapshot of the current handlers. Async (microtask) by default;
   * pass `{ async: false }` when the caller reads handler side effects right after.
   */
  publish(evt: AppEvent, opts?: { async?: boolean }): void {
    if (!evt.eventId) evt.eventId = `${Date.now()}-${Math.random().toString(36).slice(2, 10)}`;
    const set = this.handlers.get(evt.type);
    if (!set || set.size === 0) return;
    const handlers = Array.from(set);
    const call = () => { for (const h of handlers) this.invoke(h, evt); };
    if (opts?.async === false) { call(); return; }
    queueMicrotask(call);
  }

  private add(type: AppEventType, h: EventHandler): Set<EventHandler> {
    let set = this.handlers.get(type);
    if (!set) { set = new Set(); this.handlers.set(type, set); }
    set.add(h);
    return set;
  }

  subscribe<K extends AppEventType>(type: K, handler: EventHandler<EventOf<K>>): () => void {
    const isK = (ev: AppEvent): ev is EventOf<K> => ev.type === type;
    const wrapper: EventHandler = (ev) => { if (isK(ev)) return handler(ev); };
    const set = this.add(type, wrapper);
    return () => { set.delete(wrapper); };
  }

  subscribeOnce<K extends AppEventType>(type: K, handler: EventHandler<EventOf<K>>): () => void {
    const isK = (ev: AppEvent): ev is EventOf<K> => ev.type === type;
    const wrapper: EventHandler = (ev) => {
      set.delete(wrapper);
      if (isK(ev)) return handler(ev);
    };
    const set = this.add(type, wrapper);
    return () => { set.delete(wrapper); };
  }

  async flush(): Promise<void> { await new Promise((res) => setTimeout(res, 0)); }

  /** Removes all event handlers from the bus. */
  clear() { this.handlers.clear(); }
}

let _bus: EventBus | undefined;
export function getEventBus(): EventBus {
  if (!_bus) _bus = new InMemoryEventBus();
  return _bus;
}
export function setEventBus(bus: EventBus) { _bus = bus; }

/**
 * Sets the handler called when a subscriber throws or rejects.
 * Only works with the default InMemoryEventBus implementation.
 */
export function setEventBusErrorHandler(handler: EventBusErrorHandler) {
  const bus = getEventBus();
  if (bus instanceof InMemoryEventBus) bus.setErrorHandler(handler);
}

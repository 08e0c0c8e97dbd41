export { getEventBus, setEventBus, setEventBusErrorHandler, InMemoryEventBus } from './bus';
export type { EventBus, EventHandler, EventBusErrorHandler } from './bus';
export * from './types';
export { registerLoggerSubscriber } from './subscribers/logger-subscriber';
export { registerSpikeSubscriber } from './subscribers/spike-subscriber';

export { TypedEventEmitter } from './typed-event-emitter.js';
export type { EventListener, EventListenerOptions } from './typed-event-emitter.js';
export { LifecycleEventBus } from './lifecycle-event-bus.js';
export type { LifecycleEventBusOptions } from './lifecycle-event-bus.js';
export type { LifecycleEventMap, LifecycleEventName } from './event-types.js';

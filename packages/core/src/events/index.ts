export {
  EventBus,
  createEventBus,
  type BusEvent,
  type EventBusConfig,
  type EventBusDiagnostic,
  type EventHandler,
} from './event-bus.js';

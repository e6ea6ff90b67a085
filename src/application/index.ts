export { Dispatcher, orderByPriority } from './dispatcher.js';
export type { DispatcherOptions } from './dispatcher.js';
export { SubscriptionRegistry } from './registry.js';
export { createEvent } from './event-factory.js';
export {
  subscribeOptionsSchema,
  bulkSubscribeOptionsSchema,
  eventInputSchema,
  dispatchableEventSchema,
} from './schemas.js';
export type { SubscribeOptions, BulkSubscribeOptions, EventInput } from './schemas.js';

export { GLOBAL, LOCAL } from './constants.js';
export { EventData, sameEvent } from './event.js';
export type { Event, EventPayload } from './event.js';
export type { IdGenerator } from './ids.js';
export type { EventHandler, EventSelector, Subscription } from './subscription.js';
export { Notification } from './notification.js';
export type { HandlerFailure, NotificationInit, NotificationStatus } from './notification.js';
export {
  DispatcherError,
  ConfigurationError,
  InvalidHandlerError,
  DuplicateSubscriptionCodeError,
  SubscriptionLookupError,
  SubscriptionNotFoundError,
  DispatchFormatError,
  AmbiguousResultError,
  HandlerTimeoutError,
  NotificationFailedError,
  BulkSubscribeError,
} from './errors.js';
export type { BulkSubscribeFailure } from './errors.js';

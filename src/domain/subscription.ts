import type { Event } from './event.js';

/**
 * Handler invoked for every matching dispatch.
 *
 * Receives the event followed by whatever extra arguments the caller
 * passed to `dispatch()`. The return value is recorded in the notification.
 */
export type EventHandler = (event: Event, ...args: unknown[]) => unknown;

/**
 * What a subscription listens to: an event code, an Event (its code is
 * used), or `null` for every event dispatched to the namespace.
 */
export type EventSelector = string | Event | null;

/**
 * A registered handler.
 *
 * Identity is `code` alone: the same handler subscribed twice yields two
 * subscriptions, each removable on its own. Never mutated after creation.
 */
export interface Subscription {
  readonly code: string;
  /** `null` when the subscription covers every event in its namespace. */
  readonly eventCode: string | null;
  readonly handler: EventHandler;
  /** Key under which the handler's result lands in a notification. */
  readonly handlerName: string;
  readonly namespace: string;
  /** Advisory only: stored and reported, never acted on. */
  readonly persistent: boolean;
  /** Higher runs earlier. */
  readonly priority: number;
  readonly createdAt: string; // ISO-8601
}

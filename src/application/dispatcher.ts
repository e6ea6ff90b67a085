import type { Logger } from 'pino';
import {
  BulkSubscribeError,
  ConfigurationError,
  DispatchFormatError,
  DispatcherError,
  HandlerTimeoutError,
  InvalidHandlerError,
  Notification,
  SubscriptionLookupError,
  SubscriptionNotFoundError,
} from '../domain/index.js';
import type {
  BulkSubscribeFailure,
  Event,
  EventHandler,
  EventSelector,
  HandlerFailure,
  IdGenerator,
  Subscription,
} from '../domain/index.js';
import { SequentialIdGenerator, createLogger, resolveDispatcherConfig } from '../infrastructure/index.js';
import type { DispatcherConfig } from '../infrastructure/index.js';
import { broadcast } from './bulk.js';
import { SubscriptionRegistry } from './registry.js';
import {
  bulkSubscribeOptionsSchema,
  describeIssues,
  dispatchableEventSchema,
  namespaceSchema,
  subscribeOptionsSchema,
} from './schemas.js';
import type { BulkSubscribeOptions, SubscribeOptions } from './schemas.js';
import { withTimeout } from './timeout.js';

export interface DispatcherOptions {
  readonly config?: Partial<DispatcherConfig>;
  readonly logger?: Logger;
  readonly registry?: SubscriptionRegistry;
  readonly ids?: IdGenerator;
  /** Clock for notification timestamps (epoch ms). Injectable for tests. */
  readonly nowFn?: () => number;
}

/** Result of running one handler: its value, or the failure it produced. */
type Invocation =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly failure: HandlerFailure };

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function'
  );
}

/** Message for whatever a handler threw. Never throws itself. */
function describeThrown(err: unknown): string {
  if (err instanceof Error) return err.message;
  try {
    return String(err);
  } catch {
    // null-prototype objects, or a toString that throws
    return Object.prototype.toString.call(err);
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Orders subscriptions for invocation: priority descending, then
 * registration order. `Array.prototype.sort` is stable, and the input
 * arrives in registration order from the registry, so equal priorities
 * keep that order.
 */
export function orderByPriority(subscriptions: readonly Subscription[]): Subscription[] {
  return [...subscriptions].sort((a, b) => b.priority - a.priority);
}

/**
 * Publish/subscribe coordinator.
 *
 * Owns one SubscriptionRegistry. `dispatch()` resolves matching
 * subscriptions, runs them in priority order and folds every outcome into
 * a Notification. A handler that throws never stops the others and never
 * makes `dispatch()` throw; only malformed input to the dispatcher itself
 * raises.
 */
export class Dispatcher {
  private readonly config: DispatcherConfig;
  private readonly log: Logger;
  private readonly registry: SubscriptionRegistry;
  private readonly ids: IdGenerator;
  private readonly nowFn: () => number;

  constructor(options: DispatcherOptions = {}) {
    this.config = resolveDispatcherConfig(options.config);
    this.log = options.logger ?? createLogger(this.config);
    this.registry = options.registry ?? new SubscriptionRegistry();
    this.ids = options.ids ?? new SequentialIdGenerator();
    this.nowFn = options.nowFn ?? Date.now;
  }

  // --------------------------------------------------
  // Subscribe
  // --------------------------------------------------

  /**
   * Registers `handler` for `event` and returns the subscription code.
   *
   * `event` may be an event code, an Event (its code is used), or `null`
   * to receive every event dispatched to the namespace.
   */
  subscribe(event: EventSelector, handler: EventHandler, options: SubscribeOptions = {}): string {
    if (typeof handler !== 'function') {
      throw new InvalidHandlerError(describeType(handler));
    }

    const parsed = subscribeOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError('Invalid subscribe options', describeIssues(parsed.error));
    }
    const { namespace, persistent, priority, name } = parsed.data;

    const code = this.ids.nextCode();
    const subscription: Subscription = Object.freeze({
      code,
      eventCode: this.resolveEventCode(event),
      handler,
      handlerName: name ?? (handler.name || code),
      namespace: namespace ?? this.config.defaultNamespace,
      persistent,
      priority,
      createdAt: new Date(this.nowFn()).toISOString(),
    });

    this.registry.add(subscription);

    this.log.debug(
      {
        subscription_code: code,
        event_code: subscription.eventCode,
        namespace: subscription.namespace,
        handler: subscription.handlerName,
        priority,
        persistent,
      },
      'Subscription added',
    );

    return code;
  }

  /**
   * Subscribes several (event, handler) pairs at once.
   *
   * `handlers` and every option accept either one value for all entries or
   * a list aligned with `events`. A length mismatch raises
   * ConfigurationError before anything is registered. Entries are then
   * applied one by one; rejected entries are collected and reported
   * together in a BulkSubscribeError while the valid ones stay registered.
   */
  bulkSubscribe(
    events: readonly EventSelector[],
    handlers: EventHandler | readonly EventHandler[],
    options: BulkSubscribeOptions = {},
  ): string[] {
    if (!Array.isArray(events)) {
      throw new ConfigurationError('Bulk subscribe expects a list of events');
    }
    const parsed = bulkSubscribeOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError('Invalid bulk subscribe options', describeIssues(parsed.error));
    }

    const count = events.length;
    const handlerList = broadcast<EventHandler>(handlers, count, 'handlers');
    const namespaces = broadcast(
      parsed.data.namespaces ?? this.config.defaultNamespace,
      count,
      'namespaces',
    );
    const persistents = broadcast(parsed.data.persistents, count, 'persistents');
    const priorities = broadcast(parsed.data.priorities, count, 'priorities');

    const codes: (string | null)[] = [];
    const failures: BulkSubscribeFailure[] = [];

    for (const [index, event] of events.entries()) {
      try {
        const handler = handlerList[index];
        if (handler === undefined) {
          throw new InvalidHandlerError('undefined');
        }
        codes.push(
          this.subscribe(event, handler, {
            namespace: namespaces[index],
            persistent: persistents[index],
            priority: priorities[index],
          }),
        );
      } catch (err: unknown) {
        if (!(err instanceof DispatcherError)) throw err;
        codes.push(null);
        failures.push({ index, error: err });
      }
    }

    if (failures.length > 0) {
      throw new BulkSubscribeError(failures, codes);
    }
    return codes.filter((c): c is string => c !== null);
  }

  // --------------------------------------------------
  // Unsubscribe
  // --------------------------------------------------

  /**
   * Removes the subscription matching exactly (event, handler, namespace).
   * When the same triple was registered more than once, the oldest goes.
   * Returns the removed subscription's code.
   */
  unsubscribe(event: EventSelector, handler: EventHandler, namespace?: string): string {
    const ns = namespace ?? this.config.defaultNamespace;
    const eventCode = this.resolveEventCode(event);
    const match = this.registry
      .findByNamespace(ns)
      .find((s) => s.eventCode === eventCode && s.handler === handler);

    if (match === undefined) {
      throw new SubscriptionLookupError(
        `No subscription of '${handler.name || 'anonymous'}' to ${eventCode ?? 'all events'} in namespace '${ns}'`,
      );
    }
    this.registry.removeByCode(match.code);
    this.logRemoval([match], 'unsubscribe');
    return match.code;
  }

  /** Throws SubscriptionNotFoundError (a SubscriptionLookupError) for an unknown code. */
  unsubscribeByCode(code: string): Subscription {
    const removed = this.registry.removeByCode(code);
    this.logRemoval([removed], 'code');
    return removed;
  }

  /** Removes every subscription of `handler`. Returns the count, 0 when none matched. */
  unsubscribeByFunction(handler: EventHandler, namespace?: string): number {
    const removed = this.registry.removeByHandler(handler, namespace);
    this.logRemoval(removed, 'function');
    return removed.length;
  }

  unsubscribeByNamespace(namespace: string): number {
    const removed = this.registry.removeByNamespace(namespace);
    this.logRemoval(removed, 'namespace');
    return removed.length;
  }

  /**
   * Removes every subscription bound to the event's code (optionally within
   * one namespace). Throws SubscriptionLookupError when none existed.
   */
  unsubscribeByEvent(event: string | Event, namespace?: string): number {
    const eventCode = this.resolveEventCode(event);
    if (eventCode === null) {
      throw new ConfigurationError('unsubscribeByEvent needs an event code; use unsubscribeByNamespace');
    }
    const removed = this.registry.removeByEvent(eventCode, namespace);
    if (removed.length === 0) {
      throw new SubscriptionLookupError(`No subscription bound to event '${eventCode}'`);
    }
    this.logRemoval(removed, 'event');
    return removed.length;
  }

  unsubscribeAll(): number {
    const removed = this.registry.removeAll();
    this.log.debug({ removed }, 'All subscriptions removed');
    return removed;
  }

  // --------------------------------------------------
  // Queries
  // --------------------------------------------------

  getSubscriptionsByEvent(event: string | Event, namespace?: string): Subscription[] {
    const eventCode = this.resolveEventCode(event);
    return eventCode === null ? [] : this.registry.findByEvent(eventCode, namespace);
  }

  getSubscriptionsByFunction(handler: EventHandler, namespace?: string): Subscription[] {
    return this.registry.findByHandler(handler, namespace);
  }

  getSubscriptionsByNamespace(namespace: string): Subscription[] {
    return this.registry.findByNamespace(namespace);
  }

  getSubscriptionByCode(code: string): Subscription {
    const subscription = this.registry.findByCode(code);
    if (subscription === undefined) {
      throw new SubscriptionNotFoundError(code);
    }
    return subscription;
  }

  /** Subscriptions flagged persistent, for an external layer that reloads them. */
  getPersistentSubscriptions(): Subscription[] {
    return this.registry.findPersistent();
  }

  get subscriptionCount(): number {
    return this.registry.size;
  }

  // --------------------------------------------------
  // Dispatch
  // --------------------------------------------------

  /**
   * Runs every handler subscribed to `event.code` (or to the whole
   * namespace) synchronously, highest priority first, passing `args`
   * after the event.
   *
   * Handlers returning a promise are recorded as failures; use
   * `dispatchAsync()` for those.
   */
  dispatch(event: Event, namespace?: string, ...args: unknown[]): Notification {
    const ns = this.validateDispatch(event, namespace);
    const start = this.nowFn();
    const matches = orderByPriority(this.registry.find(ns, event.code));

    const content = new Map<string, unknown>();
    const errors: HandlerFailure[] = [];

    for (const subscription of matches) {
      const outcome = this.invoke(subscription, event, ns, args);
      if (outcome.ok) {
        content.set(subscription.handlerName, outcome.value);
      } else {
        errors.push(outcome.failure);
      }
    }

    return this.buildNotification(event, ns, start, matches.length, content, errors);
  }

  /**
   * Like `dispatch()`, but awaits each handler in turn. Rejections and
   * per-handler timeouts (`handlerTimeoutMs`) become failures.
   */
  async dispatchAsync(event: Event, namespace?: string, ...args: unknown[]): Promise<Notification> {
    const ns = this.validateDispatch(event, namespace);
    const start = this.nowFn();
    const matches = orderByPriority(this.registry.find(ns, event.code));

    const content = new Map<string, unknown>();
    const errors: HandlerFailure[] = [];

    for (const subscription of matches) {
      const outcome = await this.invokeAsync(subscription, event, ns, args);
      if (outcome.ok) {
        content.set(subscription.handlerName, outcome.value);
      } else {
        errors.push(outcome.failure);
      }
    }

    return this.buildNotification(event, ns, start, matches.length, content, errors);
  }

  // --------------------------------------------------
  // Internals
  // --------------------------------------------------

  private invoke(subscription: Subscription, event: Event, namespace: string, args: unknown[]): Invocation {
    let value: unknown;
    try {
      value = subscription.handler(event, ...args);
    } catch (err: unknown) {
      return { ok: false, failure: this.recordFailure(subscription, event, namespace, err) };
    }

    if (isPromiseLike(value)) {
      void Promise.resolve(value).catch((err: unknown) => {
        this.log.warn(
          { err, subscription_code: subscription.code, handler: subscription.handlerName, namespace },
          'Asynchronous handler rejected after synchronous dispatch',
        );
      });
      const misuse = new DispatcherError(
        `Handler '${subscription.handlerName}' returned a promise; use dispatchAsync() for asynchronous handlers`,
      );
      return { ok: false, failure: this.recordFailure(subscription, event, namespace, misuse) };
    }

    return { ok: true, value };
  }

  private async invokeAsync(
    subscription: Subscription,
    event: Event,
    namespace: string,
    args: unknown[],
  ): Promise<Invocation> {
    const timeoutMs = this.config.handlerTimeoutMs;
    try {
      const value = await withTimeout(
        Promise.resolve().then(() => subscription.handler(event, ...args)),
        timeoutMs,
        () => new HandlerTimeoutError(subscription.handlerName, timeoutMs),
      );
      return { ok: true, value };
    } catch (err: unknown) {
      return { ok: false, failure: this.recordFailure(subscription, event, namespace, err) };
    }
  }

  private recordFailure(
    subscription: Subscription,
    event: Event,
    namespace: string,
    err: unknown,
  ): HandlerFailure {
    const message = describeThrown(err);
    const stack = this.config.captureStackTraces && err instanceof Error ? err.stack : undefined;

    this.log.warn(
      {
        err,
        subscription_code: subscription.code,
        handler: subscription.handlerName,
        namespace,
        event_code: event.code,
      },
      'Event handler failed',
    );

    return {
      subscriptionCode: subscription.code,
      handler: subscription.handlerName,
      namespace,
      message,
      error: err,
      stack,
    };
  }

  private buildNotification(
    event: Event,
    namespace: string,
    start: number,
    handlerCount: number,
    content: Map<string, unknown>,
    errors: HandlerFailure[],
  ): Notification {
    const notification = new Notification({
      id: this.ids.nextId(),
      event,
      namespace,
      start,
      end: this.nowFn(),
      content,
      errors,
    });

    this.log.debug(
      {
        notification_id: notification.id,
        event_code: event.code,
        namespace,
        handlers: handlerCount,
        failed: errors.length,
        duration_ms: notification.duration,
      },
      'Event dispatched',
    );

    return notification;
  }

  private validateDispatch(event: Event, namespace: string | undefined): string {
    const parsedEvent = dispatchableEventSchema.safeParse(event);
    if (!parsedEvent.success) {
      throw new DispatchFormatError(describeIssues(parsedEvent.error));
    }
    const ns = namespace ?? this.config.defaultNamespace;
    const parsedNamespace = namespaceSchema.safeParse(ns);
    if (!parsedNamespace.success) {
      throw new DispatchFormatError(
        describeIssues(parsedNamespace.error).map((issue) => `namespace ${issue}`),
      );
    }
    return ns;
  }

  private resolveEventCode(event: EventSelector): string | null {
    if (event === null) return null;
    if (typeof event === 'string') {
      if (event.length === 0) {
        throw new ConfigurationError('Event code must be a non-empty string');
      }
      return event;
    }
    if (typeof event === 'object' && typeof event.code === 'string' && event.code.length > 0) {
      return event.code;
    }
    throw new ConfigurationError(
      `Event must be a non-empty code, an Event or null, received ${describeType(event)}`,
    );
  }

  private logRemoval(removed: readonly Subscription[], by: string): void {
    if (removed.length === 0) return;
    this.log.debug(
      { removed: removed.length, by, subscription_codes: removed.map((s) => s.code) },
      'Subscriptions removed',
    );
  }
}

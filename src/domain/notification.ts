import type { Event } from './event.js';
import { AmbiguousResultError, NotificationFailedError } from './errors.js';

export type NotificationStatus = 'success' | 'failure';

/** One handler that threw (or rejected, or timed out) during a dispatch. */
export interface HandlerFailure {
  readonly subscriptionCode: string;
  readonly handler: string;
  readonly namespace: string;
  readonly message: string;
  /** The thrown value, unchanged. */
  readonly error: unknown;
  readonly stack?: string | undefined;
}

export interface NotificationInit {
  readonly id: number;
  readonly event: Event;
  readonly namespace: string;
  readonly start: number; // epoch ms
  readonly end: number; // epoch ms
  readonly content: ReadonlyMap<string, unknown>;
  readonly errors: readonly HandlerFailure[];
}

/**
 * Outcome of a single dispatch.
 *
 * `status` is derived, never supplied: it is `failure` exactly when
 * `errors` is non-empty. Content and errors are copied on construction
 * and the instance is frozen.
 */
export class Notification {
  readonly id: number;
  readonly event: Event;
  readonly namespace: string;
  readonly start: number;
  readonly end: number;
  /** Milliseconds, never negative even if the clock stepped back. */
  readonly duration: number;
  readonly status: NotificationStatus;
  readonly errors: readonly HandlerFailure[];
  private readonly results: ReadonlyMap<string, unknown>;

  constructor(init: NotificationInit) {
    this.id = init.id;
    this.event = init.event;
    this.namespace = init.namespace;
    this.start = init.start;
    this.end = init.end;
    this.duration = Math.max(0, init.end - init.start);
    this.errors = Object.freeze([...init.errors]);
    this.status = this.errors.length > 0 ? 'failure' : 'success';
    this.results = new Map(init.content);
    Object.freeze(this);
  }

  /** Handler name → return value, in invocation order. Returns a copy. */
  get content(): ReadonlyMap<string, unknown> {
    return new Map(this.results);
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  has(handlerName: string): boolean {
    return this.results.has(handlerName);
  }

  get(handlerName: string): unknown {
    return this.results.get(handlerName);
  }

  getFunctionNames(): string[] {
    return [...this.results.keys()];
  }

  getFunctionResults(): unknown[] {
    return [...this.results.values()];
  }

  /** For namespaces expected to hold a single handler. */
  getOneAndOnlyResult(): unknown {
    if (this.results.size !== 1) {
      throw new AmbiguousResultError(this.results.size);
    }
    const [only] = this.results.values();
    return only;
  }

  /** Returns true when every handler succeeded, throws otherwise. */
  ensureSuccess(): true {
    if (this.hasErrors()) {
      throw new NotificationFailedError(this.errors);
    }
    return true;
  }

  toJSON(): Record<string, unknown> {
    return {
      id: this.id,
      event: { id: this.event.id, name: this.event.name, code: this.event.code },
      namespace: this.namespace,
      status: this.status,
      started_at: new Date(this.start).toISOString(),
      ended_at: new Date(this.end).toISOString(),
      duration_ms: this.duration,
      content: Object.fromEntries(this.results),
      errors: this.errors.map((e) => ({
        subscription_code: e.subscriptionCode,
        handler: e.handler,
        message: e.message,
      })),
    };
  }
}

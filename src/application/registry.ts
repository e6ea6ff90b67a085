import { DuplicateSubscriptionCodeError, SubscriptionNotFoundError } from '../domain/index.js';
import type { EventHandler, Subscription } from '../domain/index.js';

interface RegistryEntry {
  readonly subscription: Subscription;
  /** Registration order, used to break priority ties. */
  readonly sequence: number;
}

type Bucket = Map<string, RegistryEntry>;

/** Index key for a (namespace, event code) pair. `null` marks namespace-wide subscriptions. */
function eventKey(namespace: string, eventCode: string | null): string {
  return JSON.stringify([namespace, eventCode]);
}

function bucketFor(index: Map<string, Bucket>, key: string): Bucket {
  let bucket = index.get(key);
  if (bucket === undefined) {
    bucket = new Map();
    index.set(key, bucket);
  }
  return bucket;
}

function bySequence(a: RegistryEntry, b: RegistryEntry): number {
  return a.sequence - b.sequence;
}

/**
 * Store of live subscriptions, indexed three ways:
 *
 * - code → entry (lookup and removal by handle)
 * - namespace → entries (namespace queries and removal)
 * - (namespace, event code) → entries (dispatch matching)
 *
 * Every mutation updates all three before returning. Because Node.js is
 * single-threaded and no method awaits, a caller never observes a
 * half-applied add or remove. Queries return fresh arrays, so a dispatch
 * iterating its result is unaffected by handlers that subscribe or
 * unsubscribe while it runs.
 *
 * Buckets are Maps, which iterate in insertion order; within a bucket
 * that is also sequence order.
 */
export class SubscriptionRegistry {
  private readonly byCode: Bucket = new Map();
  private readonly byNamespace: Map<string, Bucket> = new Map();
  private readonly byEvent: Map<string, Bucket> = new Map();
  private sequence = 0;

  add(subscription: Subscription): void {
    if (this.byCode.has(subscription.code)) {
      throw new DuplicateSubscriptionCodeError(subscription.code);
    }
    const entry: RegistryEntry = { subscription, sequence: this.sequence++ };

    this.byCode.set(subscription.code, entry);
    bucketFor(this.byNamespace, subscription.namespace).set(subscription.code, entry);
    bucketFor(this.byEvent, eventKey(subscription.namespace, subscription.eventCode)).set(
      subscription.code,
      entry,
    );
  }

  /** Removes one subscription. Throws SubscriptionNotFoundError when the code is unknown. */
  removeByCode(code: string): Subscription {
    const entry = this.byCode.get(code);
    if (entry === undefined) {
      throw new SubscriptionNotFoundError(code);
    }
    this.detach(entry);
    return entry.subscription;
  }

  /** Removes every subscription of `handler`, optionally within one namespace. No match is not an error. */
  removeByHandler(handler: EventHandler, namespace?: string): Subscription[] {
    return this.detachAll(this.findByHandler(handler, namespace));
  }

  removeByNamespace(namespace: string): Subscription[] {
    return this.detachAll(this.findByNamespace(namespace));
  }

  /** Removes subscriptions bound to exactly `eventCode` (namespace-wide ones are kept). */
  removeByEvent(eventCode: string, namespace?: string): Subscription[] {
    return this.detachAll(this.findByEvent(eventCode, namespace));
  }

  /** Clears every index. Returns how many subscriptions were dropped. */
  removeAll(): number {
    const removed = this.byCode.size;
    this.byCode.clear();
    this.byNamespace.clear();
    this.byEvent.clear();
    return removed;
  }

  /**
   * Subscriptions that fire for `eventCode` in `namespace`: those bound to
   * that code plus the namespace-wide ones, in registration order.
   */
  find(namespace: string, eventCode: string): Subscription[] {
    const exact = this.byEvent.get(eventKey(namespace, eventCode));
    const wide = this.byEvent.get(eventKey(namespace, null));
    const entries = [...(exact?.values() ?? []), ...(wide?.values() ?? [])];
    return entries.sort(bySequence).map((e) => e.subscription);
  }

  findByCode(code: string): Subscription | undefined {
    return this.byCode.get(code)?.subscription;
  }

  findByHandler(handler: EventHandler, namespace?: string): Subscription[] {
    return this.scan(namespace, (s) => s.handler === handler);
  }

  findByNamespace(namespace: string): Subscription[] {
    return this.scan(namespace, () => true);
  }

  /** Subscriptions bound to exactly `eventCode`, across namespaces unless one is given. */
  findByEvent(eventCode: string, namespace?: string): Subscription[] {
    if (namespace !== undefined) {
      const bucket = this.byEvent.get(eventKey(namespace, eventCode));
      return bucket ? [...bucket.values()].map((e) => e.subscription) : [];
    }
    return this.scan(undefined, (s) => s.eventCode === eventCode);
  }

  findPersistent(): Subscription[] {
    return this.scan(undefined, (s) => s.persistent);
  }

  /** Namespaces holding at least one subscription, in first-registration order. */
  namespaces(): string[] {
    return [...this.byNamespace.keys()];
  }

  get size(): number {
    return this.byCode.size;
  }

  private scan(namespace: string | undefined, predicate: (s: Subscription) => boolean): Subscription[] {
    const source = namespace === undefined ? this.byCode : this.byNamespace.get(namespace);
    if (source === undefined) return [];

    const matches: Subscription[] = [];
    for (const entry of source.values()) {
      if (predicate(entry.subscription)) {
        matches.push(entry.subscription);
      }
    }
    return matches;
  }

  private detachAll(subscriptions: Subscription[]): Subscription[] {
    for (const subscription of subscriptions) {
      const entry = this.byCode.get(subscription.code);
      if (entry !== undefined) this.detach(entry);
    }
    return subscriptions;
  }

  private detach(entry: RegistryEntry): void {
    const { code, namespace, eventCode } = entry.subscription;
    this.byCode.delete(code);
    this.deleteFrom(this.byNamespace, namespace, code);
    this.deleteFrom(this.byEvent, eventKey(namespace, eventCode), code);
  }

  private deleteFrom(index: Map<string, Bucket>, key: string, code: string): void {
    const bucket = index.get(key);
    if (bucket === undefined) return;
    bucket.delete(code);
    if (bucket.size === 0) {
      index.delete(key);
    }
  }
}

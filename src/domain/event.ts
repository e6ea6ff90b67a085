/**
 * Core event model.
 *
 * An event's identity (`id`, `uuid`, `name`, `code`) never changes after
 * construction. Only its payload, reached through `data`, is mutable.
 */

/** Plain key/value payload as supplied by a producer. */
export type EventPayload = Record<string, unknown>;

/**
 * Mutable payload store owned by an event.
 *
 * Backed by a Map so key order is insertion order, including for keys
 * that look like integers.
 */
export class EventData {
  private readonly entries: Map<string, unknown>;

  constructor(initial: EventPayload = {}) {
    this.entries = new Map(Object.entries(initial));
  }

  get(key: string): unknown {
    return this.entries.get(key);
  }

  set(key: string, value: unknown): void {
    this.entries.set(key, value);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  isEmpty(): boolean {
    return this.entries.size === 0;
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  toJSON(): EventPayload {
    return Object.fromEntries(this.entries);
  }
}

/**
 * Canonical Event entity.
 *
 * `code` is the key subscriptions match against; when a producer gives
 * none it equals `name`.
 */
export interface Event {
  readonly id: number;
  readonly uuid: string;
  readonly name: string;
  readonly code: string;
  readonly data: EventData;
}

/** Two events are the same when code, id and name all match. */
export function sameEvent(a: Event, b: Event): boolean {
  return a.code === b.code && a.id === b.id && a.name === b.name;
}

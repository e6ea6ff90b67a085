import { vi } from 'vitest';
import type { Logger } from 'pino';
import { Dispatcher, SubscriptionRegistry, createEvent } from '../src/application/index.js';
import type { DispatcherOptions, EventInput } from '../src/application/index.js';
import type { Event } from '../src/domain/index.js';
import { SequentialIdGenerator } from '../src/infrastructure/index.js';

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

/** Id generator with readable codes: `sub-1`, `sub-2`, ... */
export function predictableIds(start = 1): SequentialIdGenerator {
  let counter = 0;
  return new SequentialIdGenerator(start, () => `sub-${++counter}`);
}

/** Fixed "now" for deterministic notification timestamps. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z').getTime();

/**
 * Dispatcher with a fake logger, fresh registry, predictable codes and a
 * frozen clock. Override any option via the parameter.
 */
export function makeDispatcher(overrides: DispatcherOptions = {}) {
  const log = overrides.logger ?? fakeLogger();
  const registry = overrides.registry ?? new SubscriptionRegistry();
  const dispatcher = new Dispatcher({
    nowFn: () => FIXED_NOW,
    ids: predictableIds(),
    ...overrides,
    logger: log,
    registry,
  });
  return { dispatcher, log, registry };
}

export function makeEvent(overrides: Partial<EventInput> = {}): Event {
  return createEvent({
    name: overrides.name ?? 'page_view',
    code: overrides.code,
    data: overrides.data ?? { url: '/home' },
  });
}

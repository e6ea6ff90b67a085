import { describe, it, expect } from 'vitest';
import { EventData, sameEvent } from '../../src/domain/index.js';
import type { Event } from '../../src/domain/index.js';

function plainEvent(overrides: Partial<Event> = {}): Event {
  return {
    id: overrides.id ?? 1,
    uuid: overrides.uuid ?? 'uuid-1',
    name: overrides.name ?? 'signup',
    code: overrides.code ?? 'signup',
    data: overrides.data ?? new EventData(),
  };
}

describe('EventData', () => {
  it('starts from the initial payload', () => {
    const data = new EventData({ name: 'Alice', age: 30 });
    expect(data.get('name')).toBe('Alice');
    expect(data.size).toBe(2);
    expect(data.isEmpty()).toBe(false);
  });

  it('supports set, has and delete', () => {
    const data = new EventData();
    data.set('plan', 'pro');
    expect(data.has('plan')).toBe(true);
    expect(data.delete('plan')).toBe(true);
    expect(data.has('plan')).toBe(false);
    expect(data.delete('plan')).toBe(false);
  });

  it('clear() empties the store', () => {
    const data = new EventData({ a: 1, b: 2 });
    data.clear();
    expect(data.isEmpty()).toBe(true);
    expect(data.get('a')).toBeUndefined();
  });

  it('keeps insertion order, including integer-like keys', () => {
    const data = new EventData();
    data.set('b', 1);
    data.set('10', 2);
    data.set('a', 3);
    expect(data.keys()).toEqual(['b', '10', 'a']);
  });

  it('does not share state with the initial object', () => {
    const payload: Record<string, unknown> = { x: 1 };
    const data = new EventData(payload);
    payload['x'] = 2;
    data.set('y', 3);
    expect(data.get('x')).toBe(1);
    expect(payload['y']).toBeUndefined();
  });

  it('toJSON() returns a plain object', () => {
    const data = new EventData({ name: 'Alice' });
    expect(data.toJSON()).toEqual({ name: 'Alice' });
  });
});

describe('sameEvent', () => {
  it('is true when code, id and name match', () => {
    expect(sameEvent(plainEvent(), plainEvent({ uuid: 'other', data: new EventData({ a: 1 }) }))).toBe(true);
  });

  it('is false when any identity field differs', () => {
    expect(sameEvent(plainEvent(), plainEvent({ id: 2 }))).toBe(false);
    expect(sameEvent(plainEvent(), plainEvent({ code: 'other' }))).toBe(false);
    expect(sameEvent(plainEvent(), plainEvent({ name: 'other' }))).toBe(false);
  });
});

import { describe, it, expect } from 'vitest';
import { createEvent } from '../../src/application/index.js';
import { ConfigurationError, EventData } from '../../src/domain/index.js';
import { SequentialIdGenerator } from '../../src/infrastructure/index.js';

describe('createEvent', () => {
  it('builds an event from an injected generator', () => {
    const event = createEvent({ name: 'signup', data: { plan: 'pro' } }, new SequentialIdGenerator(5, () => 'uuid-x'));

    expect(event.id).toBe(5);
    expect(event.uuid).toBe('uuid-x');
    expect(event.name).toBe('signup');
    expect(event.code).toBe('signup');
    expect(event.data).toBeInstanceOf(EventData);
    expect(event.data.toJSON()).toEqual({ plan: 'pro' });
  });

  it('keeps an explicit code', () => {
    const event = createEvent({ name: 'User Signed Up', code: 'signup' });
    expect(event.code).toBe('signup');
    expect(event.name).toBe('User Signed Up');
  });

  it('defaults data to an empty store', () => {
    expect(createEvent({ name: 'ping' }).data.isEmpty()).toBe(true);
  });

  it('hands out increasing ids from the shared generator', () => {
    const first = createEvent({ name: 'ping' });
    const second = createEvent({ name: 'ping' });
    expect(second.id).toBe(first.id + 1);
    expect(second.uuid).not.toBe(first.uuid);
  });

  it('freezes the event but leaves its data mutable', () => {
    const event = createEvent({ name: 'ping' });
    expect(Object.isFrozen(event)).toBe(true);
    event.data.set('seen', true);
    expect(event.data.get('seen')).toBe(true);
  });

  it('rejects an empty name', () => {
    expect(() => createEvent({ name: '' })).toThrow(ConfigurationError);
    expect(() => createEvent({ name: '' })).toThrow('Invalid event input: name:');
  });
});

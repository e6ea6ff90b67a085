import { describe, it, expect } from 'vitest';
import { SequentialIdGenerator } from '../../src/infrastructure/index.js';

describe('SequentialIdGenerator', () => {
  it('counts up from 10000 by default', () => {
    const ids = new SequentialIdGenerator();
    expect(ids.nextId()).toBe(10000);
    expect(ids.nextId()).toBe(10001);
  });

  it('starts from a given value', () => {
    expect(new SequentialIdGenerator(7).nextId()).toBe(7);
  });

  it('produces random UUID codes by default', () => {
    const ids = new SequentialIdGenerator();
    const code = ids.nextCode();
    expect(code).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(ids.nextCode()).not.toBe(code);
  });

  it('delegates codes to the injected function', () => {
    const ids = new SequentialIdGenerator(1, () => 'fixed');
    expect(ids.nextCode()).toBe('fixed');
  });
});

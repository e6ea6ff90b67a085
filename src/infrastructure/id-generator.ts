import { randomUUID } from 'node:crypto';
import type { IdGenerator } from '../domain/index.js';

/**
 * Counter-backed integer ids plus random UUID codes.
 *
 * `uuidFn` is injectable so tests can force predictable (or colliding) codes.
 */
export class SequentialIdGenerator implements IdGenerator {
  private next: number;
  private readonly uuidFn: () => string;

  constructor(start: number = 10_000, uuidFn: () => string = randomUUID) {
    this.next = start;
    this.uuidFn = uuidFn;
  }

  nextId(): number {
    return this.next++;
  }

  nextCode(): string {
    return this.uuidFn();
  }
}

/** Shared by `createEvent()` when no generator is passed. */
export const defaultIdGenerator: IdGenerator = new SequentialIdGenerator();

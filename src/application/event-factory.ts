import { ConfigurationError, EventData } from '../domain/index.js';
import type { Event, IdGenerator } from '../domain/index.js';
import { defaultIdGenerator } from '../infrastructure/index.js';
import { describeIssues, eventInputSchema } from './schemas.js';
import type { EventInput } from './schemas.js';

/**
 * Builds a frozen Event.
 *
 * The payload is copied into a fresh EventData, so later changes to the
 * caller's object do not leak into the event (and vice versa).
 */
export function createEvent(input: EventInput, ids: IdGenerator = defaultIdGenerator): Event {
  const parsed = eventInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid event input', describeIssues(parsed.error));
  }
  const { name, code, data } = parsed.data;

  return Object.freeze({
    id: ids.nextId(),
    uuid: ids.nextCode(),
    name,
    code: code ?? name,
    data: new EventData(data),
  });
}

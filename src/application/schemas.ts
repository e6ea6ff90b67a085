import { z } from 'zod';
import { EventData } from '../domain/index.js';

export const namespaceSchema = z.string().min(1).max(255);

export const prioritySchema = z.number().int().safe();

/**
 * Options accepted by `subscribe()`.
 *
 * - `namespace` falls back to the dispatcher's configured default.
 * - `name` replaces the handler's declared name as its key in notifications.
 */
export const subscribeOptionsSchema = z
  .object({
    namespace: namespaceSchema.optional(),
    persistent: z.boolean().default(false),
    priority: prioritySchema.default(0),
    name: z.string().min(1).max(255).optional(),
  })
  .strict();

export type SubscribeOptions = z.input<typeof subscribeOptionsSchema>;

/** A value applied to every bulk entry, or one value per entry. */
function perEntry<T extends z.ZodTypeAny>(item: T) {
  return z.union([item, z.array(item)]);
}

export const bulkSubscribeOptionsSchema = z
  .object({
    namespaces: perEntry(namespaceSchema).optional(),
    persistents: perEntry(z.boolean()).default(false),
    priorities: perEntry(prioritySchema).default(0),
  })
  .strict();

export type BulkSubscribeOptions = z.input<typeof bulkSubscribeOptionsSchema>;

/** Inputs for `createEvent()`. `code` defaults to `name`. */
export const eventInputSchema = z.object({
  name: z.string().min(1).max(255),
  code: z.string().min(1).max(255).optional(),
  data: z.record(z.string(), z.unknown()).default({}),
});

export type EventInput = z.input<typeof eventInputSchema>;

/** Minimum an object must carry to be dispatched. */
export const dispatchableEventSchema = z.object({
  name: z.string().min(1),
  code: z.string().min(1),
  data: z.instanceof(EventData),
});

/** Flattens zod issues into `path: message` lines for error payloads. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

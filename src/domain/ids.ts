/**
 * Source of identifiers for events, subscriptions and notifications.
 *
 * Neither value may repeat for the lifetime of the dispatcher using it.
 */
export interface IdGenerator {
  /** Process-unique integer. */
  nextId(): number;
  /** Globally unique string, used as the public subscription handle. */
  nextCode(): string;
}

import type { HandlerFailure } from './notification.js';

/**
 * Base class for every error the dispatcher raises itself.
 *
 * Failures thrown by subscribed handlers are never wrapped in these;
 * they are recorded on the notification instead.
 */
export class DispatcherError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DispatcherError';
  }
}

/** Malformed options, selectors or bulk input. Nothing was registered for the offending item. */
export class ConfigurationError extends DispatcherError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: ErrorOptions) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class InvalidHandlerError extends DispatcherError {
  readonly receivedType: string;

  constructor(receivedType: string) {
    super(`Handler must be a function, received ${receivedType}`);
    this.name = 'InvalidHandlerError';
    this.receivedType = receivedType;
  }
}

/** The id generator repeated a code. Indicates a broken generator, not bad input. */
export class DuplicateSubscriptionCodeError extends DispatcherError {
  readonly code: string;

  constructor(code: string) {
    super(`Subscription code '${code}' is already registered`);
    this.name = 'DuplicateSubscriptionCodeError';
    this.code = code;
  }
}

export class SubscriptionLookupError extends DispatcherError {
  constructor(message: string) {
    super(message);
    this.name = 'SubscriptionLookupError';
  }
}

export class SubscriptionNotFoundError extends SubscriptionLookupError {
  readonly code: string;

  constructor(code: string) {
    super(`No subscription found with code '${code}'`);
    this.name = 'SubscriptionNotFoundError';
    this.code = code;
  }
}

/** The value passed to `dispatch()` is not a well-formed event. */
export class DispatchFormatError extends DispatcherError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Cannot dispatch malformed event: ${issues.join('; ')}`);
    this.name = 'DispatchFormatError';
    this.issues = issues;
  }
}

export class AmbiguousResultError extends DispatcherError {
  readonly resultCount: number;

  constructor(resultCount: number) {
    super(`Expected exactly one handler result, found ${resultCount}`);
    this.name = 'AmbiguousResultError';
    this.resultCount = resultCount;
  }
}

export class HandlerTimeoutError extends DispatcherError {
  readonly handler: string;
  readonly timeoutMs: number;

  constructor(handler: string, timeoutMs: number) {
    super(`Handler '${handler}' timed out after ${timeoutMs}ms`);
    this.name = 'HandlerTimeoutError';
    this.handler = handler;
    this.timeoutMs = timeoutMs;
  }
}

export class NotificationFailedError extends DispatcherError {
  readonly errors: readonly HandlerFailure[];

  constructor(errors: readonly HandlerFailure[]) {
    const handlers = errors.map((e) => e.handler).join(', ');
    super(`Dispatch finished with ${errors.length} failed handler(s): ${handlers}`);
    this.name = 'NotificationFailedError';
    this.errors = errors;
  }
}

export interface BulkSubscribeFailure {
  readonly index: number;
  readonly error: DispatcherError;
}

/**
 * Some entries of a bulk subscription were rejected.
 *
 * The valid entries were registered; `codes` is aligned with the input
 * and holds `null` at every rejected index.
 */
export class BulkSubscribeError extends DispatcherError {
  readonly failures: readonly BulkSubscribeFailure[];
  readonly codes: readonly (string | null)[];

  constructor(failures: readonly BulkSubscribeFailure[], codes: readonly (string | null)[]) {
    const detail = failures.map((f) => `[${f.index}] ${f.error.message}`).join('; ');
    super(`Bulk subscribe rejected ${failures.length} of ${codes.length} entries: ${detail}`);
    this.name = 'BulkSubscribeError';
    this.failures = failures;
    this.codes = codes;
  }
}

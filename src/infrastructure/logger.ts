import { pino } from 'pino';
import type { Logger } from 'pino';
import type { DispatcherConfig } from './config.js';

/** Builds the pino logger a Dispatcher uses when none is injected. */
export function createLogger(config: Pick<DispatcherConfig, 'logLevel'>): Logger {
  return pino({ name: 'namespace-dispatcher', level: config.logLevel });
}

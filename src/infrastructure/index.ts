export { loadDispatcherConfig, resolveDispatcherConfig, DEFAULT_CONFIG } from './config.js';
export type { DispatcherConfig, LogLevel } from './config.js';
export { createLogger } from './logger.js';
export { SequentialIdGenerator, defaultIdGenerator } from './id-generator.js';

/** Namespace used when a caller does not name one. */
export const GLOBAL = 'global';

/** Conventional namespace for subscribers private to one component. */
export const LOCAL = 'local';

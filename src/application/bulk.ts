import { ConfigurationError } from '../domain/index.js';

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

/**
 * Expands a bulk parameter to one value per entry.
 *
 * A scalar is repeated `length` times; a list must already have `length`
 * items.
 */
export function broadcast<T>(value: T | readonly T[], length: number, field: string): T[] {
  if (!isList(value)) {
    return Array.from({ length }, () => value);
  }
  if (value.length !== length) {
    throw new ConfigurationError(
      `Bulk parameter '${field}' has ${value.length} entries, expected ${length}`,
    );
  }
  return [...value];
}

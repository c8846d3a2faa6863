/**
 * List Utilities
 *
 * The record keeps list-valued fields as comma-joined strings; the
 * document keeps them as arrays.
 */

/**
 * Split a comma-separated string into trimmed, non-empty items.
 * Example: "tag1, tag2,, tag3" -> ["tag1", "tag2", "tag3"]
 */
export function parseCommaList(value: string | undefined | null): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Join list items back into the record representation.
 * Strings are returned as they are.
 */
export function toCommaString(items: readonly unknown[] | string): string {
  if (typeof items === 'string') {
    return items;
  }
  return items
    .filter(item => item !== null && item !== undefined && item !== '')
    .map(item => String(item))
    .join(', ');
}

/**
 * Truncate text, adding an ellipsis when shortened
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

/**
 * Truthiness as foreign metadata uses it: empty strings, lists and
 * objects count as false alongside null, undefined, false, 0 and NaN.
 */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (value !== null && typeof value === 'object') {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
}

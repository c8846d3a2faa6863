/**
 * UUID Utilities
 */

import { randomUUID } from 'crypto';

const UUID_V4_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/**
 * Generate a new UUID v4 string
 */
export function generateUuid(): string {
  return randomUUID();
}

/**
 * Check if a value is a UUID v4 (8-4-4-4-12 hex, version 4, RFC variant)
 */
export function isValidUuid(value: unknown): boolean {
  if (typeof value !== 'string' || value.length === 0) {
    return false;
  }
  return UUID_V4_PATTERN.test(value);
}

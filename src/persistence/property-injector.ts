/**
 * Attached-property Persistence
 *
 * Stores the collected document on a host property store. The primary key
 * holds a native structure when the host can represent every value, and a
 * JSON string otherwise; a JSON string backup is always written alongside.
 */

import { DEFAULT_CONFIG, PROPERTY_KEYS } from '../constants/config';
import type { FieldStore, StoredValue } from '../interfaces';
import { toForeignDocument } from '../metadata/applier';
import type { ExternalDocument } from '../metadata/collector';

export interface InjectOptions {
  /** Object nesting levels the host stores natively, the document itself included */
  nativeDepth?: number;
}

export interface InjectResult {
  /** Whether the primary key holds a native structure */
  native: boolean;
  json: string;
}

function isHomogeneousList(value: unknown[]): value is string[] | number[] | boolean[] {
  if (value.length === 0) {
    return true;
  }
  const kind = typeof value[0];
  if (kind !== 'string' && kind !== 'number' && kind !== 'boolean') {
    return false;
  }
  return value.every(item => typeof item === kind);
}

/**
 * Convert a value to what the host stores natively, or undefined when it
 * cannot: null, mixed-type lists, lists of objects, nesting beyond `depth`.
 */
export function toNativeValue(value: unknown, depth: number): StoredValue | undefined {
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    return isHomogeneousList(value) ? value.slice() : undefined;
  }
  if (typeof value !== 'object' || value === null || depth < 1) {
    return undefined;
  }

  const result: { [key: string]: StoredValue } = {};
  for (const [key, child] of Object.entries(value)) {
    const native = toNativeValue(child, depth - 1);
    if (native === undefined) {
      return undefined;
    }
    result[key] = native;
  }
  return result;
}

export function serializeDocument(document: ExternalDocument): string {
  return JSON.stringify(document, null, DEFAULT_CONFIG.JSON_INDENT);
}

/**
 * Write the document under the primary key and the JSON backup key
 */
export function injectIntoStore(
  store: FieldStore,
  document: ExternalDocument,
  options: InjectOptions = {}
): InjectResult {
  const json = serializeDocument(document);
  const native = toNativeValue(document, options.nativeDepth ?? DEFAULT_CONFIG.NATIVE_DEPTH);

  store.set(PROPERTY_KEYS.METADATA, native ?? json);
  store.set(PROPERTY_KEYS.METADATA_JSON, json);

  return { native: native !== undefined, json };
}

/**
 * Read the stored document back: structured primary, JSON primary, then
 * the JSON backup. Null when none of them holds an object.
 */
export function readStoredDocument(store: FieldStore): Record<string, unknown> | null {
  if (store.has(PROPERTY_KEYS.METADATA)) {
    const primary = toForeignDocument(store.get(PROPERTY_KEYS.METADATA));
    if (primary) {
      return primary;
    }
  }
  if (store.has(PROPERTY_KEYS.METADATA_JSON)) {
    const backup = store.get(PROPERTY_KEYS.METADATA_JSON);
    if (typeof backup === 'string') {
      return toForeignDocument(backup);
    }
  }
  return null;
}

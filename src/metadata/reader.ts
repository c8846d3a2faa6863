/**
 * Reader
 *
 * Populates the record from what the host already holds: the stored
 * document on the scene and the custom properties of the active object
 * (where glTF extras land after an import).
 */

import { PROPERTY_KEYS, RESERVED_PROPERTY_KEYS } from '../constants/config';
import type { InternalFieldKey } from '../constants/schema';
import type { FieldStore } from '../interfaces';
import { readStoredDocument } from '../persistence/property-injector';
import { applyDocument, toForeignDocument } from './applier';
import type { MetadataRecord } from './record';
import { aliasToInternal } from './registry';

export interface ReadSources {
  sceneStore: FieldStore;
  objectStore?: FieldStore;
}

export interface ReadResult {
  mapped: InternalFieldKey[];
  raw: Record<string, unknown>;
}

function isHostPrivateKey(key: string): boolean {
  return key.startsWith('_');
}

/**
 * Split loose properties into aliased metadata and unrecognized values
 */
function splitProperties(store: FieldStore, skip: readonly string[]): {
  metadata: Record<string, unknown>;
  raw: Record<string, unknown>;
} {
  const metadata: Record<string, unknown> = {};
  const raw: Record<string, unknown> = {};

  for (const key of store.keys()) {
    if (isHostPrivateKey(key) || skip.includes(key)) {
      continue;
    }
    const value = store.get(key);
    const field = aliasToInternal(key);
    if (field) {
      if (!(field in metadata)) {
        metadata[field] = value;
      }
    } else {
      raw[key] = value;
    }
  }

  return { metadata, raw };
}

/**
 * Read every source into the record: the stored document, then the active
 * object's properties, which override it. Loose scene properties are only
 * reported; aliased ones are left to the stored document.
 */
export function readFromStores(record: MetadataRecord, sources: ReadSources): ReadResult {
  const mapped = new Set<InternalFieldKey>();
  const raw: Record<string, unknown> = {};

  const merge = (data: Record<string, unknown>): void => {
    const outcome = applyDocument(record, data);
    outcome.mapped.forEach(key => mapped.add(key));
    Object.assign(raw, outcome.rejected);
  };

  // 1. Stored document on the scene
  const stored = readStoredDocument(sources.sceneStore);
  if (stored) {
    merge(stored);
  }

  // 2. Object properties, including a nested metadata block
  if (sources.objectStore) {
    const object = splitProperties(sources.objectStore, RESERVED_PROPERTY_KEYS);
    if (Object.keys(object.metadata).length > 0) {
      merge(object.metadata);
    }
    // The block is applied last so it wins over loose aliases
    const block = toForeignDocument(sources.objectStore.get(PROPERTY_KEYS.METADATA));
    if (block) {
      merge(block);
    }
    Object.assign(raw, object.raw);
  }

  // 3. Remaining scene properties
  Object.assign(raw, splitProperties(sources.sceneStore, RESERVED_PROPERTY_KEYS).raw);

  return { mapped: [...mapped], raw };
}

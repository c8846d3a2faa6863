/**
 * Schema Registry
 *
 * Lookups over the static tables in constants/schema. No mutable state.
 */

import {
  ACCESS_LEVEL_ITEMS,
  ASSET_FORMAT_ITEMS,
  DOCUMENT_META_KEYS,
  EXTRAS_ALIASES,
  FIELD_MAP_TO_API,
  FORMAT_TO_MIME,
  LICENSE_ITEMS,
  PROJECT_PHASE_ITEMS,
  USE_CASE_ITEMS,
  type AssetFormat,
  type EnumItem,
  type InternalFieldKey,
} from '../constants/schema';
import { RESERVED_PROPERTY_KEYS } from '../constants/config';
import {
  AccessLevelSchema,
  AssetFormatSchema,
  LicenseSchema,
  ProjectPhaseSchema,
  UseCaseSchema,
} from '../schemas';

export function isInternalFieldKey(key: string): key is InternalFieldKey {
  return Object.prototype.hasOwnProperty.call(FIELD_MAP_TO_API, key);
}

/**
 * Every internal key, in table order
 */
export const INTERNAL_FIELD_KEYS: readonly InternalFieldKey[] = Object.keys(FIELD_MAP_TO_API).filter(isInternalFieldKey);

const FIELD_MAP_FROM_API: ReadonlyMap<string, InternalFieldKey> = new Map(
  INTERNAL_FIELD_KEYS.map(key => [FIELD_MAP_TO_API[key], key] as const)
);

const ALIAS_LOOKUP_LOWER: ReadonlyMap<string, InternalFieldKey> = new Map(
  Object.entries(EXTRAS_ALIASES).map(([alias, key]) => [alias.toLowerCase(), key] as const)
);

/**
 * First segment of every external path ("provenance" for "provenance.tool")
 */
const TOP_LEVEL_EXTERNAL_KEYS: ReadonlySet<string> = new Set(
  INTERNAL_FIELD_KEYS.map(key => FIELD_MAP_TO_API[key].split('.')[0])
);

/**
 * Internal key -> API path, e.g. "bounding_box_x" -> "boundingBox.x"
 */
export function internalToExternal(key: string): string | undefined {
  return isInternalFieldKey(key) ? FIELD_MAP_TO_API[key] : undefined;
}

/**
 * API path -> internal key, e.g. "boundingBox.x" -> "bounding_box_x"
 */
export function externalToInternal(path: string): InternalFieldKey | undefined {
  return FIELD_MAP_FROM_API.get(path);
}

export function formatToMime(format: string): string | undefined {
  return isAssetFormat(format) ? FORMAT_TO_MIME[format] : undefined;
}

/**
 * Resolve a foreign extras key ("title", "Keywords") to an internal key.
 * Aliases are an alternate vocabulary, not an inverse of the API map.
 */
export function aliasToInternal(foreignKey: string, caseInsensitive = true): InternalFieldKey | undefined {
  if (Object.prototype.hasOwnProperty.call(EXTRAS_ALIASES, foreignKey)) {
    return EXTRAS_ALIASES[foreignKey];
  }
  return caseInsensitive ? ALIAS_LOOKUP_LOWER.get(foreignKey.toLowerCase()) : undefined;
}

/**
 * Whether a top-level key of a foreign document is something the mapper
 * understands. Everything else is reported back as unrecognized.
 */
export function isRecognizedForeignKey(key: string): boolean {
  return (
    aliasToInternal(key) !== undefined ||
    isInternalFieldKey(key) ||
    TOP_LEVEL_EXTERNAL_KEYS.has(key) ||
    key === DOCUMENT_META_KEYS.SCHEMA_VERSION ||
    key === DOCUMENT_META_KEYS.ENCODING_FORMAT ||
    RESERVED_PROPERTY_KEYS.includes(key)
  );
}

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

const ENUM_SCHEMAS = {
  asset_format: AssetFormatSchema,
  access_level: AccessLevelSchema,
  use_case: UseCaseSchema,
  project_phase: ProjectPhaseSchema,
  license: LicenseSchema,
} as const;

export type EnumFieldKey = keyof typeof ENUM_SCHEMAS;

const ENUM_ITEMS: Record<EnumFieldKey, readonly EnumItem[]> = {
  asset_format: ASSET_FORMAT_ITEMS,
  access_level: ACCESS_LEVEL_ITEMS,
  use_case: USE_CASE_ITEMS,
  project_phase: PROJECT_PHASE_ITEMS,
  license: LICENSE_ITEMS,
};

export function isEnumMember(field: EnumFieldKey, value: unknown): boolean {
  return ENUM_SCHEMAS[field].safeParse(value).success;
}

/**
 * Items for building a picker (identifier, label, description)
 */
export function listEnumItems(field: EnumFieldKey): readonly EnumItem[] {
  return ENUM_ITEMS[field];
}

export function isAssetFormat(value: unknown): value is AssetFormat {
  return AssetFormatSchema.safeParse(value).success;
}

/**
 * Configuration Constants
 */

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  LOG_LEVEL: 'info' as const,
  REQUIRE_NAME: true,
  NATIVE_DEPTH: 2,
  EMBED_OBJECT_STATS: true,
  SIDECAR_EXTENSION: '.metro.json',
  JSON_INDENT: 2,
} as const;

/**
 * Attached-property and extras keys
 */
export const PROPERTY_KEYS = {
  METADATA: 'metro_metadata',
  METADATA_JSON: 'metro_metadata_json',
  OBJECT_STATS: 'metro_object_stats',
} as const;

/**
 * Host property keys the reader never reports as foreign data
 */
export const RESERVED_PROPERTY_KEYS: readonly string[] = [
  PROPERTY_KEYS.METADATA,
  PROPERTY_KEYS.METADATA_JSON,
  PROPERTY_KEYS.OBJECT_STATS,
];

/**
 * Decimal places kept for bounding box dimensions
 */
export const BOUNDING_BOX_PRECISION = 4;

/**
 * Applier
 *
 * Writes foreign or previously collected metadata back into a record.
 * Accepts internal snake_case keys, API camelCase/dotted keys and the
 * common extras aliases, mixed in one document. For each field the keys
 * are tried in a fixed order (internal key first) and the first usable
 * value wins. A value that cannot be coerced is skipped and reported,
 * never thrown.
 */

import { z } from 'zod';
import { BOUNDING_BOX_PRECISION, PROPERTY_KEYS } from '../constants/config';
import type { InternalFieldKey } from '../constants/schema';
import {
  AccessLevelSchema,
  AssetFormatSchema,
  ForeignDocumentSchema,
  LicenseSchema,
  ProjectPhaseSchema,
  UseCaseSchema,
} from '../schemas';
import { LoggerFactory, isTruthy, parseCommaList, roundTo, toCommaString } from '../utils';
import { parseProcessingParameters } from './collector';
import type { MetadataRecord } from './record';
import { aliasToInternal, isRecognizedForeignKey } from './registry';

const logger = LoggerFactory.forMapper();

/**
 * One field's import rule
 */
interface FieldRule {
  key: InternalFieldKey;
  /** Keys tried in order; dotted keys descend into nested objects */
  keys: readonly string[];
  /** Whether a found value counts as given at all */
  present: (value: unknown) => boolean;
  /** Coerce and assign; false when the value cannot be coerced */
  assign: (record: MetadataRecord, value: unknown) => boolean;
}

export interface ApplyOutcome {
  mapped: InternalFieldKey[];
  /** Values found under a known key that could not be coerced, by that key */
  rejected: Record<string, unknown>;
}

export interface IngestResult {
  mapped: InternalFieldKey[];
  /** Unrecognized top-level keys and rejected values */
  raw: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Coercion
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringify(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  try {
    const json = JSON.stringify(value);
    return typeof json === 'string' ? json : undefined;
  } catch (error) {
    logger.debug('Value is not JSON-serializable', { error: error instanceof Error ? error.message : String(error) });
    return undefined;
  }
}

function toNonNegativeNumber(value: unknown, integer: boolean): number | undefined {
  let result: number | undefined;

  if (typeof value === 'number') {
    result = Number.isFinite(value) ? value : undefined;
  } else if (typeof value === 'boolean') {
    result = value ? 1 : 0;
  } else if (typeof value === 'string') {
    const text = value.trim();
    const pattern = integer ? /^[+-]?\d+$/ : /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
    result = pattern.test(text) ? Number(text) : undefined;
  }

  if (result === undefined || result < 0) {
    return undefined;
  }
  return integer ? Math.trunc(result) : result;
}

function toList(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    const items: string[] = [];
    for (const item of value) {
      const text = stringify(item);
      if (text) items.push(text);
    }
    return toCommaString(items);
  }
  return stringify(value);
}

const isGiven = (value: unknown): boolean => value !== null && value !== undefined;

function sameList(current: string, incoming: string): boolean {
  return parseCommaList(current).join('\n') === parseCommaList(incoming).join('\n');
}

function sameJson(current: string, incoming: string): boolean {
  return current.trim() !== '' &&
    JSON.stringify(parseProcessingParameters(current)) === JSON.stringify(parseProcessingParameters(incoming));
}

// ---------------------------------------------------------------------------
// Rule builders
// ---------------------------------------------------------------------------

function stringRule(key: InternalFieldKey, keys: readonly string[], set: (record: MetadataRecord, value: string) => void): FieldRule {
  return {
    key,
    keys,
    present: isTruthy,
    assign: (record, value) => {
      const text = stringify(value);
      if (text === undefined) return false;
      set(record, text);
      return true;
    },
  };
}

/**
 * Comma-joined text; the current spelling is kept when it lists the same items
 */
function listRule(
  key: InternalFieldKey,
  keys: readonly string[],
  get: (record: MetadataRecord) => string,
  set: (record: MetadataRecord, value: string) => void
): FieldRule {
  return {
    key,
    keys,
    present: isTruthy,
    assign: (record, value) => {
      const text = toList(value);
      if (text === undefined) return false;
      if (!sameList(get(record), text)) set(record, text);
      return true;
    },
  };
}

/**
 * JSON kept as text; the current text is kept when it holds the same value
 */
function jsonTextRule(
  key: InternalFieldKey,
  keys: readonly string[],
  get: (record: MetadataRecord) => string,
  set: (record: MetadataRecord, value: string) => void
): FieldRule {
  return {
    key,
    keys,
    present: isTruthy,
    assign: (record, value) => {
      const text = stringify(value);
      if (text === undefined) return false;
      if (!sameJson(get(record), text)) set(record, text);
      return true;
    },
  };
}

function countRule(key: InternalFieldKey, keys: readonly string[], set: (record: MetadataRecord, value: number) => void): FieldRule {
  return {
    key,
    keys,
    present: isGiven,
    assign: (record, value) => {
      const num = toNonNegativeNumber(value, true);
      if (num === undefined) return false;
      set(record, num);
      return true;
    },
  };
}

/**
 * Bounding box extent; the current value is kept when it rounds to the incoming one
 */
function extentRule(
  key: InternalFieldKey,
  keys: readonly string[],
  get: (record: MetadataRecord) => number,
  set: (record: MetadataRecord, value: number) => void
): FieldRule {
  return {
    key,
    keys,
    present: isGiven,
    assign: (record, value) => {
      const num = toNonNegativeNumber(value, false);
      if (num === undefined) return false;
      if (roundTo(get(record), BOUNDING_BOX_PRECISION) !== num) set(record, num);
      return true;
    },
  };
}

function boolRule(key: InternalFieldKey, keys: readonly string[], set: (record: MetadataRecord, value: boolean) => void): FieldRule {
  return {
    key,
    keys,
    present: isGiven,
    assign: (record, value) => {
      set(record, isTruthy(value));
      return true;
    },
  };
}

function enumRule<T extends string>(
  key: InternalFieldKey,
  keys: readonly string[],
  schema: z.ZodType<T>,
  set: (record: MetadataRecord, value: T) => void
): FieldRule {
  return {
    key,
    keys,
    present: isTruthy,
    assign: (record, value) => {
      const parsed = schema.safeParse(stringify(value));
      if (!parsed.success) return false;
      set(record, parsed.data);
      return true;
    },
  };
}

// ---------------------------------------------------------------------------
// Field table
// ---------------------------------------------------------------------------

const FIELD_RULES: readonly FieldRule[] = [
  // Core
  stringRule('asset_name', ['asset_name', 'name', 'title'], (r, v) => { r.core.assetName = v; }),
  stringRule('description', ['description'], (r, v) => { r.core.description = v; }),
  enumRule('asset_format', ['asset_format', 'format'], AssetFormatSchema, (r, v) => { r.core.assetFormat = v; }),
  countRule('tri_count', ['tri_count', 'triCount', 'triangleCount'], (r, v) => { r.core.triCount = v; }),
  listRule('tags', ['tags', 'keywords', 'dcat:keyword'], r => r.core.tags, (r, v) => { r.core.tags = v; }),
  enumRule('use_case', ['use_case', 'useCase'], UseCaseSchema, (r, v) => { r.core.useCase = v; }),

  // Provenance
  stringRule('provenance_tool', ['provenance_tool', 'provenance.tool', 'generatedWith', 'generator', 'author'], (r, v) => { r.provenance.tool = v; }),
  listRule(
    'provenance_source_data',
    ['provenance_source_data', 'provenance.sourceData', 'sourceData'],
    r => r.provenance.sourceData,
    (r, v) => { r.provenance.sourceData = v; }
  ),

  // Access
  enumRule('access_level', ['access_level', 'accessLevel'], AccessLevelSchema, (r, v) => { r.access.accessLevel = v; }),
  enumRule('license', ['license', 'copyright'], LicenseSchema, (r, v) => { r.access.license = v; }),
  boolRule('attribution_required', ['attribution_required', 'attributionRequired'], (r, v) => { r.access.attributionRequired = v; }),

  // Lineage
  stringRule('lineage_id', ['lineage_id', 'lineageId'], (r, v) => { r.lineage.lineageId = v; }),
  listRule('derived_from_asset', ['derived_from_asset', 'derivedFromAsset'], r => r.lineage.derivedFromAsset, (r, v) => { r.lineage.derivedFromAsset = v; }),

  // Technical
  countRule('vertex_count', ['vertex_count', 'qualityMetrics.vertexCount', 'vertexCount'], (r, v) => { r.technical.vertexCount = v; }),
  extentRule('bounding_box_x', ['bounding_box_x', 'boundingBox.x'], r => r.technical.boundingBoxX, (r, v) => { r.technical.boundingBoxX = v; }),
  extentRule('bounding_box_y', ['bounding_box_y', 'boundingBox.y'], r => r.technical.boundingBoxY, (r, v) => { r.technical.boundingBoxY = v; }),
  extentRule('bounding_box_z', ['bounding_box_z', 'boundingBox.z'], r => r.technical.boundingBoxZ, (r, v) => { r.technical.boundingBoxZ = v; }),
  countRule('material_count', ['material_count', 'materialProperties.materialCount', 'materialCount'], (r, v) => { r.technical.materialCount = v; }),
  boolRule('has_textures', ['has_textures', 'materialProperties.hasTextures', 'hasTextures'], (r, v) => { r.technical.hasTextures = v; }),
  boolRule('supports_pbr', ['supports_pbr', 'materialProperties.supportsPBR', 'supportsPBR'], (r, v) => { r.technical.supportsPbr = v; }),
  countRule('lod_levels', ['lod_levels', 'lodLevels'], (r, v) => { r.technical.lodLevels = v; }),
  stringRule('scientific_domain', ['scientific_domain', 'scientificDomain'], (r, v) => { r.technical.scientificDomain = v; }),
  stringRule('source_data_format', ['source_data_format', 'sourceDataFormat'], (r, v) => { r.technical.sourceDataFormat = v; }),
  jsonTextRule(
    'processing_parameters',
    ['processing_parameters', 'processingParameters'],
    r => r.technical.processingParameters,
    (r, v) => { r.technical.processingParameters = v; }
  ),

  // Project
  enumRule('project_phase', ['project_phase', 'projectPhase'], ProjectPhaseSchema, (r, v) => { r.project.projectPhase = v; }),
  stringRule('theme_scheme', ['theme_scheme', 'theme.scheme'], (r, v) => { r.project.themeScheme = v; }),
  stringRule('theme_code', ['theme_code', 'theme.code'], (r, v) => { r.project.themeCode = v; }),
  boolRule('supports_vr', ['supports_vr', 'visualizationCapabilities.supportsVR', 'supportsVR'], (r, v) => { r.project.supportsVr = v; }),
  boolRule('supports_ar', ['supports_ar', 'visualizationCapabilities.supportsAR', 'supportsAR'], (r, v) => { r.project.supportsAr = v; }),
  stringRule('usage_constraints', ['usage_constraints', 'usageConstraints'], (r, v) => { r.project.usageConstraints = v; }),
  stringRule(
    'usage_guidelines_viewer',
    ['usage_guidelines_viewer', 'usageGuidelines.recommended_viewer', 'usageGuidelines.recommendedViewer'],
    (r, v) => { r.project.usageGuidelinesViewer = v; }
  ),
  stringRule('usage_guidelines_notes', ['usage_guidelines_notes', 'usageGuidelines.notes'], (r, v) => { r.project.usageGuidelinesNotes = v; }),
  stringRule('deployment_notes', ['deployment_notes', 'deploymentNotes'], (r, v) => { r.project.deploymentNotes = v; }),
  listRule('geo_restrictions', ['geo_restrictions', 'geoRestrictions'], r => r.project.geoRestrictions, (r, v) => { r.project.geoRestrictions = v; }),
  listRule('access_scope', ['access_scope', 'accessScope'], r => r.project.accessScope, (r, v) => { r.project.accessScope = v; }),
];

/**
 * First segment of every key any rule tries
 */
const RULE_TOP_LEVEL_KEYS: ReadonlySet<string> = new Set(
  FIELD_RULES.flatMap(rule => rule.keys.map(key => key.split('.')[0]))
);

/**
 * Whether a top-level foreign key is one the applier can use
 */
export function isMappableKey(key: string): boolean {
  return isRecognizedForeignKey(key) || RULE_TOP_LEVEL_KEYS.has(key);
}

/**
 * Keys tried for a field, in precedence order
 */
export function keysTriedFor(key: InternalFieldKey): readonly string[] {
  return FIELD_RULES.find(rule => rule.key === key)?.keys ?? [];
}

// ---------------------------------------------------------------------------
// Apply
// ---------------------------------------------------------------------------

/**
 * Look a key up, descending through dotted segments when the literal key
 * is absent. Undefined means not found.
 */
function lookup(data: Readonly<Record<string, unknown>>, key: string): unknown {
  if (Object.prototype.hasOwnProperty.call(data, key)) {
    return data[key];
  }
  if (!key.includes('.')) {
    return undefined;
  }

  let current: unknown = data;
  for (const segment of key.split('.')) {
    if (!isPlainObject(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Apply a document and report both mapped fields and rejected values
 */
export function applyDocument(record: MetadataRecord, data: Readonly<Record<string, unknown>>): ApplyOutcome {
  const mapped: InternalFieldKey[] = [];
  const rejected: Record<string, unknown> = {};

  for (const rule of FIELD_RULES) {
    for (const key of rule.keys) {
      const value = lookup(data, key);
      if (!rule.present(value)) {
        continue;
      }
      if (rule.assign(record, value)) {
        mapped.push(rule.key);
        break;
      }
      logger.debug(`Skipped ${key}: value could not be coerced for ${rule.key}`, { operation: 'apply' });
      rejected[key] = value;
    }
  }

  return { mapped, rejected };
}

/**
 * Apply a document to the record in place; returns the mapped field keys
 */
export function apply(record: MetadataRecord, data: Readonly<Record<string, unknown>>): InternalFieldKey[] {
  return applyDocument(record, data).mapped;
}

/**
 * Narrow data of unknown origin to a plain object. JSON text is parsed;
 * anything else that is not an object gives null.
 */
export function toForeignDocument(data: unknown): Record<string, unknown> | null {
  let candidate = data;
  if (typeof data === 'string') {
    try {
      candidate = JSON.parse(data);
    } catch (error) {
      logger.debug('Foreign data is not JSON', { error: error instanceof Error ? error.message : String(error) });
      return null;
    }
  }
  const parsed = ForeignDocumentSchema.safeParse(candidate);
  return parsed.success ? parsed.data : null;
}

/**
 * Ingest foreign data: unwrap a nested metadata block, normalize
 * case-variant aliases, apply, and return what could not be used.
 */
export function ingest(record: MetadataRecord, foreign: unknown): IngestResult {
  const data = toForeignDocument(foreign);
  if (!data) {
    return { mapped: [], raw: {} };
  }

  const normalized: Record<string, unknown> = {};
  const raw: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (key === PROPERTY_KEYS.METADATA) {
      continue;
    }
    if (!isMappableKey(key)) {
      raw[key] = value;
      continue;
    }
    if (aliasToInternal(key, false) === undefined && aliasToInternal(key, true) !== undefined) {
      // "Title" -> "title", unless the canonical spelling is also present
      const canonical = key.toLowerCase();
      if (!Object.prototype.hasOwnProperty.call(data, canonical)) {
        normalized[canonical] = value;
      }
      continue;
    }
    normalized[key] = value;
  }

  // Our own block wins over loose top-level keys
  const nested = toForeignDocument(data[PROPERTY_KEYS.METADATA]);
  if (nested) {
    Object.assign(normalized, nested);
  }

  const outcome = applyDocument(record, normalized);
  return { mapped: outcome.mapped, raw: { ...raw, ...outcome.rejected } };
}

/**
 * Collector
 *
 * Builds the nested, versioned API document from a record. Empty and
 * default values are left out; `format`, `accessLevel` and
 * `attributionRequired` are always written.
 */

import { BOUNDING_BOX_PRECISION } from '../constants/config';
import {
  ENUM_NONE,
  SCHEMA_VERSION,
  type AccessLevel,
  type AssetFormat,
  type License,
  type ProjectPhase,
  type UseCase,
} from '../constants/schema';
import type { BoundingBox } from '../interfaces';
import { parseCommaList, roundTo } from '../utils';
import type { MetadataRecord } from './record';
import { formatToMime } from './registry';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * The API document embedded in files and written to sidecars
 */
export type ExternalDocument = {
  _schemaVersion: string;
  name?: string;
  description?: string;
  format: AssetFormat;
  triCount?: number;
  tags?: string[];
  useCase?: Exclude<UseCase, 'NONE'>;
  provenance?: { tool?: string; sourceData?: string[] };
  accessLevel: AccessLevel;
  license?: Exclude<License, 'NONE'>;
  attributionRequired: boolean;
  lineageId?: string;
  derivedFromAsset?: string | string[];
  lodLevels?: number;
  boundingBox?: BoundingBox;
  materialProperties?: { materialCount: number; hasTextures: boolean; supportsPBR: boolean };
  qualityMetrics?: { vertexCount: number };
  scientificDomain?: string;
  sourceDataFormat?: string;
  processingParameters?: JsonValue;
  projectPhase?: Exclude<ProjectPhase, 'NONE'>;
  theme?: { scheme?: string; code?: string };
  visualizationCapabilities?: { supportsVR: boolean; supportsAR: boolean };
  usageConstraints?: string;
  deploymentNotes?: string;
  usageGuidelines?: { recommended_viewer?: string; notes?: string };
  geoRestrictions?: string[];
  accessScope?: string[];
  encodingFormat?: string;
};

/**
 * Parse processing parameters as JSON; keep the text when it does not
 * parse or parses to null
 */
export function parseProcessingParameters(text: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed === null ? text : parsed;
  } catch {
    return text;
  }
}

function isSet<T extends string>(value: T): value is Exclude<T, 'NONE'> {
  return value !== ENUM_NONE;
}

/**
 * Collect the record into the API document
 */
export function collect(record: MetadataRecord): ExternalDocument {
  const { core, provenance: prov, access, lineage, technical: tech, project: proj } = record;

  const doc: ExternalDocument = {
    _schemaVersion: SCHEMA_VERSION,
    format: core.assetFormat,
    accessLevel: access.accessLevel,
    attributionRequired: access.attributionRequired,
  };

  // Core
  if (core.assetName) doc.name = core.assetName;
  if (core.description) doc.description = core.description;
  if (core.triCount > 0) doc.triCount = core.triCount;
  const tags = parseCommaList(core.tags);
  if (tags.length > 0) doc.tags = tags;
  if (isSet(core.useCase)) doc.useCase = core.useCase;

  // Provenance
  const provenance: NonNullable<ExternalDocument['provenance']> = {};
  if (prov.tool) provenance.tool = prov.tool;
  const sourceData = parseCommaList(prov.sourceData);
  if (sourceData.length > 0) provenance.sourceData = sourceData;
  if (Object.keys(provenance).length > 0) doc.provenance = provenance;

  // Access
  if (isSet(access.license)) doc.license = access.license;

  // Lineage
  if (lineage.lineageId) doc.lineageId = lineage.lineageId;
  const derived = parseCommaList(lineage.derivedFromAsset);
  if (derived.length === 1) {
    doc.derivedFromAsset = derived[0];
  } else if (derived.length > 1) {
    doc.derivedFromAsset = derived;
  }

  // Technical
  if (tech.lodLevels > 0) doc.lodLevels = tech.lodLevels;

  if (tech.boundingBoxX > 0 || tech.boundingBoxY > 0 || tech.boundingBoxZ > 0) {
    doc.boundingBox = {
      x: roundTo(tech.boundingBoxX, BOUNDING_BOX_PRECISION),
      y: roundTo(tech.boundingBoxY, BOUNDING_BOX_PRECISION),
      z: roundTo(tech.boundingBoxZ, BOUNDING_BOX_PRECISION),
    };
  }

  if (tech.materialCount > 0 || tech.hasTextures || tech.supportsPbr) {
    doc.materialProperties = {
      materialCount: tech.materialCount,
      hasTextures: tech.hasTextures,
      supportsPBR: tech.supportsPbr,
    };
  }

  if (tech.vertexCount > 0) doc.qualityMetrics = { vertexCount: tech.vertexCount };
  if (tech.scientificDomain) doc.scientificDomain = tech.scientificDomain;
  if (tech.sourceDataFormat) doc.sourceDataFormat = tech.sourceDataFormat;
  if (tech.processingParameters.trim()) {
    doc.processingParameters = parseProcessingParameters(tech.processingParameters);
  }

  // Project
  if (isSet(proj.projectPhase)) doc.projectPhase = proj.projectPhase;

  if (proj.themeScheme || proj.themeCode) {
    doc.theme = {};
    if (proj.themeScheme) doc.theme.scheme = proj.themeScheme;
    if (proj.themeCode) doc.theme.code = proj.themeCode;
  }

  if (proj.supportsVr || proj.supportsAr) {
    doc.visualizationCapabilities = {
      supportsVR: proj.supportsVr,
      supportsAR: proj.supportsAr,
    };
  }

  if (proj.usageConstraints) doc.usageConstraints = proj.usageConstraints;

  if (proj.usageGuidelinesViewer || proj.usageGuidelinesNotes) {
    doc.usageGuidelines = {};
    if (proj.usageGuidelinesViewer) doc.usageGuidelines.recommended_viewer = proj.usageGuidelinesViewer;
    if (proj.usageGuidelinesNotes) doc.usageGuidelines.notes = proj.usageGuidelinesNotes;
  }

  if (proj.deploymentNotes) doc.deploymentNotes = proj.deploymentNotes;

  const geo = parseCommaList(proj.geoRestrictions);
  if (geo.length > 0) doc.geoRestrictions = geo;
  const scope = parseCommaList(proj.accessScope);
  if (scope.length > 0) doc.accessScope = scope;

  // Derived
  const mime = formatToMime(core.assetFormat);
  if (mime) doc.encodingFormat = mime;

  return doc;
}

/**
 * Number of user-facing fields in a document (metadata keys excluded)
 */
export function countDocumentFields(doc: ExternalDocument): number {
  return Object.keys(doc).filter(key => !key.startsWith('_')).length;
}

/**
 * Registry API Schema Constants
 *
 * Enumerated value sets, field name maps and alias tables for the
 * 3D Asset Registry API v1.0 document format.
 */

/**
 * Schema version written to every collected document
 */
export const SCHEMA_VERSION = '1.0.0';

/**
 * Enum item: identifier, display label, description
 */
export interface EnumItem<T extends string = string> {
  readonly id: T;
  readonly label: string;
  readonly description: string;
}

type ItemText = Omit<EnumItem, 'id'>;

/**
 * Items in identifier order; every identifier must have its text
 */
function toItems<T extends string>(ids: readonly T[], text: Record<T, ItemText>): readonly EnumItem<T>[] {
  return ids.map(id => ({ id, ...text[id] }));
}

export const ASSET_FORMATS = ['gltf', 'glb', 'usdz', 'blend', 'fbx', 'obj', 'stl', 'ply'] as const;
export const ACCESS_LEVELS = ['private', 'group', 'institution', 'consortium', 'approval_required', 'public'] as const;
export const USE_CASES = ['NONE', 'UC2', 'UC3', 'UC4', 'UC5'] as const;
export const PROJECT_PHASES = ['NONE', 'prototype', 'development', 'production', 'archived'] as const;
export const LICENSES = [
  'NONE',
  'CC-BY-4.0',
  'CC-BY-SA-4.0',
  'CC-BY-NC-4.0',
  'CC-BY-NC-SA-4.0',
  'CC0-1.0',
  'MIT',
  'Apache-2.0',
  'OTHER',
] as const;

export type AssetFormat = (typeof ASSET_FORMATS)[number];
export type AccessLevel = (typeof ACCESS_LEVELS)[number];
export type UseCase = (typeof USE_CASES)[number];
export type ProjectPhase = (typeof PROJECT_PHASES)[number];
export type License = (typeof LICENSES)[number];

export const ASSET_FORMAT_ITEMS = toItems(ASSET_FORMATS, {
  gltf: { label: 'glTF', description: 'GL Transmission Format' },
  glb: { label: 'GLB', description: 'GL Transmission Format (Binary)' },
  usdz: { label: 'USDZ', description: 'Universal Scene Description (Zip)' },
  blend: { label: 'Blend', description: 'Blender native format' },
  fbx: { label: 'FBX', description: 'Autodesk FBX' },
  obj: { label: 'OBJ', description: 'Wavefront OBJ' },
  stl: { label: 'STL', description: 'Stereolithography' },
  ply: { label: 'PLY', description: 'Polygon File Format' },
});

export const ACCESS_LEVEL_ITEMS = toItems(ACCESS_LEVELS, {
  private: { label: 'Private', description: 'Only owner can access' },
  group: { label: 'Group', description: 'Authorized users/institutions' },
  institution: { label: 'Institution', description: 'Same institution members' },
  consortium: { label: 'Consortium', description: 'All consortium members' },
  approval_required: { label: 'Approval Required', description: 'Explicit approval needed' },
  public: { label: 'Public', description: 'Any authenticated user' },
});

export const USE_CASE_ITEMS = toItems(USE_CASES, {
  NONE: { label: 'None', description: 'No specific use case' },
  UC2: { label: 'UC2', description: 'Use Case 2' },
  UC3: { label: 'UC3', description: 'Use Case 3' },
  UC4: { label: 'UC4', description: 'Use Case 4' },
  UC5: { label: 'UC5', description: 'Use Case 5' },
});

export const PROJECT_PHASE_ITEMS = toItems(PROJECT_PHASES, {
  NONE: { label: 'None', description: 'Not specified' },
  prototype: { label: 'Prototype', description: 'Early development / proof of concept' },
  development: { label: 'Development', description: 'Active development' },
  production: { label: 'Production', description: 'Production-ready' },
  archived: { label: 'Archived', description: 'No longer actively maintained' },
});

export const LICENSE_ITEMS = toItems(LICENSES, {
  NONE: { label: 'None', description: 'No license specified' },
  'CC-BY-4.0': { label: 'CC BY 4.0', description: 'Creative Commons Attribution 4.0' },
  'CC-BY-SA-4.0': { label: 'CC BY-SA 4.0', description: 'Creative Commons Attribution-ShareAlike 4.0' },
  'CC-BY-NC-4.0': { label: 'CC BY-NC 4.0', description: 'Creative Commons Attribution-NonCommercial 4.0' },
  'CC-BY-NC-SA-4.0': { label: 'CC BY-NC-SA 4.0', description: 'Creative Commons Attribution-NonCommercial-ShareAlike 4.0' },
  'CC0-1.0': { label: 'CC0 1.0', description: 'Creative Commons Zero / Public Domain' },
  MIT: { label: 'MIT', description: 'MIT License' },
  'Apache-2.0': { label: 'Apache 2.0', description: 'Apache License 2.0' },
  OTHER: { label: 'Other', description: 'Other license (specify in description)' },
});

/**
 * Sentinel identifier for "not set" in optional enums
 */
export const ENUM_NONE = 'NONE';

/**
 * Format to MIME type (encodingFormat)
 */
export const FORMAT_TO_MIME: Record<AssetFormat, string> = {
  gltf: 'model/gltf+json',
  glb: 'model/gltf-binary',
  usdz: 'model/vnd.usdz+zip',
  blend: 'application/x-blender',
  fbx: 'application/x-fbx',
  obj: 'model/obj',
  stl: 'model/stl',
  ply: 'application/x-ply',
};

/**
 * Internal field key -> API path (dotted for nested objects)
 */
export const FIELD_MAP_TO_API = {
  // Core
  asset_name: 'name',
  description: 'description',
  asset_format: 'format',
  tri_count: 'triCount',
  tags: 'tags',
  use_case: 'useCase',
  // Provenance
  provenance_tool: 'provenance.tool',
  provenance_source_data: 'provenance.sourceData',
  // Access control
  access_level: 'accessLevel',
  license: 'license',
  attribution_required: 'attributionRequired',
  // Lineage
  lineage_id: 'lineageId',
  derived_from_asset: 'derivedFromAsset',
  // Technical
  lod_levels: 'lodLevels',
  bounding_box_x: 'boundingBox.x',
  bounding_box_y: 'boundingBox.y',
  bounding_box_z: 'boundingBox.z',
  material_count: 'materialProperties.materialCount',
  has_textures: 'materialProperties.hasTextures',
  supports_pbr: 'materialProperties.supportsPBR',
  vertex_count: 'qualityMetrics.vertexCount',
  scientific_domain: 'scientificDomain',
  source_data_format: 'sourceDataFormat',
  processing_parameters: 'processingParameters',
  // Project
  project_phase: 'projectPhase',
  theme_scheme: 'theme.scheme',
  theme_code: 'theme.code',
  supports_vr: 'visualizationCapabilities.supportsVR',
  supports_ar: 'visualizationCapabilities.supportsAR',
  usage_constraints: 'usageConstraints',
  usage_guidelines_viewer: 'usageGuidelines.recommended_viewer',
  usage_guidelines_notes: 'usageGuidelines.notes',
  deployment_notes: 'deploymentNotes',
  geo_restrictions: 'geoRestrictions',
  access_scope: 'accessScope',
} as const;

export type InternalFieldKey = keyof typeof FIELD_MAP_TO_API;

/**
 * Extras keys other tools commonly write, mapped to internal fields
 */
export const EXTRAS_ALIASES: Readonly<Record<string, InternalFieldKey>> = {
  title: 'asset_name',
  name: 'asset_name',
  description: 'description',
  author: 'provenance_tool',
  generator: 'provenance_tool',
  license: 'license',
  copyright: 'license',
  tags: 'tags',
  keywords: 'tags',
};

/**
 * Document keys that carry no record field but are still ours
 */
export const DOCUMENT_META_KEYS = {
  SCHEMA_VERSION: '_schemaVersion',
  ENCODING_FORMAT: 'encodingFormat',
} as const;

/**
 * Field limits enforced by the validator
 */
export const FIELD_LIMITS = {
  NAME_MAX: 100,
  DESCRIPTION_MAX: 500,
  TAGS_MAX_COUNT: 20,
  TAG_MAX_LENGTH: 50,
} as const;

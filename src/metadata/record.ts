/**
 * Metadata Record
 *
 * The flat, user-editable metadata of one scene: six independent field
 * groups. List-valued fields are kept as comma-joined strings, the way an
 * editable text field holds them.
 */

import type {
  AccessLevel,
  AssetFormat,
  License,
  ProjectPhase,
  UseCase,
} from '../constants/schema';

export interface CoreFields {
  assetName: string;
  description: string;
  assetFormat: AssetFormat;
  triCount: number;
  tags: string;
  useCase: UseCase;
}

export interface ProvenanceFields {
  tool: string;
  sourceData: string;
}

export interface AccessFields {
  accessLevel: AccessLevel;
  license: License;
  attributionRequired: boolean;
}

export interface LineageFields {
  lineageId: string;
  derivedFromAsset: string;
}

export interface TechnicalFields {
  vertexCount: number;
  boundingBoxX: number;
  boundingBoxY: number;
  boundingBoxZ: number;
  materialCount: number;
  hasTextures: boolean;
  supportsPbr: boolean;
  lodLevels: number;
  scientificDomain: string;
  sourceDataFormat: string;
  /** JSON text, or any free string when it does not parse */
  processingParameters: string;
}

export interface ProjectFields {
  projectPhase: ProjectPhase;
  themeScheme: string;
  themeCode: string;
  supportsVr: boolean;
  supportsAr: boolean;
  usageConstraints: string;
  usageGuidelinesViewer: string;
  usageGuidelinesNotes: string;
  deploymentNotes: string;
  geoRestrictions: string;
  accessScope: string;
}

export interface MetadataRecord {
  core: CoreFields;
  provenance: ProvenanceFields;
  access: AccessFields;
  lineage: LineageFields;
  technical: TechnicalFields;
  project: ProjectFields;
}

function defaultCore(): CoreFields {
  return {
    assetName: '',
    description: '',
    assetFormat: 'glb',
    triCount: 0,
    tags: '',
    useCase: 'NONE',
  };
}

function defaultProvenance(): ProvenanceFields {
  return { tool: '', sourceData: '' };
}

function defaultAccess(): AccessFields {
  return { accessLevel: 'private', license: 'NONE', attributionRequired: false };
}

function defaultLineage(): LineageFields {
  return { lineageId: '', derivedFromAsset: '' };
}

function defaultTechnical(): TechnicalFields {
  return {
    vertexCount: 0,
    boundingBoxX: 0,
    boundingBoxY: 0,
    boundingBoxZ: 0,
    materialCount: 0,
    hasTextures: false,
    supportsPbr: false,
    lodLevels: 0,
    scientificDomain: '',
    sourceDataFormat: '',
    processingParameters: '',
  };
}

function defaultProject(): ProjectFields {
  return {
    projectPhase: 'NONE',
    themeScheme: '',
    themeCode: '',
    supportsVr: false,
    supportsAr: false,
    usageConstraints: '',
    usageGuidelinesViewer: '',
    usageGuidelinesNotes: '',
    deploymentNotes: '',
    geoRestrictions: '',
    accessScope: '',
  };
}

/**
 * A record with every field at its declared default
 */
export function createEmptyRecord(): MetadataRecord {
  return {
    core: defaultCore(),
    provenance: defaultProvenance(),
    access: defaultAccess(),
    lineage: defaultLineage(),
    technical: defaultTechnical(),
    project: defaultProject(),
  };
}

/**
 * Clear action: restore every field to its default, in place
 */
export function resetRecord(record: MetadataRecord): void {
  Object.assign(record.core, defaultCore());
  Object.assign(record.provenance, defaultProvenance());
  Object.assign(record.access, defaultAccess());
  Object.assign(record.lineage, defaultLineage());
  Object.assign(record.technical, defaultTechnical());
  Object.assign(record.project, defaultProject());
}

/**
 * Deep copy, for callers that want to keep a snapshot before an import
 */
export function cloneRecord(record: MetadataRecord): MetadataRecord {
  return {
    core: { ...record.core },
    provenance: { ...record.provenance },
    access: { ...record.access },
    lineage: { ...record.lineage },
    technical: { ...record.technical },
    project: { ...record.project },
  };
}

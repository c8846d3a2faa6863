/**
 * Metro Asset Metadata
 *
 * Maps editable 3D asset metadata to the registry's nested JSON document
 * and back, and carries it in scene properties, sidecar files and glTF
 * extras.
 *
 * @example
 * ```typescript
 * import { defineConfig, GltfMetricsProvider, ExtrasFieldStore } from 'metro-asset-metadata';
 *
 * const metro = defineConfig({ logLevel: 'warn' });
 *
 * metro.extract(new GltfMetricsProvider(document), { sourcePath: './helmet.glb' });
 * metro.getRecord().core.tags = 'museum, bronze';
 * metro.exportSidecar({ sourcePath: './helmet.glb' });
 * await metro.embedIntoFile('./helmet.glb');
 * ```
 */

import type { Document } from '@gltf-transform/core';
import { ZodError } from 'zod';
import { ERROR_MESSAGES } from './constants/errors';
import { MetroErrorFactory } from './errors';
import type { ValidationIssue } from './errors';
import { extractFromScene } from './extraction/extractor';
import type { ExtractContext } from './extraction/extractor';
import { GltfFileIO } from './gltf/gltf-file-io';
import type { EmbedFileResult } from './gltf/gltf-file-io';
import { embedIntoDocument, importFromDocument } from './gltf/gltf-hooks';
import type { EmbedResult } from './gltf/gltf-hooks';
import type { FieldStore, GeometryMetrics, GeometryMetricsProvider } from './interfaces';
import { ingest } from './metadata/applier';
import type { IngestResult } from './metadata/applier';
import { collect, countDocumentFields } from './metadata/collector';
import type { ExternalDocument } from './metadata/collector';
import { readFromStores } from './metadata/reader';
import type { ReadResult, ReadSources } from './metadata/reader';
import { createEmptyRecord, resetRecord } from './metadata/record';
import type { MetadataRecord } from './metadata/record';
import { validate } from './metadata/validator';
import { injectIntoStore } from './persistence/property-injector';
import type { InjectResult } from './persistence/property-injector';
import { exportSidecar } from './persistence/sidecar-writer';
import type { SidecarOptions } from './persistence/sidecar-writer';
import { MetroConfigSchema } from './schemas';
import type { MetroConfig } from './schemas';
import { generateUuid, LoggerFactory, toLogLevel } from './utils';
import type { Logger } from './utils';

/** Keys listed in a one-line report */
const REPORT_KEY_LIMIT = 5;

/**
 * Metadata actions over one active record
 */
export class MetroMetadata {
  private config: MetroConfig;
  private record: MetadataRecord;
  private logger: Logger;
  private fileLogger: Logger;
  private fileIO: GltfFileIO;

  constructor(config: Partial<MetroConfig> = {}) {
    try {
      this.config = MetroConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw MetroErrorFactory.configError(
          ERROR_MESSAGES.CONFIG_VALIDATION_ERROR,
          'MetroConfig',
          error
        );
      }
      throw error;
    }

    const level = toLogLevel(this.config.logLevel);
    this.logger = LoggerFactory.forMetadata(level);
    this.fileLogger = LoggerFactory.forFileOperations(level);
    this.record = createEmptyRecord();
    this.fileIO = new GltfFileIO(this.fileLogger);
  }

  /**
   * Fill the technical fields from scene geometry
   */
  extract<TObject>(provider: GeometryMetricsProvider<TObject>, context: ExtractContext = {}): GeometryMetrics {
    const metrics = extractFromScene(this.record, provider, context);
    const box = metrics.boundingBox;
    this.logger.info(
      `Extracted: ${metrics.triCount} tris, ${metrics.vertexCount} verts, ${metrics.materialCount} materials, ` +
      `bbox (${box.x.toFixed(2)} x ${box.y.toFixed(2)} x ${box.z.toFixed(2)})`
    );
    return metrics;
  }

  /**
   * Field issues under the configured name requirement
   */
  validate(): ValidationIssue[] {
    return validate(this.record, { requireName: this.config.requireName });
  }

  collect(): ExternalDocument {
    return collect(this.record);
  }

  /**
   * Store the document on a host property store (scene custom properties)
   */
  inject(store: FieldStore): InjectResult {
    this.assertValid('inject');
    const document = collect(this.record);
    const result = injectIntoStore(store, document, { nativeDepth: this.config.nativeDepth });
    this.logger.info(`Injected ${countDocumentFields(document)} metadata fields into scene`);
    return result;
  }

  /**
   * Populate the record from the scene's stored document and the active object
   */
  read(sources: ReadSources): ReadResult {
    const result = readFromStores(this.record, sources);
    this.reportMapping(result.mapped, result.raw);
    return result;
  }

  /**
   * Apply foreign metadata (JSON text or an object)
   */
  ingest(foreign: unknown): IngestResult {
    const result = ingest(this.record, foreign);
    this.reportMapping(result.mapped, result.raw);
    return result;
  }

  /**
   * Write the sidecar file; returns its path
   */
  exportSidecar(options: SidecarOptions = {}): string {
    this.assertValid('export sidecar');
    const filePath = exportSidecar(
      collect(this.record),
      { extension: this.config.sidecarExtension, ...options },
      this.fileLogger
    );
    this.logger.info(`Exported sidecar to: ${filePath}`);
    return filePath;
  }

  embedIntoDocument(document: Document): EmbedResult {
    this.assertValid('embed');
    const result = embedIntoDocument(document, this.record, {
      embedObjectStats: this.config.embedObjectStats,
    });
    this.logger.debug(`Embedded scene metadata: ${result.scene}, node stats: ${result.nodes}`);
    return result;
  }

  async embedIntoFile(inputPath: string, outputPath?: string): Promise<EmbedFileResult> {
    this.assertValid('embed');
    const result = await this.fileIO.embedIntoFile(this.record, inputPath, outputPath, {
      embedObjectStats: this.config.embedObjectStats,
    });
    this.logger.info(`Embedded metadata into ${result.outputPath}`);
    return result;
  }

  /**
   * Run the import hook on a document already in memory
   */
  importFromDocument(document: Document): IngestResult | null {
    const result = importFromDocument(document, this.record);
    if (result) {
      this.reportMapping(result.mapped, result.raw);
    }
    return result;
  }

  async importFromFile(filePath: string): Promise<IngestResult | null> {
    const result = await this.fileIO.importFromFile(this.record, filePath);
    if (result) {
      this.logger.info(`Imported metadata: ${result.mapped.length} fields from glTF extras`);
    } else {
      this.logger.warn(`No metadata found in ${filePath}`);
    }
    return result;
  }

  generateLineageId(): string {
    this.record.lineage.lineageId = generateUuid();
    this.logger.info('Generated new Lineage ID');
    return this.record.lineage.lineageId;
  }

  clear(): void {
    resetRecord(this.record);
    this.logger.info('All metadata cleared');
  }

  /**
   * The live record; edits go straight into it
   */
  getRecord(): MetadataRecord {
    return this.record;
  }

  getConfig(): MetroConfig {
    return { ...this.config };
  }

  private assertValid(action: string): void {
    const issues = this.validate();
    if (issues.length === 0) {
      return;
    }
    for (const issue of issues) {
      this.logger.warn(`${issue.field}: ${issue.message}`);
    }
    throw MetroErrorFactory.validationError(ERROR_MESSAGES.VALIDATION_ERROR, action, issues);
  }

  private reportMapping(mapped: readonly string[], raw: Record<string, unknown>): void {
    if (mapped.length > 0) {
      this.logger.info(`Mapped ${mapped.length} fields: ${mapped.slice(0, REPORT_KEY_LIMIT).join(', ')}`);
    } else {
      this.logger.warn('No recognized metadata found');
    }

    const rawKeys = Object.keys(raw);
    if (rawKeys.length > 0) {
      this.logger.info(`${rawKeys.length} unrecognized properties: ${rawKeys.slice(0, REPORT_KEY_LIMIT).join(', ')}`);
    }
  }
}

/**
 * Create a metadata instance with validated configuration
 *
 * @example
 * ```typescript
 * const metro = defineConfig({ requireName: false, embedObjectStats: false });
 * ```
 */
export function defineConfig(config: Partial<MetroConfig> = {}): MetroMetadata {
  return new MetroMetadata(config);
}

/**
 * TypeScript type exports
 */
export type { MetroConfig } from './schemas';
export type { MetadataRecord } from './metadata/record';
export type { ExternalDocument, JsonValue } from './metadata/collector';
export type { IngestResult, ApplyOutcome } from './metadata/applier';
export type { ReadResult, ReadSources } from './metadata/reader';
export type { InjectResult, InjectOptions } from './persistence/property-injector';
export type { SidecarOptions } from './persistence/sidecar-writer';
export type { EmbedOptions, EmbedResult } from './gltf/gltf-hooks';
export type { EmbedFileResult } from './gltf/gltf-file-io';
export type { ExtractContext } from './extraction/extractor';
export type * from './interfaces';

/**
 * Building blocks
 */
export { createEmptyRecord, resetRecord, cloneRecord } from './metadata/record';
export { validate } from './metadata/validator';
export { collect } from './metadata/collector';
export { apply, applyDocument, ingest } from './metadata/applier';
export { readFromStores } from './metadata/reader';
export * from './metadata/registry';
export { extractFromScene, extractFromObject } from './extraction/extractor';
export { injectIntoStore, readStoredDocument } from './persistence/property-injector';
export { exportSidecar, resolveSidecarPath } from './persistence/sidecar-writer';
export { MemoryFieldStore } from './persistence/field-store';
export { ExtrasFieldStore } from './gltf/extras-field-store';
export { GltfMetricsProvider } from './gltf/gltf-metrics-provider';
export { exportSceneHook, exportNodeHook, importSceneHook } from './gltf/gltf-hooks';
export { GltfFileIO } from './gltf/gltf-file-io';
export * from './errors';
export { SCHEMA_VERSION, FIELD_MAP_TO_API } from './constants/schema';
export { PROPERTY_KEYS } from './constants/config';

/**
 * glTF File I/O
 *
 * Reads and writes .gltf/.glb files with every registered extension kept,
 * running the metadata hooks in between.
 */

import { Document, NodeIO } from '@gltf-transform/core';
import { ALL_EXTENSIONS } from '@gltf-transform/extensions';
import { ERROR_MESSAGES } from '../constants/errors';
import { MetroErrorFactory } from '../errors';
import type { IngestResult } from '../metadata/applier';
import type { MetadataRecord } from '../metadata/record';
import { LoggerFactory } from '../utils';
import type { Logger } from '../utils';
import { embedIntoDocument, importFromDocument } from './gltf-hooks';
import type { EmbedOptions, EmbedResult } from './gltf-hooks';

export interface EmbedFileResult extends EmbedResult {
  outputPath: string;
}

export class GltfFileIO {
  private io: NodeIO;
  private logger: Logger;

  constructor(logger: Logger = LoggerFactory.forFileOperations()) {
    this.io = new NodeIO().registerExtensions(ALL_EXTENSIONS);
    this.logger = logger;
  }

  async read(filePath: string): Promise<Document> {
    try {
      const document = await this.io.read(filePath);
      this.logger.logFileOperation('read glTF', filePath);
      return document;
    } catch (error) {
      const failure = MetroErrorFactory.fileSystemError(ERROR_MESSAGES.GLTF_READ_FAILED, filePath, 'read', error);
      this.logger.logError(failure, { filePath });
      throw failure;
    }
  }

  async write(filePath: string, document: Document): Promise<void> {
    try {
      await this.io.write(filePath, document);
      this.logger.logFileOperation('write glTF', filePath);
    } catch (error) {
      const failure = MetroErrorFactory.fileSystemError(ERROR_MESSAGES.GLTF_WRITE_FAILED, filePath, 'write', error);
      this.logger.logError(failure, { filePath });
      throw failure;
    }
  }

  /**
   * Embed the record into a file; the input is overwritten unless an
   * output path is given
   */
  async embedIntoFile(
    record: MetadataRecord,
    inputPath: string,
    outputPath: string = inputPath,
    options: EmbedOptions = {}
  ): Promise<EmbedFileResult> {
    return this.logger.withTiming('embed glTF', async () => {
      const document = await this.read(inputPath);
      const result = embedIntoDocument(document, record, options);
      await this.write(outputPath, document);
      return { ...result, outputPath };
    }, { inputPath, outputPath });
  }

  /**
   * Apply the metadata block of a file's default scene to the record
   */
  async importFromFile(record: MetadataRecord, filePath: string): Promise<IngestResult | null> {
    const document = await this.read(filePath);
    return importFromDocument(document, record);
  }
}

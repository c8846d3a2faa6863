/**
 * Sidecar Writer
 *
 * Writes the collected document to `<basename>.metro.json` beside the
 * source file, or to an explicit path.
 */

import { DEFAULT_CONFIG } from '../constants/config';
import { ERROR_MESSAGES } from '../constants/errors';
import { MetroErrorFactory } from '../errors';
import type { ExternalDocument } from '../metadata/collector';
import { LoggerFactory, replaceExtension, writeFileAtomic } from '../utils';
import type { Logger } from '../utils';
import { serializeDocument } from './property-injector';

export interface SidecarOptions {
  /** Explicit output path; wins over everything else */
  filePath?: string;
  /** Path of the file the metadata describes (the saved scene or export) */
  sourcePath?: string;
  extension?: string;
}

/**
 * Explicit path, else the source path with the sidecar extension
 */
export function resolveSidecarPath(options: SidecarOptions): string {
  if (options.filePath) {
    return options.filePath;
  }
  if (options.sourcePath) {
    return replaceExtension(options.sourcePath, options.extension ?? DEFAULT_CONFIG.SIDECAR_EXTENSION);
  }
  throw MetroErrorFactory.pathResolutionError(ERROR_MESSAGES.NO_SIDECAR_PATH, 'sidecar');
}

/**
 * Write the sidecar; returns the path written
 */
export function exportSidecar(
  document: ExternalDocument,
  options: SidecarOptions = {},
  logger: Logger = LoggerFactory.forFileOperations()
): string {
  const filePath = resolveSidecarPath(options);
  const content = `${serializeDocument(document)}\n`;

  try {
    writeFileAtomic(filePath, content);
  } catch (error) {
    throw MetroErrorFactory.fileSystemError(ERROR_MESSAGES.SIDECAR_WRITE_FAILED, filePath, 'write', error);
  }

  logger.logFileOperation('write sidecar', filePath, Buffer.byteLength(content, 'utf-8'));
  return filePath;
}

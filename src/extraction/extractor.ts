/**
 * Extractor
 *
 * Fills the auto-extracted technical fields from host geometry. Only
 * metric fields are overwritten; descriptive fields the user edited stay.
 */

import { BOUNDING_BOX_PRECISION } from '../constants/config';
import type { BoundingBox, GeometryMetrics, GeometryMetricsProvider, ObjectStats } from '../interfaces';
import type { MetadataRecord } from '../metadata/record';
import { getBasenameWithoutExt, roundTo } from '../utils';

export interface ExtractContext {
  /** Saved file the scene came from; its basename names an unnamed asset */
  sourcePath?: string;
}

export function roundBoundingBox(box: BoundingBox): BoundingBox {
  return {
    x: roundTo(box.x, BOUNDING_BOX_PRECISION),
    y: roundTo(box.y, BOUNDING_BOX_PRECISION),
    z: roundTo(box.z, BOUNDING_BOX_PRECISION),
  };
}

/**
 * Extract scene metrics into the record; returns the metrics as read
 */
export function extractFromScene<TObject>(
  record: MetadataRecord,
  provider: GeometryMetricsProvider<TObject>,
  context: ExtractContext = {}
): GeometryMetrics {
  const metrics = provider.getSceneMetrics();
  const box = roundBoundingBox(metrics.boundingBox);

  record.core.triCount = metrics.triCount;
  record.technical.vertexCount = metrics.vertexCount;
  record.technical.boundingBoxX = box.x;
  record.technical.boundingBoxY = box.y;
  record.technical.boundingBoxZ = box.z;
  record.technical.materialCount = metrics.materialCount;
  record.technical.hasTextures = metrics.hasTextures;
  record.technical.supportsPbr = metrics.supportsPbr;

  if (!record.core.assetName) {
    const fromFile = context.sourcePath ? getBasenameWithoutExt(context.sourcePath) : '';
    record.core.assetName = fromFile || provider.getSceneName();
  }

  return { ...metrics, boundingBox: box };
}

/**
 * Per-object stats block, or null when the object is not a mesh
 */
export function extractFromObject<TObject>(
  provider: GeometryMetricsProvider<TObject>,
  object: TObject
): ObjectStats | null {
  const metrics = provider.getObjectMetrics(object);
  if (!metrics) {
    return null;
  }
  return {
    triCount: metrics.triCount,
    vertexCount: metrics.vertexCount,
    boundingBox: roundBoundingBox(metrics.boundingBox),
  };
}

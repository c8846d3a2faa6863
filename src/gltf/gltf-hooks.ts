/**
 * glTF Export/Import Hooks
 *
 * Scene-level hooks carry the collected document in the scene extras under
 * `metro_metadata`; node-level hooks add a small stats block under
 * `metro_object_stats` when the scene holds more than one mesh node.
 */

import type { Document, Node, Scene } from '@gltf-transform/core';
import { PROPERTY_KEYS } from '../constants/config';
import { extractFromObject } from '../extraction/extractor';
import type { GeometryMetricsProvider } from '../interfaces';
import { ingest, toForeignDocument } from '../metadata/applier';
import type { IngestResult } from '../metadata/applier';
import { collect } from '../metadata/collector';
import type { MetadataRecord } from '../metadata/record';
import { GltfMetricsProvider } from './gltf-metrics-provider';

export interface EmbedOptions {
  /** Write per-node stats blocks */
  embedObjectStats?: boolean;
}

export interface EmbedResult {
  /** Whether the scene document was written */
  scene: boolean;
  /** Nodes that received a stats block */
  nodes: number;
}

/**
 * Write the collected document to the scene extras. Nothing is written for
 * an unnamed asset.
 */
export function exportSceneHook(scene: Scene, record: MetadataRecord): boolean {
  if (!record.core.assetName) {
    return false;
  }
  scene.setExtras({ ...scene.getExtras(), [PROPERTY_KEYS.METADATA]: collect(record) });
  return true;
}

/**
 * Write the stats block to a mesh node's extras when several mesh nodes exist
 */
export function exportNodeHook(
  node: Node,
  provider: GeometryMetricsProvider<Node>,
  meshCount: number
): boolean {
  if (meshCount <= 1) {
    return false;
  }
  const stats = extractFromObject(provider, node);
  if (!stats) {
    return false;
  }
  node.setExtras({
    ...node.getExtras(),
    [PROPERTY_KEYS.OBJECT_STATS]: {
      triCount: stats.triCount,
      vertexCount: stats.vertexCount,
      boundingBox: { ...stats.boundingBox },
    },
  });
  return true;
}

/**
 * Apply the `metro_metadata` block found in scene extras. The extras may be
 * absent, an object or JSON text; null when there is no block to read.
 */
export function importSceneHook(extras: unknown, record: MetadataRecord): IngestResult | null {
  const data = toForeignDocument(extras);
  if (!data) {
    return null;
  }
  const block = toForeignDocument(data[PROPERTY_KEYS.METADATA]);
  if (!block || Object.keys(block).length === 0) {
    return null;
  }
  return ingest(record, block);
}

/**
 * Run the export hooks over a document: the scene once, then every mesh node
 */
export function embedIntoDocument(
  document: Document,
  record: MetadataRecord,
  options: EmbedOptions = {}
): EmbedResult {
  const provider = new GltfMetricsProvider(document);
  const scene = provider.getScene();
  if (!scene) {
    return { scene: false, nodes: 0 };
  }

  const result: EmbedResult = { scene: exportSceneHook(scene, record), nodes: 0 };
  if (options.embedObjectStats === false) {
    return result;
  }

  const meshNodes = provider.listMeshObjects();
  for (const node of meshNodes) {
    if (exportNodeHook(node, provider, meshNodes.length)) {
      result.nodes++;
    }
  }
  return result;
}

/**
 * Run the import hook on a document's default scene
 */
export function importFromDocument(document: Document, record: MetadataRecord): IngestResult | null {
  const scene = new GltfMetricsProvider(document).getScene();
  return scene ? importSceneHook(scene.getExtras(), record) : null;
}

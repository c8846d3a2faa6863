/**
 * glTF Geometry Metrics Provider
 *
 * Reads triangle and vertex counts, world-space bounds and material facts
 * from a glTF-Transform document. Every mesh node of the scene counts as a
 * visible mesh object; a mesh instanced by several nodes counts once per node.
 */

import { Document, Material, Node, Primitive, Scene } from '@gltf-transform/core';
import { getBounds } from '@gltf-transform/functions';
import type { BoundingBox, GeometryMetrics, GeometryMetricsProvider } from '../interfaces';

/**
 * glTF primitive modes (accessor topology)
 */
const PRIMITIVE_MODES = {
  TRIANGLES: 4,
  TRIANGLE_STRIP: 5,
  TRIANGLE_FAN: 6,
} as const;

const UNLIT_EXTENSION = 'KHR_materials_unlit';
const DEFAULT_SCENE_NAME = 'Scene';

function emptyMetrics(): GeometryMetrics {
  return {
    triCount: 0,
    vertexCount: 0,
    boundingBox: { x: 0, y: 0, z: 0 },
    materialCount: 0,
    hasTextures: false,
    supportsPbr: false,
  };
}

/**
 * Triangles drawn by one primitive
 */
export function countPrimitiveTriangles(primitive: Primitive): number {
  const indices = primitive.getIndices();
  const position = primitive.getAttribute('POSITION');
  const count = indices ? indices.getCount() : position ? position.getCount() : 0;

  switch (primitive.getMode()) {
    case PRIMITIVE_MODES.TRIANGLES:
      return Math.floor(count / 3);
    case PRIMITIVE_MODES.TRIANGLE_STRIP:
    case PRIMITIVE_MODES.TRIANGLE_FAN:
      return Math.max(count - 2, 0);
    default:
      // Points and lines
      return 0;
  }
}

function hasAnyTexture(material: Material): boolean {
  return (
    material.getBaseColorTexture() !== null ||
    material.getMetallicRoughnessTexture() !== null ||
    material.getNormalTexture() !== null ||
    material.getOcclusionTexture() !== null ||
    material.getEmissiveTexture() !== null
  );
}

function isPbrMaterial(material: Material): boolean {
  return material.getExtension(UNLIT_EXTENSION) === null;
}

function boundsToExtents(target: Node | Scene): BoundingBox {
  const { min, max } = getBounds(target);
  if (!min.every(Number.isFinite) || !max.every(Number.isFinite)) {
    return { x: 0, y: 0, z: 0 };
  }
  return {
    x: max[0] - min[0],
    y: max[1] - min[1],
    z: max[2] - min[2],
  };
}

export class GltfMetricsProvider implements GeometryMetricsProvider<Node> {
  private scene: Scene | null;

  constructor(document: Document, scene?: Scene) {
    const root = document.getRoot();
    this.scene = scene ?? root.getDefaultScene() ?? root.listScenes()[0] ?? null;
  }

  getScene(): Scene | null {
    return this.scene;
  }

  getSceneName(): string {
    return this.scene?.getName() || DEFAULT_SCENE_NAME;
  }

  listMeshObjects(): Node[] {
    const nodes: Node[] = [];
    this.scene?.traverse(node => {
      if (node.getMesh()) {
        nodes.push(node);
      }
    });
    return nodes;
  }

  getSceneMetrics(): GeometryMetrics {
    const nodes = this.listMeshObjects();
    if (!this.scene || nodes.length === 0) {
      return emptyMetrics();
    }

    const metrics = this.measure(nodes);
    metrics.boundingBox = boundsToExtents(this.scene);
    return metrics;
  }

  getObjectMetrics(node: Node): GeometryMetrics | null {
    if (!node.getMesh()) {
      return null;
    }
    const metrics = this.measure([node]);
    metrics.boundingBox = boundsToExtents(node);
    return metrics;
  }

  /**
   * Counts and material facts over mesh nodes (bounds left empty)
   */
  private measure(nodes: Node[]): GeometryMetrics {
    const metrics = emptyMetrics();
    const materials = new Set<Material>();

    for (const node of nodes) {
      const mesh = node.getMesh();
      if (!mesh) continue;

      for (const primitive of mesh.listPrimitives()) {
        metrics.triCount += countPrimitiveTriangles(primitive);
        metrics.vertexCount += primitive.getAttribute('POSITION')?.getCount() ?? 0;

        const material = primitive.getMaterial();
        if (material) {
          materials.add(material);
        }
      }
    }

    for (const material of materials) {
      metrics.hasTextures = metrics.hasTextures || hasAnyTexture(material);
      metrics.supportsPbr = metrics.supportsPbr || isPbrMaterial(material);
    }
    metrics.materialCount = materials.size;

    return metrics;
  }
}

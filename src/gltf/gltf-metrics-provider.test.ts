import { Document, Primitive } from '@gltf-transform/core';
import type { GLTF } from '@gltf-transform/core';
import { KHRMaterialsUnlit } from '@gltf-transform/extensions';
import { describe, expect, it } from 'vitest';
import { countPrimitiveTriangles, GltfMetricsProvider } from './gltf-metrics-provider';
import { createGalleryDocument, createQuadMesh } from './test-scenes';

function primitiveWithPositions(document: Document, count: number, mode: GLTF.MeshPrimitiveMode): Primitive {
  const position = document
    .createAccessor()
    .setType('VEC3')
    .setArray(new Float32Array(count * 3));
  return document.createPrimitive().setAttribute('POSITION', position).setMode(mode);
}

describe('countPrimitiveTriangles', () => {
  it('counts indexed triangles', () => {
    const document = new Document();
    const [primitive] = createQuadMesh(document, null).listPrimitives();

    expect(countPrimitiveTriangles(primitive)).toBe(2);
  });

  it('counts non-indexed triangles, strips and fans', () => {
    const document = new Document();

    expect(countPrimitiveTriangles(primitiveWithPositions(document, 6, Primitive.Mode.TRIANGLES))).toBe(2);
    expect(countPrimitiveTriangles(primitiveWithPositions(document, 4, Primitive.Mode.TRIANGLE_STRIP))).toBe(2);
    expect(countPrimitiveTriangles(primitiveWithPositions(document, 5, Primitive.Mode.TRIANGLE_FAN))).toBe(3);
  });

  it('counts no triangles for points and lines', () => {
    const document = new Document();

    expect(countPrimitiveTriangles(primitiveWithPositions(document, 6, Primitive.Mode.POINTS))).toBe(0);
    expect(countPrimitiveTriangles(primitiveWithPositions(document, 6, Primitive.Mode.LINES))).toBe(0);
  });
});

describe('GltfMetricsProvider', () => {
  it('aggregates every mesh node of the default scene', () => {
    const provider = new GltfMetricsProvider(createGalleryDocument(2));

    expect(provider.getSceneName()).toBe('Gallery');
    expect(provider.listMeshObjects().map(node => node.getName())).toEqual(['quad-0', 'quad-1']);
    expect(provider.getSceneMetrics()).toEqual({
      triCount: 4,
      vertexCount: 8,
      boundingBox: { x: 12, y: 3, z: 4 },
      materialCount: 1,
      hasTextures: false,
      supportsPbr: true,
    });
  });

  it('measures one node in world space', () => {
    const provider = new GltfMetricsProvider(createGalleryDocument(2));
    const [, second] = provider.listMeshObjects();

    expect(provider.getObjectMetrics(second)).toEqual({
      triCount: 2,
      vertexCount: 4,
      boundingBox: { x: 2, y: 3, z: 4 },
      materialCount: 1,
      hasTextures: false,
      supportsPbr: true,
    });
  });

  it('gives null for a node without a mesh', () => {
    const document = createGalleryDocument(1);
    const empty = document.createNode('empty');
    document.getRoot().listScenes()[0].addChild(empty);

    expect(new GltfMetricsProvider(document).getObjectMetrics(empty)).toBeNull();
  });

  it('gives zero metrics for a scene without meshes', () => {
    const document = new Document();
    document.getRoot().setDefaultScene(document.createScene());
    const provider = new GltfMetricsProvider(document);

    expect(provider.getSceneName()).toBe('Scene');
    expect(provider.listMeshObjects()).toEqual([]);
    expect(provider.getSceneMetrics()).toEqual({
      triCount: 0,
      vertexCount: 0,
      boundingBox: { x: 0, y: 0, z: 0 },
      materialCount: 0,
      hasTextures: false,
      supportsPbr: false,
    });
  });

  it('handles a document without scenes', () => {
    const provider = new GltfMetricsProvider(new Document());

    expect(provider.getScene()).toBeNull();
    expect(provider.getSceneMetrics().triCount).toBe(0);
  });

  it('detects textures and unlit materials', () => {
    const document = createGalleryDocument(1);
    const [material] = document.getRoot().listMaterials();
    const texture = document.createTexture('albedo').setMimeType('image/png').setImage(new Uint8Array([1, 2, 3]));
    material.setBaseColorTexture(texture);
    const unlit = document.createExtension(KHRMaterialsUnlit).createUnlit();
    material.setExtension('KHR_materials_unlit', unlit);

    const metrics = new GltfMetricsProvider(document).getSceneMetrics();

    expect(metrics.hasTextures).toBe(true);
    expect(metrics.supportsPbr).toBe(false);
  });

  it('counts distinct materials', () => {
    const document = createGalleryDocument(1);
    const other = createQuadMesh(document, document.createMaterial('metal'));
    document.getRoot().listScenes()[0].addChild(document.createNode('metal-quad').setMesh(other));

    expect(new GltfMetricsProvider(document).getSceneMetrics().materialCount).toBe(2);
  });
});

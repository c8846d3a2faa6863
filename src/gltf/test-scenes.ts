/**
 * Small in-memory scenes for the glTF tests
 */

import { Document, Material, Mesh } from '@gltf-transform/core';

/**
 * A quad of two triangles spanning 2 x 3 x 4
 */
export function createQuadMesh(document: Document, material: Material | null): Mesh {
  const buffer = document.getRoot().listBuffers()[0] ?? document.createBuffer();
  const position = document
    .createAccessor('position')
    .setType('VEC3')
    .setArray(new Float32Array([0, 0, 0, 2, 0, 0, 0, 3, 0, 2, 3, 4]))
    .setBuffer(buffer);
  const indices = document
    .createAccessor('indices')
    .setType('SCALAR')
    .setArray(new Uint16Array([0, 1, 2, 1, 3, 2]))
    .setBuffer(buffer);

  const primitive = document.createPrimitive().setAttribute('POSITION', position).setIndices(indices);
  if (material) {
    primitive.setMaterial(material);
  }
  return document.createMesh('quad').addPrimitive(primitive);
}

/**
 * Default scene "Gallery" holding `count` quad nodes, each shifted 10 units
 * along x, all sharing one material
 */
export function createGalleryDocument(count: number): Document {
  const document = new Document();
  const material = document.createMaterial('stone');
  const mesh = createQuadMesh(document, material);
  const scene = document.createScene('Gallery');

  for (let i = 0; i < count; i++) {
    scene.addChild(document.createNode(`quad-${i}`).setMesh(mesh).setTranslation([i * 10, 0, 0]));
  }

  document.getRoot().setDefaultScene(scene);
  return document;
}

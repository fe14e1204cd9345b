import { Accessor, Document, NodeIO, type GLTF } from "@gltf-transform/core";
import { BufferAttribute, type BufferGeometry, type Scene } from "three";
import { sceneMeshes } from "./primitives";

export type SceneExtras = Record<string, string | number>;

function floatAttribute(geometry: BufferGeometry, name: string): Float32Array {
  const attr = geometry.getAttribute(name);
  if (!(attr instanceof BufferAttribute) || !(attr.array instanceof Float32Array)) {
    throw new Error(`geometry attribute '${name}' is missing or not float32`);
  }
  return attr.array.slice();
}

function indices(geometry: BufferGeometry, vertexCount: number): Uint32Array {
  const index = geometry.getIndex();
  if (!index) return Uint32Array.from({ length: vertexCount }, (_, i) => i);
  return Uint32Array.from(index.array);
}

/**
 * Serializes every mesh in the scene to a binary glTF (GLB) in memory.
 * Each mesh becomes one named node with POSITION, NORMAL and COLOR_0.
 */
export async function exportGlb(scene: Scene, extras: SceneExtras = {}): Promise<Uint8Array> {
  const doc = new Document();
  const buffer = doc.createBuffer();
  const material = doc.createMaterial("VertexColor")
    .setBaseColorFactor([1, 1, 1, 1])
    .setMetallicFactor(0)
    .setRoughnessFactor(0.8);

  const root = doc.createScene("House").setExtras(extras);

  for (const mesh of sceneMeshes(scene)) {
    const geometry = mesh.geometry;
    const positions = floatAttribute(geometry, "position");
    const vertexCount = positions.length / 3;

    const accessor = (suffix: string, type: GLTF.AccessorType, array: Float32Array | Uint32Array) =>
      doc.createAccessor(`${mesh.name}_${suffix}`).setType(type).setArray(array).setBuffer(buffer);

    const primitive = doc.createPrimitive()
      .setAttribute("POSITION", accessor("position", Accessor.Type.VEC3, positions))
      .setAttribute("NORMAL", accessor("normal", Accessor.Type.VEC3, floatAttribute(geometry, "normal")))
      .setAttribute("COLOR_0", accessor("color", Accessor.Type.VEC4, floatAttribute(geometry, "color")))
      .setIndices(accessor("indices", Accessor.Type.SCALAR, indices(geometry, vertexCount)))
      .setMaterial(material);

    const gltfMesh = doc.createMesh(mesh.name).addPrimitive(primitive);
    root.addChild(doc.createNode(mesh.name).setMesh(gltfMesh));
  }

  doc.getRoot().setDefaultScene(root);
  return new NodeIO().writeBinary(doc);
}

import {
  BoxGeometry,
  BufferGeometry,
  ConeGeometry,
  CylinderGeometry,
  Float32BufferAttribute,
  Mesh,
  MeshStandardMaterial,
  Scene,
} from "three";
import type { Rgba, Vec3 } from "./types";

// Scenes are z-up: x/y is the ground plane, z is height.

const RADIAL_SEGMENTS = 32;

function paint(geometry: BufferGeometry, color: Rgba): BufferGeometry {
  const count = geometry.getAttribute("position").count;
  const [r, g, b, a] = color.map((c) => c / 255);
  const rgba = new Float32Array(count * 4);
  for (let i = 0; i < count; i++) {
    rgba.set([r, g, b, a], i * 4);
  }
  geometry.setAttribute("color", new Float32BufferAttribute(rgba, 4));
  return geometry;
}

function place(name: string, geometry: BufferGeometry, at: Vec3, color: Rgba): Mesh {
  geometry.translate(at.x, at.y, at.z);
  const mesh = new Mesh(paint(geometry, color), new MeshStandardMaterial({ vertexColors: true }));
  mesh.name = name;
  return mesh;
}

/** Box with the given extents, centred on `at` */
export function box(name: string, size: Vec3, at: Vec3, color: Rgba): Mesh {
  return place(name, new BoxGeometry(size.x, size.y, size.z), at, color);
}

/** Upright cylinder centred on `at` */
export function cylinder(name: string, radius: number, height: number, at: Vec3, color: Rgba): Mesh {
  const geometry = new CylinderGeometry(radius, radius, height, RADIAL_SEGMENTS);
  geometry.rotateX(Math.PI / 2);
  return place(name, geometry, at, color);
}

/** Upright cone, apex pointing +z, centred on `at` */
export function cone(name: string, radius: number, height: number, at: Vec3, color: Rgba): Mesh {
  const geometry = new ConeGeometry(radius, height, RADIAL_SEGMENTS);
  geometry.rotateX(Math.PI / 2);
  return place(name, geometry, at, color);
}

export function sceneMeshes(scene: Scene): Mesh[] {
  const meshes: Mesh[] = [];
  for (const child of scene.children) {
    if (child instanceof Mesh) meshes.push(child);
  }
  return meshes;
}

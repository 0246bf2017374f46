// src/core/types/mesh.ts
import type { AABB } from "@/core/types/gpu";

/**
 * Raw mesh data, typically produced by a model loader.
 * This data is what a renderer uploads into vertex and index buffers.
 */
export interface MeshData {
  positions: Float32Array;
  normals: Float32Array;
  indices: Uint16Array | Uint32Array;
  texCoords?: Float32Array;
  texCoords1?: Float32Array;
  tangents?: Float32Array;
  /** Per-vertex RGBA colors. */
  colors?: Float32Array;
  /** Local-space bounds. Loaders fill this from file data or positions. */
  aabb?: AABB;
  /** Draw lines instead of triangles. */
  topology?: "triangle-list" | "line-list";
}

// src/core/utils/bounds.ts
import { vec3 } from "wgpu-matrix";
import type { AABB } from "@/core/types/gpu";

/**
 * Computes the axis-aligned bounding box from vertex positions.
 *
 * @remarks
 * Only the vertex window `[firstVertex, firstVertex + vertexCount)` is
 * considered. An empty window yields a degenerate box at the origin.
 *
 * @param positions Flattened array of vertex positions [x,y,z,x,y,z,...]
 * @param firstVertex First vertex of the window. Defaults to 0.
 * @param vertexCount Number of vertices. Defaults to the rest of the array.
 * @returns AABB with min and max corners
 */
export function computeAABB(
  positions: Float32Array,
  firstVertex = 0,
  vertexCount = positions.length / 3 - firstVertex,
): AABB {
  if (vertexCount <= 0) {
    return { min: vec3.create(0, 0, 0), max: vec3.create(0, 0, 0) };
  }
  let minX = Infinity,
    minY = Infinity,
    minZ = Infinity;
  let maxX = -Infinity,
    maxY = -Infinity,
    maxZ = -Infinity;
  const end = (firstVertex + vertexCount) * 3;
  for (let i = firstVertex * 3; i < end; i += 3) {
    const x = positions[i],
      y = positions[i + 1],
      z = positions[i + 2];
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
    if (y < minY) minY = y;
    if (y > maxY) maxY = y;
    if (z < minZ) minZ = z;
    if (z > maxZ) maxZ = z;
  }
  return {
    min: vec3.create(minX, minY, minZ),
    max: vec3.create(maxX, maxY, maxZ),
  };
}

/**
 * Returns a copy of the stored bounds, or bounds derived from positions
 * when none were stored.
 */
export function resolveBounds(
  bounds: AABB | null,
  positions: Float32Array,
): AABB {
  if (bounds) {
    return { min: vec3.clone(bounds.min), max: vec3.clone(bounds.max) };
  }
  return computeAABB(positions);
}


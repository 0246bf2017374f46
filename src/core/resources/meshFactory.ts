// src/core/resources/meshFactory.ts
import type { AABB } from "@/core/types/gpu";
import type { MeshData } from "@/core/types/mesh";
import { Topology, type MeshContainer } from "@/core/types/vnb";
import { computeAABB, resolveBounds } from "@/core/utils/bounds";
import { FormatError } from "@/core/vnb/formatError";
import {
  COLOR_COMPONENTS,
  NORMAL_COMPONENTS,
  POSITION_COMPONENTS,
  TANGENT_COMPONENTS,
  UV_COMPONENTS,
} from "@/core/vnb/vnbLayout";

const MAX_U16_INDEX = 0xffff;

function sliceStream(
  stream: Float32Array | null,
  firstVertex: number,
  vertexCount: number,
  components: number,
): Float32Array | undefined {
  if (!stream) return undefined;
  return stream.slice(
    firstVertex * components,
    (firstVertex + vertexCount) * components,
  );
}

/**
 * A stateless factory turning decoded containers into engine mesh data.
 *
 * @remarks
 * Each submesh becomes one {@link MeshData} whose vertex streams cover the
 * submesh's vertex window and whose indices are rebased into that window.
 * Index ranges and rebased indices are validated; nothing is clamped.
 */
export class MeshFactory {
  /**
   * Extracts one submesh as standalone mesh data.
   *
   * @remarks
   * Every index in `[startIndex, startIndex + indexCount)` is offset by
   * `baseVertex`, must land inside `[firstVertex, firstVertex + vertexCount)`
   * and is then written relative to `firstVertex`. Missing normals are
   * returned as an empty array, as other loaders do.
   *
   * @param container A decoded container.
   * @param subMeshIndex Index into `container.subMeshes`.
   * @returns Mesh data for the submesh, with an AABB of its vertex window.
   * @throws FormatError (`InvariantViolation`) for an unknown submesh, an
   *     index range outside the index buffer, or an index outside the
   *     vertex window.
   */
  public static fromSubMesh(
    container: MeshContainer,
    subMeshIndex: number,
  ): MeshData {
    const subMesh = container.subMeshes.at(subMeshIndex);
    if (!subMesh || subMeshIndex < 0) {
      throw new FormatError(
        "InvariantViolation",
        `submesh ${subMeshIndex} does not exist (${container.subMeshes.length} submeshes)`,
      );
    }

    const totalVertices = container.positions.length / POSITION_COMPONENTS;
    const { startIndex, indexCount, baseVertex, firstVertex, vertexCount } =
      subMesh;

    if (startIndex + indexCount > container.indices.length) {
      throw new FormatError(
        "InvariantViolation",
        `submesh ${subMeshIndex} indices [${startIndex}, ${startIndex + indexCount}) exceed index buffer of ${container.indices.length}`,
      );
    }
    if (firstVertex + vertexCount > totalVertices) {
      throw new FormatError(
        "InvariantViolation",
        `submesh ${subMeshIndex} vertices [${firstVertex}, ${firstVertex + vertexCount}) exceed vertex buffer of ${totalVertices}`,
      );
    }

    const indices =
      vertexCount - 1 <= MAX_U16_INDEX
        ? new Uint16Array(indexCount)
        : new Uint32Array(indexCount);
    for (let i = 0; i < indexCount; i++) {
      const global = container.indices[startIndex + i] + baseVertex;
      if (global < firstVertex || global >= firstVertex + vertexCount) {
        throw new FormatError(
          "InvariantViolation",
          `submesh ${subMeshIndex} index ${i} resolves to vertex ${global}, outside [${firstVertex}, ${firstVertex + vertexCount})`,
        );
      }
      indices[i] = global - firstVertex;
    }

    const positions = container.positions.slice(
      firstVertex * POSITION_COMPONENTS,
      (firstVertex + vertexCount) * POSITION_COMPONENTS,
    );
    const meshData: MeshData = {
      positions,
      normals:
        sliceStream(container.normals, firstVertex, vertexCount, NORMAL_COMPONENTS) ??
        new Float32Array(0),
      indices,
      aabb: computeAABB(positions),
    };

    const texCoords = sliceStream(container.uv0, firstVertex, vertexCount, UV_COMPONENTS);
    if (texCoords) meshData.texCoords = texCoords;
    const texCoords1 = sliceStream(container.uv1, firstVertex, vertexCount, UV_COMPONENTS);
    if (texCoords1) meshData.texCoords1 = texCoords1;
    const tangents = sliceStream(
      container.tangents,
      firstVertex,
      vertexCount,
      TANGENT_COMPONENTS,
    );
    if (tangents) meshData.tangents = tangents;
    const colors = sliceStream(container.colors, firstVertex, vertexCount, COLOR_COMPONENTS);
    if (colors) meshData.colors = colors;
    if (subMesh.topology === Topology.Lines) meshData.topology = "line-list";

    return meshData;
  }

  /**
   * Extracts every submesh of a container, in order.
   */
  public static fromContainer(container: MeshContainer): MeshData[] {
    return container.subMeshes.map((_, i) =>
      MeshFactory.fromSubMesh(container, i),
    );
  }

  /**
   * Returns the container's bounds, computed from positions when the
   * container stores none.
   */
  public static containerBounds(container: MeshContainer): AABB {
    return resolveBounds(container.bounds, container.positions);
  }
}

/** Functional alias of {@link MeshFactory.fromSubMesh}. */
export function extractSubMeshData(
  container: MeshContainer,
  subMeshIndex: number,
): MeshData {
  return MeshFactory.fromSubMesh(container, subMeshIndex);
}

/** Functional alias of {@link MeshFactory.fromContainer}. */
export function toMeshData(container: MeshContainer): MeshData[] {
  return MeshFactory.fromContainer(container);
}

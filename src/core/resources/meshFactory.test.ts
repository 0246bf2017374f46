// src/core/resources/meshFactory.test.ts
import { describe, expect, it } from "vitest";
import { vec3 } from "wgpu-matrix";
import { GlobalFlags, Topology, type MeshContainer } from "@/core/types/vnb";
import { fullContainer, triangleContainer } from "@/core/vnb/testFixtures";
import { MeshFactory, extractSubMeshData, toMeshData } from "./meshFactory";

/** Two triangles stored with indices relative to a shared base vertex. */
function offsetContainer(): MeshContainer {
  return {
    ...triangleContainer(),
    featureFlags: GlobalFlags.HasPositions | GlobalFlags.HasVertexColors,
    positions: new Float32Array([
      0, 0, 0, 1, 0, 0, 0, 1, 0,
      4, 4, 4, 5, 4, 4, 4, 5, 4,
    ]),
    colors: new Float32Array([
      1, 0, 0, 1, 1, 0, 0, 1, 1, 0, 0, 1,
      0, 1, 0, 1, 0, 1, 0, 1, 0, 1, 0, 1,
    ]),
    indices: new Uint32Array([0, 1, 2, 0, 2, 1]),
    subMeshes: [
      {
        topology: Topology.Triangles,
        materialIndex: null,
        startIndex: 0,
        indexCount: 3,
        baseVertex: 0,
        firstVertex: 0,
        vertexCount: 3,
      },
      {
        topology: Topology.Lines,
        materialIndex: 0,
        startIndex: 3,
        indexCount: 3,
        baseVertex: 3,
        firstVertex: 3,
        vertexCount: 3,
      },
    ],
    vertexCount: 6,
    indexCount: 6,
  };
}

describe("MeshFactory", () => {
  it("rebases indices by baseVertex into the submesh window", () => {
    const mesh = MeshFactory.fromSubMesh(offsetContainer(), 1);

    expect(Array.from(mesh.indices)).toEqual([0, 2, 1]);
    expect(mesh.indices).toBeInstanceOf(Uint16Array);
    expect(mesh.positions).toEqual(
      new Float32Array([4, 4, 4, 5, 4, 4, 4, 5, 4]),
    );
    expect(mesh.colors).toEqual(
      new Float32Array([0, 1, 0, 1, 0, 1, 0, 1, 0, 1, 0, 1]),
    );
    expect(mesh.topology).toBe("line-list");
  });

  it("derives the AABB of the submesh window", () => {
    const mesh = MeshFactory.fromSubMesh(offsetContainer(), 1);

    expect(mesh.aabb && Array.from(mesh.aabb.min)).toEqual([4, 4, 4]);
    expect(mesh.aabb && Array.from(mesh.aabb.max)).toEqual([5, 5, 4]);
  });

  it("returns empty normals and no optional streams when absent", () => {
    const mesh = extractSubMeshData(triangleContainer(), 0);

    expect(mesh.normals).toEqual(new Float32Array(0));
    expect(mesh.texCoords).toBeUndefined();
    expect(mesh.tangents).toBeUndefined();
    expect(mesh.topology).toBeUndefined();
  });

  it("carries every stream of a full container", () => {
    const [first] = toMeshData(fullContainer());

    expect(first.texCoords).toEqual(new Float32Array([0, 0, 1, 0, 1, 1]));
    expect(first.texCoords1).toEqual(
      new Float32Array([0, 0, 0.5, 0, 0.5, 0.5]),
    );
    expect(first.tangents).toHaveLength(12);
  });

  it("extracts every submesh in order", () => {
    const meshes = MeshFactory.fromContainer(offsetContainer());

    expect(meshes).toHaveLength(2);
    expect(meshes[0].topology).toBeUndefined();
    expect(meshes[1].topology).toBe("line-list");
  });

  it("rejects an index outside the vertex buffer", () => {
    const container = triangleContainer();
    container.indices = new Uint32Array([0, 1, 9]);

    expect(() => MeshFactory.fromSubMesh(container, 0)).toThrow(
      "InvariantViolation: submesh 0 index 2 resolves to vertex 9, outside [0, 3)",
    );
  });

  it("rejects an index range outside the index buffer", () => {
    const container = triangleContainer();
    container.subMeshes[0].indexCount = 4;

    expect(() => MeshFactory.fromSubMesh(container, 0)).toThrow(
      /InvariantViolation: submesh 0 indices \[0, 4\) exceed index buffer of 3/,
    );
  });

  it("rejects a vertex window outside the vertex buffer", () => {
    const container = triangleContainer();
    container.subMeshes[0].firstVertex = 1;

    expect(() => MeshFactory.fromSubMesh(container, 0)).toThrow(
      /vertices \[1, 4\) exceed vertex buffer of 3/,
    );
  });

  it("rejects an unknown submesh", () => {
    expect(() => MeshFactory.fromSubMesh(triangleContainer(), 1)).toThrow(
      "InvariantViolation: submesh 1 does not exist (1 submeshes)",
    );
    expect(() => MeshFactory.fromSubMesh(triangleContainer(), -1)).toThrow(
      /submesh -1 does not exist/,
    );
  });

  it("prefers stored bounds over computed ones", () => {
    const container = triangleContainer();
    container.bounds = { min: vec3.create(-1, -1, -1), max: vec3.create(2, 2, 2) };

    const bounds = MeshFactory.containerBounds(container);
    expect(Array.from(bounds.max)).toEqual([2, 2, 2]);
    expect(bounds.max).not.toBe(container.bounds.max);
  });

  it("computes bounds when none are stored", () => {
    const bounds = MeshFactory.containerBounds(triangleContainer());

    expect(Array.from(bounds.min)).toEqual([0, 0, 0]);
    expect(Array.from(bounds.max)).toEqual([1, 1, 0]);
  });
});

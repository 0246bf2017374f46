// src/core/vnb/legacyParser.test.ts
import { describe, expect, it } from "vitest";
import { GlobalFlags, Topology } from "@/core/types/vnb";
import { BinaryWriter } from "./binaryWriter";
import { isFormatError } from "./formatError";
import { parseLegacy } from "./legacyParser";
import { writeLegacy } from "./testFixtures";

const twoParts = () =>
  writeLegacy([
    {
      color: [1, 0, 0, 1],
      positions: [0, 0, 0, 1, 0, 0, 0, 1, 0],
      normals: [0, 0, 1, 0, 0, 1, 0, 0, 1],
      indices: [0, 1, 2],
      uvs: [0, 0, 1, 0, 0, 1],
    },
    {
      color: [0, 0, 1, 0.5],
      positions: [2, 0, 0, 3, 0, 0],
      normals: [0, 1, 0, 0, 1, 0],
      indices: [3, 4, 3],
      uvs: [0.5, 0.5, 1, 1],
    },
  ]);

describe("parseLegacy", () => {
  it("broadcasts each part's color over its vertex range", () => {
    const container = parseLegacy(twoParts());

    expect(container.colors).toEqual(
      new Float32Array([
        1, 0, 0, 1, 1, 0, 0, 1, 1, 0, 0, 1,
        0, 0, 1, 0.5, 0, 0, 1, 0.5,
      ]),
    );
  });

  it("concatenates streams and spans all indices with one submesh", () => {
    const container = parseLegacy(twoParts());

    expect(container.vertexCount).toBe(5);
    expect(container.indexCount).toBe(6);
    expect(container.positions).toEqual(
      new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0, 2, 0, 0, 3, 0, 0]),
    );
    expect(container.uv0).toEqual(
      new Float32Array([0, 0, 1, 0, 0, 1, 0.5, 0.5, 1, 1]),
    );
    expect(Array.from(container.indices)).toEqual([0, 1, 2, 3, 4, 3]);
    expect(container.indices).toBeInstanceOf(Uint32Array);
    expect(container.subMeshes).toEqual([
      {
        topology: Topology.Triangles,
        materialIndex: null,
        startIndex: 0,
        indexCount: 6,
        baseVertex: 0,
        firstVertex: 0,
        vertexCount: 5,
      },
    ]);
    expect(container.materials).toEqual([]);
  });

  it("flags UV0 only when UVs are present", () => {
    expect(parseLegacy(twoParts()).featureFlags).toBe(
      GlobalFlags.HasPositions |
        GlobalFlags.HasNormals |
        GlobalFlags.HasVertexColors |
        GlobalFlags.HasUV0,
    );
  });

  it("rejects a UV total that is neither zero nor the vertex count", () => {
    const bytes = writeLegacy([
      {
        color: [1, 1, 1, 1],
        positions: [0, 0, 0, 1, 0, 0, 0, 1, 0],
        normals: [0, 0, 1, 0, 0, 1, 0, 0, 1],
        indices: [0, 1, 2],
        uvs: [0, 0],
      },
    ]);

    expect(() => parseLegacy(bytes)).toThrow(
      /LegacyParseFailure: uv count 1 does not match vertex count 3/,
    );
  });

  it("rejects a negative submesh count", () => {
    const writer = new BinaryWriter();
    writer.writeI32(-1);

    expect(() => parseLegacy(writer.toBytes())).toThrow(
      /negative submesh count -1/,
    );
  });

  it("rejects counts the stream cannot hold", () => {
    const writer = new BinaryWriter();
    writer.writeI32(1);
    writer.writeFloatArray([1, 1, 1, 1]);
    writer.writeI32(1000);
    writer.writeZeros(64);

    expect(() => parseLegacy(writer.toBytes())).toThrow(
      /LegacyParseFailure: vertex count 1000/,
    );
  });

  it("reports early end of stream as LegacyParseFailure with the cause", () => {
    // Cut inside the index counts, after positions and normals.
    const bytes = twoParts().subarray(0, 4 + 32 + 8 + 120 + 2);
    let caught: unknown;
    try {
      parseLegacy(bytes);
    } catch (error) {
      caught = error;
    }

    expect(isFormatError(caught, "LegacyParseFailure")).toBe(true);
    expect(
      isFormatError(caught) && isFormatError(caught.cause, "TruncatedInput"),
    ).toBe(true);
  });
});

// src/core/vnb/legacyParser.ts
import {
  GlobalFlags,
  Topology,
  type MeshContainer,
} from "@/core/types/vnb";
import { BinaryReader } from "./binaryReader";
import { FormatError, isFormatError } from "./formatError";
import {
  COLOR_COMPONENTS,
  FLOAT_BYTES,
  NORMAL_COMPONENTS,
  POSITION_COMPONENTS,
  UV_COMPONENTS,
} from "./vnbLayout";

// Smallest footprint of one element of each legacy section.
const SUBMESH_BYTES = COLOR_COMPONENTS * FLOAT_BYTES + 3 * 4;
const VERTEX_BYTES = (POSITION_COMPONENTS + NORMAL_COMPONENTS) * FLOAT_BYTES;
const INDEX_BYTES = 4;
const UV_BYTES = UV_COMPONENTS * FLOAT_BYTES;

/**
 * Reads `count` signed per-submesh counts, rejecting negatives.
 */
function readCounts(reader: BinaryReader, count: number, what: string): Int32Array {
  const counts = new Int32Array(count);
  for (let i = 0; i < count; i++) {
    const value = reader.readI32();
    if (value < 0) {
      throw new FormatError(
        "LegacyParseFailure",
        `negative ${what} ${value} for submesh ${i}`,
      );
    }
    counts[i] = value;
  }
  return counts;
}

function sum(values: Int32Array): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

/**
 * Rejects a count whose payload cannot fit in the remaining bytes.
 */
function requirePlausible(
  reader: BinaryReader,
  elements: number,
  bytesPerElement: number,
  what: string,
): void {
  if (elements * bytesPerElement > reader.remaining) {
    throw new FormatError(
      "LegacyParseFailure",
      `${what} count ${elements} needs ${elements * bytesPerElement} bytes, only ${reader.remaining} left`,
    );
  }
}

function parse(reader: BinaryReader): MeshContainer {
  const subMeshCount = reader.readI32();
  if (subMeshCount < 0) {
    throw new FormatError(
      "LegacyParseFailure",
      `negative submesh count ${subMeshCount}`,
    );
  }
  requirePlausible(reader, subMeshCount, SUBMESH_BYTES, "submesh");

  const subColors = reader.readFloatArray(subMeshCount * COLOR_COMPONENTS);
  const vertexCounts = readCounts(reader, subMeshCount, "vertex count");
  const vertexCount = sum(vertexCounts);

  requirePlausible(reader, vertexCount, VERTEX_BYTES, "vertex");
  const positions = reader.readFloatArray(vertexCount * POSITION_COMPONENTS);
  const normals = reader.readFloatArray(vertexCount * NORMAL_COMPONENTS);

  const indexCounts = readCounts(reader, subMeshCount, "index count");
  const indexCount = sum(indexCounts);
  requirePlausible(reader, indexCount, INDEX_BYTES, "index");
  const indices = reader.readU32Array(indexCount);

  const uvCounts = readCounts(reader, subMeshCount, "uv count");
  const uvCount = sum(uvCounts);
  requirePlausible(reader, uvCount, UV_BYTES, "uv");
  const uvs = reader.readFloatArray(uvCount * UV_COMPONENTS);

  if (uvCount !== 0 && uvCount !== vertexCount) {
    throw new FormatError(
      "LegacyParseFailure",
      `uv count ${uvCount} does not match vertex count ${vertexCount}`,
    );
  }

  // Broadcast each submesh's flat color over its contiguous vertex range.
  const colors = new Float32Array(vertexCount * COLOR_COMPONENTS);
  let cursor = 0;
  for (let s = 0; s < subMeshCount; s++) {
    const color = subColors.subarray(
      s * COLOR_COMPONENTS,
      (s + 1) * COLOR_COMPONENTS,
    );
    for (let v = 0; v < vertexCounts[s]; v++) {
      colors.set(color, (cursor + v) * COLOR_COMPONENTS);
    }
    cursor += vertexCounts[s];
  }

  let featureFlags =
    GlobalFlags.HasPositions | GlobalFlags.HasNormals | GlobalFlags.HasVertexColors;
  if (uvCount > 0) featureFlags |= GlobalFlags.HasUV0;

  return {
    name: "",
    featureFlags,
    positions,
    normals,
    tangents: null,
    colors,
    uv0: uvCount > 0 ? uvs : null,
    uv1: null,
    bounds: null,
    indices,
    subMeshes: [
      {
        topology: Topology.Triangles,
        materialIndex: null,
        startIndex: 0,
        indexCount,
        baseVertex: 0,
        firstVertex: 0,
        vertexCount,
      },
    ],
    materials: [],
    vertexCount,
    indexCount,
  };
}

/**
 * Parses the flag-less layout that preceded VNB2.
 *
 * @remarks
 * Layout: submesh count (i32), one RGBA color per submesh, one vertex count
 * per submesh, all positions, all normals, one index count per submesh, all
 * indices (u32), one UV count per submesh, all UVs. The result carries
 * positions, normals, per-vertex colors and (when present) UV0, a single
 * submesh spanning every index, and no materials.
 *
 * @throws FormatError (`LegacyParseFailure`) on early end of stream or an
 *     implausible count. Nothing is partially recovered.
 */
export function parseLegacy(bytes: Uint8Array): MeshContainer {
  try {
    return parse(new BinaryReader(bytes));
  } catch (error) {
    if (isFormatError(error, "TruncatedInput")) {
      throw new FormatError("LegacyParseFailure", error.message, {
        cause: error,
      });
    }
    throw error;
  }
}

// src/core/vnb/meshStreamCodec.ts
import { vec3 } from "wgpu-matrix";
import type { AABB } from "@/core/types/gpu";
import { GlobalFlags, type MeshContainer } from "@/core/types/vnb";
import { BinaryReader } from "./binaryReader";
import { BinaryWriter } from "./binaryWriter";
import { FormatError } from "./formatError";
import type { VnbHeader } from "./headerCodec";
import {
  BOUNDS_COMPONENTS,
  COLOR_COMPONENTS,
  NORMAL_COMPONENTS,
  POSITION_COMPONENTS,
  TANGENT_COMPONENTS,
  UV_COMPONENTS,
} from "./vnbLayout";

const MAX_U32 = 0xffffffff;

/**
 * The vertex, bounds and index sections of a container, plus its name.
 */
export type MeshStreams = Pick<
  MeshContainer,
  | "name"
  | "positions"
  | "normals"
  | "tangents"
  | "colors"
  | "uv0"
  | "uv1"
  | "bounds"
  | "indices"
>;

/** Element counts derived from the actual array lengths. */
export interface StreamCounts {
  vertexCount: number;
  indexCount: number;
}

/**
 * Optional per-vertex streams in wire order.
 */
const OPTIONAL_STREAMS = [
  { key: "normals", flag: GlobalFlags.HasNormals, components: NORMAL_COMPONENTS },
  { key: "tangents", flag: GlobalFlags.HasTangents, components: TANGENT_COMPONENTS },
  { key: "colors", flag: GlobalFlags.HasVertexColors, components: COLOR_COMPONENTS },
  { key: "uv0", flag: GlobalFlags.HasUV0, components: UV_COMPONENTS },
  { key: "uv1", flag: GlobalFlags.HasUV1, components: UV_COMPONENTS },
] as const;

function violation(message: string): FormatError {
  return new FormatError("InvariantViolation", message);
}

/**
 * Checks the streams against the declared flags and derives the counts.
 *
 * @remarks
 * A flagged stream must exist with exactly `vertexCount * components`
 * floats. An unflagged stream must be `null` or empty; it is never written.
 * The index array type must match the `IndicesU16` bit.
 *
 * @throws FormatError (`InvariantViolation`) on any disagreement.
 */
export function validateMeshStreams(
  streams: MeshStreams,
  flags: number,
): StreamCounts {
  if ((flags & GlobalFlags.HasPositions) === 0) {
    throw violation("HasPositions flag is required");
  }
  if (streams.positions.length % POSITION_COMPONENTS !== 0) {
    throw violation(
      `positions length ${streams.positions.length} is not a multiple of ${POSITION_COMPONENTS}`,
    );
  }

  const vertexCount = streams.positions.length / POSITION_COMPONENTS;
  if (vertexCount > MAX_U32) {
    throw violation(`vertex count ${vertexCount} exceeds u32 range`);
  }

  for (const { key, flag, components } of OPTIONAL_STREAMS) {
    const stream = streams[key];
    if ((flags & flag) === 0) {
      if (stream !== null && stream.length > 0) {
        throw violation(`${key} stream is present but its flag is not set`);
      }
      continue;
    }
    if (stream === null) {
      throw violation(`${key} flag is set but the stream is missing`);
    }
    if (stream.length !== vertexCount * components) {
      throw violation(
        `${key} has ${stream.length} floats, expected ${vertexCount * components} for ${vertexCount} vertices`,
      );
    }
  }

  if ((flags & GlobalFlags.HasBounds) !== 0) {
    if (streams.bounds === null) {
      throw violation("HasBounds flag is set but bounds are missing");
    }
    if (
      streams.bounds.min.length !== BOUNDS_COMPONENTS ||
      streams.bounds.max.length !== BOUNDS_COMPONENTS
    ) {
      throw violation("bounds min and max must have 3 components");
    }
  } else if (streams.bounds !== null) {
    throw violation("bounds are present but HasBounds flag is not set");
  }

  const wantsU16 = (flags & GlobalFlags.IndicesU16) !== 0;
  if (wantsU16 && !(streams.indices instanceof Uint16Array)) {
    throw violation("IndicesU16 flag is set but indices are not a Uint16Array");
  }
  if (!wantsU16 && !(streams.indices instanceof Uint32Array)) {
    throw violation("32-bit indices require a Uint32Array");
  }
  if (streams.indices.length > MAX_U32) {
    throw violation(`index count ${streams.indices.length} exceeds u32 range`);
  }

  return { vertexCount, indexCount: streams.indices.length };
}

/**
 * Writes name, vertex streams, bounds and indices in wire order.
 *
 * @remarks
 * Expects streams already checked by {@link validateMeshStreams}.
 */
export function writeMeshStreams(
  writer: BinaryWriter,
  streams: MeshStreams,
  flags: number,
): void {
  writer.writeLengthPrefixedUtf8(streams.name);
  writer.writeFloatArray(streams.positions);

  for (const { key, flag } of OPTIONAL_STREAMS) {
    const stream = streams[key];
    if ((flags & flag) !== 0 && stream !== null) {
      writer.writeFloatArray(stream);
    }
  }

  if ((flags & GlobalFlags.HasBounds) !== 0 && streams.bounds !== null) {
    writer.writeFloatArray(streams.bounds.min);
    writer.writeFloatArray(streams.bounds.max);
  }

  if (streams.indices instanceof Uint16Array) {
    writer.writeU16Array(streams.indices);
  } else {
    writer.writeU32Array(streams.indices);
  }
}

function readVec3(reader: BinaryReader) {
  return vec3.create(reader.readF32(), reader.readF32(), reader.readF32());
}

/**
 * Reads the sections written by {@link writeMeshStreams}.
 *
 * @remarks
 * Presence and length of every block come from the header flags and counts
 * already read. Absent streams are returned as `null`.
 */
export function readMeshStreams(
  reader: BinaryReader,
  header: VnbHeader,
): MeshStreams {
  const flags = header.featureFlags;
  const vertexCount = header.vertexCount;

  const name = reader.readLengthPrefixedUtf8();
  const positions =
    (flags & GlobalFlags.HasPositions) !== 0
      ? reader.readFloatArray(vertexCount * POSITION_COMPONENTS)
      : new Float32Array(0);

  const readOptional = (flag: GlobalFlags, components: number) =>
    (flags & flag) !== 0 ? reader.readFloatArray(vertexCount * components) : null;

  const normals = readOptional(GlobalFlags.HasNormals, NORMAL_COMPONENTS);
  const tangents = readOptional(GlobalFlags.HasTangents, TANGENT_COMPONENTS);
  const colors = readOptional(GlobalFlags.HasVertexColors, COLOR_COMPONENTS);
  const uv0 = readOptional(GlobalFlags.HasUV0, UV_COMPONENTS);
  const uv1 = readOptional(GlobalFlags.HasUV1, UV_COMPONENTS);

  let bounds: AABB | null = null;
  if ((flags & GlobalFlags.HasBounds) !== 0) {
    const min = readVec3(reader);
    const max = readVec3(reader);
    bounds = { min, max };
  }

  const indices =
    (flags & GlobalFlags.IndicesU16) !== 0
      ? reader.readU16Array(header.indexCount)
      : reader.readU32Array(header.indexCount);

  return { name, positions, normals, tangents, colors, uv0, uv1, bounds, indices };
}

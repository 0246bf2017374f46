// src/core/vnb/subMeshCodec.ts
import { Topology, type SubMeshRange } from "@/core/types/vnb";
import { BinaryReader } from "./binaryReader";
import { BinaryWriter } from "./binaryWriter";
import { FormatError } from "./formatError";
import { NO_MATERIAL, SUBMESH_RECORD_SIZE } from "./vnbLayout";

const MAX_U32 = 0xffffffff;
const MIN_I32 = -0x80000000;
const MAX_I32 = 0x7fffffff;

function checkRange(
  value: number,
  min: number,
  max: number,
  field: string,
  index: number,
): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new FormatError(
      "InvariantViolation",
      `submesh ${index}: ${field} ${value} is outside [${min}, ${max}]`,
    );
  }
}

/**
 * Checks every field of a submesh fits its wire width.
 *
 * @remarks
 * Overlap between ranges and references past the buffers are left to the
 * consumer.
 */
export function validateSubMesh(subMesh: SubMeshRange, index: number): void {
  if (subMesh.topology !== Topology.Triangles && subMesh.topology !== Topology.Lines) {
    throw new FormatError(
      "InvariantViolation",
      `submesh ${index}: unknown topology ${subMesh.topology}`,
    );
  }
  if (subMesh.materialIndex !== null) {
    checkRange(subMesh.materialIndex, 0, NO_MATERIAL - 1, "materialIndex", index);
  }
  checkRange(subMesh.startIndex, 0, MAX_U32, "startIndex", index);
  checkRange(subMesh.indexCount, 0, MAX_U32, "indexCount", index);
  checkRange(subMesh.baseVertex, MIN_I32, MAX_I32, "baseVertex", index);
  checkRange(subMesh.firstVertex, 0, MAX_U32, "firstVertex", index);
  checkRange(subMesh.vertexCount, 0, MAX_U32, "vertexCount", index);
}

export function writeSubMeshes(
  writer: BinaryWriter,
  subMeshes: readonly SubMeshRange[],
): void {
  for (const subMesh of subMeshes) {
    writer.writeU8(subMesh.topology);
    writer.writeU16(subMesh.materialIndex ?? NO_MATERIAL);
    writer.writeU32(subMesh.startIndex);
    writer.writeU32(subMesh.indexCount);
    writer.writeI32(subMesh.baseVertex);
    writer.writeU32(subMesh.firstVertex);
    writer.writeU32(subMesh.vertexCount);
  }
}

function readTopology(value: number, index: number): Topology {
  switch (value) {
    case Topology.Triangles:
      return Topology.Triangles;
    case Topology.Lines:
      return Topology.Lines;
    default:
      throw new FormatError(
        "UnknownEnumValue",
        `submesh ${index}: topology byte ${value}`,
      );
  }
}

/**
 * Reads `count` fixed-size submesh records, preserving their order.
 */
export function readSubMeshes(
  reader: BinaryReader,
  count: number,
): SubMeshRange[] {
  if (count * SUBMESH_RECORD_SIZE > reader.remaining) {
    throw new FormatError(
      "TruncatedInput",
      `${count} submesh records need ${count * SUBMESH_RECORD_SIZE} bytes, only ${reader.remaining} left`,
    );
  }

  const subMeshes: SubMeshRange[] = [];
  for (let i = 0; i < count; i++) {
    const topology = readTopology(reader.readU8(), i);
    const materialIndex = reader.readU16();
    subMeshes.push({
      topology,
      materialIndex: materialIndex === NO_MATERIAL ? null : materialIndex,
      startIndex: reader.readU32(),
      indexCount: reader.readU32(),
      baseVertex: reader.readI32(),
      firstVertex: reader.readU32(),
      vertexCount: reader.readU32(),
    });
  }
  return subMeshes;
}

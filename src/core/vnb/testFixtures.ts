// src/core/vnb/testFixtures.ts
import { vec3 } from "wgpu-matrix";
import {
  AlphaMode,
  FilterMode,
  GlobalFlags,
  MimeKind,
  PbrFlags,
  TextureRefKind,
  TextureSlot,
  Topology,
  WrapMode,
  type MeshContainer,
  type PbrMaterial,
} from "@/core/types/vnb";
import { BinaryWriter } from "./binaryWriter";

/** A single positions-only triangle with one unassigned submesh. */
export function triangleContainer(): MeshContainer {
  return {
    name: "",
    featureFlags: GlobalFlags.HasPositions,
    positions: new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0]),
    normals: null,
    tangents: null,
    colors: null,
    uv0: null,
    uv1: null,
    bounds: null,
    indices: new Uint32Array([0, 1, 2]),
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
    ],
    materials: [],
    vertexCount: 3,
    indexCount: 3,
  };
}

export function embeddedPngMaterial(): PbrMaterial {
  return {
    name: "painted",
    flags: PbrFlags.BaseColorFactor | PbrFlags.BaseColorTex,
    baseColorFactor: [1, 0.5, 0.25, 1],
    metallicFactor: null,
    roughnessFactor: null,
    emissiveFactor: null,
    alpha: null,
    doubleSided: null,
    textures: [
      {
        slot: TextureSlot.BaseColor,
        uvSet: 0,
        offset: null,
        scale: null,
        rotation: null,
        sampler: null,
        source: {
          kind: TextureRefKind.Embedded,
          mime: MimeKind.PNG,
          data: new Uint8Array([0x89, 0x50, 0x4e, 0x47]),
        },
      },
    ],
  };
}

/** A material using every gated block, transforms and samplers. */
export function fullMaterial(): PbrMaterial {
  return {
    name: "brushed steel",
    flags:
      PbrFlags.BaseColorFactor |
      PbrFlags.MetallicFactor |
      PbrFlags.RoughnessFactor |
      PbrFlags.EmissiveFactor |
      PbrFlags.AlphaMode |
      PbrFlags.DoubleSided |
      PbrFlags.BaseColorTex |
      PbrFlags.NormalTex |
      PbrFlags.TilingOffset |
      PbrFlags.Sampler,
    baseColorFactor: [0.5, 0.5, 0.5, 1],
    metallicFactor: 1,
    roughnessFactor: 0.25,
    emissiveFactor: [0, 0, 0.5],
    alpha: { mode: AlphaMode.Mask, cutoff: 0.5 },
    doubleSided: true,
    textures: [
      {
        slot: TextureSlot.BaseColor,
        uvSet: 0,
        offset: [0.5, 0.25],
        scale: [2, 2],
        rotation: 0.5,
        sampler: {
          wrapU: WrapMode.Repeat,
          wrapV: WrapMode.Mirror,
          minFilter: FilterMode.Trilinear,
          magFilter: FilterMode.Bilinear,
        },
        source: { kind: TextureRefKind.External, uri: "textures/steel_albedo.png" },
      },
      {
        slot: TextureSlot.Normal,
        uvSet: 1,
        offset: null,
        scale: [4, 1],
        rotation: null,
        sampler: {
          wrapU: WrapMode.Clamp,
          wrapV: WrapMode.Clamp,
          minFilter: FilterMode.Point,
          magFilter: FilterMode.Point,
        },
        source: {
          kind: TextureRefKind.Embedded,
          mime: MimeKind.KTX2,
          data: new Uint8Array([0xab, 0x4b, 0x54, 0x58]),
        },
      },
    ],
  };
}

/**
 * A quad split into two submeshes with every vertex stream, bounds and
 * 16-bit indices.
 */
export function fullContainer(): MeshContainer {
  return {
    name: "crate",
    featureFlags:
      GlobalFlags.HasPositions |
      GlobalFlags.HasNormals |
      GlobalFlags.HasTangents |
      GlobalFlags.HasVertexColors |
      GlobalFlags.HasUV0 |
      GlobalFlags.HasUV1 |
      GlobalFlags.HasBounds |
      GlobalFlags.IndicesU16 |
      GlobalFlags.EmbedTextures,
    positions: new Float32Array([0, 0, 0, 1, 0, 0, 1, 1, 0, 0, 1, 0]),
    normals: new Float32Array([0, 0, 1, 0, 0, 1, 0, 0, 1, 0, 0, 1]),
    tangents: new Float32Array([
      1, 0, 0, 1, 1, 0, 0, 1, 1, 0, 0, 1, 1, 0, 0, 1,
    ]),
    colors: new Float32Array([
      1, 0, 0, 1, 0, 1, 0, 1, 0, 0, 1, 1, 1, 1, 1, 0.5,
    ]),
    uv0: new Float32Array([0, 0, 1, 0, 1, 1, 0, 1]),
    uv1: new Float32Array([0, 0, 0.5, 0, 0.5, 0.5, 0, 0.5]),
    bounds: { min: vec3.create(0, 0, 0), max: vec3.create(1, 1, 0) },
    indices: new Uint16Array([0, 1, 2, 0, 2, 3]),
    subMeshes: [
      {
        topology: Topology.Triangles,
        materialIndex: 1,
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
        baseVertex: 0,
        firstVertex: 0,
        vertexCount: 4,
      },
    ],
    materials: [embeddedPngMaterial(), fullMaterial()],
    vertexCount: 4,
    indexCount: 6,
  };
}

export interface LegacySubMesh {
  color: [number, number, number, number];
  positions: number[];
  normals: number[];
  indices: number[];
  uvs: number[];
}

/** Writes submeshes in the flag-less legacy layout. */
export function writeLegacy(subMeshes: LegacySubMesh[]): Uint8Array {
  const writer = new BinaryWriter();
  writer.writeI32(subMeshes.length);
  for (const s of subMeshes) writer.writeFloatArray(s.color);
  for (const s of subMeshes) writer.writeI32(s.positions.length / 3);
  for (const s of subMeshes) writer.writeFloatArray(s.positions);
  for (const s of subMeshes) writer.writeFloatArray(s.normals);
  for (const s of subMeshes) writer.writeI32(s.indices.length);
  for (const s of subMeshes) writer.writeU32Array(new Uint32Array(s.indices));
  for (const s of subMeshes) writer.writeI32(s.uvs.length / 2);
  for (const s of subMeshes) writer.writeFloatArray(s.uvs);
  return writer.toBytes();
}

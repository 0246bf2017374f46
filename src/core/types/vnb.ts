// src/core/types/vnb.ts
import type { AABB } from "@/core/types/gpu";

/**
 * Bitset of the sections present in a container.
 *
 * @remarks
 * `HasPositions` is mandatory. `IndicesU16` selects the width of the whole
 * index buffer. `EmbedTextures` is informational only.
 */
export enum GlobalFlags {
  HasPositions = 1 << 0,
  HasNormals = 1 << 1,
  HasTangents = 1 << 2,
  HasVertexColors = 1 << 3,
  HasUV0 = 1 << 4,
  HasUV1 = 1 << 5,
  HasBounds = 1 << 6,
  IndicesU16 = 1 << 7,
  EmbedTextures = 1 << 8,
}

/**
 * Bitset of the blocks present in a material record.
 *
 * @remarks
 * The `*Tex` and `TilingOffset` bits are hints and gate no bytes. `Sampler`
 * adds a sampler block to every texture of the material.
 */
export enum PbrFlags {
  BaseColorFactor = 1 << 0,
  MetallicFactor = 1 << 1,
  RoughnessFactor = 1 << 2,
  EmissiveFactor = 1 << 3,
  AlphaMode = 1 << 4,
  DoubleSided = 1 << 5,
  BaseColorTex = 1 << 6,
  MetalRoughTex = 1 << 7,
  NormalTex = 1 << 8,
  OcclusionTex = 1 << 9,
  EmissiveTex = 1 << 10,
  TilingOffset = 1 << 11,
  Sampler = 1 << 12,
}

export enum Topology {
  Triangles = 0,
  Lines = 1,
}

export enum TextureSlot {
  BaseColor = 0,
  MetalRough = 1,
  Normal = 2,
  Occlusion = 3,
  Emissive = 4,
}

export enum TextureRefKind {
  External = 0,
  Embedded = 1,
}

export enum AlphaMode {
  Opaque = 0,
  Mask = 1,
  Blend = 2,
}

export enum MimeKind {
  PNG = 0,
  JPG = 1,
  KTX2 = 2,
}

export enum WrapMode {
  Repeat = 0,
  Clamp = 1,
  Mirror = 2,
}

export enum FilterMode {
  Point = 0,
  Bilinear = 1,
  Trilinear = 2,
}

export type RGBA = [number, number, number, number];
export type RGB = [number, number, number];
export type Vec2Tuple = [number, number];

/** UV channel a texture samples from. */
export type UvSet = 0 | 1;

/**
 * A contiguous draw range inside the shared vertex and index buffers.
 */
export interface SubMeshRange {
  topology: Topology;
  /** Index into the container's materials, or `null` for none. */
  materialIndex: number | null;
  startIndex: number;
  indexCount: number;
  /** Signed offset added to every index of the range. */
  baseVertex: number;
  firstVertex: number;
  vertexCount: number;
}

export interface SamplerDesc {
  wrapU: WrapMode;
  wrapV: WrapMode;
  minFilter: FilterMode;
  magFilter: FilterMode;
}

export interface ExternalTextureSource {
  kind: TextureRefKind.External;
  uri: string;
}

export interface EmbeddedTextureSource {
  kind: TextureRefKind.Embedded;
  mime: MimeKind;
  /** Raw image bytes, never interpreted by the codec. */
  data: Uint8Array;
}

export type TextureSource = ExternalTextureSource | EmbeddedTextureSource;

export interface TextureRef {
  slot: TextureSlot;
  uvSet: UvSet;
  offset: Vec2Tuple | null;
  scale: Vec2Tuple | null;
  /** Rotation in radians. Carried, never applied. */
  rotation: number | null;
  /** Present on every texture iff the owning material has `PbrFlags.Sampler`. */
  sampler: SamplerDesc | null;
  source: TextureSource;
}

export type AlphaSettings =
  | { mode: AlphaMode.Opaque | AlphaMode.Blend }
  | { mode: AlphaMode.Mask; cutoff: number };

export interface PbrMaterial {
  name: string;
  /** Serialized presence bitset, must agree with the nullable fields below. */
  flags: number;
  baseColorFactor: RGBA | null;
  metallicFactor: number | null;
  roughnessFactor: number | null;
  emissiveFactor: RGB | null;
  alpha: AlphaSettings | null;
  doubleSided: boolean | null;
  textures: TextureRef[];
}

/**
 * In-memory form of a VNB container.
 *
 * @remarks
 * Optional streams are `null` when absent. `vertexCount` and `indexCount`
 * are filled by the decoder and recomputed from the arrays by the encoder.
 */
export interface MeshContainer {
  name: string;
  featureFlags: number;
  positions: Float32Array;
  normals: Float32Array | null;
  tangents: Float32Array | null;
  colors: Float32Array | null;
  uv0: Float32Array | null;
  uv1: Float32Array | null;
  bounds: AABB | null;
  indices: Uint16Array | Uint32Array;
  subMeshes: SubMeshRange[];
  materials: PbrMaterial[];
  vertexCount: number;
  indexCount: number;
}

/**
 * Resolves an external texture URI to raw bytes.
 *
 * @remarks
 * Called synchronously during decode; return `null` or `undefined` to leave
 * the reference external.
 */
export type TextureResolver = (uri: string) => Uint8Array | null | undefined;

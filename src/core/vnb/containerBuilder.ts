// src/core/vnb/containerBuilder.ts
import type { MeshData } from "@/core/types/mesh";
import {
  FilterMode,
  GlobalFlags,
  PbrFlags,
  TextureRefKind,
  TextureSlot,
  Topology,
  WrapMode,
  type AlphaSettings,
  type MeshContainer,
  type PbrMaterial,
  type RGB,
  type RGBA,
  type SamplerDesc,
  type SubMeshRange,
  type TextureRef,
  type TextureSource,
  type UvSet,
  type Vec2Tuple,
} from "@/core/types/vnb";
import { computeAABB } from "@/core/utils/bounds";
import { FormatError } from "./formatError";
import {
  COLOR_COMPONENTS,
  NORMAL_COMPONENTS,
  POSITION_COMPONENTS,
  TANGENT_COMPONENTS,
  UV_COMPONENTS,
} from "./vnbLayout";

const MAX_U16_INDEX = 0xffff;

/** Sampler given to textures that have none when a sibling texture has one. */
export const DEFAULT_SAMPLER: SamplerDesc = {
  wrapU: WrapMode.Repeat,
  wrapV: WrapMode.Repeat,
  minFilter: FilterMode.Bilinear,
  magFilter: FilterMode.Bilinear,
};

const SLOT_FLAGS: Record<TextureSlot, PbrFlags> = {
  [TextureSlot.BaseColor]: PbrFlags.BaseColorTex,
  [TextureSlot.MetalRough]: PbrFlags.MetalRoughTex,
  [TextureSlot.Normal]: PbrFlags.NormalTex,
  [TextureSlot.Occlusion]: PbrFlags.OcclusionTex,
  [TextureSlot.Emissive]: PbrFlags.EmissiveTex,
};

export interface TextureRefInput {
  slot: TextureSlot;
  uvSet?: UvSet;
  offset?: Vec2Tuple | null;
  scale?: Vec2Tuple | null;
  rotation?: number | null;
  sampler?: SamplerDesc | null;
  source: TextureSource;
}

export interface PbrMaterialInput {
  name?: string;
  baseColorFactor?: RGBA | null;
  metallicFactor?: number | null;
  roughnessFactor?: number | null;
  emissiveFactor?: RGB | null;
  alpha?: AlphaSettings | null;
  doubleSided?: boolean | null;
  textures?: TextureRefInput[];
}

/**
 * Creates a material whose flags are derived from the fields given.
 *
 * @remarks
 * Factor, alpha and double-sided bits follow field presence. Texture slot
 * bits and `TilingOffset` are set as hints. If any texture has a sampler,
 * `Sampler` is set and textures without one receive {@link DEFAULT_SAMPLER}.
 */
export function createPbrMaterial(input: PbrMaterialInput): PbrMaterial {
  const textureInputs = input.textures ?? [];
  const withSampler = textureInputs.some((t) => t.sampler);

  const textures = textureInputs.map(
    (t): TextureRef => ({
      slot: t.slot,
      uvSet: t.uvSet ?? 0,
      offset: t.offset ?? null,
      scale: t.scale ?? null,
      rotation: t.rotation ?? null,
      sampler: withSampler ? (t.sampler ?? { ...DEFAULT_SAMPLER }) : null,
      source: t.source,
    }),
  );

  const material: PbrMaterial = {
    name: input.name ?? "",
    flags: 0,
    baseColorFactor: input.baseColorFactor ?? null,
    metallicFactor: input.metallicFactor ?? null,
    roughnessFactor: input.roughnessFactor ?? null,
    emissiveFactor: input.emissiveFactor ?? null,
    alpha: input.alpha ?? null,
    doubleSided: input.doubleSided ?? null,
    textures,
  };

  let flags = 0;
  if (material.baseColorFactor) flags |= PbrFlags.BaseColorFactor;
  if (material.metallicFactor !== null) flags |= PbrFlags.MetallicFactor;
  if (material.roughnessFactor !== null) flags |= PbrFlags.RoughnessFactor;
  if (material.emissiveFactor) flags |= PbrFlags.EmissiveFactor;
  if (material.alpha) flags |= PbrFlags.AlphaMode;
  if (material.doubleSided !== null) flags |= PbrFlags.DoubleSided;
  for (const texture of textures) {
    flags |= SLOT_FLAGS[texture.slot];
    if (texture.offset || texture.scale) flags |= PbrFlags.TilingOffset;
  }
  if (withSampler) flags |= PbrFlags.Sampler;

  material.flags = flags;
  return material;
}

export type IndexFormatOption = "auto" | "uint16" | "uint32";

export interface BuildOptions {
  name?: string;
  /** Index width. `auto` picks 16-bit when every index fits. */
  indexFormat?: IndexFormatOption;
  /** Store bounds computed from the positions. */
  includeBounds?: boolean;
  /**
   * Per-stream switches. A stream switched off is left out even when every
   * primitive supplies it.
   */
  withNormals?: boolean;
  withTangents?: boolean;
  withColors?: boolean;
  withUV0?: boolean;
  withUV1?: boolean;
  materials?: PbrMaterial[];
  /**
   * Material per primitive. When omitted and materials are given,
   * primitive `i` uses material `i % materials.length`.
   */
  materialIndices?: (number | null)[];
}

export const DEFAULT_BUILD_OPTIONS = {
  name: "",
  indexFormat: "auto",
  includeBounds: true,
  withNormals: true,
  withTangents: true,
  withColors: true,
  withUV0: true,
  withUV1: true,
} satisfies Omit<Required<BuildOptions>, "materials" | "materialIndices">;

type StreamKey = "normals" | "tangents" | "colors" | "texCoords" | "texCoords1";
type StreamSwitch =
  | "withNormals"
  | "withTangents"
  | "withColors"
  | "withUV0"
  | "withUV1";

const BUILD_STREAMS: {
  key: StreamKey;
  option: StreamSwitch;
  flag: GlobalFlags;
  components: number;
}[] = [
  { key: "normals", option: "withNormals", flag: GlobalFlags.HasNormals, components: NORMAL_COMPONENTS },
  { key: "tangents", option: "withTangents", flag: GlobalFlags.HasTangents, components: TANGENT_COMPONENTS },
  { key: "colors", option: "withColors", flag: GlobalFlags.HasVertexColors, components: COLOR_COMPONENTS },
  { key: "texCoords", option: "withUV0", flag: GlobalFlags.HasUV0, components: UV_COMPONENTS },
  { key: "texCoords1", option: "withUV1", flag: GlobalFlags.HasUV1, components: UV_COMPONENTS },
];

function vertexCountOf(primitive: MeshData): number {
  return primitive.positions.length / POSITION_COMPONENTS;
}

/**
 * Concatenates one stream of every primitive, or returns `null` when a
 * primitive with vertices lacks it.
 */
function concatStream(
  primitives: readonly MeshData[],
  key: StreamKey,
  components: number,
  totalVertices: number,
): Float32Array | null {
  if (totalVertices === 0) return null;
  for (const primitive of primitives) {
    const vertices = vertexCountOf(primitive);
    const stream = primitive[key];
    if (vertices > 0 && stream?.length !== vertices * components) return null;
  }

  const out = new Float32Array(totalVertices * components);
  let offset = 0;
  for (const primitive of primitives) {
    const stream = primitive[key];
    if (stream) out.set(stream, offset);
    offset += vertexCountOf(primitive) * components;
  }
  return out;
}

function pickIndexFormat(
  requested: IndexFormatOption,
  primitives: readonly MeshData[],
): "uint16" | "uint32" {
  let maxIndex = 0;
  for (const primitive of primitives) {
    for (const index of primitive.indices) {
      if (index > maxIndex) maxIndex = index;
    }
  }

  if (requested === "uint16" && maxIndex > MAX_U16_INDEX) {
    throw new FormatError(
      "InvariantViolation",
      `index ${maxIndex} does not fit a 16-bit index buffer`,
    );
  }
  if (requested !== "auto") return requested;
  return maxIndex <= MAX_U16_INDEX ? "uint16" : "uint32";
}

function hasEmbeddedTexture(materials: readonly PbrMaterial[]): boolean {
  return materials.some((m) =>
    m.textures.some((t) => t.source.kind === TextureRefKind.Embedded),
  );
}

/**
 * Assembles a container from one or more engine mesh primitives.
 *
 * @remarks
 * Vertex and index buffers are concatenated and each primitive becomes one
 * submesh. Indices stay local to their primitive; the submesh `baseVertex`
 * and `firstVertex` hold the primitive's vertex offset. A vertex stream is
 * kept only if every primitive supplies it and its `with*` switch is on.
 *
 * @param primitives A single primitive or an array, as returned by mesh loaders.
 * @param options Build settings, merged over {@link DEFAULT_BUILD_OPTIONS}.
 * @returns A container ready for `encode`.
 * @throws FormatError (`InvariantViolation`) if a forced 16-bit index
 *     format cannot hold the indices or a material index is out of range.
 */
export function buildMeshContainer(
  primitives: MeshData | MeshData[],
  options: BuildOptions = {},
): MeshContainer {
  const list = Array.isArray(primitives) ? primitives : [primitives];
  const opts = { ...DEFAULT_BUILD_OPTIONS, ...options };
  const materials = opts.materials ?? [];

  const totalVertices = list.reduce((n, p) => n + vertexCountOf(p), 0);
  const totalIndices = list.reduce((n, p) => n + p.indices.length, 0);

  const positions = new Float32Array(totalVertices * POSITION_COMPONENTS);
  let featureFlags: number = GlobalFlags.HasPositions;

  const streams: Record<StreamKey, Float32Array | null> = {
    normals: null,
    tangents: null,
    colors: null,
    texCoords: null,
    texCoords1: null,
  };
  for (const { key, option, flag, components } of BUILD_STREAMS) {
    if (!opts[option]) continue;
    streams[key] = concatStream(list, key, components, totalVertices);
    if (streams[key]) featureFlags |= flag;
  }

  const indexFormat = pickIndexFormat(opts.indexFormat, list);
  const indices =
    indexFormat === "uint16"
      ? new Uint16Array(totalIndices)
      : new Uint32Array(totalIndices);
  if (indexFormat === "uint16") featureFlags |= GlobalFlags.IndicesU16;

  const subMeshes: SubMeshRange[] = [];
  let vertexOffset = 0;
  let indexOffset = 0;
  list.forEach((primitive, i) => {
    positions.set(primitive.positions, vertexOffset * POSITION_COMPONENTS);
    indices.set(primitive.indices, indexOffset);

    const materialIndex = opts.materialIndices
      ? (opts.materialIndices[i] ?? null)
      : materials.length > 0
        ? i % materials.length
        : null;
    if (
      materialIndex !== null &&
      (materialIndex < 0 || materialIndex >= materials.length)
    ) {
      throw new FormatError(
        "InvariantViolation",
        `primitive ${i} references material ${materialIndex} of ${materials.length}`,
      );
    }

    const vertices = vertexCountOf(primitive);
    subMeshes.push({
      topology:
        primitive.topology === "line-list" ? Topology.Lines : Topology.Triangles,
      materialIndex,
      startIndex: indexOffset,
      indexCount: primitive.indices.length,
      baseVertex: vertexOffset,
      firstVertex: vertexOffset,
      vertexCount: vertices,
    });

    vertexOffset += vertices;
    indexOffset += primitive.indices.length;
  });

  const bounds = opts.includeBounds ? computeAABB(positions) : null;
  if (bounds) featureFlags |= GlobalFlags.HasBounds;
  if (hasEmbeddedTexture(materials)) featureFlags |= GlobalFlags.EmbedTextures;

  return {
    name: opts.name,
    featureFlags,
    positions,
    normals: streams.normals,
    tangents: streams.tangents,
    colors: streams.colors,
    uv0: streams.texCoords,
    uv1: streams.texCoords1,
    bounds,
    indices,
    subMeshes,
    materials,
    vertexCount: totalVertices,
    indexCount: totalIndices,
  };
}

// src/index.ts
export {
  AlphaMode,
  FilterMode,
  GlobalFlags,
  MimeKind,
  PbrFlags,
  TextureRefKind,
  TextureSlot,
  Topology,
  WrapMode,
} from "@/core/types/vnb";
export type {
  AlphaSettings,
  EmbeddedTextureSource,
  ExternalTextureSource,
  MeshContainer,
  PbrMaterial,
  RGB,
  RGBA,
  SamplerDesc,
  SubMeshRange,
  TextureRef,
  TextureResolver,
  TextureSource,
  UvSet,
  Vec2Tuple,
} from "@/core/types/vnb";
export type { AABB, PBRMaterialOptions } from "@/core/types/gpu";
export type { MeshData } from "@/core/types/mesh";
export type { PBRMaterialSpec } from "@/core/types/material";

export {
  DEFAULT_DECODE_OPTIONS,
  decode,
  decodeContainer,
  encode,
} from "@/core/vnb/vnbCodec";
export type { DecodeOptions } from "@/core/vnb/vnbCodec";
export { FormatError, isFormatError } from "@/core/vnb/formatError";
export type { FormatErrorKind } from "@/core/vnb/formatError";
export { probeHeader } from "@/core/vnb/headerCodec";
export type { HeaderProbe, VnbHeader } from "@/core/vnb/headerCodec";
export { parseLegacy } from "@/core/vnb/legacyParser";
export { resolveExternalTextures } from "@/core/vnb/textureResolution";
export type {
  TextureResolution,
  UnresolvedTexturePolicy,
} from "@/core/vnb/textureResolution";
export {
  DEFAULT_BUILD_OPTIONS,
  DEFAULT_SAMPLER,
  buildMeshContainer,
  createPbrMaterial,
} from "@/core/vnb/containerBuilder";
export type {
  BuildOptions,
  IndexFormatOption,
  PbrMaterialInput,
  TextureRefInput,
} from "@/core/vnb/containerBuilder";
export { HEADER_SIZE, VNB_MAGIC, VNB_VERSION } from "@/core/vnb/vnbLayout";

export {
  MeshFactory,
  extractSubMeshData,
  toMeshData,
} from "@/core/resources/meshFactory";
export {
  MaterialFactory,
  toPBRMaterialSpec,
} from "@/core/resources/materialFactory";
export type {
  IMeshLoader,
  MeshLoadResult,
} from "@/core/resources/mesh/meshLoader";
export { MeshLoaderRegistry } from "@/core/resources/mesh/meshLoaderRegistry";
export { createMaterialSpecKey } from "@/core/utils/material";
export { computeAABB } from "@/core/utils/bounds";
export {
  Profiler,
  type ProfileSpan,
  type ProfileTiming,
} from "@/core/utils/profiler";

export {
  createFileTextureResolver,
  importVnb,
  loadVnb,
  toVnbAsset,
} from "@/loaders/vnbLoader";
export type { VnbAsset } from "@/loaders/vnbLoader";
export {
  VnbMeshLoader,
  createMeshLoaderRegistry,
} from "@/loaders/mesh/vnbMeshLoader";

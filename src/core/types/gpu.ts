// src/core/types/gpu.ts
import type { Vec3 } from "wgpu-matrix";

/**
 * Axis-Aligned Bounding Box
 */
export interface AABB {
  min: Vec3;
  max: Vec3;
}

/** Wrap mode names understood by the engine's sampler cache. */
export type SamplerAddressMode = "repeat" | "clamp-to-edge" | "mirror-repeat";
/** Filter names understood by the engine's sampler cache. */
export type SamplerFilterMode = "nearest" | "linear";

export interface TextureSamplerOptions {
  addressModeU: SamplerAddressMode;
  addressModeV: SamplerAddressMode;
  minFilter: SamplerFilterMode;
  magFilter: SamplerFilterMode;
  /** Trilinear filtering samples between mip levels. */
  mipmapFilter: SamplerFilterMode;
}

/** UV offset/scale applied to a texture map. Rotation is never applied. */
export interface TextureTransformOptions {
  offset: [number, number];
  scale: [number, number];
}

/** Names of the texture map fields of {@link PBRMaterialOptions}. */
export type PBRTextureMap =
  | "albedoMap"
  | "metallicRoughnessMap"
  | "normalMap"
  | "occlusionMap"
  | "emissiveMap";

export interface PBRMaterialOptions {
  /**
   * Base color (albedo) in linear space [R, G, B, A].
   * Acts as diffuse color for dielectrics, tint for metals.
   * Default: [1, 1, 1, 1] (white)
   */
  albedo?: [number, number, number, number];

  /**
   * Metallic factor [0.0 - 1.0].
   * 0.0 = dielectric (plastic, wood, etc.)
   * 1.0 = metallic (iron, gold, etc.)
   * Default: 0.0
   */
  metallic?: number;

  /**
   * Roughness factor [0.0 - 1.0].
   * 0.0 = perfectly smooth (mirror)
   * 1.0 = completely rough (chalk)
   * Default: 0.5
   */
  roughness?: number;

  /**
   * Emissive color in linear space [R, G, B].
   * Default: [0, 0, 0] (no emission)
   */
  emissive?: [number, number, number];

  /**
   * How the alpha channel of the base color is used.
   * Default: "opaque"
   */
  alphaMode?: "opaque" | "mask" | "blend";

  /** Alpha threshold when `alphaMode` is "mask". Default: 0.5 */
  alphaCutoff?: number;

  /** Disables back-face culling. Default: false */
  doubleSided?: boolean;

  // Texture Maps (glTF 2.0 standard), as URLs (data: URLs for inline images)
  albedoMap?: string;
  /**
   * Metallic-Roughness texture map URL.
   * G channel: roughness, B channel: metallic
   */
  metallicRoughnessMap?: string;
  normalMap?: string;
  emissiveMap?: string;
  occlusionMap?: string;

  // --- UV Set Selectors ---
  /** UV set index for the albedo map. Defaults to 0. */
  albedoUV?: number;
  /** UV set index for the metallic-roughness map. Defaults to 0. */
  metallicRoughnessUV?: number;
  /** UV set index for the normal map. Defaults to 0. */
  normalUV?: number;
  /** UV set index for the emissive map. Defaults to 0. */
  emissiveUV?: number;
  /** UV set index for the occlusion map. Defaults to 0. */
  occlusionUV?: number;

  /** Per-map UV transforms. Maps without an entry use identity. */
  textureTransforms?: Partial<Record<PBRTextureMap, TextureTransformOptions>>;

  /** Per-map sampler settings. Maps without an entry use the default sampler. */
  samplers?: Partial<Record<PBRTextureMap, TextureSamplerOptions>>;
}

// src/core/resources/materialFactory.ts
import type {
  PBRMaterialOptions,
  PBRTextureMap,
  SamplerAddressMode,
  SamplerFilterMode,
  TextureSamplerOptions,
} from "@/core/types/gpu";
import type { PBRMaterialSpec } from "@/core/types/material";
import {
  AlphaMode,
  FilterMode,
  MimeKind,
  TextureRefKind,
  TextureSlot,
  WrapMode,
  type PbrMaterial,
  type SamplerDesc,
  type TextureRef,
} from "@/core/types/vnb";

type UvSelector =
  | "albedoUV"
  | "metallicRoughnessUV"
  | "normalUV"
  | "occlusionUV"
  | "emissiveUV";

const SLOT_MAPS = new Map<TextureSlot, { map: PBRTextureMap; uv: UvSelector }>([
  [TextureSlot.BaseColor, { map: "albedoMap", uv: "albedoUV" }],
  [
    TextureSlot.MetalRough,
    { map: "metallicRoughnessMap", uv: "metallicRoughnessUV" },
  ],
  [TextureSlot.Normal, { map: "normalMap", uv: "normalUV" }],
  [TextureSlot.Occlusion, { map: "occlusionMap", uv: "occlusionUV" }],
  [TextureSlot.Emissive, { map: "emissiveMap", uv: "emissiveUV" }],
]);

const MIME_TYPES = new Map<MimeKind, string>([
  [MimeKind.PNG, "image/png"],
  [MimeKind.JPG, "image/jpeg"],
  [MimeKind.KTX2, "image/ktx2"],
]);

const ADDRESS_MODES = new Map<WrapMode, SamplerAddressMode>([
  [WrapMode.Repeat, "repeat"],
  [WrapMode.Clamp, "clamp-to-edge"],
  [WrapMode.Mirror, "mirror-repeat"],
]);

function toFilter(mode: FilterMode): SamplerFilterMode {
  return mode === FilterMode.Point ? "nearest" : "linear";
}

function toSamplerOptions(sampler: SamplerDesc): TextureSamplerOptions {
  return {
    addressModeU: ADDRESS_MODES.get(sampler.wrapU) ?? "repeat",
    addressModeV: ADDRESS_MODES.get(sampler.wrapV) ?? "repeat",
    minFilter: toFilter(sampler.minFilter),
    magFilter: toFilter(sampler.magFilter),
    mipmapFilter:
      sampler.minFilter === FilterMode.Trilinear ? "linear" : "nearest",
  };
}

/**
 * Returns the URL the engine's texture loader fetches for a reference.
 * Embedded payloads become `data:` URLs tagged with their mime type.
 */
function textureUrl(texture: TextureRef): string {
  const source = texture.source;
  if (source.kind === TextureRefKind.External) return source.uri;
  const mime = MIME_TYPES.get(source.mime) ?? "application/octet-stream";
  return `data:${mime};base64,${Buffer.from(source.data).toString("base64")}`;
}

/**
 * A stateless factory mapping decoded materials onto the engine's
 * declarative PBR material description.
 */
export class MaterialFactory {
  /**
   * Builds a {@link PBRMaterialSpec} from a decoded material.
   *
   * @remarks
   * Only the fields present in the material are set, leaving the engine's
   * defaults for the rest. Texture rotation is carried by the container but
   * not applied. If two textures use the same slot the first one wins.
   *
   * @param material A material from a decoded container.
   * @param fallbackName Name used when the material has none.
   */
  public static toPBRMaterialSpec(
    material: PbrMaterial,
    fallbackName = "",
  ): PBRMaterialSpec {
    const options: PBRMaterialOptions = {};

    if (material.baseColorFactor) options.albedo = [...material.baseColorFactor];
    if (material.metallicFactor !== null) options.metallic = material.metallicFactor;
    if (material.roughnessFactor !== null) {
      options.roughness = material.roughnessFactor;
    }
    if (material.emissiveFactor) options.emissive = [...material.emissiveFactor];

    if (material.alpha) {
      switch (material.alpha.mode) {
        case AlphaMode.Opaque:
          options.alphaMode = "opaque";
          break;
        case AlphaMode.Blend:
          options.alphaMode = "blend";
          break;
        case AlphaMode.Mask:
          options.alphaMode = "mask";
          options.alphaCutoff = material.alpha.cutoff;
          break;
      }
    }
    if (material.doubleSided !== null) options.doubleSided = material.doubleSided;

    const transforms: NonNullable<PBRMaterialOptions["textureTransforms"]> = {};
    const samplers: NonNullable<PBRMaterialOptions["samplers"]> = {};

    for (const texture of material.textures) {
      const target = SLOT_MAPS.get(texture.slot);
      if (!target) continue;
      if (options[target.map] !== undefined) {
        console.warn(
          `[MaterialFactory] Material "${material.name}" has more than one texture for ${target.map}; keeping the first.`,
        );
        continue;
      }

      options[target.map] = textureUrl(texture);
      if (texture.uvSet !== 0) options[target.uv] = texture.uvSet;
      if (texture.offset || texture.scale) {
        transforms[target.map] = {
          offset: texture.offset ? [...texture.offset] : [0, 0],
          scale: texture.scale ? [...texture.scale] : [1, 1],
        };
      }
      if (texture.sampler) {
        samplers[target.map] = toSamplerOptions(texture.sampler);
      }
    }

    if (Object.keys(transforms).length > 0) options.textureTransforms = transforms;
    if (Object.keys(samplers).length > 0) options.samplers = samplers;

    return {
      type: "PBR",
      name: material.name || fallbackName,
      options,
    };
  }
}

/** Functional alias of {@link MaterialFactory.toPBRMaterialSpec}. */
export function toPBRMaterialSpec(
  material: PbrMaterial,
  fallbackName?: string,
): PBRMaterialSpec {
  return MaterialFactory.toPBRMaterialSpec(material, fallbackName);
}

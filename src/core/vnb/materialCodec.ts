// src/core/vnb/materialCodec.ts
import {
  AlphaMode,
  FilterMode,
  MimeKind,
  PbrFlags,
  TextureRefKind,
  TextureSlot,
  WrapMode,
  type AlphaSettings,
  type PbrMaterial,
  type RGB,
  type RGBA,
  type SamplerDesc,
  type TextureRef,
  type TextureSource,
  type UvSet,
  type Vec2Tuple,
} from "@/core/types/vnb";
import { BinaryReader } from "./binaryReader";
import { BinaryWriter } from "./binaryWriter";
import { FormatError } from "./formatError";
import {
  MAX_TEXTURES_PER_MATERIAL,
  TEXTURE_HAS_OFFSET,
  TEXTURE_HAS_ROTATION,
  TEXTURE_HAS_SCALE,
} from "./vnbLayout";

const MAX_U32 = 0xffffffff;

// Wire byte → enum member. Bytes missing from a map are rejected.
const TEXTURE_SLOTS = new Map<number, TextureSlot>([
  [0, TextureSlot.BaseColor],
  [1, TextureSlot.MetalRough],
  [2, TextureSlot.Normal],
  [3, TextureSlot.Occlusion],
  [4, TextureSlot.Emissive],
]);
const REF_KINDS = new Map<number, TextureRefKind>([
  [0, TextureRefKind.External],
  [1, TextureRefKind.Embedded],
]);
const ALPHA_MODES = new Map<number, AlphaMode>([
  [0, AlphaMode.Opaque],
  [1, AlphaMode.Mask],
  [2, AlphaMode.Blend],
]);
const MIME_KINDS = new Map<number, MimeKind>([
  [0, MimeKind.PNG],
  [1, MimeKind.JPG],
  [2, MimeKind.KTX2],
]);
const WRAP_MODES = new Map<number, WrapMode>([
  [0, WrapMode.Repeat],
  [1, WrapMode.Clamp],
  [2, WrapMode.Mirror],
]);
const FILTER_MODES = new Map<number, FilterMode>([
  [0, FilterMode.Point],
  [1, FilterMode.Bilinear],
  [2, FilterMode.Trilinear],
]);
const UV_SETS = new Map<number, UvSet>([
  [0, 0],
  [1, 1],
]);

function lookupEnum<E>(table: Map<number, E>, value: number, what: string): E {
  const member = table.get(value);
  if (member === undefined) {
    throw new FormatError("UnknownEnumValue", `${what} byte ${value}`);
  }
  return member;
}

function hasFlag(flags: number, flag: PbrFlags): boolean {
  return (flags & flag) !== 0;
}

function violation(material: number, message: string): FormatError {
  return new FormatError("InvariantViolation", `material ${material}: ${message}`);
}

function checkGated(
  flags: number,
  flag: PbrFlags,
  present: boolean,
  field: string,
  material: number,
): void {
  if (hasFlag(flags, flag) && !present) {
    throw violation(material, `${PbrFlags[flag]} flag is set but ${field} is missing`);
  }
  if (!hasFlag(flags, flag) && present) {
    throw violation(material, `${field} is present but ${PbrFlags[flag]} flag is not set`);
  }
}

function checkEnum<E>(table: Map<number, E>, value: number, what: string, material: number): void {
  if (!table.has(value)) {
    throw violation(material, `unknown ${what} ${value}`);
  }
}

/**
 * Checks that a material's nullable fields agree with its flags.
 *
 * @remarks
 * Sampler presence is material-scoped: with `PbrFlags.Sampler` set every
 * texture must carry a sampler, without it none may.
 *
 * @throws FormatError (`InvariantViolation`) on any disagreement.
 */
export function validateMaterial(material: PbrMaterial, index: number): void {
  const { flags } = material;
  if (!Number.isInteger(flags) || flags < 0 || flags > MAX_U32) {
    throw violation(index, `flags ${flags} do not fit u32`);
  }

  checkGated(flags, PbrFlags.BaseColorFactor, material.baseColorFactor !== null, "baseColorFactor", index);
  checkGated(flags, PbrFlags.MetallicFactor, material.metallicFactor !== null, "metallicFactor", index);
  checkGated(flags, PbrFlags.RoughnessFactor, material.roughnessFactor !== null, "roughnessFactor", index);
  checkGated(flags, PbrFlags.EmissiveFactor, material.emissiveFactor !== null, "emissiveFactor", index);
  checkGated(flags, PbrFlags.AlphaMode, material.alpha !== null, "alpha", index);
  checkGated(flags, PbrFlags.DoubleSided, material.doubleSided !== null, "doubleSided", index);

  if (material.alpha !== null) {
    checkEnum(ALPHA_MODES, material.alpha.mode, "alpha mode", index);
  }

  if (material.textures.length > MAX_TEXTURES_PER_MATERIAL) {
    throw violation(
      index,
      `${material.textures.length} textures exceed the limit of ${MAX_TEXTURES_PER_MATERIAL}`,
    );
  }

  const withSampler = hasFlag(flags, PbrFlags.Sampler);
  material.textures.forEach((texture, t) => {
    checkEnum(TEXTURE_SLOTS, texture.slot, `texture ${t} slot`, index);
    checkEnum(UV_SETS, texture.uvSet, `texture ${t} uv set`, index);
    checkEnum(REF_KINDS, texture.source.kind, `texture ${t} ref kind`, index);

    if (withSampler && texture.sampler === null) {
      throw violation(index, `Sampler flag is set but texture ${t} has no sampler`);
    }
    if (!withSampler && texture.sampler !== null) {
      throw violation(index, `texture ${t} has a sampler but the Sampler flag is not set`);
    }
    if (texture.sampler !== null) {
      checkEnum(WRAP_MODES, texture.sampler.wrapU, `texture ${t} wrapU`, index);
      checkEnum(WRAP_MODES, texture.sampler.wrapV, `texture ${t} wrapV`, index);
      checkEnum(FILTER_MODES, texture.sampler.minFilter, `texture ${t} minFilter`, index);
      checkEnum(FILTER_MODES, texture.sampler.magFilter, `texture ${t} magFilter`, index);
    }

    if (texture.source.kind === TextureRefKind.Embedded) {
      checkEnum(MIME_KINDS, texture.source.mime, `texture ${t} mime`, index);
      if (texture.source.data.byteLength > MAX_U32) {
        throw violation(index, `texture ${t} payload exceeds u32 length`);
      }
    }
  });
}

function writeTexture(
  writer: BinaryWriter,
  texture: TextureRef,
  withSampler: boolean,
): void {
  writer.writeU8(texture.slot);
  writer.writeU8(texture.uvSet);
  writer.writeU8(texture.source.kind);

  let transformFlags = 0;
  if (texture.offset !== null) transformFlags |= TEXTURE_HAS_OFFSET;
  if (texture.scale !== null) transformFlags |= TEXTURE_HAS_SCALE;
  if (texture.rotation !== null) transformFlags |= TEXTURE_HAS_ROTATION;
  writer.writeU8(transformFlags);

  if (texture.offset !== null) writer.writeFloatArray(texture.offset);
  if (texture.scale !== null) writer.writeFloatArray(texture.scale);
  if (texture.rotation !== null) writer.writeF32(texture.rotation);

  if (withSampler && texture.sampler !== null) {
    writer.writeU8(texture.sampler.wrapU);
    writer.writeU8(texture.sampler.wrapV);
    writer.writeU8(texture.sampler.minFilter);
    writer.writeU8(texture.sampler.magFilter);
  }

  if (texture.source.kind === TextureRefKind.External) {
    writer.writeLengthPrefixedUtf8(texture.source.uri);
  } else {
    writer.writeU8(texture.source.mime);
    writer.writeU32(texture.source.data.byteLength);
    writer.writeBytes(texture.source.data);
  }
}

/**
 * Writes one material record.
 *
 * @remarks
 * Expects a material already checked by {@link validateMaterial}. Only the
 * blocks whose flag bit is set are written.
 */
export function writeMaterial(writer: BinaryWriter, material: PbrMaterial): void {
  const { flags } = material;
  writer.writeLengthPrefixedUtf8(material.name);
  writer.writeU32(flags);

  if (hasFlag(flags, PbrFlags.BaseColorFactor) && material.baseColorFactor) {
    writer.writeFloatArray(material.baseColorFactor);
  }
  if (hasFlag(flags, PbrFlags.MetallicFactor) && material.metallicFactor !== null) {
    writer.writeF32(material.metallicFactor);
  }
  if (hasFlag(flags, PbrFlags.RoughnessFactor) && material.roughnessFactor !== null) {
    writer.writeF32(material.roughnessFactor);
  }
  if (hasFlag(flags, PbrFlags.EmissiveFactor) && material.emissiveFactor) {
    writer.writeFloatArray(material.emissiveFactor);
  }
  if (hasFlag(flags, PbrFlags.AlphaMode) && material.alpha) {
    writer.writeU8(material.alpha.mode);
    if (material.alpha.mode === AlphaMode.Mask) {
      writer.writeF32(material.alpha.cutoff);
    }
  }
  if (hasFlag(flags, PbrFlags.DoubleSided) && material.doubleSided !== null) {
    writer.writeU8(material.doubleSided ? 1 : 0);
  }

  const withSampler = hasFlag(flags, PbrFlags.Sampler);
  writer.writeU8(material.textures.length);
  for (const texture of material.textures) {
    writeTexture(writer, texture, withSampler);
  }
}

function readVec2(reader: BinaryReader): Vec2Tuple {
  return [reader.readF32(), reader.readF32()];
}

function readSampler(reader: BinaryReader): SamplerDesc {
  return {
    wrapU: lookupEnum(WRAP_MODES, reader.readU8(), "wrapU"),
    wrapV: lookupEnum(WRAP_MODES, reader.readU8(), "wrapV"),
    minFilter: lookupEnum(FILTER_MODES, reader.readU8(), "minFilter"),
    magFilter: lookupEnum(FILTER_MODES, reader.readU8(), "magFilter"),
  };
}

function readTexture(reader: BinaryReader, withSampler: boolean): TextureRef {
  const slot = lookupEnum(TEXTURE_SLOTS, reader.readU8(), "texture slot");
  const uvSet = lookupEnum(UV_SETS, reader.readU8(), "uv set");
  const kind = lookupEnum(REF_KINDS, reader.readU8(), "texture ref kind");

  const transformFlags = reader.readU8();
  const offset = transformFlags & TEXTURE_HAS_OFFSET ? readVec2(reader) : null;
  const scale = transformFlags & TEXTURE_HAS_SCALE ? readVec2(reader) : null;
  const rotation = transformFlags & TEXTURE_HAS_ROTATION ? reader.readF32() : null;

  const sampler = withSampler ? readSampler(reader) : null;

  let source: TextureSource;
  if (kind === TextureRefKind.External) {
    source = { kind, uri: reader.readLengthPrefixedUtf8() };
  } else {
    const mime = lookupEnum(MIME_KINDS, reader.readU8(), "mime");
    const length = reader.readU32();
    source = { kind, mime, data: reader.readBytes(length) };
  }

  return { slot, uvSet, offset, scale, rotation, sampler, source };
}

/**
 * Reads one material record.
 *
 * @remarks
 * External references are returned as read; resolving them is a separate
 * step (see `resolveExternalTextures`).
 */
export function readMaterial(reader: BinaryReader): PbrMaterial {
  const name = reader.readLengthPrefixedUtf8();
  const flags = reader.readU32();

  const baseColorFactor: RGBA | null = hasFlag(flags, PbrFlags.BaseColorFactor)
    ? [reader.readF32(), reader.readF32(), reader.readF32(), reader.readF32()]
    : null;
  const metallicFactor = hasFlag(flags, PbrFlags.MetallicFactor)
    ? reader.readF32()
    : null;
  const roughnessFactor = hasFlag(flags, PbrFlags.RoughnessFactor)
    ? reader.readF32()
    : null;
  const emissiveFactor: RGB | null = hasFlag(flags, PbrFlags.EmissiveFactor)
    ? [reader.readF32(), reader.readF32(), reader.readF32()]
    : null;

  let alpha: AlphaSettings | null = null;
  if (hasFlag(flags, PbrFlags.AlphaMode)) {
    const mode = lookupEnum(ALPHA_MODES, reader.readU8(), "alpha mode");
    alpha =
      mode === AlphaMode.Mask ? { mode, cutoff: reader.readF32() } : { mode };
  }

  const doubleSided = hasFlag(flags, PbrFlags.DoubleSided)
    ? reader.readU8() !== 0
    : null;

  const withSampler = hasFlag(flags, PbrFlags.Sampler);
  const textureCount = reader.readU8();
  const textures: TextureRef[] = [];
  for (let i = 0; i < textureCount; i++) {
    textures.push(readTexture(reader, withSampler));
  }

  return {
    name,
    flags,
    baseColorFactor,
    metallicFactor,
    roughnessFactor,
    emissiveFactor,
    alpha,
    doubleSided,
    textures,
  };
}

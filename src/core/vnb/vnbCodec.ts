// src/core/vnb/vnbCodec.ts
import type {
  MeshContainer,
  PbrMaterial,
  TextureResolver,
} from "@/core/types/vnb";
import { Profiler } from "@/core/utils/profiler";
import { BinaryReader } from "./binaryReader";
import { BinaryWriter } from "./binaryWriter";
import { FormatError, isFormatError } from "./formatError";
import {
  createHeader,
  readHeader,
  startsWithMagic,
  writeHeader,
  type HeaderProbe,
  type VnbHeader,
} from "./headerCodec";
import { parseLegacy } from "./legacyParser";
import { readMaterial, validateMaterial, writeMaterial } from "./materialCodec";
import {
  readMeshStreams,
  validateMeshStreams,
  writeMeshStreams,
} from "./meshStreamCodec";
import { readSubMeshes, validateSubMesh, writeSubMeshes } from "./subMeshCodec";
import {
  resolveExternalTextures,
  type UnresolvedTexturePolicy,
} from "./textureResolution";
import { HEADER_SIZE, SUBMESH_RECORD_SIZE } from "./vnbLayout";

const MAX_U32 = 0xffffffff;
/** Smallest possible material record: empty name, flags, texture count. */
const MIN_MATERIAL_RECORD_SIZE = 2 + 4 + 1;

export interface DecodeOptions {
  /** Synchronous lookup used to embed external textures after decoding. */
  resolveTexture?: TextureResolver;
  /** Handling of external textures the resolver cannot supply. */
  unresolvedTextures?: UnresolvedTexturePolicy;
  /** Route non-current headers to the legacy parser. */
  legacyFallback?: boolean;
}

export const DEFAULT_DECODE_OPTIONS = {
  unresolvedTextures: "passThrough",
  legacyFallback: true,
} satisfies Omit<Required<DecodeOptions>, "resolveTexture">;

function estimateByteLength(container: MeshContainer): number {
  let size = HEADER_SIZE + 2 + container.name.length * 3;
  for (const stream of [
    container.positions,
    container.normals,
    container.tangents,
    container.colors,
    container.uv0,
    container.uv1,
  ]) {
    size += stream?.byteLength ?? 0;
  }
  size += 24 + container.indices.byteLength;
  size += container.subMeshes.length * SUBMESH_RECORD_SIZE;
  for (const material of container.materials) {
    size += 64 + material.name.length * 3;
    for (const texture of material.textures) {
      size += 32;
      size +=
        "data" in texture.source
          ? texture.source.data.byteLength
          : texture.source.uri.length * 3;
    }
  }
  return size;
}

/**
 * Encodes a container into a single contiguous byte sequence.
 *
 * @remarks
 * Sections are written as header, name, vertex streams, bounds, indices,
 * submeshes and materials. The header's vertex and index counts are derived
 * from the array lengths; the container's own `vertexCount` and `indexCount`
 * are ignored.
 *
 * @param container - The container to encode. It is not modified.
 * @returns The encoded bytes.
 * @throws FormatError (`InvariantViolation`) if a stream, submesh or material
 *     disagrees with its flags or counts, or (`StringTooLong`) if a name or
 *     URI exceeds 65535 UTF-8 bytes.
 */
export function encode(container: MeshContainer): Uint8Array {
  const span = Profiler.begin("vnb.encode");
  let written = 0;
  try {
    const flags = container.featureFlags;
    if (!Number.isInteger(flags) || flags < 0 || flags > MAX_U32) {
      throw new FormatError(
        "InvariantViolation",
        `feature flags ${flags} do not fit u32`,
      );
    }

    const counts = validateMeshStreams(container, flags);
    container.subMeshes.forEach(validateSubMesh);
    container.materials.forEach(validateMaterial);

    const writer = new BinaryWriter(estimateByteLength(container));
    writeHeader(
      writer,
      createHeader(flags, {
        ...counts,
        subMeshCount: container.subMeshes.length,
        materialCount: container.materials.length,
      }),
    );
    writeMeshStreams(writer, container, flags);
    writeSubMeshes(writer, container.subMeshes);
    for (const material of container.materials) {
      writeMaterial(writer, material);
    }
    const bytes = writer.toBytes();
    written = bytes.byteLength;
    return bytes;
  } finally {
    Profiler.end(span, written);
  }
}

function decodeCurrent(reader: BinaryReader, header: VnbHeader): MeshContainer {
  const streams = readMeshStreams(reader, header);
  const subMeshes = readSubMeshes(reader, header.subMeshCount);

  if (header.materialCount * MIN_MATERIAL_RECORD_SIZE > reader.remaining) {
    throw new FormatError(
      "TruncatedInput",
      `${header.materialCount} materials cannot fit in ${reader.remaining} remaining bytes`,
    );
  }
  const materials: PbrMaterial[] = [];
  for (let i = 0; i < header.materialCount; i++) {
    materials.push(readMaterial(reader));
  }

  return {
    ...streams,
    featureFlags: header.featureFlags,
    subMeshes,
    materials,
    vertexCount: header.vertexCount,
    indexCount: header.indexCount,
  };
}

/**
 * Runs the legacy grammar after the current header was rejected.
 *
 * @param headerError - The truncation raised by the header, if that is why
 *     the current format was abandoned.
 */
function decodeLegacy(
  bytes: Uint8Array,
  legacyFallback: boolean,
  headerError: FormatError | null,
): MeshContainer {
  if (!legacyFallback) {
    throw (
      headerError ??
      new FormatError(
        "UnsupportedMagicOrVersion",
        "header is not VNB2 and legacy fallback is disabled",
      )
    );
  }

  console.warn("VNB header not recognized; reading legacy layout.");
  try {
    return parseLegacy(bytes);
  } catch (legacyError) {
    // A short stream that starts like the current format is a truncated
    // current file, not a legacy one.
    if (headerError !== null && startsWithMagic(bytes)) {
      throw headerError;
    }
    throw legacyError;
  }
}

/**
 * Decodes bytes into a container without resolving external textures.
 *
 * @remarks
 * A magic/version mismatch, or a stream too short for the header, is
 * retried once under the legacy grammar. Corruption found after a valid
 * header is never reinterpreted as legacy data.
 *
 * @throws FormatError on truncated or malformed input.
 */
export function decodeContainer(
  bytes: Uint8Array,
  options: Pick<DecodeOptions, "legacyFallback"> = {},
): MeshContainer {
  const legacyFallback =
    options.legacyFallback ?? DEFAULT_DECODE_OPTIONS.legacyFallback;
  const reader = new BinaryReader(bytes);

  let probe: HeaderProbe;
  try {
    probe = readHeader(reader);
  } catch (error) {
    if (!isFormatError(error, "TruncatedInput")) throw error;
    return decodeLegacy(bytes, legacyFallback, error);
  }

  if (probe.status === "mismatch") {
    return decodeLegacy(bytes, legacyFallback, null);
  }
  return decodeCurrent(reader, probe.header);
}

/**
 * Decodes bytes into a container.
 *
 * @remarks
 * With a resolver, external textures the resolver can supply are returned
 * as embedded PNG payloads. The source bytes are never modified.
 *
 * @param bytes - The encoded container.
 * @param resolverOrOptions - A texture resolver, or full decode options.
 * @returns The decoded container.
 * @throws FormatError on truncated or malformed input, or
 *     (`UnresolvedTexture`) under the `reject` policy.
 */
export function decode(
  bytes: Uint8Array,
  resolverOrOptions?: TextureResolver | DecodeOptions,
): MeshContainer {
  const options: DecodeOptions =
    typeof resolverOrOptions === "function"
      ? { resolveTexture: resolverOrOptions }
      : (resolverOrOptions ?? {});

  const span = Profiler.begin("vnb.decode");
  try {
    const container = decodeContainer(bytes, options);
    if (!options.resolveTexture) return container;

    return resolveExternalTextures(
      container,
      options.resolveTexture,
      options.unresolvedTextures ?? DEFAULT_DECODE_OPTIONS.unresolvedTextures,
    ).container;
  } finally {
    Profiler.end(span, bytes.byteLength);
  }
}

// src/core/vnb/headerCodec.ts
import { BinaryReader } from "./binaryReader";
import { BinaryWriter } from "./binaryWriter";
import {
  COORD_SYS_Y_UP,
  ENDIANNESS_LITTLE,
  HEADER_RESERVED_BYTES,
  HEADER_SIZE,
  UNIT_SCALE_METERS,
  VNB_MAGIC,
  VNB_VERSION,
} from "./vnbLayout";
import { FormatError } from "./formatError";

/**
 * The fixed preamble of a VNB container.
 */
export interface VnbHeader {
  magic: number;
  version: number;
  endianness: number;
  coordinateSystem: number;
  unitScale: number;
  featureFlags: number;
  vertexCount: number;
  indexCount: number;
  subMeshCount: number;
  materialCount: number;
}

/**
 * Outcome of probing a byte stream for the current format.
 *
 * @remarks
 * A magic/version mismatch is not an error: it tells the caller to try the
 * legacy grammar.
 */
export type HeaderProbe =
  | { status: "current"; header: VnbHeader }
  | { status: "mismatch"; magic: number; version: number };

/**
 * Builds the header the encoder writes for the given flags and counts.
 */
export function createHeader(
  featureFlags: number,
  counts: Pick<
    VnbHeader,
    "vertexCount" | "indexCount" | "subMeshCount" | "materialCount"
  >,
): VnbHeader {
  return {
    magic: VNB_MAGIC,
    version: VNB_VERSION,
    endianness: ENDIANNESS_LITTLE,
    coordinateSystem: COORD_SYS_Y_UP,
    unitScale: UNIT_SCALE_METERS,
    featureFlags,
    ...counts,
  };
}

export function writeHeader(writer: BinaryWriter, header: VnbHeader): void {
  writer.writeU32(header.magic);
  writer.writeU16(header.version);
  writer.writeU8(header.endianness);
  writer.writeU8(header.coordinateSystem);
  writer.writeF32(header.unitScale);
  writer.writeU32(header.featureFlags);
  writer.writeU32(header.vertexCount);
  writer.writeU32(header.indexCount);
  writer.writeU32(header.subMeshCount);
  writer.writeU32(header.materialCount);
  writer.writeZeros(HEADER_RESERVED_BYTES);
}

/**
 * Reads the fixed 48-byte preamble.
 *
 * @remarks
 * The reserved bytes are skipped without inspection. A non-zero endianness
 * tag is logged and decoding continues as little-endian.
 *
 * @param reader - Reader positioned at the start of the stream.
 * @returns `current` with the parsed header, or `mismatch` when the magic or
 *     version differ from the current format.
 * @throws FormatError (`TruncatedInput`) if fewer than 48 bytes are available.
 */
export function readHeader(reader: BinaryReader): HeaderProbe {
  if (reader.remaining < HEADER_SIZE) {
    throw new FormatError(
      "TruncatedInput",
      `header needs ${HEADER_SIZE} bytes, got ${reader.remaining}`,
    );
  }

  const magic = reader.readU32();
  const version = reader.readU16();
  if (magic !== VNB_MAGIC || version !== VNB_VERSION) {
    return { status: "mismatch", magic, version };
  }

  const header: VnbHeader = {
    magic,
    version,
    endianness: reader.readU8(),
    coordinateSystem: reader.readU8(),
    unitScale: reader.readF32(),
    featureFlags: reader.readU32(),
    vertexCount: reader.readU32(),
    indexCount: reader.readU32(),
    subMeshCount: reader.readU32(),
    materialCount: reader.readU32(),
  };
  reader.skip(HEADER_RESERVED_BYTES);

  if (header.endianness !== ENDIANNESS_LITTLE) {
    console.warn(
      `VNB header declares endianness ${header.endianness}; decoding as little-endian.`,
    );
  }

  return { status: "current", header };
}

/**
 * Probes raw bytes without consuming them.
 *
 * @returns The header probe, or `null` when the bytes are too short to hold
 *     a header.
 */
export function probeHeader(bytes: Uint8Array): HeaderProbe | null {
  if (bytes.byteLength < HEADER_SIZE) return null;
  return readHeader(new BinaryReader(bytes));
}

/**
 * True when the first four bytes carry the current magic.
 */
export function startsWithMagic(bytes: Uint8Array): boolean {
  if (bytes.byteLength < 4) return false;
  const view = new DataView(bytes.buffer, bytes.byteOffset, 4);
  return view.getUint32(0, true) === VNB_MAGIC;
}

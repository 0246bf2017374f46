// src/core/vnb/headerCodec.test.ts
import { afterEach, describe, expect, it, vi } from "vitest";
import { GlobalFlags } from "@/core/types/vnb";
import { BinaryReader } from "./binaryReader";
import { BinaryWriter } from "./binaryWriter";
import {
  createHeader,
  probeHeader,
  readHeader,
  startsWithMagic,
  writeHeader,
} from "./headerCodec";
import {
  HEADER_COORD_SYS_OFFSET,
  HEADER_ENDIANNESS_OFFSET,
  HEADER_FLAGS_OFFSET,
  HEADER_INDEX_COUNT_OFFSET,
  HEADER_MAGIC_OFFSET,
  HEADER_MATERIAL_COUNT_OFFSET,
  HEADER_RESERVED_OFFSET,
  HEADER_SIZE,
  HEADER_SUBMESH_COUNT_OFFSET,
  HEADER_UNIT_SCALE_OFFSET,
  HEADER_VERSION_OFFSET,
  HEADER_VERTEX_COUNT_OFFSET,
  VNB_MAGIC,
} from "./vnbLayout";

function encodedHeader(): Uint8Array {
  const writer = new BinaryWriter();
  writeHeader(
    writer,
    createHeader(GlobalFlags.HasPositions | GlobalFlags.HasNormals, {
      vertexCount: 4,
      indexCount: 6,
      subMeshCount: 1,
      materialCount: 2,
    }),
  );
  return writer.toBytes();
}

describe("headerCodec", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes the 48-byte preamble at fixed offsets", () => {
    const bytes = encodedHeader();
    const view = new DataView(bytes.buffer);

    expect(bytes.byteLength).toBe(HEADER_SIZE);
    expect(Array.from(bytes.subarray(HEADER_MAGIC_OFFSET, 4))).toEqual([
      0x32, 0x42, 0x4e, 0x56,
    ]);
    expect(view.getUint16(HEADER_VERSION_OFFSET, true)).toBe(2);
    expect(view.getUint8(HEADER_ENDIANNESS_OFFSET)).toBe(0);
    expect(view.getUint8(HEADER_COORD_SYS_OFFSET)).toBe(0);
    expect(view.getFloat32(HEADER_UNIT_SCALE_OFFSET, true)).toBe(1);
    expect(view.getUint32(HEADER_FLAGS_OFFSET, true)).toBe(3);
    expect(view.getUint32(HEADER_VERTEX_COUNT_OFFSET, true)).toBe(4);
    expect(view.getUint32(HEADER_INDEX_COUNT_OFFSET, true)).toBe(6);
    expect(view.getUint32(HEADER_SUBMESH_COUNT_OFFSET, true)).toBe(1);
    expect(view.getUint32(HEADER_MATERIAL_COUNT_OFFSET, true)).toBe(2);
    expect(HEADER_RESERVED_OFFSET).toBe(32);
    expect(Array.from(bytes.subarray(HEADER_RESERVED_OFFSET))).toEqual(
      new Array(16).fill(0),
    );
  });

  it("reads back a current header and consumes exactly 48 bytes", () => {
    const reader = new BinaryReader(encodedHeader());
    const probe = readHeader(reader);

    expect(probe).toEqual({
      status: "current",
      header: {
        magic: VNB_MAGIC,
        version: 2,
        endianness: 0,
        coordinateSystem: 0,
        unitScale: 1,
        featureFlags: 3,
        vertexCount: 4,
        indexCount: 6,
        subMeshCount: 1,
        materialCount: 2,
      },
    });
    expect(reader.offset).toBe(HEADER_SIZE);
  });

  it("ignores reserved bytes", () => {
    const bytes = encodedHeader();
    bytes.fill(0x5a, HEADER_RESERVED_OFFSET, HEADER_SIZE);

    expect(probeHeader(bytes)?.status).toBe("current");
  });

  it("reports a wrong magic as a mismatch, not an error", () => {
    const bytes = encodedHeader();
    bytes[0] = 0x00;

    expect(probeHeader(bytes)).toEqual({
      status: "mismatch",
      magic: 0x564e4200,
      version: 2,
    });
  });

  it("reports a wrong version as a mismatch", () => {
    const bytes = encodedHeader();
    bytes[4] = 1;

    expect(probeHeader(bytes)).toEqual({
      status: "mismatch",
      magic: VNB_MAGIC,
      version: 1,
    });
  });

  it("warns on a non-zero endianness tag and keeps decoding", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const bytes = encodedHeader();
    bytes[HEADER_ENDIANNESS_OFFSET] = 1;

    const probe = probeHeader(bytes);

    expect(probe?.status).toBe("current");
    expect(warn).toHaveBeenCalledWith(
      "VNB header declares endianness 1; decoding as little-endian.",
    );
  });

  it("raises TruncatedInput for a preamble shorter than 48 bytes", () => {
    const reader = new BinaryReader(encodedHeader().subarray(0, 47));

    expect(() => readHeader(reader)).toThrow(/TruncatedInput/);
    expect(probeHeader(encodedHeader().subarray(0, 47))).toBeNull();
  });

  it("detects the magic prefix", () => {
    expect(startsWithMagic(encodedHeader().subarray(0, 4))).toBe(true);
    expect(startsWithMagic(new Uint8Array([0x32, 0x42, 0x4e]))).toBe(false);
    expect(startsWithMagic(new Uint8Array([1, 0, 0, 0]))).toBe(false);
  });
});

// src/core/vnb/binaryWriter.ts
import { FormatError } from "./formatError";
import { MAX_STRING_BYTES } from "./vnbLayout";

const HOST_IS_LITTLE_ENDIAN =
  new Uint8Array(new Uint16Array([1]).buffer)[0] === 1;

const textEncoder = new TextEncoder();

/**
 * Growable little-endian byte sink.
 *
 * @remarks
 * Writes never insert padding. Bulk array writes copy the typed array's
 * bytes directly when the host is little-endian and fall back to per-element
 * DataView writes otherwise.
 */
export class BinaryWriter {
  private bytes: Uint8Array;
  private view: DataView;
  private length = 0;

  constructor(initialCapacity = 256) {
    this.bytes = new Uint8Array(Math.max(16, initialCapacity));
    this.view = new DataView(this.bytes.buffer);
  }

  /** Number of bytes written so far. */
  public get byteLength(): number {
    return this.length;
  }

  public writeU8(value: number): void {
    this.reserve(1);
    this.view.setUint8(this.length, value);
    this.length += 1;
  }

  public writeU16(value: number): void {
    this.reserve(2);
    this.view.setUint16(this.length, value, true);
    this.length += 2;
  }

  public writeU32(value: number): void {
    this.reserve(4);
    this.view.setUint32(this.length, value, true);
    this.length += 4;
  }

  public writeI32(value: number): void {
    this.reserve(4);
    this.view.setInt32(this.length, value, true);
    this.length += 4;
  }

  public writeF32(value: number): void {
    this.reserve(4);
    this.view.setFloat32(this.length, value, true);
    this.length += 4;
  }

  public writeBytes(data: Uint8Array): void {
    this.reserve(data.byteLength);
    this.bytes.set(data, this.length);
    this.length += data.byteLength;
  }

  /** Writes `count` zero bytes. */
  public writeZeros(count: number): void {
    this.reserve(count);
    this.bytes.fill(0, this.length, this.length + count);
    this.length += count;
  }

  /**
   * Writes a UTF-8 string behind a u16 byte-length prefix.
   *
   * @throws FormatError (`StringTooLong`) if the encoded string exceeds
   *     65535 bytes.
   */
  public writeLengthPrefixedUtf8(value: string): void {
    const encoded = textEncoder.encode(value);
    if (encoded.byteLength > MAX_STRING_BYTES) {
      throw new FormatError(
        "StringTooLong",
        `string of ${encoded.byteLength} UTF-8 bytes exceeds the ${MAX_STRING_BYTES}-byte limit`,
      );
    }
    this.writeU16(encoded.byteLength);
    this.writeBytes(encoded);
  }

  public writeFloatArray(values: ArrayLike<number>): void {
    if (values instanceof Float32Array && HOST_IS_LITTLE_ENDIAN) {
      this.writeBytes(
        new Uint8Array(values.buffer, values.byteOffset, values.byteLength),
      );
      return;
    }
    this.reserve(values.length * 4);
    for (let i = 0; i < values.length; i++) {
      this.view.setFloat32(this.length, values[i], true);
      this.length += 4;
    }
  }

  public writeU16Array(values: Uint16Array): void {
    if (HOST_IS_LITTLE_ENDIAN) {
      this.writeBytes(
        new Uint8Array(values.buffer, values.byteOffset, values.byteLength),
      );
      return;
    }
    this.reserve(values.length * 2);
    for (let i = 0; i < values.length; i++) {
      this.view.setUint16(this.length, values[i], true);
      this.length += 2;
    }
  }

  public writeU32Array(values: Uint32Array): void {
    if (HOST_IS_LITTLE_ENDIAN) {
      this.writeBytes(
        new Uint8Array(values.buffer, values.byteOffset, values.byteLength),
      );
      return;
    }
    this.reserve(values.length * 4);
    for (let i = 0; i < values.length; i++) {
      this.view.setUint32(this.length, values[i], true);
      this.length += 4;
    }
  }

  /**
   * Returns a copy of the written bytes, trimmed to length.
   */
  public toBytes(): Uint8Array {
    return this.bytes.slice(0, this.length);
  }

  private reserve(extra: number): void {
    const required = this.length + extra;
    if (required <= this.bytes.byteLength) return;

    let capacity = this.bytes.byteLength * 2;
    while (capacity < required) capacity *= 2;

    const grown = new Uint8Array(capacity);
    grown.set(this.bytes.subarray(0, this.length));
    this.bytes = grown;
    this.view = new DataView(grown.buffer);
  }
}

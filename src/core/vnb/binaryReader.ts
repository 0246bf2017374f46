// src/core/vnb/binaryReader.ts
import { FormatError } from "./formatError";

const HOST_IS_LITTLE_ENDIAN =
  new Uint8Array(new Uint16Array([1]).buffer)[0] === 1;

const textDecoder = new TextDecoder("utf-8");

/**
 * Sequential little-endian reader over an in-memory byte source.
 *
 * @remarks
 * Every read checks the remaining length first and raises
 * `TruncatedInput` instead of reading past the end. Bulk readers take an
 * explicit element count and always return freshly allocated arrays, so the
 * source bytes are never aliased or mutated.
 */
export class BinaryReader {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private position = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  public get offset(): number {
    return this.position;
  }

  public get remaining(): number {
    return this.bytes.byteLength - this.position;
  }

  public readU8(): number {
    this.require(1, "u8");
    const value = this.view.getUint8(this.position);
    this.position += 1;
    return value;
  }

  public readU16(): number {
    this.require(2, "u16");
    const value = this.view.getUint16(this.position, true);
    this.position += 2;
    return value;
  }

  public readU32(): number {
    this.require(4, "u32");
    const value = this.view.getUint32(this.position, true);
    this.position += 4;
    return value;
  }

  public readI32(): number {
    this.require(4, "i32");
    const value = this.view.getInt32(this.position, true);
    this.position += 4;
    return value;
  }

  public readF32(): number {
    this.require(4, "f32");
    const value = this.view.getFloat32(this.position, true);
    this.position += 4;
    return value;
  }

  /** Returns a copy of the next `count` bytes. */
  public readBytes(count: number): Uint8Array {
    this.require(count, `${count}-byte block`);
    const value = this.bytes.slice(this.position, this.position + count);
    this.position += count;
    return value;
  }

  public skip(count: number): void {
    this.require(count, `${count} reserved bytes`);
    this.position += count;
  }

  public readLengthPrefixedUtf8(): string {
    const length = this.readU16();
    this.require(length, "string payload");
    const value = textDecoder.decode(
      this.bytes.subarray(this.position, this.position + length),
    );
    this.position += length;
    return value;
  }

  public readFloatArray(count: number): Float32Array {
    const byteLength = count * 4;
    this.require(byteLength, `${count} floats`);
    if (HOST_IS_LITTLE_ENDIAN) {
      const copy = this.bytes.slice(this.position, this.position + byteLength);
      this.position += byteLength;
      return new Float32Array(copy.buffer);
    }
    const values = new Float32Array(count);
    for (let i = 0; i < count; i++) {
      values[i] = this.view.getFloat32(this.position, true);
      this.position += 4;
    }
    return values;
  }

  public readU16Array(count: number): Uint16Array {
    const byteLength = count * 2;
    this.require(byteLength, `${count} u16 indices`);
    if (HOST_IS_LITTLE_ENDIAN) {
      const copy = this.bytes.slice(this.position, this.position + byteLength);
      this.position += byteLength;
      return new Uint16Array(copy.buffer);
    }
    const values = new Uint16Array(count);
    for (let i = 0; i < count; i++) {
      values[i] = this.view.getUint16(this.position, true);
      this.position += 2;
    }
    return values;
  }

  public readU32Array(count: number): Uint32Array {
    const byteLength = count * 4;
    this.require(byteLength, `${count} u32 indices`);
    if (HOST_IS_LITTLE_ENDIAN) {
      const copy = this.bytes.slice(this.position, this.position + byteLength);
      this.position += byteLength;
      return new Uint32Array(copy.buffer);
    }
    const values = new Uint32Array(count);
    for (let i = 0; i < count; i++) {
      values[i] = this.view.getUint32(this.position, true);
      this.position += 4;
    }
    return values;
  }

  private require(byteLength: number, what: string): void {
    if (byteLength > this.remaining) {
      throw new FormatError(
        "TruncatedInput",
        `expected ${what} at offset ${this.position}, only ${this.remaining} byte(s) left`,
      );
    }
  }
}

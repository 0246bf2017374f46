// src/core/vnb/vnbLayout.ts

/**
 * Byte layout of the VNB container.
 *
 * - Pure constants (magic, version, offsets, sizes, flag bits)
 * - All offsets expressed in BYTES, little-endian throughout
 * - No functions, no classes; import these constants in the codec modules
 *
 * Section order after the header:
 *   name → positions → normals → tangents → colors → uv0 → uv1 → bounds
 *   → indices → submeshes → materials
 *
 * Every optional section is gated by a bit of the global flags, the
 * material flags or the per-texture transform byte. Arrays carry no
 * terminator; their lengths come from the header counts.
 */

/* ==========================================================================================
 * Header
 * Layout (bytes):
 *   [0]   MAGIC (u32)            'VNB2'
 *   [4]   VERSION (u16)
 *   [6]   ENDIANNESS (u8)        0 = little
 *   [7]   COORD_SYS (u8)         0 = Y-up, reserved for axis negotiation
 *   [8]   UNIT_SCALE (f32)       1.0, reserved for units negotiation
 *   [12]  FLAGS (u32)            GlobalFlags
 *   [16]  VERTEX_COUNT (u32)
 *   [20]  INDEX_COUNT (u32)
 *   [24]  SUBMESH_COUNT (u32)
 *   [28]  MATERIAL_COUNT (u32)
 *   [32]  RESERVED (16 bytes)    zero-filled, ignored on read
 * ======================================================================================== */

/** Magic number of the current format ('VNB2'). */
export const VNB_MAGIC = 0x564e4232; // 'VNB2'
/** Current format version. */
export const VNB_VERSION = 2;

export const HEADER_MAGIC_OFFSET = 0;
export const HEADER_VERSION_OFFSET = 4;
export const HEADER_ENDIANNESS_OFFSET = 6;
export const HEADER_COORD_SYS_OFFSET = 7;
export const HEADER_UNIT_SCALE_OFFSET = 8;
export const HEADER_FLAGS_OFFSET = 12;
export const HEADER_VERTEX_COUNT_OFFSET = 16;
export const HEADER_INDEX_COUNT_OFFSET = 20;
export const HEADER_SUBMESH_COUNT_OFFSET = 24;
export const HEADER_MATERIAL_COUNT_OFFSET = 28;
export const HEADER_RESERVED_OFFSET = 32;

/** Reserved tail of the header (bytes). */
export const HEADER_RESERVED_BYTES = 16;
/** Total header size (bytes). */
export const HEADER_SIZE = HEADER_RESERVED_OFFSET + HEADER_RESERVED_BYTES;

/** Endianness tag written by the encoder. */
export const ENDIANNESS_LITTLE = 0;
/** Coordinate system tag written by the encoder (right-handed, Y-up). */
export const COORD_SYS_Y_UP = 0;
/** Unit scale written by the encoder (1 unit = 1 meter). */
export const UNIT_SCALE_METERS = 1.0;

/* ==========================================================================================
 * Vertex streams
 * ======================================================================================== */

export const POSITION_COMPONENTS = 3;
export const NORMAL_COMPONENTS = 3;
export const TANGENT_COMPONENTS = 4;
export const COLOR_COMPONENTS = 4;
export const UV_COMPONENTS = 2;
export const BOUNDS_COMPONENTS = 3;

/** Bytes per float component. */
export const FLOAT_BYTES = 4;

/* ==========================================================================================
 * Submesh record
 * Layout (bytes):
 *   [0]   TOPOLOGY (u8)
 *   [1]   MATERIAL_INDEX (u16)   0xFFFF = no material
 *   [3]   START_INDEX (u32)
 *   [7]   INDEX_COUNT (u32)
 *   [11]  BASE_VERTEX (i32)
 *   [15]  FIRST_VERTEX (u32)
 *   [19]  VERTEX_COUNT (u32)
 * ======================================================================================== */

export const SUBMESH_RECORD_SIZE = 23;
/** Wire sentinel for a submesh without material. */
export const NO_MATERIAL = 0xffff;

/* ==========================================================================================
 * Texture reference
 * Layout (bytes):
 *   [0]   SLOT (u8)
 *   [1]   UV_SET (u8)
 *   [2]   REF_KIND (u8)
 *   [3]   TRANSFORM_FLAGS (u8)   bit0 offset, bit1 scale, bit2 rotation
 *   ...   OFFSET (f32[2]) | SCALE (f32[2]) | ROTATION (f32), each when flagged
 *   ...   SAMPLER (u8[4])        when the material has the Sampler flag
 *   ...   External: URI (u16 length + utf8)
 *         Embedded: MIME (u8) + LENGTH (u32) + BYTES
 * ======================================================================================== */

export const TEXTURE_HAS_OFFSET = 1 << 0;
export const TEXTURE_HAS_SCALE = 1 << 1;
export const TEXTURE_HAS_ROTATION = 1 << 2;

/** Maximum number of textures per material (u8 count). */
export const MAX_TEXTURES_PER_MATERIAL = 0xff;
/** Maximum encoded byte length of a length-prefixed string (u16 prefix). */
export const MAX_STRING_BYTES = 0xffff;

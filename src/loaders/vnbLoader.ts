// src/loaders/vnbLoader.ts
import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { MaterialFactory } from "@/core/resources/materialFactory";
import { MeshFactory } from "@/core/resources/meshFactory";
import type { PBRMaterialSpec } from "@/core/types/material";
import type { MeshData } from "@/core/types/mesh";
import type { MeshContainer, TextureResolver } from "@/core/types/vnb";
import { createMaterialSpecKey } from "@/core/utils/material";
import { FormatError } from "@/core/vnb/formatError";
import { decode, type DecodeOptions } from "@/core/vnb/vnbCodec";

/**
 * A decoded container together with its engine-side mesh and material data.
 */
export interface VnbAsset {
  container: MeshContainer;
  /** One entry per submesh, in submesh order. */
  meshes: MeshData[];
  /** One spec per container material, in material order. */
  materials: PBRMaterialSpec[];
  /** Cache key of each mesh's material, or null for a submesh without one. */
  materialKeys: (string | null)[];
}

const URI_SCHEME = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Creates a resolver that reads external textures from disk.
 *
 * @remarks
 * Relative URIs are resolved against `baseDir`. URIs carrying a scheme
 * (`http:`, `data:` and the like) and missing files are left unresolved.
 *
 * @param baseDir Directory the model was loaded from.
 */
export const createFileTextureResolver = (baseDir: string): TextureResolver => {
  return (uri: string): Uint8Array | null => {
    if (uri.length === 0 || URI_SCHEME.test(uri)) {
      return null;
    }
    const path = resolve(baseDir, uri);
    try {
      return new Uint8Array(readFileSync(path));
    } catch (error) {
      if (
        error instanceof Error &&
        "code" in error &&
        (error.code === "ENOENT" || error.code === "EISDIR")
      ) {
        return null;
      }
      throw error;
    }
  };
};

/**
 * Converts a decoded container into engine mesh data and material specs.
 *
 * @throws FormatError (`InvariantViolation`) if a submesh references a
 *     material that does not exist, or its ranges fall outside the buffers.
 */
export const toVnbAsset = (container: MeshContainer): VnbAsset => {
  const materials = container.materials.map((material, i) =>
    MaterialFactory.toPBRMaterialSpec(material, `material_${i}`),
  );
  const keys = materials.map(createMaterialSpecKey);

  const materialKeys = container.subMeshes.map((subMesh, i) => {
    if (subMesh.materialIndex === null) return null;
    const key = keys.at(subMesh.materialIndex);
    if (key === undefined || subMesh.materialIndex < 0) {
      throw new FormatError(
        "InvariantViolation",
        `submesh ${i} references material ${subMesh.materialIndex} of ${materials.length}`,
      );
    }
    return key;
  });

  return {
    container,
    meshes: MeshFactory.fromContainer(container),
    materials,
    materialKeys,
  };
};

/**
 * Decodes a VNB byte stream into engine-ready data.
 *
 * @param bytes The encoded container.
 * @param options Decode options, including an optional texture resolver.
 */
export const importVnb = (
  bytes: Uint8Array,
  options: DecodeOptions = {},
): VnbAsset => {
  return toVnbAsset(decode(bytes, options));
};

/**
 * Reads and decodes a VNB file.
 *
 * @remarks
 * Unless `options.resolveTexture` is given, external textures are looked up
 * next to the file.
 *
 * @param path Path of the `.vnb` file.
 * @param options Decode options.
 * @returns A promise that resolves to the decoded asset.
 */
export const loadVnb = async (
  path: string,
  options: DecodeOptions = {},
): Promise<VnbAsset> => {
  const bytes = new Uint8Array(await readFile(path));
  return importVnb(bytes, {
    ...options,
    resolveTexture:
      options.resolveTexture ?? createFileTextureResolver(dirname(path)),
  });
};

// src/loaders/mesh/vnbMeshLoader.ts
import type {
  IMeshLoader,
  MeshLoadResult,
} from "@/core/resources/mesh/meshLoader";
import { MeshLoaderRegistry } from "@/core/resources/mesh/meshLoaderRegistry";
import type { DecodeOptions } from "@/core/vnb/vnbCodec";
import { loadVnb } from "@/loaders/vnbLoader";

/**
 * Loader for meshes in .vnb format.
 */
export class VnbMeshLoader implements IMeshLoader {
  constructor(private readonly options: DecodeOptions = {}) {}

  /**
   * Loads every submesh of a VNB file.
   *
   * @remarks
   * A container with a single submesh yields a single MeshData object,
   * otherwise one MeshData per submesh.
   *
   * @param path - Path of the VNB file.
   * @returns A promise that resolves to the mesh data, or null if the file
   *     holds no submeshes.
   */
  public async load(path: string): Promise<MeshLoadResult | null> {
    const asset = await loadVnb(path, this.options);
    if (asset.meshes.length === 0) return null;
    return asset.meshes.length === 1 ? asset.meshes[0] : asset.meshes;
  }
}

/**
 * Creates a registry with the VNB loader registered under the `VNB` prefix.
 */
export function createMeshLoaderRegistry(
  options: DecodeOptions = {},
): MeshLoaderRegistry {
  const registry = new MeshLoaderRegistry();
  registry.register("VNB", new VnbMeshLoader(options));
  return registry;
}

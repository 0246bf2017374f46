// src/core/resources/mesh/meshLoaderRegistry.ts
import type { IMeshLoader, MeshLoadResult } from "@/core/resources/mesh/meshLoader";

/**
 * A registry for mapping resource prefixes (ie "VNB") to their
 * corresponding mesh loaders.
 */
export class MeshLoaderRegistry {
  private loaders = new Map<string, IMeshLoader>();

  /**
   * Registers a loader for a given resource prefix.
   * @param prefix The resource prefix (case-insensitive).
   * @param loader The loader instance.
   */
  public register(prefix: string, loader: IMeshLoader): void {
    this.loaders.set(prefix.toUpperCase(), loader);
  }

  /**
   * Retrieves a loader for a given resource prefix.
   * @param prefix The resource prefix.
   * @returns The loader instance, or undefined if not found.
   */
  public getLoader(prefix: string): IMeshLoader | undefined {
    return this.loaders.get(prefix.toUpperCase());
  }

  /**
   * Loads mesh data for a resource key of the form `PREFIX:path`.
   *
   * @param key The resource key, ie "VNB:models/crate.vnb".
   * @returns The loader's result, or null if it failed to load.
   * @throws Error if no loader is registered for the prefix.
   */
  public async loadByKey(key: string): Promise<MeshLoadResult | null> {
    const [type, ...rest] = key.split(":");
    const path = rest.join(":");

    const loader = this.getLoader(type);
    if (!loader) {
      throw new Error(`Unsupported mesh handle type: ${type}`);
    }

    const loadResult = await loader.load(path);
    if (!loadResult) {
      console.error(`[MeshLoaderRegistry] Failed to load mesh data for key: ${key}`);
    }
    return loadResult;
  }
}

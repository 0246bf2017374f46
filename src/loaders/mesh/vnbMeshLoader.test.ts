// src/loaders/mesh/vnbMeshLoader.test.ts
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MeshLoaderRegistry } from "@/core/resources/mesh/meshLoaderRegistry";
import type { MeshContainer } from "@/core/types/vnb";
import { fullContainer, triangleContainer } from "@/core/vnb/testFixtures";
import { encode } from "@/core/vnb/vnbCodec";
import { VnbMeshLoader, createMeshLoaderRegistry } from "./vnbMeshLoader";

describe("VnbMeshLoader", () => {
  let dir: string;

  const writeModel = async (name: string, container: MeshContainer) => {
    const path = join(dir, name);
    await writeFile(path, encode(container));
    return path;
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "vnb-mesh-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("returns a single MeshData for a single submesh", async () => {
    const path = await writeModel("tri.vnb", triangleContainer());

    const result = await new VnbMeshLoader().load(path);

    expect(Array.isArray(result)).toBe(false);
    expect(result && !Array.isArray(result) && Array.from(result.indices)).toEqual(
      [0, 1, 2],
    );
  });

  it("returns one MeshData per submesh", async () => {
    const path = await writeModel("crate.vnb", fullContainer());

    const result = await new VnbMeshLoader().load(path);

    expect(Array.isArray(result) && result.length).toBe(2);
  });

  it("returns null for a container without submeshes", async () => {
    const path = await writeModel("empty.vnb", {
      ...triangleContainer(),
      subMeshes: [],
    });

    expect(await new VnbMeshLoader().load(path)).toBeNull();
  });

  it("is registered under the VNB prefix", async () => {
    const registry = createMeshLoaderRegistry();
    const path = await writeModel("tri.vnb", triangleContainer());

    expect(registry.getLoader("vnb")).toBeInstanceOf(VnbMeshLoader);
    const result = await registry.loadByKey(`VNB:${path}`);
    expect(result && !Array.isArray(result) && result.positions.length).toBe(9);
  });

  it("logs and returns null when a loader yields nothing", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const path = await writeModel("empty.vnb", {
      ...triangleContainer(),
      subMeshes: [],
    });

    const result = await createMeshLoaderRegistry().loadByKey(`VNB:${path}`);

    expect(result).toBeNull();
    expect(error).toHaveBeenCalledWith(
      `[MeshLoaderRegistry] Failed to load mesh data for key: VNB:${path}`,
    );
  });

  it("rejects keys with an unknown prefix", async () => {
    await expect(new MeshLoaderRegistry().loadByKey("OBJ:a.obj")).rejects.toThrow(
      "Unsupported mesh handle type: OBJ",
    );
  });
});

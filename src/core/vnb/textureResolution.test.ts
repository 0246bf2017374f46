// src/core/vnb/textureResolution.test.ts
import { afterEach, describe, expect, it, vi } from "vitest";
import { MimeKind, TextureRefKind } from "@/core/types/vnb";
import { fullContainer } from "./testFixtures";
import { resolveExternalTextures } from "./textureResolution";

describe("resolveExternalTextures", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns a new container and leaves the input untouched", () => {
    const container = fullContainer();
    const data = new Uint8Array([7, 7]);

    const result = resolveExternalTextures(container, () => data);

    expect(result.container).not.toBe(container);
    expect(result.container.materials[1].textures[0].source).toEqual({
      kind: TextureRefKind.Embedded,
      mime: MimeKind.PNG,
      data,
    });
    expect(container.materials[1].textures[0].source).toEqual({
      kind: TextureRefKind.External,
      uri: "textures/steel_albedo.png",
    });
  });

  it("shares materials that have no external references", () => {
    const container = fullContainer();
    const result = resolveExternalTextures(container, () => null);

    expect(result.container.materials[0]).toBe(container.materials[0]);
  });

  it("lists resolved and unresolved URIs", () => {
    const container = fullContainer();
    container.materials[0].textures.push({
      ...container.materials[1].textures[0],
      sampler: null,
      source: { kind: TextureRefKind.External, uri: "missing.png" },
    });

    const result = resolveExternalTextures(container, (uri) =>
      uri === "missing.png" ? undefined : new Uint8Array([1]),
    );

    expect(result.resolved).toEqual(["textures/steel_albedo.png"]);
    expect(result.unresolved).toEqual(["missing.png"]);
  });

  it("is silent under the passThrough policy", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    resolveExternalTextures(fullContainer(), () => null);

    expect(warn).not.toHaveBeenCalled();
  });

  it("warns once per unresolved URI under the warn policy", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const result = resolveExternalTextures(fullContainer(), () => null, "warn");

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      'VNB external texture "textures/steel_albedo.png" could not be resolved.',
    );
    expect(result.container.materials[1].textures[0].source.kind).toBe(
      TextureRefKind.External,
    );
  });

  it("throws under the reject policy", () => {
    expect(() =>
      resolveExternalTextures(fullContainer(), () => null, "reject"),
    ).toThrow(
      "UnresolvedTexture: no data for external texture(s): textures/steel_albedo.png",
    );
  });
});

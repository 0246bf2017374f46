// src/core/resources/materialFactory.test.ts
import { afterEach, describe, expect, it, vi } from "vitest";
import { MimeKind, TextureRefKind, TextureSlot } from "@/core/types/vnb";
import { createPbrMaterial } from "@/core/vnb/containerBuilder";
import { embeddedPngMaterial, fullMaterial } from "@/core/vnb/testFixtures";
import { MaterialFactory, toPBRMaterialSpec } from "./materialFactory";

describe("MaterialFactory", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("maps factors, alpha, sides, UV sets, transforms and samplers", () => {
    const spec = MaterialFactory.toPBRMaterialSpec(fullMaterial());

    expect(spec).toEqual({
      type: "PBR",
      name: "brushed steel",
      options: {
        albedo: [0.5, 0.5, 0.5, 1],
        metallic: 1,
        roughness: 0.25,
        emissive: [0, 0, 0.5],
        alphaMode: "mask",
        alphaCutoff: 0.5,
        doubleSided: true,
        albedoMap: "textures/steel_albedo.png",
        normalMap: "data:image/ktx2;base64,q0tUWA==",
        normalUV: 1,
        textureTransforms: {
          albedoMap: { offset: [0.5, 0.25], scale: [2, 2] },
          normalMap: { offset: [0, 0], scale: [4, 1] },
        },
        samplers: {
          albedoMap: {
            addressModeU: "repeat",
            addressModeV: "mirror-repeat",
            minFilter: "linear",
            magFilter: "linear",
            mipmapFilter: "linear",
          },
          normalMap: {
            addressModeU: "clamp-to-edge",
            addressModeV: "clamp-to-edge",
            minFilter: "nearest",
            magFilter: "nearest",
            mipmapFilter: "nearest",
          },
        },
      },
    });
  });

  it("turns embedded PNG payloads into data URLs", () => {
    const spec = toPBRMaterialSpec(embeddedPngMaterial());

    expect(spec.options.albedoMap).toBe("data:image/png;base64,iVBORw==");
    expect(spec.options.albedoUV).toBeUndefined();
    expect(spec.options.textureTransforms).toBeUndefined();
    expect(spec.options.samplers).toBeUndefined();
  });

  it("leaves absent fields to the engine defaults", () => {
    const spec = toPBRMaterialSpec(createPbrMaterial({}), "material_3");

    expect(spec).toEqual({ type: "PBR", name: "material_3", options: {} });
  });

  it("keeps the first texture of a repeated slot", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const material = createPbrMaterial({
      name: "twice",
      textures: [
        {
          slot: TextureSlot.Occlusion,
          source: { kind: TextureRefKind.External, uri: "ao_a.png" },
        },
        {
          slot: TextureSlot.Occlusion,
          source: {
            kind: TextureRefKind.Embedded,
            mime: MimeKind.JPG,
            data: new Uint8Array([1]),
          },
        },
      ],
    });

    const spec = toPBRMaterialSpec(material);

    expect(spec.options.occlusionMap).toBe("ao_a.png");
    expect(warn).toHaveBeenCalledWith(
      '[MaterialFactory] Material "twice" has more than one texture for occlusionMap; keeping the first.',
    );
  });
});

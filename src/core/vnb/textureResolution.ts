// src/core/vnb/textureResolution.ts
import {
  MimeKind,
  TextureRefKind,
  type MeshContainer,
  type PbrMaterial,
  type TextureRef,
  type TextureResolver,
} from "@/core/types/vnb";
import { FormatError } from "./formatError";

/**
 * What to do with an external reference the resolver cannot supply.
 *
 * - `passThrough`: keep it external, silently.
 * - `warn`: keep it external and log a warning.
 * - `reject`: fail with `UnresolvedTexture`.
 */
export type UnresolvedTexturePolicy = "passThrough" | "warn" | "reject";

export interface TextureResolution {
  container: MeshContainer;
  /** URIs rewritten to embedded payloads, in encounter order. */
  resolved: string[];
  /** URIs left external, in encounter order. */
  unresolved: string[];
}

/**
 * Produces a copy of the container with external textures embedded.
 *
 * @remarks
 * Every external reference is passed to the resolver. When it returns bytes
 * the reference becomes an embedded PNG payload holding those bytes; the
 * input container is left untouched. Materials without external references
 * are shared with the input rather than copied.
 *
 * @param container - A decoded container.
 * @param resolver - Synchronous URI → bytes lookup.
 * @param policy - Handling of URIs the resolver leaves unresolved.
 * @returns The new container and the lists of resolved and unresolved URIs.
 * @throws FormatError (`UnresolvedTexture`) under the `reject` policy.
 */
export function resolveExternalTextures(
  container: MeshContainer,
  resolver: TextureResolver,
  policy: UnresolvedTexturePolicy = "passThrough",
): TextureResolution {
  const resolved: string[] = [];
  const unresolved: string[] = [];

  const resolveTexture = (texture: TextureRef): TextureRef => {
    if (texture.source.kind !== TextureRefKind.External) return texture;

    const uri = texture.source.uri;
    const data = resolver(uri);
    if (data === null || data === undefined) {
      unresolved.push(uri);
      return texture;
    }

    resolved.push(uri);
    return {
      ...texture,
      source: { kind: TextureRefKind.Embedded, mime: MimeKind.PNG, data },
    };
  };

  const materials = container.materials.map((material): PbrMaterial => {
    if (
      !material.textures.some((t) => t.source.kind === TextureRefKind.External)
    ) {
      return material;
    }
    return { ...material, textures: material.textures.map(resolveTexture) };
  });

  if (unresolved.length > 0) {
    if (policy === "reject") {
      throw new FormatError(
        "UnresolvedTexture",
        `no data for external texture(s): ${unresolved.join(", ")}`,
      );
    }
    if (policy === "warn") {
      for (const uri of unresolved) {
        console.warn(`VNB external texture "${uri}" could not be resolved.`);
      }
    }
  }

  return { container: { ...container, materials }, resolved, unresolved };
}

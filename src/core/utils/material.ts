// src/core/utils/material.ts
import type { PBRMaterialSpec } from "@/core/types/material";

/**
 * Serializes a value with object keys sorted, so that key order does not
 * affect the output.
 */
function canonicalize(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map(canonicalize).join(",");
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${k}=${canonicalize(v)}`).join(";")}}`;
  }
  return String(value);
}

/**
 * Creates a stable, canonical string key from a PBR material specification.
 *
 * @remarks
 * This function is used to generate a unique key for caching material instances.
 * It sorts option keys (including those of nested transform and sampler
 * records) so that two identical specs produce the same key, regardless of
 * property order. The material name is not part of the key.
 *
 * @param spec - The PBR material specification.
 * @returns A unique string key for caching.
 */
export function createMaterialSpecKey(spec: PBRMaterialSpec): string {
  const { options } = spec;
  const parts: string[] = ["PBR"];

  // Sort keys to ensure canonical representation
  const sortedKeys = Object.keys(options).sort();

  for (const key of sortedKeys) {
    const value: unknown = Reflect.get(options, key);
    if (value !== undefined) {
      parts.push(`${key}:${canonicalize(value)}`);
    }
  }

  return parts.join("|");
}

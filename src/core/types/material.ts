// src/core/types/material.ts
import type { PBRMaterialOptions } from "@/core/types/gpu";

/**
 * Defines the declarative specification for a PBR material.
 *
 * @remarks
 * This interface is used for creating materials from asset files or code,
 * providing a high-level description that a renderer resolves into a
 * concrete material instance.
 */
export interface PBRMaterialSpec {
  type: "PBR";
  name: string;
  options: PBRMaterialOptions;
}

/**
 * Shader intermediate representation.
 *
 * `ShaderSources` is what the generated module exposes to a renderer: source
 * text for each GL dialect, optional D3D bytecode, and the reflection data
 * needed to bind vertex inputs, uniforms and textures.
 */

import type { DataType } from "./data-type.ts";

export interface InputLocation {
  readonly name: string;
  readonly location: number;
  readonly semantic: string;
  readonly semanticIndex: number;
  readonly type: DataType;
  /** Component count. */
  readonly size: number;
}

export interface UniformBlock {
  readonly name: string;
  readonly binding: number;
}

export interface UniformLocation {
  /** `_<blockId>.<member>`, the name glslcc gives flattened members. */
  readonly name: string;
  readonly type: DataType;
  readonly size: number;
  /** Byte offset into the single buffer spanning every block. */
  readonly offset: number;
}

export interface UniformsReflection {
  readonly blocks: readonly UniformBlock[];
  readonly locations: readonly UniformLocation[];
  /** Total byte size of all blocks. */
  readonly size: number;
}

export interface TextureBinding {
  readonly name: string;
  readonly binding: number;
}

/** Reflection data shared by every backend of one variant. */
export interface ShaderReflection {
  /** Sorted ascending by location. */
  readonly inputs: readonly InputLocation[];
  readonly uniforms: UniformsReflection;
  readonly textures: readonly TextureBinding[];
}

export interface ShaderSources extends ShaderReflection {
  readonly glsl100es: string;
  readonly glsl300es: string;
  /** Shader model 4.0 bytecode. Absent when fxc was not available. */
  readonly hlsl?: Uint8Array;
}

/** A converted variant, plus the HLSL text emitted as a debugging aid. */
export interface ConvertedShader extends ShaderSources {
  readonly hlslText: string;
}

interface ShaderEntryBase {
  /** Identifier of the exported constant, e.g. `shader_blit_frag`. */
  readonly name: string;
  readonly path: string;
}

/** Every variant produced the same GLSL ES 1.00 output. */
export interface SingleShaderEntry extends ShaderEntryBase {
  readonly kind: "single";
  readonly sources: ConvertedShader;
}

/** One record per variant, in declared variant order. */
export interface VariantShaderEntry extends ShaderEntryBase {
  readonly kind: "variants";
  readonly variants: readonly ConvertedShader[];
}

export type ShaderEntry = SingleShaderEntry | VariantShaderEntry;

// ── Backend targets ──────────────────────────────────────────────

export type ShaderLanguage = "gles" | "hlsl";

export interface BackendTarget {
  readonly language: ShaderLanguage;
  readonly profile: string;
}

export const BackendTarget = {
  GLSL100ES: { language: "gles", profile: "100" },
  GLSL300ES: { language: "gles", profile: "300" },
  HLSL40: { language: "hlsl", profile: "40" },
} as const satisfies Readonly<Record<string, BackendTarget>>;

export function formatBackendTarget(target: BackendTarget): string {
  return `${target.language} ${target.profile}`;
}

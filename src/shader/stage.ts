import { extname } from "node:path";
import { UnrecognizedShaderStageError } from "../errors.ts";

// ── Shader Stage ─────────────────────────────────────────────────

export const ShaderStage = {
  Vertex: "vertex",
  Fragment: "fragment",
} as const;

export type ShaderStage = (typeof ShaderStage)[keyof typeof ShaderStage];

interface StageInfo {
  /** File extension that selects the stage. */
  readonly extension: string;
  /** glslcc flag that precedes the input file. */
  readonly compilerFlag: string;
  /** Suffix glslcc appends to the output base name. */
  readonly outputSuffix: string;
  /** Prefix of the fxc target profile. */
  readonly hlslProfilePrefix: string;
}

export const SHADER_STAGE_INFO: Readonly<Record<ShaderStage, StageInfo>> = {
  [ShaderStage.Vertex]: {
    extension: ".vert",
    compilerFlag: "--vert",
    outputSuffix: "vs",
    hlslProfilePrefix: "vs",
  },
  [ShaderStage.Fragment]: {
    extension: ".frag",
    compilerFlag: "--frag",
    outputSuffix: "fs",
    hlslProfilePrefix: "ps",
  },
};

export function shaderStageFromPath(path: string): ShaderStage {
  const ext = extname(path);
  if (ext === SHADER_STAGE_INFO[ShaderStage.Vertex].extension) return ShaderStage.Vertex;
  if (ext === SHADER_STAGE_INFO[ShaderStage.Fragment].extension) return ShaderStage.Fragment;
  throw new UnrecognizedShaderStageError(path);
}

/** fxc target profile for shader model 4.0, e.g. "ps_4_0". */
export function hlslProfileForStage(stage: ShaderStage): string {
  return `${SHADER_STAGE_INFO[stage].hlslProfilePrefix}_4_0`;
}

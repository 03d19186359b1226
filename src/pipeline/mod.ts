/**
 * Shader conversion orchestrator.
 *
 * Pipeline per shader and variant:
 *   template → glslcc (gles 100, reflection) → glslcc (gles 300)
 *   → glslcc (hlsl 40) → fxc (optional)
 *
 * Variants whose GLSL ES 1.00 output is identical collapse to one record.
 */

import { rm } from "node:fs/promises";
import { basename } from "node:path";
import { ShaderBuildError, ShaderNameClashError, type ShaderBuildContext } from "../errors.ts";
import { compileHlslBytecode } from "../fxc/cli.ts";
import { parseReflection } from "../reflection/mod.ts";
import { hlslProfileForStage, shaderStageFromPath, type ShaderStage } from "../shader/stage.ts";
import {
  BackendTarget,
  formatBackendTarget,
  type ConvertedShader,
  type ShaderEntry,
} from "../shader/types.ts";
import { expandVariant } from "../template/mod.ts";
import type { ShaderVariant } from "../template/variants.ts";
import { shaderIdentifier } from "../emitter/mod.ts";
import type { BuildContext } from "./context.ts";

export { BuildContext, withBuildContext, type BuildContextOptions, type Logger } from "./context.ts";
export { discoverShaders } from "./discovery.ts";

/** Makes GL ES 2 sources acceptable to desktop GL 3 drivers. */
const GLSL100_VERSION_DIRECTIVE = "#version 100\n";

const HLSL_ENTRY_POINT = "main";

/**
 * Run `fn`, wrapping anything it throws with the pipeline position.
 */
async function step<T>(context: ShaderBuildContext, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof ShaderBuildError) throw err;
    throw new ShaderBuildError(context, err);
  }
}

// ── Variant ──────────────────────────────────────────────────────

/**
 * Convert one variant of a shader to every backend.
 * Reflection is read once, from the GLSL ES 1.00 conversion.
 */
export async function convertVariant(
  shaderPath: string,
  stage: ShaderStage,
  variant: ShaderVariant,
  ctx: BuildContext,
): Promise<ConvertedShader> {
  const where = { shader: shaderPath, variant: variant.name };

  const inputPath = await step(where, () => expandVariant(shaderPath, variant, ctx.tempDir));

  try {
    const convert = (target: BackendTarget) =>
      step({ ...where, target: formatBackendTarget(target) }, () =>
        ctx.converter.convert({
          inputPath,
          sourcePath: shaderPath,
          stage,
          target,
          workDir: ctx.tempDir,
          flattenUbos: ctx.flattenUbos,
        }),
      );

    const glsl100 = await convert(BackendTarget.GLSL100ES);
    const reflection = await step(
      { ...where, target: formatBackendTarget(BackendTarget.GLSL100ES) },
      async () => parseReflection(glsl100.reflection),
    );

    const glsl300 = await convert(BackendTarget.GLSL300ES);
    const hlsl = await convert(BackendTarget.HLSL40);

    const compiler = ctx.bytecodeCompiler;
    const bytecode = compiler
      ? await step({ ...where, target: "fxc" }, () =>
          compileHlslBytecode(compiler, hlsl.source, {
            entryPoint: HLSL_ENTRY_POINT,
            targetProfile: hlslProfileForStage(stage),
            workDir: ctx.tempDir,
          }),
        )
      : undefined;

    return {
      ...reflection,
      glsl100es: GLSL100_VERSION_DIRECTIVE + glsl100.source,
      glsl300es: glsl300.source,
      ...(bytecode ? { hlsl: bytecode } : {}),
      hlslText: hlsl.source,
    };
  } finally {
    await rm(inputPath, { force: true });
  }
}

// ── Shader file ──────────────────────────────────────────────────

/**
 * Convert every variant of one shader file, collapsing them to a single
 * record when the variants made no difference to the GLSL ES 1.00 output.
 */
export async function convertShaderFile(
  shaderPath: string,
  ctx: BuildContext,
): Promise<ShaderEntry> {
  const stage = await step({ shader: shaderPath }, async () => shaderStageFromPath(shaderPath));

  const variants: ConvertedShader[] = [];
  for (const variant of ctx.variants) {
    variants.push(await convertVariant(shaderPath, stage, variant, ctx));
  }

  const [first] = variants;
  if (!first) {
    throw new ShaderBuildError({ shader: shaderPath }, new Error("no shader variants configured"));
  }

  const name = shaderIdentifier(shaderPath);
  const multiVariant = variants.some((v) => v.glsl100es !== first.glsl100es);

  if (!multiVariant) {
    return { kind: "single", name, path: shaderPath, sources: first };
  }
  return { kind: "variants", name, path: shaderPath, variants };
}

/** Each shader becomes one export; two files may not share an identifier. */
function assertUniqueIdentifiers(shaderPaths: readonly string[]): void {
  const seen = new Map<string, string>();
  for (const shaderPath of shaderPaths) {
    const name = shaderIdentifier(shaderPath);
    const previous = seen.get(name);
    if (previous !== undefined) {
      throw new ShaderNameClashError(name, previous, shaderPath);
    }
    seen.set(name, shaderPath);
  }
}

/** Convert shaders one at a time, in the order given. */
export async function convertShaders(
  shaderPaths: readonly string[],
  ctx: BuildContext,
): Promise<readonly ShaderEntry[]> {
  assertUniqueIdentifiers(shaderPaths);

  const entries: ShaderEntry[] = [];

  for (const shaderPath of shaderPaths) {
    const entry = await convertShaderFile(shaderPath, ctx);
    entries.push(entry);

    const count = entry.kind === "single" ? 1 : entry.variants.length;
    ctx.logger.log(`  ${basename(shaderPath)}: ${count} variant${count === 1 ? "" : "s"}`);
  }

  return entries;
}

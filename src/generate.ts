/**
 * End-to-end run: discover shaders, convert them all, then write the module.
 *
 * The output file is only written once every shader has converted; any
 * failure leaves it untouched.
 */

import { resolve } from "node:path";
import { outputPathFor, type ConvertConfig } from "./config.ts";
import { emitShaderModule, writeShaderModule } from "./emitter/mod.ts";
import { FxcCompilerCli } from "./fxc/cli.ts";
import type { HlslCompiler } from "./fxc/types.ts";
import { GlslccCompilerCli } from "./glslcc/cli.ts";
import type { ShaderConverter } from "./glslcc/types.ts";
import { withBuildContext, type Logger } from "./pipeline/context.ts";
import { discoverShaders } from "./pipeline/discovery.ts";
import { convertShaders } from "./pipeline/mod.ts";
import type { ShaderEntry } from "./shader/types.ts";
import type { ShaderVariant } from "./template/variants.ts";

/** Replaceable collaborators; the real tools are located when omitted. */
export interface GenerateDependencies {
  readonly converter?: ShaderConverter;
  /** null forces bytecode off. */
  readonly bytecodeCompiler?: HlslCompiler | null;
  readonly variants?: readonly ShaderVariant[];
  readonly logger?: Logger;
  readonly cwd?: string;
}

export interface GenerateResult {
  readonly outputPath: string;
  readonly entries: readonly ShaderEntry[];
  readonly bytecode: boolean;
}

export async function generateShaderModule(
  config: ConvertConfig,
  deps: GenerateDependencies = {},
): Promise<GenerateResult> {
  const logger = deps.logger ?? console;
  const cwd = deps.cwd ?? process.cwd();
  const outputPath = outputPathFor(config, cwd);

  const shaderPaths = await discoverShaders(resolve(cwd, config.shadersDir));
  logger.log(`Shaders: ${shaderPaths.length} in ${config.shadersDir}`);

  const converter = deps.converter ?? (await GlslccCompilerCli.create(config.glslccPath));
  const bytecodeCompiler =
    deps.bytecodeCompiler !== undefined
      ? deps.bytecodeCompiler
      : await FxcCompilerCli.find(config.fxcPath);

  if (!bytecodeCompiler) {
    logger.warn("fxc not found: HLSL bytecode will be omitted");
  }

  const entries = await withBuildContext(
    {
      converter,
      bytecodeCompiler,
      variants: deps.variants,
      flattenUbos: config.flattenUbos,
      logger,
    },
    (ctx) => convertShaders(shaderPaths, ctx),
  );

  const source = emitShaderModule(entries, {
    moduleName: config.moduleName,
    typesModule: config.typesModule,
  });
  await writeShaderModule(outputPath, source);

  return { outputPath, entries, bytecode: bytecodeCompiler !== null };
}

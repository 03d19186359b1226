/**
 * glslcc cross-compiler wrapper.
 *
 * Each call writes `<workDir>/shader_<vs|fs>` and a `.json` reflection
 * sidecar, reads both back and deletes them.
 */

import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { ToolNotFoundError } from "../errors.ts";
import { resolveExecutable, runProcess } from "../process/mod.ts";
import { SHADER_STAGE_INFO } from "../shader/stage.ts";
import { ConversionError } from "./errors.ts";
import type { ConvertOptions, ConvertResult, ShaderConverter } from "./types.ts";

export type { ConvertOptions, ConvertResult, ShaderConverter };

const OUTPUT_BASENAME = "shader";

// ── Build CLI arguments ───────────────────────────────────────────

export function buildGlslccArgs(options: ConvertOptions): readonly string[] {
  const args = [
    "--silent",
    "--optimize",
    "--reflect",
    "--output", join(options.workDir, OUTPUT_BASENAME),
    "--lang", options.target.language,
    "--profile", options.target.profile,
    SHADER_STAGE_INFO[options.stage].compilerFlag, options.inputPath,
  ];

  if (options.flattenUbos) {
    args.push("--flatten-ubos");
  }

  return args;
}

/** Where glslcc writes the converted source for `options`. */
export function glslccOutputPath(options: ConvertOptions): string {
  return join(
    options.workDir,
    `${OUTPUT_BASENAME}_${SHADER_STAGE_INFO[options.stage].outputSuffix}`,
  );
}

async function readOutput(path: string, shaderPath: string, diagnostics: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch {
    throw new ConversionError(
      shaderPath,
      diagnostics || `glslcc did not produce ${path}`,
    );
  }
}

// ── GlslccCompilerCli ─────────────────────────────────────────────

export class GlslccCompilerCli implements ShaderConverter {
  readonly path: string;

  private constructor(path: string) {
    this.path = path;
  }

  /** Locate glslcc. Throws ToolNotFoundError when it is not installed. */
  static async create(glslccPath?: string): Promise<GlslccCompilerCli> {
    const resolved = await resolveExecutable("glslcc", {
      explicitPath: glslccPath,
      envVar: "GLSLCC_PATH",
    });
    if (!resolved) throw new ToolNotFoundError("glslcc", "GLSLCC_PATH");
    return new GlslccCompilerCli(resolved);
  }

  async convert(options: ConvertOptions): Promise<ConvertResult> {
    const shaderPath = options.sourcePath ?? options.inputPath;
    const result = await runProcess(this.path, buildGlslccArgs(options));
    const diagnostics = [result.stdout, result.stderr]
      .filter((text) => text.length > 0)
      .join("\n");

    if (result.exitCode !== 0) {
      throw new ConversionError(
        shaderPath,
        diagnostics || `glslcc exited with code ${result.exitCode}`,
      );
    }

    const outputPath = glslccOutputPath(options);
    const reflectionPath = `${outputPath}.json`;

    try {
      const source = await readOutput(outputPath, shaderPath, diagnostics);
      const reflection = await readOutput(reflectionPath, shaderPath, diagnostics);
      return { source, reflection };
    } finally {
      await Promise.all([rm(outputPath, { force: true }), rm(reflectionPath, { force: true })]);
    }
  }
}

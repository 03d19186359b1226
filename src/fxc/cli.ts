/**
 * CLI-based fxc compiler.
 *
 * Invokes the `fxc` command-line tool via subprocess, using scratch files
 * for source input and bytecode output.
 */

import { readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { resolveExecutable, runProcess } from "../process/mod.ts";
import { BytecodeCompileError } from "./errors.ts";
import type { FxcCompileOptions, FxcCompileResult, HlslCompiler } from "./types.ts";

export type { FxcCompileOptions, FxcCompileResult, HlslCompiler };

// ── Build CLI arguments ───────────────────────────────────────────

export function buildFxcArgs(
  options: Pick<FxcCompileOptions, "entryPoint" | "targetProfile">,
  inputPath: string,
  outputPath: string,
): readonly string[] {
  return [
    "/T", options.targetProfile,
    "/E", options.entryPoint,
    "/nologo",
    "/Fo", outputPath,
    inputPath,
  ];
}

// ── FxcCompilerCli ────────────────────────────────────────────────

export class FxcCompilerCli implements HlslCompiler {
  readonly path: string;

  private constructor(path: string) {
    this.path = path;
  }

  /**
   * Locate fxc. Returns null when it is not installed, in which case
   * bytecode is left out of the generated module.
   */
  static async find(fxcPath?: string): Promise<FxcCompilerCli | null> {
    const resolved = await resolveExecutable("fxc", {
      explicitPath: fxcPath,
      envVar: "FXC_PATH",
    });
    return resolved ? new FxcCompilerCli(resolved) : null;
  }

  async compile(options: FxcCompileOptions): Promise<FxcCompileResult> {
    const inputPath = join(options.workDir, "shader.hlsl");
    const outputPath = join(options.workDir, "shader.bin");

    try {
      await writeFile(inputPath, options.source);

      const result = await runProcess(this.path, buildFxcArgs(options, inputPath, outputPath));
      const stderr = result.stderr;

      if (result.exitCode !== 0) {
        return {
          success: false,
          objectBytes: new Uint8Array(0),
          errors: stderr || result.stdout || `fxc exited with code ${result.exitCode}`,
        };
      }

      let objectBytes: Uint8Array;
      try {
        objectBytes = new Uint8Array(await readFile(outputPath));
      } catch {
        return {
          success: false,
          objectBytes: new Uint8Array(0),
          errors: stderr || "fxc did not produce output file",
        };
      }

      return {
        success: true,
        objectBytes,
        errors: stderr, // May contain warnings
      };
    } finally {
      await Promise.all([rm(inputPath, { force: true }), rm(outputPath, { force: true })]);
    }
  }
}

// ── Convenience function ──────────────────────────────────────────

const TEXT_ENCODER = new TextEncoder();

/**
 * Compile HLSL text to bytecode. Throws BytecodeCompileError on failure.
 */
export async function compileHlslBytecode(
  compiler: HlslCompiler,
  hlsl: string,
  options: Omit<FxcCompileOptions, "source">,
): Promise<Uint8Array> {
  const result = await compiler.compile({ ...options, source: TEXT_ENCODER.encode(hlsl) });
  if (!result.success) {
    throw new BytecodeCompileError(result.errors);
  }
  return result.objectBytes;
}

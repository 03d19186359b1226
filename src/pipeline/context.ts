/**
 * Per-run state handed to every pipeline step.
 *
 * The context owns one temp directory for all scratch files. It is removed
 * by `dispose()`, or synchronously on process exit if the run is cut short.
 */

import { rmSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { HlslCompiler } from "../fxc/types.ts";
import type { ShaderConverter } from "../glslcc/types.ts";
import { SHADER_VARIANTS, type ShaderVariant } from "../template/variants.ts";

export type Logger = Pick<Console, "log" | "warn">;

export interface BuildContextOptions {
  readonly converter: ShaderConverter;
  /** null when fxc is unavailable; bytecode is then omitted. */
  readonly bytecodeCompiler: HlslCompiler | null;
  readonly variants?: readonly ShaderVariant[];
  readonly flattenUbos?: boolean;
  readonly logger?: Logger;
}

export class BuildContext {
  readonly tempDir: string;
  readonly converter: ShaderConverter;
  readonly bytecodeCompiler: HlslCompiler | null;
  readonly variants: readonly ShaderVariant[];
  readonly flattenUbos: boolean;
  readonly logger: Logger;

  private _disposed = false;
  private readonly _onExit = (): void => {
    rmSync(this.tempDir, { recursive: true, force: true });
  };

  private constructor(tempDir: string, options: BuildContextOptions) {
    this.tempDir = tempDir;
    this.converter = options.converter;
    this.bytecodeCompiler = options.bytecodeCompiler;
    this.variants = options.variants ?? SHADER_VARIANTS;
    this.flattenUbos = options.flattenUbos ?? false;
    this.logger = options.logger ?? console;
    process.once("exit", this._onExit);
  }

  static async create(options: BuildContextOptions): Promise<BuildContext> {
    const tempDir = await mkdtemp(join(tmpdir(), "shader-convert-"));
    return new BuildContext(tempDir, options);
  }

  get disposed(): boolean {
    return this._disposed;
  }

  async dispose(): Promise<void> {
    if (this._disposed) return;
    this._disposed = true;
    process.off("exit", this._onExit);
    await rm(this.tempDir, { recursive: true, force: true });
  }
}

/** Run `fn` with a fresh context that is disposed on every exit path. */
export async function withBuildContext<T>(
  options: BuildContextOptions,
  fn: (ctx: BuildContext) => Promise<T>,
): Promise<T> {
  const ctx = await BuildContext.create(options);
  try {
    return await fn(ctx);
  } finally {
    await ctx.dispose();
  }
}

import type { ShaderStage } from "../shader/stage.ts";
import type { BackendTarget } from "../shader/types.ts";

/** Options for one cross-compiler invocation. */
export interface ConvertOptions {
  /** Expanded shader source to convert. */
  readonly inputPath: string;
  /** Shader the input was expanded from, named in errors. Defaults to `inputPath`. */
  readonly sourcePath?: string;
  readonly stage: ShaderStage;
  readonly target: BackendTarget;
  /** Scratch directory for the compiler's output files. */
  readonly workDir: string;
  /** Ask glslcc to flatten uniform blocks into arrays. */
  readonly flattenUbos?: boolean;
}

/** Output of one cross-compiler invocation. */
export interface ConvertResult {
  /** Backend source text. */
  readonly source: string;
  /** Raw reflection JSON written beside the source. */
  readonly reflection: string;
}

/**
 * Converts one shader stage to one backend. Implemented by the glslcc CLI
 * wrapper and by test doubles.
 */
export interface ShaderConverter {
  convert(options: ConvertOptions): Promise<ConvertResult>;
}

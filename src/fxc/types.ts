/** Options for compiling HLSL source via fxc. */
export interface FxcCompileOptions {
  /** HLSL source code as UTF-8 bytes. */
  readonly source: Uint8Array;
  /** Entry point function name (e.g., "main"). */
  readonly entryPoint: string;
  /** Target profile (e.g., "ps_4_0", "vs_4_0"). */
  readonly targetProfile: string;
  /** Scratch directory for the source and object files. */
  readonly workDir: string;
}

/** Result of an fxc compilation. */
export interface FxcCompileResult {
  /** True if fxc exited cleanly and wrote an object file. */
  readonly success: boolean;
  /** Compiled bytecode. Empty on failure. */
  readonly objectBytes: Uint8Array;
  /** Compiler error/warning messages. Empty string on clean success. */
  readonly errors: string;
}

/** Compiles HLSL to bytecode. Implemented by FxcCompilerCli and test doubles. */
export interface HlslCompiler {
  compile(options: FxcCompileOptions): Promise<FxcCompileResult>;
}

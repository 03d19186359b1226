export { FxcCompilerCli, buildFxcArgs, compileHlslBytecode } from "./cli.ts";
export type { FxcCompileOptions, FxcCompileResult, HlslCompiler } from "./types.ts";
export { BytecodeCompileError } from "./errors.ts";

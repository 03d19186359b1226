export {
  GlslccCompilerCli,
  buildGlslccArgs,
  glslccOutputPath,
} from "./cli.ts";
export type { ConvertOptions, ConvertResult, ShaderConverter } from "./types.ts";
export { ConversionError } from "./errors.ts";

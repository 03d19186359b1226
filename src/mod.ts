// ── Intermediate representation ─────────────────────────────────
export type {
  InputLocation,
  UniformBlock,
  UniformLocation,
  UniformsReflection,
  TextureBinding,
  ShaderReflection,
  ShaderSources,
  ConvertedShader,
  ShaderEntry,
  SingleShaderEntry,
  VariantShaderEntry,
  ShaderLanguage,
} from "./shader/types.ts";
export { BackendTarget, formatBackendTarget } from "./shader/types.ts";
export { DataType, parseDataType, type DataTypeInfo } from "./shader/data-type.ts";
export {
  ShaderStage,
  SHADER_STAGE_INFO,
  shaderStageFromPath,
  hlslProfileForStage,
} from "./shader/stage.ts";

// ── Reflection ──────────────────────────────────────────────────
export {
  parseReflection,
  decodeReflectionDocument,
  type RawReflectionDocument,
} from "./reflection/mod.ts";

// ── Templates ───────────────────────────────────────────────────
export {
  expandTemplate,
  expandVariant,
  SHADER_VARIANTS,
  type ShaderVariant,
} from "./template/mod.ts";

// ── External compilers ──────────────────────────────────────────
export {
  GlslccCompilerCli,
  buildGlslccArgs,
  glslccOutputPath,
  ConversionError,
  type ConvertOptions,
  type ConvertResult,
  type ShaderConverter,
} from "./glslcc/mod.ts";
export {
  FxcCompilerCli,
  buildFxcArgs,
  compileHlslBytecode,
  BytecodeCompileError,
  type FxcCompileOptions,
  type FxcCompileResult,
  type HlslCompiler,
} from "./fxc/mod.ts";
export { runProcess, resolveExecutable, type ProcessResult } from "./process/mod.ts";

// ── Pipeline ────────────────────────────────────────────────────
export {
  BuildContext,
  withBuildContext,
  discoverShaders,
  convertShaders,
  convertShaderFile,
  convertVariant,
  type BuildContextOptions,
  type Logger,
} from "./pipeline/mod.ts";
export {
  generateShaderModule,
  type GenerateDependencies,
  type GenerateResult,
} from "./generate.ts";
export {
  emitShaderModule,
  writeShaderModule,
  shaderIdentifier,
  type EmitOptions,
} from "./emitter/mod.ts";

// ── Configuration ───────────────────────────────────────────────
export { parseConfig, outputPathFor, type ConvertConfig } from "./config.ts";

// ── Errors ──────────────────────────────────────────────────────
export {
  ShaderConvertError,
  DiscoveryError,
  UnrecognizedShaderStageError,
  TemplateError,
  ReflectionParseError,
  UnsupportedTypeError,
  ToolNotFoundError,
  ConfigError,
  ShaderNameClashError,
  ShaderBuildError,
  type ShaderBuildContext,
} from "./errors.ts";

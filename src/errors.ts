export class ShaderConvertError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ShaderConvertError";
  }
}

export class DiscoveryError extends ShaderConvertError {
  constructor(dir: string, reason: string) {
    super(`Cannot read shader directory "${dir}": ${reason}`);
    this.name = "DiscoveryError";
  }
}

export class UnrecognizedShaderStageError extends ShaderConvertError {
  readonly shaderPath: string;

  constructor(shaderPath: string) {
    super(`Unrecognized shader stage: ${shaderPath} (expected .vert or .frag)`);
    this.name = "UnrecognizedShaderStageError";
    this.shaderPath = shaderPath;
  }
}

export class TemplateError extends ShaderConvertError {
  constructor(templateName: string, line: number, reason: string) {
    super(`${templateName}:${line}: ${reason}`);
    this.name = "TemplateError";
  }
}

export class ReflectionParseError extends ShaderConvertError {
  constructor(message: string) {
    super(`Invalid reflection document: ${message}`);
    this.name = "ReflectionParseError";
  }
}

export class UnsupportedTypeError extends ShaderConvertError {
  readonly token: string;

  constructor(token: string) {
    super(`Unsupported input data type: ${token}`);
    this.name = "UnsupportedTypeError";
    this.token = token;
  }
}

export class ToolNotFoundError extends ShaderConvertError {
  constructor(tool: string, envVar: string) {
    super(`Could not find "${tool}". Install it on PATH, pass its path, or set ${envVar}.`);
    this.name = "ToolNotFoundError";
  }
}

export class ShaderNameClashError extends ShaderConvertError {
  readonly identifier: string;
  readonly paths: readonly [string, string];

  constructor(identifier: string, first: string, second: string) {
    super(`Shaders ${first} and ${second} both export as ${identifier}; rename one of them`);
    this.name = "ShaderNameClashError";
    this.identifier = identifier;
    this.paths = [first, second];
  }
}

export class ConfigError extends ShaderConvertError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Where in the pipeline a shader failed. */
export interface ShaderBuildContext {
  readonly shader: string;
  readonly variant?: string;
  readonly target?: string;
}

/**
 * Wraps any failure while converting one shader with where it happened.
 * The original error is kept as `cause`.
 */
export class ShaderBuildError extends ShaderConvertError {
  readonly context: ShaderBuildContext;

  constructor(context: ShaderBuildContext, cause: unknown) {
    const where = [context.shader, context.variant, context.target]
      .filter((part): part is string => part !== undefined)
      .join(" / ");
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${where}: ${reason}`, { cause });
    this.name = "ShaderBuildError";
    this.context = context;
  }
}

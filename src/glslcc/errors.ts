import { ShaderConvertError } from "../errors.ts";

export class ConversionError extends ShaderConvertError {
  readonly shaderPath: string;
  readonly diagnostics: string;

  constructor(shaderPath: string, diagnostics: string) {
    super(`glslcc failed for ${shaderPath}:\n${diagnostics}`);
    this.name = "ConversionError";
    this.shaderPath = shaderPath;
    this.diagnostics = diagnostics;
  }
}

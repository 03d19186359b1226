import { ShaderConvertError } from "../errors.ts";

export class BytecodeCompileError extends ShaderConvertError {
  readonly diagnostics: string;

  constructor(diagnostics: string) {
    super(`HLSL bytecode compilation failed:\n${diagnostics}`);
    this.name = "BytecodeCompileError";
    this.diagnostics = diagnostics;
  }
}

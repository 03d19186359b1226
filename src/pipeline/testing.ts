/**
 * In-process stand-ins for glslcc and fxc, used by the pipeline tests.
 */

import { readFile } from "node:fs/promises";
import type { FxcCompileOptions, FxcCompileResult, HlslCompiler } from "../fxc/types.ts";
import type { ConvertOptions, ConvertResult, ShaderConverter } from "../glslcc/types.ts";
import { formatBackendTarget } from "../shader/types.ts";
import type { Logger } from "./context.ts";

export const EMPTY_REFLECTION = "{}";

export interface FakeConverterOptions {
  /** Reflection returned for every backend without its own entry. */
  readonly reflection?: string;
  /** Reflection per backend, keyed like "gles 300". */
  readonly reflectionByTarget?: Readonly<Record<string, string>>;
  /** Backend that fails, keyed like "hlsl 40". */
  readonly failOn?: string;
}

/**
 * Echoes the expanded shader back, prefixed with the backend it was asked
 * for, and returns a canned reflection document.
 */
export class FakeConverter implements ShaderConverter {
  readonly calls: ConvertOptions[] = [];
  private readonly reflection: string;
  private readonly reflectionByTarget: ReadonlyMap<string, string>;
  private readonly failOn: string | undefined;

  constructor(options: FakeConverterOptions = {}) {
    this.reflection = options.reflection ?? EMPTY_REFLECTION;
    this.reflectionByTarget = new Map(Object.entries(options.reflectionByTarget ?? {}));
    this.failOn = options.failOn;
  }

  async convert(options: ConvertOptions): Promise<ConvertResult> {
    this.calls.push(options);
    const target = formatBackendTarget(options.target);
    if (target === this.failOn) {
      throw new Error(`cannot convert to ${target}`);
    }
    const text = await readFile(options.inputPath, "utf-8");
    return {
      source: `// ${target}\n${text}`,
      reflection: this.reflectionByTarget.get(target) ?? this.reflection,
    };
  }
}

export class FakeHlslCompiler implements HlslCompiler {
  readonly calls: FxcCompileOptions[] = [];
  private readonly result: FxcCompileResult;

  constructor(result: FxcCompileResult) {
    this.result = result;
  }

  async compile(options: FxcCompileOptions): Promise<FxcCompileResult> {
    this.calls.push(options);
    return this.result;
  }
}

export interface RecordingLogger extends Logger {
  readonly messages: string[];
  readonly warnings: string[];
}

export function createRecordingLogger(): RecordingLogger {
  const messages: string[] = [];
  const warnings: string[] = [];
  return {
    messages,
    warnings,
    log: (...args: unknown[]) => {
      messages.push(args.join(" "));
    },
    warn: (...args: unknown[]) => {
      warnings.push(args.join(" "));
    },
  };
}

/**
 * Run configuration, from command-line flags and environment variables.
 *
 * Usage:
 *   shaderport --module <name> [--shaders dir] [--out-dir dir]
 *              [--types specifier] [--glslcc path] [--fxc path] [--flatten-ubos]
 */

import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.ts";

// ── Schema ───────────────────────────────────────────────────────

const MODULE_NAME = /^[A-Za-z_][\w-]*(\/[A-Za-z_][\w-]*)*$/;

const configSchema = z.object({
  moduleName: z
    .string({ required_error: "--module is required" })
    .regex(MODULE_NAME, "--module must be a name like \"shaders\" or \"gpu/shaders\""),
  shadersDir: z.string().min(1).default("shaders"),
  outDir: z.string().min(1).default("."),
  typesModule: z.string().min(1).default("shaderport"),
  glslccPath: z.string().min(1).optional(),
  fxcPath: z.string().min(1).optional(),
  flattenUbos: z.boolean().default(false),
});

export type ConvertConfig = z.infer<typeof configSchema>;

// ── CLI argument parsing ─────────────────────────────────────────

const VALUE_FLAGS = {
  "--module": "moduleName",
  "--shaders": "shadersDir",
  "--out-dir": "outDir",
  "--types": "typesModule",
  "--glslcc": "glslccPath",
  "--fxc": "fxcPath",
} as const satisfies Readonly<Record<string, keyof ConvertConfig>>;

const BOOLEAN_FLAGS = {
  "--flatten-ubos": "flattenUbos",
} as const satisfies Readonly<Record<string, keyof ConvertConfig>>;

function isValueFlag(arg: string): arg is keyof typeof VALUE_FLAGS {
  return Object.hasOwn(VALUE_FLAGS, arg);
}

function isBooleanFlag(arg: string): arg is keyof typeof BOOLEAN_FLAGS {
  return Object.hasOwn(BOOLEAN_FLAGS, arg);
}

/**
 * Parse command-line arguments (without the node/script prefix).
 * `GLSLCC_PATH` and `FXC_PATH` are not read here; the tool wrappers fall
 * back to them when no path is given.
 */
export function parseConfig(argv: readonly string[]): ConvertConfig {
  const raw: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";

    if (isBooleanFlag(arg)) {
      raw[BOOLEAN_FLAGS[arg]] = true;
      continue;
    }

    if (isValueFlag(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new ConfigError(`${arg} needs a value`);
      }
      raw[VALUE_FLAGS[arg]] = value;
      i++;
      continue;
    }

    throw new ConfigError(`Unknown argument: ${arg}`);
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

/** `<out-dir>/<module>.ts`, resolved against `cwd`. */
export function outputPathFor(config: ConvertConfig, cwd = process.cwd()): string {
  return resolve(cwd, config.outDir, `${config.moduleName}.ts`);
}

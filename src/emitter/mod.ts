/**
 * Writes converted shaders out as a TypeScript module.
 *
 * Each shader becomes one exported constant: a `ShaderSources` when its
 * variants collapsed, a `readonly ShaderSources[]` indexed by variant
 * otherwise. Lists are written in the order they arrive.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { basename, dirname } from "node:path";
import type {
  ConvertedShader,
  InputLocation,
  ShaderEntry,
  TextureBinding,
  UniformBlock,
  UniformLocation,
} from "../shader/types.ts";

export interface EmitOptions {
  /** Name recorded in the module's `@module` tag. */
  readonly moduleName: string;
  /** Module specifier the `ShaderSources` type is imported from. */
  readonly typesModule: string;
}

const INDENT = "  ";
const BYTES_PER_LINE = 16;

/** `shaders/blit.frag` → `shader_blit_frag`. */
export function shaderIdentifier(shaderPath: string): string {
  return `shader_${basename(shaderPath).replace(/[^A-Za-z0-9_]/g, "_")}`;
}

// ── Literals ─────────────────────────────────────────────────────

function str(value: string): string {
  return JSON.stringify(value);
}

function list<T>(items: readonly T[], format: (item: T) => string, indent: string): string {
  if (items.length === 0) return "[]";
  const inner = items.map((item) => `${indent}${INDENT}${format(item)},`).join("\n");
  return `[\n${inner}\n${indent}]`;
}

function formatInput(input: InputLocation): string {
  return (
    `{ name: ${str(input.name)}, location: ${input.location}, ` +
    `semantic: ${str(input.semantic)}, semanticIndex: ${input.semanticIndex}, ` +
    `type: ${str(input.type)}, size: ${input.size} }`
  );
}

function formatBlock(block: UniformBlock): string {
  return `{ name: ${str(block.name)}, binding: ${block.binding} }`;
}

function formatLocation(location: UniformLocation): string {
  return (
    `{ name: ${str(location.name)}, type: ${str(location.type)}, ` +
    `size: ${location.size}, offset: ${location.offset} }`
  );
}

function formatTexture(texture: TextureBinding): string {
  return `{ name: ${str(texture.name)}, binding: ${texture.binding} }`;
}

function formatBytes(bytes: Uint8Array, indent: string): string {
  const lines: string[] = [];
  for (let i = 0; i < bytes.length; i += BYTES_PER_LINE) {
    const row = Array.from(bytes.subarray(i, i + BYTES_PER_LINE), (b) =>
      `0x${b.toString(16).padStart(2, "0")}`,
    );
    lines.push(`${indent}${INDENT}${row.join(", ")},`);
  }
  if (lines.length === 0) return "new Uint8Array(0)";
  return `new Uint8Array([\n${lines.join("\n")}\n${indent}])`;
}

/** Block comment holding the HLSL text; `*\/` inside it is broken up. */
function formatHlslComment(hlsl: string, indent: string): string {
  const body = hlsl.replaceAll("*/", "* /");
  return `${indent}/*\n${body}\n${indent}*/`;
}

function formatSources(src: ConvertedShader, indent: string): string {
  const i1 = indent + INDENT;
  const i2 = i1 + INDENT;
  const lines = [
    "{",
    `${i1}inputs: ${list(src.inputs, formatInput, i1)},`,
    `${i1}uniforms: {`,
    `${i2}blocks: ${list(src.uniforms.blocks, formatBlock, i2)},`,
    `${i2}locations: ${list(src.uniforms.locations, formatLocation, i2)},`,
    `${i2}size: ${src.uniforms.size},`,
    `${i1}},`,
    `${i1}textures: ${list(src.textures, formatTexture, i1)},`,
    `${i1}glsl100es: ${str(src.glsl100es)},`,
    `${i1}glsl300es: ${str(src.glsl300es)},`,
    formatHlslComment(src.hlslText, i1),
  ];
  if (src.hlsl) {
    lines.push(`${i1}hlsl: ${formatBytes(src.hlsl, i1)},`);
  }
  lines.push(`${indent}}`);
  return lines.join("\n");
}

function formatEntry(entry: ShaderEntry): string {
  if (entry.kind === "single") {
    return `export const ${entry.name}: ShaderSources = ${formatSources(entry.sources, "")};\n`;
  }
  const variants = entry.variants
    .map((src) => `${INDENT}${formatSources(src, INDENT)},`)
    .join("\n");
  return `export const ${entry.name}: readonly ShaderSources[] = [\n${variants}\n];\n`;
}

// ── Module ───────────────────────────────────────────────────────

/** Render the generated module for `entries`, in the order given. */
export function emitShaderModule(entries: readonly ShaderEntry[], options: EmitOptions): string {
  const header = [
    "// Code generated by shaderport. DO NOT EDIT.",
    "",
    "/**",
    " * Converted shader sources and binding reflection.",
    " *",
    ` * @module ${options.moduleName}`,
    " */",
    "",
    `import type { ShaderSources } from ${str(options.typesModule)};`,
    "",
  ].join("\n");

  return header + entries.map((entry) => "\n" + formatEntry(entry)).join("");
}

export async function writeShaderModule(outputPath: string, source: string): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, source);
}

#!/usr/bin/env tsx
/**
 * shaderport CLI.
 *
 * Converts every shader in the shaders directory into GLSL ES 1.00/3.00 and
 * HLSL variants and writes them, with reflection, into one TypeScript module.
 *
 * Usage:
 *   tsx src/main.ts --module <name> [--shaders dir] [--out-dir dir]
 *                   [--types specifier] [--glslcc path] [--fxc path] [--flatten-ubos]
 */

import { relative } from "node:path";
import { parseConfig } from "./config.ts";
import { generateShaderModule } from "./generate.ts";

// ── Helpers ──────────────────────────────────────────────────────

function describeError(err: unknown): string {
  const lines: string[] = [];
  let current: unknown = err;
  while (current !== undefined) {
    if (current instanceof Error) {
      lines.push(`${current.name}: ${current.message}`);
      current = current.cause;
    } else {
      lines.push(String(current));
      current = undefined;
    }
  }
  return lines.join("\n  caused by ");
}

// Exiting fires the build context's exit hook, which removes the temp dir.
function exitOnSignal(signal: NodeJS.Signals): void {
  process.once(signal, () => {
    console.error(`\nInterrupted (${signal})`);
    process.exit(130);
  });
}

// ── Main ─────────────────────────────────────────────────────────

async function main(): Promise<void> {
  exitOnSignal("SIGINT");
  exitOnSignal("SIGTERM");

  const config = parseConfig(process.argv.slice(2));
  const startTime = performance.now();

  console.log("=== Shader Converter ===\n");

  const { outputPath, entries, bytecode } = await generateShaderModule(config);

  const records = entries.reduce(
    (sum, entry) => sum + (entry.kind === "single" ? 1 : entry.variants.length),
    0,
  );
  const elapsedMs = Math.round(performance.now() - startTime);

  console.log(
    `\n=== ${entries.length} shaders, ${records} records${bytecode ? "" : " (no bytecode)"}` +
      ` -> ${relative(process.cwd(), outputPath) || outputPath} in ${elapsedMs}ms ===`,
  );
}

main().catch((err: unknown) => {
  console.error(`\nConversion failed: ${describeError(err)}`);
  process.exit(1);
});

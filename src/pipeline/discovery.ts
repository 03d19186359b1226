import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { DiscoveryError } from "../errors.ts";

/**
 * List the shader files directly inside `dir`, sorted by name so output
 * order is stable across runs.
 */
export async function discoverShaders(dir: string): Promise<readonly string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    throw new DiscoveryError(dir, err instanceof Error ? err.message : String(err));
  }

  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name));
}

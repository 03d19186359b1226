import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DiscoveryError } from "../errors.ts";
import { discoverShaders } from "./discovery.ts";

describe("discoverShaders", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "discovery-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("lists files sorted by name and skips directories", async () => {
    await writeFile(join(dir, "stencil.vert"), "");
    await writeFile(join(dir, "blit.frag"), "");
    await writeFile(join(dir, "copy.frag"), "");
    await mkdir(join(dir, "include"));

    expect(await discoverShaders(dir)).toEqual([
      join(dir, "blit.frag"),
      join(dir, "copy.frag"),
      join(dir, "stencil.vert"),
    ]);
  });

  it("returns nothing for an empty directory", async () => {
    expect(await discoverShaders(dir)).toEqual([]);
  });

  it("fails when the directory cannot be read", async () => {
    await expect(discoverShaders(join(dir, "missing"))).rejects.toThrow(DiscoveryError);
  });
});

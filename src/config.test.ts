import { describe, expect, it } from "vitest";
import { outputPathFor, parseConfig } from "./config.ts";
import { ConfigError } from "./errors.ts";

describe("parseConfig", () => {
  it("applies defaults", () => {
    expect(parseConfig(["--module", "shaders"])).toEqual({
      moduleName: "shaders",
      shadersDir: "shaders",
      outDir: ".",
      typesModule: "shaderport",
      flattenUbos: false,
    });
  });

  it("reads every flag", () => {
    const config = parseConfig([
      "--module", "gpu/shaders",
      "--shaders", "assets/shaders",
      "--out-dir", "src",
      "--types", "../gpu/types.ts",
      "--glslcc", "/opt/bin/glslcc",
      "--fxc", "/opt/bin/fxc",
      "--flatten-ubos",
    ]);

    expect(config).toEqual({
      moduleName: "gpu/shaders",
      shadersDir: "assets/shaders",
      outDir: "src",
      typesModule: "../gpu/types.ts",
      glslccPath: "/opt/bin/glslcc",
      fxcPath: "/opt/bin/fxc",
      flattenUbos: true,
    });
  });

  it("requires --module", () => {
    expect(() => parseConfig([])).toThrow(ConfigError);
    expect(() => parseConfig([])).toThrow("Invalid configuration: --module is required");
  });

  it("rejects module names that are not plain paths", () => {
    expect(() => parseConfig(["--module", "../shaders"])).toThrow(ConfigError);
    expect(() => parseConfig(["--module", "shaders.ts"])).toThrow(ConfigError);
  });

  it("rejects unknown arguments and missing values", () => {
    expect(() => parseConfig(["--module", "shaders", "--bogus"])).toThrow(
      "Unknown argument: --bogus",
    );
    expect(() => parseConfig(["--module", "--shaders", "dir"])).toThrow("--module needs a value");
    expect(() => parseConfig(["--module"])).toThrow("--module needs a value");
  });
});

describe("outputPathFor", () => {
  it("places the module under the output directory", () => {
    const config = parseConfig(["--module", "gpu/shaders", "--out-dir", "gen"]);
    expect(outputPathFor(config, "/work")).toBe("/work/gen/gpu/shaders.ts");
  });
});

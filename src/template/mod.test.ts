import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TemplateError } from "../errors.ts";
import { expandTemplate, expandVariant, SHADER_VARIANTS } from "./mod.ts";

describe("expandTemplate", () => {
  it("substitutes key actions", () => {
    expect(expandTemplate("color = {{.FetchColorExpr}};", { FetchColorExpr: "_color" })).toBe(
      "color = _color;",
    );
  });

  it("allows whitespace inside the braces", () => {
    expect(expandTemplate("{{ .Header }}\nvoid main() {}", { Header: "uniform vec4 c;" })).toBe(
      "uniform vec4 c;\nvoid main() {}",
    );
  });

  it("trims whitespace around trim markers", () => {
    expect(expandTemplate("a  {{- .X -}}  b", { X: "x" })).toBe("axb");
    expect(expandTemplate("a\n{{- .X}}\nb", { X: "x" })).toBe("ax\nb");
  });

  it("drops comments", () => {
    expect(expandTemplate("a{{/* note */}}b", {})).toBe("ab");
  });

  it("leaves text without actions unchanged", () => {
    const source = "void main() { gl_FragColor = vec4(1.0); }\n";
    expect(expandTemplate(source, { FetchColorExpr: "_color" })).toBe(source);
  });

  it("rejects unknown keys with the template name and line", () => {
    expect(() => expandTemplate("void main() {\n{{.Missing}}\n}", {}, "blit.frag")).toThrow(
      new TemplateError("blit.frag", 2, "can't evaluate field Missing"),
    );
  });

  it("rejects unclosed actions", () => {
    expect(() => expandTemplate("a {{.X", { X: "x" })).toThrow(/unclosed action/);
  });

  it("rejects other actions", () => {
    expect(() => expandTemplate("{{if .X}}a{{end}}", { X: "x" })).toThrow(TemplateError);
    expect(() => expandTemplate("{{X}}", { X: "x" })).toThrow(/unsupported action/);
  });
});

describe("SHADER_VARIANTS", () => {
  it("declares uniform color before sampled texture", () => {
    expect(SHADER_VARIANTS.map((variant) => variant.name)).toEqual([
      "uniformColor",
      "sampledTexture",
    ]);
    expect(SHADER_VARIANTS[0]?.values["FetchColorExpr"]).toBe("_color");
    expect(SHADER_VARIANTS[1]?.values["FetchColorExpr"]).toBe("texture(tex, vUV)");
  });
});

describe("expandVariant", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "template-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the expanded source under the work directory", async () => {
    const templatePath = join(dir, "color.frag");
    await writeFile(templatePath, "out = {{.FetchColorExpr}};\n");
    const workDir = await mkdtemp(join(dir, "work-"));

    const [, textured] = SHADER_VARIANTS;
    if (!textured) throw new Error("missing variant");
    const scratchPath = await expandVariant(templatePath, textured, workDir);

    expect(scratchPath).toBe(join(workDir, "color.frag"));
    expect(await readFile(scratchPath, "utf-8")).toBe("out = texture(tex, vUV);\n");
  });
});

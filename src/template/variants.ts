/** A named set of values substituted into every shader template. */
export interface ShaderVariant {
  readonly name: string;
  readonly values: Readonly<Record<string, string>>;
}

/**
 * Variants every shader is expanded with, in output order. Shaders whose
 * templates ignore these keys collapse to a single record.
 */
export const SHADER_VARIANTS: readonly ShaderVariant[] = [
  {
    name: "uniformColor",
    values: {
      FetchColorExpr: "_color",
      Header: "layout(binding=0) uniform Color { vec4 _color; };",
    },
  },
  {
    name: "sampledTexture",
    values: {
      FetchColorExpr: "texture(tex, vUV)",
      Header: "layout(binding=0) uniform sampler2D tex;",
    },
  },
];

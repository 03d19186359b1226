import { describe, expect, it } from "vitest";
import { ReflectionParseError, UnsupportedTypeError } from "../errors.ts";
import { parseReflection } from "./mod.ts";

const TWO_BLOCKS = {
  vs: {
    inputs: [
      { id: 1, name: "uv", location: 1, semantic: "TEXCOORD", semantic_index: 0, type: "float2" },
      { id: 0, name: "pos", location: 0, semantic: "POSITION", semantic_index: 0, type: "float3" },
    ],
    uniform_buffers: [
      {
        id: 10,
        name: "Block",
        set: 0,
        binding: 0,
        block_size: 32,
        members: [
          { name: "transform", type: "float4", offset: 0, size: 16 },
          { name: "offset", type: "float2", offset: 16, size: 8 },
        ],
      },
      {
        id: 11,
        name: "Color",
        set: 0,
        binding: 1,
        block_size: 16,
        members: [{ name: "color", type: "float4", offset: 0, size: 16 }],
      },
    ],
  },
  fs: {
    inputs: [
      { id: 0, name: "vUV", location: 0, semantic: "TEXCOORD", semantic_index: 0, type: "float2" },
    ],
    textures: [
      { id: 5, name: "tex", set: 0, binding: 2, dimension: "2d", format: "float" },
    ],
  },
};

const FRAGMENT_ONLY = {
  fs: {
    uniform_buffers: [
      {
        id: 3,
        name: "Color",
        set: 0,
        binding: 0,
        block_size: 16,
        members: [{ name: "_color", type: "float4", offset: 0, size: 16 }],
      },
    ],
    textures: [
      { id: 7, name: "tex", set: 0, binding: 1, dimension: "2d", format: "float" },
    ],
  },
};

describe("parseReflection", () => {
  it("takes inputs from the vertex stage sorted by location", () => {
    const reflection = parseReflection(JSON.stringify(TWO_BLOCKS));

    expect(reflection.inputs).toEqual([
      { name: "pos", location: 0, semantic: "POSITION", semanticIndex: 0, type: "float", size: 3 },
      { name: "uv", location: 1, semantic: "TEXCOORD", semanticIndex: 0, type: "float", size: 2 },
    ]);
  });

  it("sorts inputs given in any order", () => {
    const inputs = [3, 0, 2, 1].map((location) => ({
      id: location,
      name: `a${location}`,
      location,
      semantic: "TEXCOORD",
      semantic_index: location,
      type: "float4",
    }));
    const reflection = parseReflection(JSON.stringify({ vs: { inputs } }));

    expect(reflection.inputs.map((input) => input.location)).toEqual([0, 1, 2, 3]);
  });

  it("flattens uniform blocks into one offset space", () => {
    const { uniforms } = parseReflection(JSON.stringify(TWO_BLOCKS));

    expect(uniforms.blocks).toEqual([
      { name: "Block", binding: 0 },
      { name: "Color", binding: 1 },
    ]);
    expect(uniforms.locations).toEqual([
      { name: "_10.transform", type: "float", size: 4, offset: 0 },
      { name: "_10.offset", type: "float", size: 2, offset: 16 },
      { name: "_11.color", type: "float", size: 4, offset: 32 },
    ]);
    expect(uniforms.size).toBe(48);
  });

  it("falls back to the fragment stage for textures", () => {
    const reflection = parseReflection(JSON.stringify(TWO_BLOCKS));

    expect(reflection.textures).toEqual([{ name: "tex", binding: 2 }]);
  });

  it("falls back to the fragment stage when the vertex stage is missing", () => {
    const reflection = parseReflection(JSON.stringify(FRAGMENT_ONLY));

    expect(reflection.inputs).toEqual([]);
    expect(reflection.uniforms).toEqual({
      blocks: [{ name: "Color", binding: 0 }],
      locations: [{ name: "_3._color", type: "float", size: 4, offset: 0 }],
      size: 16,
    });
    expect(reflection.textures).toEqual([{ name: "tex", binding: 1 }]);
  });

  it("prefers vertex-stage blocks over fragment-stage ones", () => {
    const doc = {
      vs: TWO_BLOCKS.vs,
      fs: FRAGMENT_ONLY.fs,
    };
    const reflection = parseReflection(JSON.stringify(doc));

    expect(reflection.uniforms.blocks.map((block) => block.name)).toEqual(["Block", "Color"]);
    expect(reflection.textures).toEqual([{ name: "tex", binding: 1 }]);
  });

  it("returns empty reflection for an empty document", () => {
    expect(parseReflection("{}")).toEqual({
      inputs: [],
      uniforms: { blocks: [], locations: [], size: 0 },
      textures: [],
    });
  });

  it("gives identical results for the same document", () => {
    const json = JSON.stringify(TWO_BLOCKS);
    expect(parseReflection(json)).toEqual(parseReflection(json));
  });

  it("accepts UTF-8 bytes", () => {
    const json = JSON.stringify(TWO_BLOCKS);
    expect(parseReflection(new TextEncoder().encode(json))).toEqual(parseReflection(json));
  });

  it("accepts documents without the fields it does not read", () => {
    const doc = {
      vs: {
        inputs: [{ name: "pos", location: 0, semantic: "POSITION", semantic_index: 0, type: "float3" }],
        uniform_buffers: [
          {
            id: 4,
            name: "Block",
            binding: 0,
            block_size: 16,
            members: [{ name: "tint", type: "float4", offset: 0 }],
          },
        ],
        textures: [{ name: "tex", binding: 3 }],
      },
    };

    expect(parseReflection(JSON.stringify(doc))).toEqual({
      inputs: [
        { name: "pos", location: 0, semantic: "POSITION", semanticIndex: 0, type: "float", size: 3 },
      ],
      uniforms: {
        blocks: [{ name: "Block", binding: 0 }],
        locations: [{ name: "_4.tint", type: "float", size: 4, offset: 0 }],
        size: 16,
      },
      textures: [{ name: "tex", binding: 3 }],
    });
  });

  it("rejects malformed JSON", () => {
    expect(() => parseReflection("{\"vs\": ")).toThrow(ReflectionParseError);
  });

  it("rejects a document of the wrong shape", () => {
    const doc = { vs: { inputs: "pos" } };
    expect(() => parseReflection(JSON.stringify(doc))).toThrow(/vs\.inputs/);
    expect(() => parseReflection(JSON.stringify(doc))).toThrow(ReflectionParseError);
  });

  it("rejects an unsupported input type", () => {
    const doc = {
      vs: {
        inputs: [
          { id: 0, name: "pos", location: 0, semantic: "POSITION", semantic_index: 0, type: "double" },
        ],
      },
    };
    expect(() => parseReflection(JSON.stringify(doc))).toThrow(UnsupportedTypeError);
  });

  it("rejects an unsupported uniform member type", () => {
    const doc = {
      fs: {
        uniform_buffers: [
          {
            id: 1,
            name: "Block",
            binding: 0,
            block_size: 64,
            members: [{ name: "m", type: "float4x4", offset: 0, size: 64 }],
          },
        ],
      },
    };
    expect(() => parseReflection(JSON.stringify(doc))).toThrow(UnsupportedTypeError);
  });
});

/**
 * Turns a glslcc reflection document into the canonical ShaderReflection.
 *
 * Inputs come from the vertex stage only. Uniform blocks and textures come
 * from the vertex stage when it declares any, otherwise from the fragment
 * stage. All uniform blocks share one offset space: each block starts where
 * the previous one ended.
 */

import type { ZodError } from "zod";
import { ReflectionParseError } from "../errors.ts";
import { parseDataType } from "../shader/data-type.ts";
import type {
  InputLocation,
  ShaderReflection,
  TextureBinding,
  UniformBlock,
  UniformLocation,
  UniformsReflection,
} from "../shader/types.ts";
import {
  reflectionDocumentSchema,
  type RawReflectionDocument,
  type RawStageReflection,
  type RawTextureReflection,
  type RawUniformBufferReflection,
} from "./schema.ts";

export type { RawReflectionDocument } from "./schema.ts";

const TEXT_DECODER = new TextDecoder("utf-8");

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Decode and validate a reflection document.
 * Throws ReflectionParseError on malformed JSON or an unexpected shape.
 */
export function decodeReflectionDocument(data: string | Uint8Array): RawReflectionDocument {
  const text = typeof data === "string" ? data : TEXT_DECODER.decode(data);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ReflectionParseError(`${err instanceof Error ? err.message : err}`);
  }

  const result = reflectionDocumentSchema.safeParse(parsed);
  if (!result.success) {
    throw new ReflectionParseError(formatZodError(result.error));
  }
  return result.data;
}

// ── Per-section conversion ───────────────────────────────────────

function parseInputs(stage: RawStageReflection | undefined): InputLocation[] {
  const inputs = (stage?.inputs ?? []).map((input): InputLocation => {
    const { type, size } = parseDataType(input.type);
    return {
      name: input.name,
      location: input.location,
      semantic: input.semantic,
      semanticIndex: input.semantic_index,
      type,
      size,
    };
  });
  // Renderers bind attributes by position.
  return inputs.sort((a, b) => a.location - b.location);
}

function parseUniforms(buffers: readonly RawUniformBufferReflection[]): UniformsReflection {
  const blocks: UniformBlock[] = [];
  const locations: UniformLocation[] = [];
  let blockOffset = 0;

  for (const block of buffers) {
    blocks.push({ name: block.name, binding: block.binding });
    for (const member of block.members) {
      const { type, size } = parseDataType(member.type);
      locations.push({
        name: `_${block.id}.${member.name}`,
        type,
        size,
        offset: blockOffset + member.offset,
      });
    }
    blockOffset += block.block_size;
  }

  return { blocks, locations, size: blockOffset };
}

function parseTextures(textures: readonly RawTextureReflection[]): TextureBinding[] {
  return textures.map((texture) => ({ name: texture.name, binding: texture.binding }));
}

function vertexOrFragment<T>(
  doc: RawReflectionDocument,
  select: (stage: RawStageReflection) => readonly T[],
): readonly T[] {
  const fromVertex = doc.vs ? select(doc.vs) : [];
  if (fromVertex.length > 0) return fromVertex;
  return doc.fs ? select(doc.fs) : [];
}

// ── Entry point ──────────────────────────────────────────────────

/**
 * Parse a reflection document into inputs, flattened uniforms and textures.
 *
 * Throws ReflectionParseError for malformed documents and lets
 * UnsupportedTypeError from the type mapper propagate.
 */
export function parseReflection(data: string | Uint8Array): ShaderReflection {
  const doc = decodeReflectionDocument(data);

  return {
    inputs: parseInputs(doc.vs),
    uniforms: parseUniforms(vertexOrFragment(doc, (stage) => stage.uniform_buffers)),
    textures: parseTextures(vertexOrFragment(doc, (stage) => stage.textures)),
  };
}

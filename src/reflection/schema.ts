/**
 * zod schemas for the reflection sidecar glslcc writes next to each
 * converted shader (`--reflect`).
 *
 * Fields the parser never reads (input and texture ids, member sizes,
 * texture dimension and format) are optional. Undeclared keys are stripped.
 */

import { z } from "zod";

const inputSchema = z.object({
  id: z.number().int().optional(),
  name: z.string(),
  location: z.number().int(),
  semantic: z.string(),
  semantic_index: z.number().int(),
  type: z.string(),
});

const uniformMemberSchema = z.object({
  name: z.string(),
  type: z.string(),
  offset: z.number().int().nonnegative(),
  size: z.number().int().nonnegative().optional(),
});

const uniformBufferSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  set: z.number().int().default(0),
  binding: z.number().int(),
  block_size: z.number().int().nonnegative(),
  members: z.array(uniformMemberSchema).default([]),
});

const textureSchema = z.object({
  id: z.number().int().optional(),
  name: z.string(),
  set: z.number().int().default(0),
  binding: z.number().int(),
  dimension: z.string().optional(),
  format: z.string().optional(),
});

const stageReflectionSchema = z.object({
  inputs: z.array(inputSchema).default([]),
  uniform_buffers: z.array(uniformBufferSchema).default([]),
  textures: z.array(textureSchema).default([]),
});

export const reflectionDocumentSchema = z.object({
  vs: stageReflectionSchema.optional(),
  fs: stageReflectionSchema.optional(),
});

export type RawInputReflection = z.infer<typeof inputSchema>;
export type RawUniformBufferReflection = z.infer<typeof uniformBufferSchema>;
export type RawTextureReflection = z.infer<typeof textureSchema>;
export type RawStageReflection = z.infer<typeof stageReflectionSchema>;
export type RawReflectionDocument = z.infer<typeof reflectionDocumentSchema>;

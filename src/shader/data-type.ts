import { UnsupportedTypeError } from "../errors.ts";

/** Scalar kind of a vertex input or uniform member. */
export const DataType = {
  Float: "float",
  Int: "int",
} as const;

export type DataType = (typeof DataType)[keyof typeof DataType];

/** A scalar kind plus its component count (1-4). */
export interface DataTypeInfo {
  readonly type: DataType;
  readonly size: number;
}

const DATA_TYPES: ReadonlyMap<string, DataTypeInfo> = new Map([
  ["float", { type: DataType.Float, size: 1 }],
  ["float2", { type: DataType.Float, size: 2 }],
  ["float3", { type: DataType.Float, size: 3 }],
  ["float4", { type: DataType.Float, size: 4 }],
  ["int", { type: DataType.Int, size: 1 }],
  ["int2", { type: DataType.Int, size: 2 }],
  ["int3", { type: DataType.Int, size: 3 }],
  ["int4", { type: DataType.Int, size: 4 }],
]);

/**
 * Map a reflection type token (`float3`, `int`, ...) to its kind and
 * component count. Throws UnsupportedTypeError for anything else.
 */
export function parseDataType(token: string): DataTypeInfo {
  const info = DATA_TYPES.get(token);
  if (!info) throw new UnsupportedTypeError(token);
  return info;
}

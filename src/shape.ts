import type { BigIntKind, NumberKind } from "./value";

/**
 * Shapes describe what the decoder should expect at each position. The wire
 * format carries no type tags, so every decode is driven by one.
 */

export type PrimitiveKind = "bool" | NumberKind | BigIntKind | "char";

export interface FieldShape {
  name: string;
  shape: Shape;
}

export interface StructShape {
  kind: "struct";
  name: string;
  fields: FieldShape[];
}

export type VariantShape =
  | { kind: "unit"; name: string }
  | { kind: "newtype"; name: string; shape: Shape }
  | { kind: "tuple"; name: string; elements: Shape[] }
  | { kind: "struct"; name: string; fields: FieldShape[] };

export interface EnumShape {
  kind: "enum";
  name: string;
  /** Variants in ordinal order */
  variants: VariantShape[];
}

export type Shape =
  | { kind: PrimitiveKind }
  | { kind: "string" }
  | { kind: "bytes" }
  | { kind: "unit" }
  | { kind: "option"; of: Shape }
  | { kind: "seq"; of: Shape }
  | { kind: "tuple"; elements: Shape[] }
  | { kind: "map"; key: Shape; value: Shape }
  | StructShape
  | EnumShape
  // Named shape resolved through a Registry
  | { kind: "ref"; name: string }
  // Self-describing decode, always rejected
  | { kind: "any" };

function toFieldShapes(fields: Record<string, Shape>): FieldShape[] {
  return Object.entries(fields).map(([name, shape]) => ({ name, shape }));
}

/**
 * Shape constructors.
 *
 * @example
 * ```typescript
 * const Human = s.struct("Human", { name: s.string(), age: s.u8() });
 * ```
 */
export const s = {
  bool: (): Shape => ({ kind: "bool" }),
  i8: (): Shape => ({ kind: "i8" }),
  i16: (): Shape => ({ kind: "i16" }),
  i32: (): Shape => ({ kind: "i32" }),
  i64: (): Shape => ({ kind: "i64" }),
  u8: (): Shape => ({ kind: "u8" }),
  u16: (): Shape => ({ kind: "u16" }),
  u32: (): Shape => ({ kind: "u32" }),
  u64: (): Shape => ({ kind: "u64" }),
  f32: (): Shape => ({ kind: "f32" }),
  f64: (): Shape => ({ kind: "f64" }),
  char: (): Shape => ({ kind: "char" }),
  string: (): Shape => ({ kind: "string" }),
  bytes: (): Shape => ({ kind: "bytes" }),
  unit: (): Shape => ({ kind: "unit" }),
  option: (of: Shape): Shape => ({ kind: "option", of }),
  seq: (of: Shape): Shape => ({ kind: "seq", of }),
  tuple: (elements: Shape[]): Shape => ({ kind: "tuple", elements }),
  map: (key: Shape, value: Shape): Shape => ({ kind: "map", key, value }),
  ref: (name: string): Shape => ({ kind: "ref", name }),
  any: (): Shape => ({ kind: "any" }),

  struct: (name: string, fields: Record<string, Shape>): StructShape => ({
    kind: "struct",
    name,
    fields: toFieldShapes(fields),
  }),

  enum: (name: string, variants: VariantShape[]): EnumShape => ({
    kind: "enum",
    name,
    variants,
  }),

  unitVariant: (name: string): VariantShape => ({ kind: "unit", name }),
  newtypeVariant: (name: string, shape: Shape): VariantShape => ({ kind: "newtype", name, shape }),
  tupleVariant: (name: string, elements: Shape[]): VariantShape => ({ kind: "tuple", name, elements }),
  structVariant: (name: string, fields: Record<string, Shape>): VariantShape => ({
    kind: "struct",
    name,
    fields: toFieldShapes(fields),
  }),
};

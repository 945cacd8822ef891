/**
 * Tagged value model. A Value carries enough structure for the encoder to
 * walk it without a shape; decoding produces the same representation.
 */

export type IntKind = "i8" | "i16" | "i32" | "u8" | "u16" | "u32";
export type FloatKind = "f32" | "f64";
export type BigIntKind = "i64" | "u64";
export type NumberKind = IntKind | FloatKind;

export type StructFields = Array<[string, Value]>;

export type VariantPayload =
  | { kind: "unit" }
  | { kind: "newtype"; value: Value }
  | { kind: "tuple"; elements: Value[] }
  | { kind: "struct"; fields: StructFields };

export interface StructValue {
  kind: "struct";
  name: string;
  /** Fields in encoding order */
  fields: StructFields;
}

export interface EnumValue {
  kind: "enum";
  name: string;
  /** Zero-based variant ordinal, the only identity written to the wire */
  index: number;
  variant: string;
  payload: VariantPayload;
}

export type Value =
  | { kind: "bool"; value: boolean }
  | { kind: NumberKind; value: number }
  | { kind: BigIntKind; value: bigint }
  | { kind: "char"; value: string }
  | { kind: "string"; value: string }
  | { kind: "bytes"; value: Uint8Array }
  | { kind: "unit" }
  | { kind: "option"; value: Value | null }
  | { kind: "seq"; elements: Value[] }
  | { kind: "tuple"; elements: Value[] }
  | { kind: "map"; entries: Array<[Value, Value]> }
  | StructValue
  | EnumValue;

function toFields(fields: Record<string, Value> | StructFields): StructFields {
  return Array.isArray(fields) ? fields : Object.entries(fields);
}

/**
 * Value constructors.
 *
 * @example
 * ```typescript
 * const human = v.struct("Human", { name: v.string("Ayush"), age: v.u8(19) });
 * ```
 */
export const v = {
  bool: (value: boolean): Value => ({ kind: "bool", value }),
  i8: (value: number): Value => ({ kind: "i8", value }),
  i16: (value: number): Value => ({ kind: "i16", value }),
  i32: (value: number): Value => ({ kind: "i32", value }),
  i64: (value: bigint): Value => ({ kind: "i64", value }),
  u8: (value: number): Value => ({ kind: "u8", value }),
  u16: (value: number): Value => ({ kind: "u16", value }),
  u32: (value: number): Value => ({ kind: "u32", value }),
  u64: (value: bigint): Value => ({ kind: "u64", value }),
  f32: (value: number): Value => ({ kind: "f32", value }),
  f64: (value: number): Value => ({ kind: "f64", value }),
  char: (value: string): Value => ({ kind: "char", value }),
  string: (value: string): Value => ({ kind: "string", value }),
  bytes: (value: Uint8Array): Value => ({ kind: "bytes", value }),
  unit: (): Value => ({ kind: "unit" }),
  none: (): Value => ({ kind: "option", value: null }),
  some: (value: Value): Value => ({ kind: "option", value }),
  seq: (elements: Value[]): Value => ({ kind: "seq", elements }),
  tuple: (elements: Value[]): Value => ({ kind: "tuple", elements }),
  map: (entries: Array<[Value, Value]>): Value => ({ kind: "map", entries }),

  struct: (name: string, fields: Record<string, Value> | StructFields): StructValue => ({
    kind: "struct",
    name,
    fields: toFields(fields),
  }),

  unitVariant: (name: string, index: number, variant: string): EnumValue => ({
    kind: "enum",
    name,
    index,
    variant,
    payload: { kind: "unit" },
  }),

  newtypeVariant: (name: string, index: number, variant: string, value: Value): EnumValue => ({
    kind: "enum",
    name,
    index,
    variant,
    payload: { kind: "newtype", value },
  }),

  tupleVariant: (name: string, index: number, variant: string, elements: Value[]): EnumValue => ({
    kind: "enum",
    name,
    index,
    variant,
    payload: { kind: "tuple", elements },
  }),

  structVariant: (
    name: string,
    index: number,
    variant: string,
    fields: Record<string, Value> | StructFields
  ): EnumValue => ({
    kind: "enum",
    name,
    index,
    variant,
    payload: { kind: "struct", fields: toFields(fields) },
  }),
};

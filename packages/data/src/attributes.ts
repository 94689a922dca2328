/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Node attribute values as produced by the binary tree decoder.
 * Enum values are the FBX binary type codes.
 */

export enum AttributeType {
  Bool = 'C',
  I16 = 'Y',
  I32 = 'I',
  I64 = 'L',
  F32 = 'F',
  F64 = 'D',
  BoolArray = 'b',
  I32Array = 'i',
  I64Array = 'l',
  F32Array = 'f',
  F64Array = 'd',
  String = 'S',
  Binary = 'R',
}

export type NodeAttribute =
  | { readonly type: AttributeType.Bool; readonly value: boolean }
  | { readonly type: AttributeType.I16; readonly value: number }
  | { readonly type: AttributeType.I32; readonly value: number }
  | { readonly type: AttributeType.I64; readonly value: bigint }
  | { readonly type: AttributeType.F32; readonly value: number }
  | { readonly type: AttributeType.F64; readonly value: number }
  | { readonly type: AttributeType.BoolArray; readonly value: readonly boolean[] }
  | { readonly type: AttributeType.I32Array; readonly value: Int32Array }
  | { readonly type: AttributeType.I64Array; readonly value: BigInt64Array }
  | { readonly type: AttributeType.F32Array; readonly value: Float32Array }
  | { readonly type: AttributeType.F64Array; readonly value: Float64Array }
  | { readonly type: AttributeType.String; readonly value: string }
  | { readonly type: AttributeType.Binary; readonly value: Uint8Array };

/** Narrow an attribute to one type, or undefined */
export type AttributeOf<T extends AttributeType> = Extract<NodeAttribute, { type: T }>;

const ATTRIBUTE_TYPE_NAMES: Record<AttributeType, string> = {
  [AttributeType.Bool]: 'bool',
  [AttributeType.I16]: 'i16',
  [AttributeType.I32]: 'i32',
  [AttributeType.I64]: 'i64',
  [AttributeType.F32]: 'f32',
  [AttributeType.F64]: 'f64',
  [AttributeType.BoolArray]: 'bool[]',
  [AttributeType.I32Array]: 'i32[]',
  [AttributeType.I64Array]: 'i64[]',
  [AttributeType.F32Array]: 'f32[]',
  [AttributeType.F64Array]: 'f64[]',
  [AttributeType.String]: 'string',
  [AttributeType.Binary]: 'binary',
};

export function attributeTypeName(type: AttributeType): string {
  return ATTRIBUTE_TYPE_NAMES[type];
}

export function isAttributeOf<T extends AttributeType>(
  attribute: NodeAttribute | undefined,
  type: T
): attribute is AttributeOf<T> {
  return attribute !== undefined && attribute.type === type;
}

/** Read attribute `index` as a string, or undefined when absent or of another type */
export function stringAttribute(attributes: readonly NodeAttribute[], index: number): string | undefined {
  const attribute = attributes[index];
  return isAttributeOf(attribute, AttributeType.String) ? attribute.value : undefined;
}

/**
 * Attribute constructors, mostly for callers that assemble trees by hand
 */
export const attr = {
  bool: (value: boolean): NodeAttribute => ({ type: AttributeType.Bool, value }),
  i16: (value: number): NodeAttribute => ({ type: AttributeType.I16, value }),
  i32: (value: number): NodeAttribute => ({ type: AttributeType.I32, value }),
  i64: (value: bigint): NodeAttribute => ({ type: AttributeType.I64, value }),
  f32: (value: number): NodeAttribute => ({ type: AttributeType.F32, value: Math.fround(value) }),
  f64: (value: number): NodeAttribute => ({ type: AttributeType.F64, value }),
  boolArray: (value: readonly boolean[]): NodeAttribute => ({ type: AttributeType.BoolArray, value }),
  i32Array: (value: ArrayLike<number>): NodeAttribute => ({ type: AttributeType.I32Array, value: Int32Array.from(value) }),
  i64Array: (value: ArrayLike<bigint>): NodeAttribute => ({ type: AttributeType.I64Array, value: BigInt64Array.from(value) }),
  f32Array: (value: ArrayLike<number>): NodeAttribute => ({ type: AttributeType.F32Array, value: Float32Array.from(value) }),
  f64Array: (value: ArrayLike<number>): NodeAttribute => ({ type: AttributeType.F64Array, value: Float64Array.from(value) }),
  string: (value: string): NodeAttribute => ({ type: AttributeType.String, value }),
  binary: (value: Uint8Array): NodeAttribute => ({ type: AttributeType.Binary, value }),
};

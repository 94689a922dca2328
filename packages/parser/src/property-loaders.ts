/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Property loaders - decode the value part of a `P` entry into a requested type
 *
 * Loaders widen only where no information is lost: an i16 stored value loads
 * as i32, an f32 as f64. Anything else is a PropertyTypeMismatch naming the
 * stored attribute types.
 */

import { AttributeType, attributeTypeName, propertyTypeMismatch } from '@fbxdoc/data';
import type { NodeAttribute } from '@fbxdoc/data';
import type { PropertyHandle } from './properties-node.js';

export interface PropertyLoader<T> {
  /** Human readable name of the requested type, used in errors */
  readonly expecting: string;
  load(property: PropertyHandle): T;
}

function describeValues(values: readonly NodeAttribute[]): string {
  if (values.length === 0) return 'no value';
  return values.map(value => attributeTypeName(value.type)).join(', ');
}

function singleValue(property: PropertyHandle, expecting: string): NodeAttribute {
  const values = property.valueAttributes;
  if (values.length !== 1) {
    throw propertyTypeMismatch(property.name, expecting, `${values.length} values (${describeValues(values)})`);
  }
  return values[0];
}

const INTEGER_RANGES = {
  i16: { min: -0x8000, max: 0x7fff },
  i32: { min: -0x80000000, max: 0x7fffffff },
} as const;

export class IntegerLoader implements PropertyLoader<number> {
  constructor(readonly expecting: 'i16' | 'i32') {}

  load(property: PropertyHandle): number {
    const value = singleValue(property, this.expecting);
    const { min, max } = INTEGER_RANGES[this.expecting];

    let loaded: number | undefined;
    switch (value.type) {
      case AttributeType.I16:
      case AttributeType.I32:
        loaded = value.value;
        break;
      case AttributeType.I64:
        if (value.value >= BigInt(min) && value.value <= BigInt(max)) {
          loaded = Number(value.value);
        }
        break;
      default:
        break;
    }

    if (loaded === undefined || loaded < min || loaded > max) {
      throw propertyTypeMismatch(property.name, this.expecting, `${attributeTypeName(value.type)} ${String(value.value)}`);
    }
    return loaded;
  }
}

export class BigIntLoader implements PropertyLoader<bigint> {
  readonly expecting = 'i64';

  load(property: PropertyHandle): bigint {
    const value = singleValue(property, this.expecting);
    switch (value.type) {
      case AttributeType.I16:
      case AttributeType.I32:
        return BigInt(value.value);
      case AttributeType.I64:
        return value.value;
      default:
        throw propertyTypeMismatch(property.name, this.expecting, attributeTypeName(value.type));
    }
  }
}

export class FloatLoader implements PropertyLoader<number> {
  constructor(readonly expecting: 'f32' | 'f64') {}

  load(property: PropertyHandle): number {
    const value = singleValue(property, this.expecting);
    if (value.type === AttributeType.F32 || (value.type === AttributeType.F64 && this.expecting === 'f64')) {
      return value.value;
    }
    throw propertyTypeMismatch(property.name, this.expecting, attributeTypeName(value.type));
  }
}

/** Booleans are usually stored as i32 0/1 under the "bool" type name */
export class BoolLoader implements PropertyLoader<boolean> {
  readonly expecting = 'bool';

  load(property: PropertyHandle): boolean {
    const value = singleValue(property, this.expecting);
    switch (value.type) {
      case AttributeType.Bool:
        return value.value;
      case AttributeType.I16:
      case AttributeType.I32:
        if (value.value === 0 || value.value === 1) return value.value === 1;
        break;
      case AttributeType.I64:
        if (value.value === 0n || value.value === 1n) return value.value === 1n;
        break;
      default:
        break;
    }
    throw propertyTypeMismatch(property.name, this.expecting, `${attributeTypeName(value.type)} ${String(value.value)}`);
  }
}

export class StringLoader implements PropertyLoader<string> {
  readonly expecting = 'string';

  load(property: PropertyHandle): string {
    const value = singleValue(property, this.expecting);
    if (value.type === AttributeType.String) {
      return value.value;
    }
    throw propertyTypeMismatch(property.name, this.expecting, attributeTypeName(value.type));
  }
}

export class BinaryLoader implements PropertyLoader<Uint8Array> {
  readonly expecting = 'binary';

  load(property: PropertyHandle): Uint8Array {
    const value = singleValue(property, this.expecting);
    if (value.type === AttributeType.Binary) {
      return value.value;
    }
    throw propertyTypeMismatch(property.name, this.expecting, attributeTypeName(value.type));
  }
}

/**
 * Fixed-length float tuple spread over several value attributes,
 * as used by "Vector3D", "ColorRGB", "Lcl Translation" and friends
 */
export class Float64VectorLoader implements PropertyLoader<number[]> {
  readonly expecting: string;

  constructor(readonly length: number) {
    this.expecting = `${length} f64 values`;
  }

  load(property: PropertyHandle): number[] {
    const values = property.valueAttributes;
    const components: number[] = [];
    for (const value of values) {
      if (value.type !== AttributeType.F32 && value.type !== AttributeType.F64) break;
      components.push(value.value);
    }
    if (values.length !== this.length || components.length !== this.length) {
      throw propertyTypeMismatch(property.name, this.expecting, describeValues(values));
    }
    return components;
  }
}

/** Ready-made loader instances */
export const loaders = {
  bool: new BoolLoader(),
  i16: new IntegerLoader('i16'),
  i32: new IntegerLoader('i32'),
  i64: new BigIntLoader(),
  f32: new FloatLoader('f32'),
  f64: new FloatLoader('f64'),
  string: new StringLoader(),
  binary: new BinaryLoader(),
  vec3: new Float64VectorLoader(3),
} as const;

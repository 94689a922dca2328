/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Tests for typed loading of property values
 */

import { describe, it, expect } from 'vitest';
import { FbxDocumentError, attr } from '@fbxdoc/data';
import { Float64VectorLoader, loaders } from '../src/index.js';
import type { PropertyLoader } from '../src/index.js';
import { handleOf, p } from './helpers.js';
import type { NodeAttribute } from '@fbxdoc/data';

function load<T>(loader: PropertyLoader<T>, ...values: NodeAttribute[]): T {
  return handleOf(p('Value', 'test', ...values)).value(loader);
}

function mismatch<T>(loader: PropertyLoader<T>, ...values: NodeAttribute[]): string {
  try {
    load(loader, ...values);
  } catch (error) {
    if (error instanceof FbxDocumentError && error.kind === 'PropertyTypeMismatch') {
      return error.message;
    }
    throw error;
  }
  throw new Error('expected a type mismatch');
}

describe('integer loaders', () => {
  it('should load stored integers', () => {
    expect(load(loaders.i32, attr.i32(-7))).toBe(-7);
    expect(load(loaders.i16, attr.i16(12))).toBe(12);
  });

  it('should widen i16 to i32', () => {
    expect(load(loaders.i32, attr.i16(-3))).toBe(-3);
  });

  it('should accept i64 values that fit', () => {
    expect(load(loaders.i32, attr.i64(7n))).toBe(7);
    expect(load(loaders.i32, attr.i64(-2147483648n))).toBe(-2147483648);
  });

  it('should reject i64 values out of range', () => {
    expect(mismatch(loaders.i32, attr.i64(2147483648n))).toBe(
      'property `Value` has an incompatible type: expected i32 but got i64 2147483648'
    );
  });

  it('should reject i32 values that do not fit in i16', () => {
    expect(mismatch(loaders.i16, attr.i32(40000))).toBe(
      'property `Value` has an incompatible type: expected i16 but got i32 40000'
    );
  });

  it('should not truncate floats', () => {
    expect(mismatch(loaders.i32, attr.f64(1.5))).toBe(
      'property `Value` has an incompatible type: expected i32 but got f64 1.5'
    );
  });

  it('should load any integer as i64', () => {
    expect(load(loaders.i64, attr.i32(5))).toBe(5n);
    expect(load(loaders.i64, attr.i64(-9007199254740993n))).toBe(-9007199254740993n);
    expect(mismatch(loaders.i64, attr.f64(5))).toBe('property `Value` has an incompatible type: expected i64 but got f64');
  });
});

describe('float loaders', () => {
  it('should widen f32 to f64', () => {
    expect(load(loaders.f64, attr.f32(0.1))).toBe(Math.fround(0.1));
    expect(load(loaders.f64, attr.f64(2.5))).toBe(2.5);
  });

  it('should not narrow f64 to f32', () => {
    expect(load(loaders.f32, attr.f32(0.5))).toBe(0.5);
    expect(mismatch(loaders.f32, attr.f64(0.5))).toBe(
      'property `Value` has an incompatible type: expected f32 but got f64'
    );
  });

  it('should not convert integers', () => {
    expect(mismatch(loaders.f64, attr.i32(100))).toBe(
      'property `Value` has an incompatible type: expected f64 but got i32'
    );
  });
});

describe('bool loader', () => {
  it('should load stored booleans and 0/1 integers', () => {
    expect(load(loaders.bool, attr.bool(true))).toBe(true);
    expect(load(loaders.bool, attr.i32(1))).toBe(true);
    expect(load(loaders.bool, attr.i32(0))).toBe(false);
    expect(load(loaders.bool, attr.i64(1n))).toBe(true);
  });

  it('should reject other integers', () => {
    expect(mismatch(loaders.bool, attr.i32(2))).toBe(
      'property `Value` has an incompatible type: expected bool but got i32 2'
    );
  });
});

describe('string and binary loaders', () => {
  it('should load matching values', () => {
    expect(load(loaders.string, attr.string('Cube'))).toBe('Cube');
    expect(load(loaders.binary, attr.binary(Uint8Array.from([1, 2])))).toEqual(Uint8Array.from([1, 2]));
  });

  it('should reject other types', () => {
    expect(mismatch(loaders.string, attr.i32(1))).toBe(
      'property `Value` has an incompatible type: expected string but got i32'
    );
    expect(mismatch(loaders.binary, attr.string('x'))).toBe(
      'property `Value` has an incompatible type: expected binary but got string'
    );
  });
});

describe('value count', () => {
  it('should report a missing value', () => {
    expect(mismatch(loaders.i32)).toBe('property `Value` has an incompatible type: expected i32 but got 0 values (no value)');
  });

  it('should report extra values', () => {
    expect(mismatch(loaders.f64, attr.f64(1), attr.f64(2))).toBe(
      'property `Value` has an incompatible type: expected f64 but got 2 values (f64, f64)'
    );
  });
});

describe('vector loader', () => {
  it('should load three components', () => {
    expect(load(loaders.vec3, attr.f64(1), attr.f64(2), attr.f64(3))).toEqual([1, 2, 3]);
    expect(load(loaders.vec3, attr.f32(0.5), attr.f64(2), attr.f64(3))).toEqual([0.5, 2, 3]);
  });

  it('should support other lengths', () => {
    expect(load(new Float64VectorLoader(2), attr.f64(4), attr.f64(5))).toEqual([4, 5]);
  });

  it('should reject the wrong count', () => {
    expect(mismatch(loaders.vec3, attr.f64(1), attr.f64(2))).toBe(
      'property `Value` has an incompatible type: expected 3 f64 values but got f64, f64'
    );
  });

  it('should reject non-float components', () => {
    expect(mismatch(loaders.vec3, attr.f64(1), attr.string('y'), attr.f64(3))).toBe(
      'property `Value` has an incompatible type: expected 3 f64 values but got f64, string, f64'
    );
  });
});

/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Tests for unit scale validation
 */

import { describe, it, expect } from 'vitest';
import { isFbxDocumentError } from '@fbxdoc/data';
import { UnitScaleFactor, classifyFloat } from '../src/index.js';

describe('classifyFloat', () => {
  it('should classify every kind of double', () => {
    expect(classifyFloat(Number.NaN)).toBe('Nan');
    expect(classifyFloat(Number.NEGATIVE_INFINITY)).toBe('Infinite');
    expect(classifyFloat(-0)).toBe('Zero');
    expect(classifyFloat(5e-324)).toBe('Subnormal');
    expect(classifyFloat(2.2250738585072014e-308)).toBe('Normal');
    expect(classifyFloat(-2.54)).toBe('Normal');
  });
});

describe('UnitScaleFactor', () => {
  it('should accept normal values', () => {
    expect(UnitScaleFactor.create(100).unitInMeters).toBe(1);
    expect(UnitScaleFactor.create(2.54).unitInCentimeters).toBe(2.54);
    expect(UnitScaleFactor.create(-1).unitInCentimeters).toBe(-1);
  });

  it('should convert lengths to centimeters', () => {
    expect(UnitScaleFactor.create(100).toCentimeters(3)).toBe(300);
    expect(UnitScaleFactor.create(2.54).toCentimeters(10)).toBeCloseTo(25.4);
  });

  it('should compare by value', () => {
    expect(UnitScaleFactor.create(1).equals(UnitScaleFactor.create(1))).toBe(true);
    expect(UnitScaleFactor.create(1).equals(UnitScaleFactor.create(100))).toBe(false);
  });

  it.each([
    { value: 0, floatClass: 'Zero' },
    { value: Number.POSITIVE_INFINITY, floatClass: 'Infinite' },
    { value: Number.NaN, floatClass: 'Nan' },
    { value: 5e-324, floatClass: 'Subnormal' },
  ])('should reject $floatClass values', ({ value, floatClass }) => {
    let caught: unknown;
    try {
      UnitScaleFactor.create(value);
    } catch (error) {
      caught = error;
    }
    expect(isFbxDocumentError(caught, 'InvalidNumericValue')).toBe(true);
    expect(caught).toMatchObject({ message: `Expected "normal" floating-point number, but got ${floatClass}` });
  });
});

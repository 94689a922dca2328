/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Unit scale factor - length of one document unit in centimeters
 *
 * 1.0 means the document is in centimeters, 100.0 in meters, 2.54 in inches.
 * Some applications ignore this value on import, so results may differ
 * between tools depending on whether they apply it.
 */

import { invalidNumericValue } from '@fbxdoc/data';

export type FloatClass = 'Nan' | 'Infinite' | 'Zero' | 'Subnormal' | 'Normal';

/** Smallest positive normal double, 2^-1022 */
const MIN_NORMAL = 2.2250738585072014e-308;

export function classifyFloat(value: number): FloatClass {
  if (Number.isNaN(value)) return 'Nan';
  if (!Number.isFinite(value)) return 'Infinite';
  if (value === 0) return 'Zero';
  if (Math.abs(value) < MIN_NORMAL) return 'Subnormal';
  return 'Normal';
}

export class UnitScaleFactor {
  private constructor(readonly unitInCentimeters: number) {}

  /** Throws InvalidNumericValue for zero, infinite, subnormal and NaN values */
  static create(unitInCentimeters: number): UnitScaleFactor {
    const floatClass = classifyFloat(unitInCentimeters);
    if (floatClass !== 'Normal') {
      throw invalidNumericValue(`Expected "normal" floating-point number, but got ${floatClass}`, unitInCentimeters);
    }
    return new UnitScaleFactor(unitInCentimeters);
  }

  get unitInMeters(): number {
    return this.unitInCentimeters / 100;
  }

  /** Convert a length in document units to centimeters */
  toCentimeters(length: number): number {
    return length * this.unitInCentimeters;
  }

  equals(other: UnitScaleFactor): boolean {
    return this.unitInCentimeters === other.unitInCentimeters;
  }
}

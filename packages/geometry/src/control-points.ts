/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Control points - vertex positions of a mesh, flat [x,y,z, x,y,z, ...]
 */

import { invalidNodeAttribute } from '@fbxdoc/data';
import { ControlPointIndex, isIndexBelow } from './indices.js';
import type { NumericArray, Vec3 } from './vectors.js';

export class ControlPoints {
  private constructor(private readonly positions: NumericArray) {}

  static fromFlat(positions: NumericArray): ControlPoints {
    if (positions.length % 3 !== 0) {
      throw invalidNodeAttribute('Vertices', `expected a multiple of 3 components but got ${positions.length}`, {
        length: positions.length,
      });
    }
    return new ControlPoints(positions);
  }

  get count(): number {
    return this.positions.length / 3;
  }

  /**
   * Position of a control point. Out of range indices yield undefined:
   * malformed files may reference vertices that do not exist.
   */
  get(index: ControlPointIndex): Vec3 | undefined {
    if (!isIndexBelow(index.value, this.count)) {
      return undefined;
    }
    const base = index.value * 3;
    return {
      x: this.positions[base],
      y: this.positions[base + 1],
      z: this.positions[base + 2],
    };
  }

  /** Checked conversion from a raw integer */
  controlPointIndex(raw: number): ControlPointIndex | undefined {
    return isIndexBelow(raw, this.count) ? new ControlPointIndex(raw) : undefined;
  }

  *indices(): IterableIterator<ControlPointIndex> {
    for (let i = 0; i < this.count; i++) {
      yield new ControlPointIndex(i);
    }
  }
}

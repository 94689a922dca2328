/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Axes and axis systems
 *
 * GlobalSettings stores each basis direction as two i32 properties, an axis
 * code (0 = X, 1 = Y, 2 = Z) and a sign (1 or -1).
 */

import { FbxDocumentError, assertInvariant, invalidEnumValue } from '@fbxdoc/data';

export enum Axis {
  X = 'X',
  Y = 'Y',
  Z = 'Z',
}

export enum SignedAxis {
  PosX = '+X',
  NegX = '-X',
  PosY = '+Y',
  NegY = '-Y',
  PosZ = '+Z',
  NegZ = '-Z',
}

export enum Handedness {
  Right = 'right',
  Left = 'left',
}

/** Indexed by axis code, then [positive, negative] */
const SIGNED_AXES: readonly (readonly [SignedAxis, SignedAxis])[] = [
  [SignedAxis.PosX, SignedAxis.NegX],
  [SignedAxis.PosY, SignedAxis.NegY],
  [SignedAxis.PosZ, SignedAxis.NegZ],
];

const AXIS_OF: Record<SignedAxis, Axis> = {
  [SignedAxis.PosX]: Axis.X,
  [SignedAxis.NegX]: Axis.X,
  [SignedAxis.PosY]: Axis.Y,
  [SignedAxis.NegY]: Axis.Y,
  [SignedAxis.PosZ]: Axis.Z,
  [SignedAxis.NegZ]: Axis.Z,
};

export function axisOf(axis: SignedAxis): Axis {
  return AXIS_OF[axis];
}

export function signOf(axis: SignedAxis): 1 | -1 {
  return axis.startsWith('+') ? 1 : -1;
}

export function unitVector(axis: SignedAxis): [number, number, number] {
  const vector: [number, number, number] = [0, 0, 0];
  const component = axisOf(axis) === Axis.X ? 0 : axisOf(axis) === Axis.Y ? 1 : 2;
  vector[component] = signOf(axis);
  return vector;
}

/**
 * Decode an (axis code, sign) pair read from the `<axisName>Axis` and
 * `<axisName>AxisSign` properties.
 *
 * Every combination of (code valid, sign valid) has its own branch. When both
 * are valid the table always has an entry; a miss there is a bug in this
 * function and raises InvariantError, not InvalidEnumValue.
 */
export function decodeSignedAxis(axisName: string, code: number, sign: number): SignedAxis {
  const codeValid = code === 0 || code === 1 || code === 2;
  const signValid = sign === 1 || sign === -1;

  if (codeValid && signValid) {
    const axis: SignedAxis | undefined = SIGNED_AXES[code]?.[sign === 1 ? 0 : 1];
    assertInvariant(
      axis !== undefined,
      `no signed axis for a valid pair: axisName=${axisName}, axis=${code}, sign=${sign}`
    );
    return axis;
  }
  if (!codeValid) {
    // Reported whether or not the sign is also wrong
    throw invalidEnumValue(`${axisName}Axis`, '0, 1, or 2', code);
  }
  throw invalidEnumValue(`${axisName}AxisSign`, '1 or -1', sign);
}

export class AxisSystem {
  private constructor(
    readonly up: SignedAxis,
    readonly front: SignedAxis,
    readonly right: SignedAxis
  ) {}

  /** Undefined unless the three directions lie on three different axes */
  static fromUpFrontRight(up: SignedAxis, front: SignedAxis, right: SignedAxis): AxisSystem | undefined {
    const axes = new Set([axisOf(up), axisOf(front), axisOf(right)]);
    return axes.size === 3 ? new AxisSystem(up, front, right) : undefined;
  }

  /** Throwing variant used by settings readers */
  static require(up: SignedAxis, front: SignedAxis, right: SignedAxis): AxisSystem {
    const system = AxisSystem.fromUpFrontRight(up, front, right);
    if (!system) {
      throw new FbxDocumentError(
        'InvalidEnumValue',
        `invalid axis system: (up, front, right) = (${up}, ${front}, ${right})`,
        { up, front, right }
      );
    }
    return system;
  }

  /** Right-handed when right × up = front */
  get handedness(): Handedness {
    const [rx, ry, rz] = unitVector(this.right);
    const [ux, uy, uz] = unitVector(this.up);
    const cross = [ry * uz - rz * uy, rz * ux - rx * uz, rx * uy - ry * ux];
    const front = unitVector(this.front);
    return cross.every((c, i) => c === front[i]) ? Handedness.Right : Handedness.Left;
  }

  equals(other: AxisSystem): boolean {
    return this.up === other.up && this.front === other.front && this.right === other.right;
  }

  toString(): string {
    return `(up, front, right) = (${this.up}, ${this.front}, ${this.right})`;
  }
}

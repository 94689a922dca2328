/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export interface Vec2 {
  x: number;
  y: number;
}

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

/** Flat numeric buffers as stored in geometry nodes */
export type NumericArray = Float32Array | Float64Array;

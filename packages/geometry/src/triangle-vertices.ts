/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Triangle vertices - fan triangulation view over polygon vertices
 *
 * A polygon with vertices v0..v(n-1) yields n-2 triangles; triangle k is
 * (v0, v(k+1), v(k+2)). Nothing is materialized: since every polygon has at
 * least 3 vertices, the first triangle of polygon p is `start(p) - 2p`, and
 * all conversions are index arithmetic plus a binary search.
 *
 * Non-convex polygons get the same fan, so their triangles may overlap or
 * fall outside the polygon.
 */

import { assertInvariant } from '@fbxdoc/data';
import {
  ControlPointIndex,
  PolygonIndex,
  PolygonVertexIndex,
  TriangleIndex,
  TriangleVertexIndex,
  isIndexBelow,
} from './indices.js';
import type {
  IntoControlPointIndexWithTriangleVertices,
  IntoPolygonVertexIndexWithTriangleVertices,
} from './indices.js';
import type { PolygonVertices } from './polygon-vertices.js';

export class TriangleVertices {
  private constructor(readonly polygonVertices: PolygonVertices) {}

  static of(polygonVertices: PolygonVertices): TriangleVertices {
    return new TriangleVertices(polygonVertices);
  }

  get triangleCount(): number {
    return this.polygonVertices.polygonVertexCount - 2 * this.polygonVertices.polygonCount;
  }

  get triangleVertexCount(): number {
    return this.triangleCount * 3;
  }

  /** Checked conversion from a raw integer */
  triangleIndex(raw: number): TriangleIndex | undefined {
    return isIndexBelow(raw, this.triangleCount) ? new TriangleIndex(raw) : undefined;
  }

  /** Checked conversion from a raw integer */
  triangleVertexIndex(raw: number): TriangleVertexIndex | undefined {
    return isIndexBelow(raw, this.triangleVertexCount) ? new TriangleVertexIndex(raw) : undefined;
  }

  polygonOf(triangle: TriangleIndex): PolygonIndex {
    this.assertTriangle(triangle);
    return new PolygonIndex(this.polygonOfTriangle(triangle.value));
  }

  trianglesOf(polygon: PolygonIndex): TriangleIndex[] {
    const first = this.firstTriangleOf(polygon.value);
    const count = this.polygonVertices.vertexCountOf(polygon) - 2;
    return Array.from({ length: count }, (_, k) => new TriangleIndex(first + k));
  }

  triangleVertexIndicesOf(triangle: TriangleIndex): [TriangleVertexIndex, TriangleVertexIndex, TriangleVertexIndex] {
    this.assertTriangle(triangle);
    const base = triangle.value * 3;
    return [new TriangleVertexIndex(base), new TriangleVertexIndex(base + 1), new TriangleVertexIndex(base + 2)];
  }

  polygonVertexOf(index: IntoPolygonVertexIndexWithTriangleVertices): PolygonVertexIndex {
    if (!(index instanceof TriangleVertexIndex)) {
      return index.toPolygonVertexIndex(this);
    }
    assertInvariant(
      isIndexBelow(index.value, this.triangleVertexCount),
      `${index} is out of range for a mesh with ${this.triangleVertexCount} triangle vertices`
    );
    const triangle = Math.floor(index.value / 3);
    const corner = index.value % 3;
    const polygon = this.polygonOfTriangle(triangle);
    const k = triangle - this.firstTriangleOf(polygon);
    const offset = corner === 0 ? 0 : k + corner;
    return new PolygonVertexIndex(this.polygonVertices.offsetOf(polygon) + offset);
  }

  controlPointOf(index: IntoControlPointIndexWithTriangleVertices): ControlPointIndex {
    if (!(index instanceof TriangleVertexIndex)) {
      return index.toControlPointIndex(this);
    }
    return this.polygonVertices.controlPointOf(this.polygonVertexOf(index));
  }

  /** Control point indices of the three corners of one triangle */
  controlPointsOf(triangle: TriangleIndex): [ControlPointIndex, ControlPointIndex, ControlPointIndex] {
    const [a, b, c] = this.triangleVertexIndicesOf(triangle);
    return [this.controlPointOf(a), this.controlPointOf(b), this.controlPointOf(c)];
  }

  *triangles(): IterableIterator<TriangleIndex> {
    for (let i = 0; i < this.triangleCount; i++) {
      yield new TriangleIndex(i);
    }
  }

  private firstTriangleOf(polygon: number): number {
    return this.polygonVertices.offsetOf(polygon) - 2 * polygon;
  }

  private polygonOfTriangle(triangle: number): number {
    let lo = 0;
    let hi = this.polygonVertices.polygonCount - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >>> 1;
      if (this.firstTriangleOf(mid) <= triangle) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return lo;
  }

  private assertTriangle(triangle: TriangleIndex): void {
    assertInvariant(
      isIndexBelow(triangle.value, this.triangleCount),
      `${triangle} is out of range for a mesh with ${this.triangleCount} triangles`
    );
  }
}

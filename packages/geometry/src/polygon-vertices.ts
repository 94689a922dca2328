/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Polygon vertices - decoded `PolygonVertexIndex` buffer
 *
 * On the wire, the last vertex of every polygon is stored as the bitwise
 * complement of its control point index, so a negative entry closes a polygon:
 *
 *   [0, 1, 2, ~3, 4, 5, ~6]  =>  polygons [0, 1, 2, 3] and [4, 5, 6]
 *
 * The buffer is scanned once; afterwards every query is O(1) or a binary
 * search over the polygon start offsets.
 */

import { assertInvariant, malformedIndexBuffer } from '@fbxdoc/data';
import {
  ControlPointIndex,
  PolygonIndex,
  PolygonVertex,
  PolygonVertexIndex,
  isIndexBelow,
} from './indices.js';

const MIN_POLYGON_VERTICES = 3;

export class PolygonVertices {
  private constructor(
    /** The unmodified wire buffer */
    readonly raw: Int32Array,
    /** Control point index per polygon vertex, complement encoding removed */
    private readonly controlPoints: Uint32Array,
    /** Start offset of each polygon, plus one trailing entry equal to the vertex count */
    private readonly starts: Uint32Array
  ) {}

  static decode(raw: Int32Array): PolygonVertices {
    const controlPoints = new Uint32Array(raw.length);
    const starts: number[] = [0];
    let start = 0;

    for (let i = 0; i < raw.length; i++) {
      const entry = raw[i];
      if (entry >= 0) {
        controlPoints[i] = entry;
        continue;
      }

      controlPoints[i] = ~entry;
      const length = i + 1 - start;
      if (length < MIN_POLYGON_VERTICES) {
        throw malformedIndexBuffer(
          `polygon ${starts.length - 1} at offset ${start} has ${length} vertices, expected at least ${MIN_POLYGON_VERTICES}`,
          { polygon: starts.length - 1, offset: start, length }
        );
      }
      start = i + 1;
      starts.push(start);
    }

    if (start !== raw.length) {
      throw malformedIndexBuffer(
        `index buffer does not end on a polygon boundary: ${raw.length - start} vertices after offset ${start} are not closed`,
        { offset: start, length: raw.length - start }
      );
    }

    return new PolygonVertices(raw, controlPoints, Uint32Array.from(starts));
  }

  get polygonCount(): number {
    return this.starts.length - 1;
  }

  get polygonVertexCount(): number {
    return this.controlPoints.length;
  }

  /** Checked conversion from a raw integer */
  polygonIndex(raw: number): PolygonIndex | undefined {
    return isIndexBelow(raw, this.polygonCount) ? new PolygonIndex(raw) : undefined;
  }

  /** Checked conversion from a raw integer */
  polygonVertexIndex(raw: number): PolygonVertexIndex | undefined {
    return isIndexBelow(raw, this.polygonVertexCount) ? new PolygonVertexIndex(raw) : undefined;
  }

  controlPointOf(index: PolygonVertexIndex): ControlPointIndex {
    this.assertPolygonVertex(index);
    return new ControlPointIndex(this.controlPoints[index.value]);
  }

  polygonOf(index: PolygonVertexIndex): PolygonIndex {
    this.assertPolygonVertex(index);
    // Last polygon whose start offset is <= index
    let lo = 0;
    let hi = this.polygonCount - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >>> 1;
      if (this.starts[mid] <= index.value) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return new PolygonIndex(lo);
  }

  vertexCountOf(polygon: PolygonIndex): number {
    this.assertPolygon(polygon);
    return this.starts[polygon.value + 1] - this.starts[polygon.value];
  }

  polygonVertexIndicesOf(polygon: PolygonIndex): PolygonVertexIndex[] {
    this.assertPolygon(polygon);
    const indices: PolygonVertexIndex[] = [];
    for (let i = this.starts[polygon.value]; i < this.starts[polygon.value + 1]; i++) {
      indices.push(new PolygonVertexIndex(i));
    }
    return indices;
  }

  verticesOf(polygon: PolygonIndex): PolygonVertex[] {
    return this.polygonVertexIndicesOf(polygon).map(
      index => new PolygonVertex(index, polygon, new ControlPointIndex(this.controlPoints[index.value]))
    );
  }

  /** Control point indices of one polygon, in winding order */
  controlPointsOf(polygon: PolygonIndex): ControlPointIndex[] {
    return this.verticesOf(polygon).map(vertex => vertex.controlPoint);
  }

  *polygons(): IterableIterator<PolygonIndex> {
    for (let i = 0; i < this.polygonCount; i++) {
      yield new PolygonIndex(i);
    }
  }

  /**
   * Offset of the first vertex of polygon `polygon` in the flat vertex
   * sequence; `polygon === polygonCount` gives the total vertex count.
   * @internal used by the triangle view
   */
  offsetOf(polygon: number): number {
    return this.starts[polygon];
  }

  private assertPolygonVertex(index: PolygonVertexIndex): void {
    assertInvariant(
      isIndexBelow(index.value, this.polygonVertexCount),
      `${index} is out of range for a mesh with ${this.polygonVertexCount} polygon vertices`
    );
  }

  private assertPolygon(polygon: PolygonIndex): void {
    assertInvariant(
      isIndexBelow(polygon.value, this.polygonCount),
      `${polygon} is out of range for a mesh with ${this.polygonCount} polygons`
    );
  }
}

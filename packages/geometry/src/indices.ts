/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Index spaces of a mesh
 *
 * Each space is its own class with a private brand, so a control point index
 * cannot be passed where a polygon vertex index is expected (and so on).
 * Conversions between spaces always go through the structure that owns the
 * mapping.
 */

import type { PolygonVertices } from './polygon-vertices.js';
import type { TriangleVertices } from './triangle-vertices.js';

/** Something that resolves to a control point given the polygon vertices of its mesh */
export interface IntoControlPointIndexWithPolygonVertices {
  toControlPointIndex(polygonVertices: PolygonVertices): ControlPointIndex;
}

/** Something that resolves to a control point given the triangle vertices of its mesh */
export interface IntoControlPointIndexWithTriangleVertices {
  toControlPointIndex(triangleVertices: TriangleVertices): ControlPointIndex;
}

/** Something that resolves to a polygon vertex given the triangle vertices of its mesh */
export interface IntoPolygonVertexIndexWithTriangleVertices {
  toPolygonVertexIndex(triangleVertices: TriangleVertices): PolygonVertexIndex;
}

export class ControlPointIndex
  implements IntoControlPointIndexWithPolygonVertices, IntoControlPointIndexWithTriangleVertices
{
  private readonly space = 'controlPoint' as const;

  constructor(readonly value: number) {}

  toControlPointIndex(): ControlPointIndex {
    return this;
  }

  equals(other: ControlPointIndex): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return `ControlPointIndex(${this.value})`;
  }
}

/** Index into the flat per-vertex sequence across all polygons */
export class PolygonVertexIndex
  implements
    IntoControlPointIndexWithPolygonVertices,
    IntoControlPointIndexWithTriangleVertices,
    IntoPolygonVertexIndexWithTriangleVertices
{
  private readonly space = 'polygonVertex' as const;

  constructor(readonly value: number) {}

  toControlPointIndex(source: PolygonVertices | TriangleVertices): ControlPointIndex {
    const polygonVertices = 'polygonVertices' in source ? source.polygonVertices : source;
    return polygonVertices.controlPointOf(this);
  }

  toPolygonVertexIndex(): PolygonVertexIndex {
    return this;
  }

  equals(other: PolygonVertexIndex): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return `PolygonVertexIndex(${this.value})`;
  }
}

export class PolygonIndex {
  private readonly space = 'polygon' as const;

  constructor(readonly value: number) {}

  equals(other: PolygonIndex): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return `PolygonIndex(${this.value})`;
  }
}

export class TriangleIndex {
  private readonly space = 'triangle' as const;

  constructor(readonly value: number) {}

  equals(other: TriangleIndex): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return `TriangleIndex(${this.value})`;
  }
}

/** One of the three corners of one triangle: `3 * triangle + corner` */
export class TriangleVertexIndex
  implements IntoControlPointIndexWithTriangleVertices, IntoPolygonVertexIndexWithTriangleVertices
{
  private readonly space = 'triangleVertex' as const;

  constructor(readonly value: number) {}

  get triangle(): TriangleIndex {
    return new TriangleIndex(Math.floor(this.value / 3));
  }

  /** 0, 1 or 2 */
  get corner(): number {
    return this.value % 3;
  }

  toControlPointIndex(triangleVertices: TriangleVertices): ControlPointIndex {
    return triangleVertices.controlPointOf(this);
  }

  toPolygonVertexIndex(triangleVertices: TriangleVertices): PolygonVertexIndex {
    return triangleVertices.polygonVertexOf(this);
  }

  equals(other: TriangleVertexIndex): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return `TriangleVertexIndex(${this.value})`;
  }
}

/** A polygon vertex with its owning polygon and referenced control point */
export class PolygonVertex implements IntoControlPointIndexWithPolygonVertices {
  constructor(
    readonly index: PolygonVertexIndex,
    readonly polygon: PolygonIndex,
    readonly controlPoint: ControlPointIndex
  ) {}

  toControlPointIndex(): ControlPointIndex {
    return this.controlPoint;
  }
}

/** Non-negative safe integer strictly below `bound` */
export function isIndexBelow(raw: number, bound: number): boolean {
  return Number.isInteger(raw) && raw >= 0 && raw < bound;
}

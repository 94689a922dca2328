/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @fbxdoc/geometry - mesh index model
 *
 * Three index spaces: control points (positions), polygon vertices (corners
 * of decoded polygons) and triangle vertices (corners of the fan
 * triangulation). Each has its own index type.
 */

export {
  ControlPointIndex,
  PolygonIndex,
  PolygonVertex,
  PolygonVertexIndex,
  TriangleIndex,
  TriangleVertexIndex,
  isIndexBelow,
} from './indices.js';
export type {
  IntoControlPointIndexWithPolygonVertices,
  IntoControlPointIndexWithTriangleVertices,
  IntoPolygonVertexIndexWithTriangleVertices,
} from './indices.js';
export { ControlPoints } from './control-points.js';
export { PolygonVertices } from './polygon-vertices.js';
export { TriangleVertices } from './triangle-vertices.js';
export {
  LayerElement,
  NormalLayer,
  UvLayer,
  ColorLayer,
  MaterialLayer,
  MappingMode,
  ReferenceMode,
  parseMappingMode,
  parseReferenceMode,
} from './layer-element.js';
export type { LayerElementKind } from './layer-element.js';
export { MeshGeometry } from './mesh-geometry.js';
export type { Vec2, Vec3, Rgba, NumericArray } from './vectors.js';

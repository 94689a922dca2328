/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Mesh geometry - index model of one `Geometry` node of subclass `Mesh`
 */

import { AttributeType, createLogger, invalidNodeAttribute, isAttributeOf, nodeNotFound } from '@fbxdoc/data';
import type { TreeNode } from '@fbxdoc/data';
import { ControlPoints } from './control-points.js';
import type { IntoControlPointIndexWithTriangleVertices } from './indices.js';
import { ColorLayer, MaterialLayer, NormalLayer, UvLayer, readNumericArray } from './layer-element.js';
import type { LayerElementKind } from './layer-element.js';
import { PolygonVertices } from './polygon-vertices.js';
import { TriangleVertices } from './triangle-vertices.js';
import type { Vec3 } from './vectors.js';

const log = createLogger('Mesh');

function readPolygonVertexIndex(node: TreeNode): Int32Array {
  const child = node.firstChildByName('PolygonVertexIndex');
  if (!child) {
    throw nodeNotFound(`${node.name}/PolygonVertexIndex`);
  }
  const attribute = child.attributes[0];
  if (!isAttributeOf(attribute, AttributeType.I32Array)) {
    throw invalidNodeAttribute(`${node.name}/PolygonVertexIndex`, 'expected an i32 array', {
      actual: attribute?.type,
    });
  }
  return attribute.value;
}

export class MeshGeometry {
  private triangles: TriangleVertices | undefined;
  private readonly normalLayers = new Map<number, NormalLayer | undefined>();
  private readonly uvLayers = new Map<number, UvLayer | undefined>();
  private readonly colorLayers = new Map<number, ColorLayer | undefined>();
  private readonly materialLayers = new Map<number, MaterialLayer | undefined>();

  private constructor(
    readonly node: TreeNode,
    readonly controlPoints: ControlPoints,
    readonly polygonVertices: PolygonVertices
  ) {}

  static fromNode(node: TreeNode): MeshGeometry {
    const controlPoints = ControlPoints.fromFlat(readNumericArray(node, 'Vertices'));
    const polygonVertices = PolygonVertices.decode(readPolygonVertexIndex(node));
    log.debug('Decoded mesh', {
      controlPoints: controlPoints.count,
      polygons: polygonVertices.polygonCount,
      polygonVertices: polygonVertices.polygonVertexCount,
    });
    return new MeshGeometry(node, controlPoints, polygonVertices);
  }

  /** Fan triangulation, derived on first use */
  triangleVertices(): TriangleVertices {
    if (!this.triangles) {
      this.triangles = TriangleVertices.of(this.polygonVertices);
    }
    return this.triangles;
  }

  /** Position of a control point, polygon vertex or triangle vertex */
  position(index: IntoControlPointIndexWithTriangleVertices): Vec3 | undefined {
    return this.controlPoints.get(index.toControlPointIndex(this.triangleVertices()));
  }

  layerElementCount(kind: LayerElementKind): number {
    return this.node.childrenByName(`LayerElement${kind}`).length;
  }

  normals(layer = 0): NormalLayer | undefined {
    return this.layer(this.normalLayers, 'Normal', layer, node => new NormalLayer(node, this.polygonVertices));
  }

  uvs(layer = 0): UvLayer | undefined {
    return this.layer(this.uvLayers, 'UV', layer, node => new UvLayer(node, this.polygonVertices));
  }

  colors(layer = 0): ColorLayer | undefined {
    return this.layer(this.colorLayers, 'Color', layer, node => new ColorLayer(node, this.polygonVertices));
  }

  materials(layer = 0): MaterialLayer | undefined {
    return this.layer(this.materialLayers, 'Material', layer, node => new MaterialLayer(node, this.polygonVertices));
  }

  private layer<T>(
    cache: Map<number, T | undefined>,
    kind: LayerElementKind,
    layer: number,
    create: (node: TreeNode) => T
  ): T | undefined {
    if (cache.has(layer)) {
      return cache.get(layer);
    }
    const node = this.node.childrenByName(`LayerElement${kind}`)[layer];
    const element = node ? create(node) : undefined;
    cache.set(layer, element);
    return element;
  }
}

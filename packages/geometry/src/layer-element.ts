/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Layer elements - per-vertex or per-polygon attributes of a mesh
 *
 * A layer element node looks like:
 *
 *   LayerElementNormal: 0 {
 *     MappingInformationType: "ByPolygonVertex"
 *     ReferenceInformationType: "IndexToDirect"
 *     Normals: *N { a: ... }
 *     NormalsIndex: *M { a: ... }
 *   }
 *
 * The mapping mode says which index space the element is keyed by; the
 * reference mode says whether that key addresses the data directly or goes
 * through the index array first.
 */

import {
  AttributeType,
  invalidNodeAttribute,
  isAttributeOf,
  nodeNotFound,
  stringAttribute,
} from '@fbxdoc/data';
import type { TreeNode } from '@fbxdoc/data';
import type { PolygonIndex, PolygonVertexIndex } from './indices.js';
import type { PolygonVertices } from './polygon-vertices.js';
import type { NumericArray, Rgba, Vec2, Vec3 } from './vectors.js';

export enum MappingMode {
  ByControlPoint = 'ByControlPoint',
  ByPolygonVertex = 'ByPolygonVertex',
  ByPolygon = 'ByPolygon',
  ByEdge = 'ByEdge',
  AllSame = 'AllSame',
}

export enum ReferenceMode {
  Direct = 'Direct',
  IndexToDirect = 'IndexToDirect',
}

export type LayerElementKind = 'Normal' | 'UV' | 'Color' | 'Material';

/** Mapping names as written by exporters; `ByVertice` is the common spelling */
const MAPPING_NAMES: Record<string, MappingMode> = {
  ByVertice: MappingMode.ByControlPoint,
  ByVertex: MappingMode.ByControlPoint,
  ByControlPoint: MappingMode.ByControlPoint,
  ByPolygonVertex: MappingMode.ByPolygonVertex,
  ByPolygon: MappingMode.ByPolygon,
  ByEdge: MappingMode.ByEdge,
  AllSame: MappingMode.AllSame,
};

const REFERENCE_NAMES: Record<string, ReferenceMode> = {
  Direct: ReferenceMode.Direct,
  IndexToDirect: ReferenceMode.IndexToDirect,
  Index: ReferenceMode.IndexToDirect,
};

export function parseMappingMode(value: string): MappingMode | undefined {
  return Object.hasOwn(MAPPING_NAMES, value) ? MAPPING_NAMES[value] : undefined;
}

export function parseReferenceMode(value: string): ReferenceMode | undefined {
  return Object.hasOwn(REFERENCE_NAMES, value) ? REFERENCE_NAMES[value] : undefined;
}

function requireChild(node: TreeNode, name: string): TreeNode {
  const child = node.firstChildByName(name);
  if (!child) {
    throw nodeNotFound(`${node.name}/${name}`);
  }
  return child;
}

function readModeName(node: TreeNode, name: string): string {
  const value = stringAttribute(requireChild(node, name).attributes, 0);
  if (value === undefined) {
    throw invalidNodeAttribute(`${node.name}/${name}`, 'expected a string attribute');
  }
  return value;
}

export function readNumericArray(node: TreeNode, name: string): NumericArray {
  const attribute = requireChild(node, name).attributes[0];
  if (isAttributeOf(attribute, AttributeType.F64Array) || isAttributeOf(attribute, AttributeType.F32Array)) {
    return attribute.value;
  }
  throw invalidNodeAttribute(`${node.name}/${name}`, 'expected a floating point array', {
    actual: attribute?.type,
  });
}

export function readIndexArray(node: TreeNode, name: string): Int32Array {
  const attribute = requireChild(node, name).attributes[0];
  if (isAttributeOf(attribute, AttributeType.I32Array)) {
    return attribute.value;
  }
  throw invalidNodeAttribute(`${node.name}/${name}`, 'expected an i32 array', { actual: attribute?.type });
}

/**
 * Mapping and reference information shared by every layer element kind
 */
export class LayerElement {
  readonly mappingMode: MappingMode;
  readonly referenceMode: ReferenceMode;
  /** Index array, present for IndexToDirect */
  readonly index: Int32Array | undefined;
  /** `Name` child, when the exporter wrote one (UV sets usually do) */
  readonly name: string | undefined;

  constructor(
    readonly node: TreeNode,
    protected readonly polygonVertices: PolygonVertices,
    indexNodeName: string | undefined
  ) {
    const mappingName = readModeName(node, 'MappingInformationType');
    const mappingMode = parseMappingMode(mappingName);
    if (mappingMode === undefined) {
      throw invalidNodeAttribute(`${node.name}/MappingInformationType`, `unknown mapping mode "${mappingName}"`);
    }
    const referenceName = readModeName(node, 'ReferenceInformationType');
    const referenceMode = parseReferenceMode(referenceName);
    if (referenceMode === undefined) {
      throw invalidNodeAttribute(`${node.name}/ReferenceInformationType`, `unknown reference mode "${referenceName}"`);
    }

    this.mappingMode = mappingMode;
    this.referenceMode = referenceMode;
    this.index =
      referenceMode === ReferenceMode.IndexToDirect && indexNodeName !== undefined
        ? readIndexArray(node, indexNodeName)
        : undefined;
    const nameNode = node.firstChildByName('Name');
    this.name = nameNode ? stringAttribute(nameNode.attributes, 0) : undefined;
  }

  /** The key of a polygon vertex in this element's mapping space */
  mappingKeyOf(vertex: PolygonVertexIndex): number {
    switch (this.mappingMode) {
      case MappingMode.ByControlPoint:
        return this.polygonVertices.controlPointOf(vertex).value;
      case MappingMode.ByPolygonVertex:
        return vertex.value;
      case MappingMode.ByPolygon:
        return this.polygonVertices.polygonOf(vertex).value;
      case MappingMode.AllSame:
        return 0;
      case MappingMode.ByEdge:
        throw invalidNodeAttribute(`${this.node.name}/MappingInformationType`, 'ByEdge mapping is not supported');
    }
  }

  /** Index into the direct data array for a polygon vertex */
  valueIndexOf(vertex: PolygonVertexIndex): number {
    const key = this.mappingKeyOf(vertex);
    if (this.index === undefined) {
      return key;
    }
    if (key >= this.index.length || this.index[key] < 0) {
      throw invalidNodeAttribute(this.node.name, `no valid index entry for mapping key ${key}`, {
        key,
        indexLength: this.index.length,
      });
    }
    return this.index[key];
  }
}

/** A layer element whose direct data is a flat array of fixed-size tuples */
abstract class TupleLayerElement extends LayerElement {
  protected readonly values: NumericArray;

  constructor(
    node: TreeNode,
    polygonVertices: PolygonVertices,
    dataNodeName: string,
    indexNodeName: string,
    private readonly stride: number
  ) {
    super(node, polygonVertices, indexNodeName);
    this.values = readNumericArray(node, dataNodeName);
    if (this.values.length % stride !== 0) {
      throw invalidNodeAttribute(`${node.name}/${dataNodeName}`, `expected a multiple of ${stride} components`, {
        length: this.values.length,
      });
    }
  }

  get valueCount(): number {
    return this.values.length / this.stride;
  }

  protected tupleAt(vertex: PolygonVertexIndex): number {
    const valueIndex = this.valueIndexOf(vertex);
    if (valueIndex >= this.valueCount) {
      throw invalidNodeAttribute(this.node.name, `value index ${valueIndex} is out of range`, {
        valueIndex,
        valueCount: this.valueCount,
      });
    }
    return valueIndex * this.stride;
  }
}

export class NormalLayer extends TupleLayerElement {
  constructor(node: TreeNode, polygonVertices: PolygonVertices) {
    super(node, polygonVertices, 'Normals', 'NormalsIndex', 3);
  }

  normalAt(vertex: PolygonVertexIndex): Vec3 {
    const base = this.tupleAt(vertex);
    return { x: this.values[base], y: this.values[base + 1], z: this.values[base + 2] };
  }
}

export class UvLayer extends TupleLayerElement {
  constructor(node: TreeNode, polygonVertices: PolygonVertices) {
    super(node, polygonVertices, 'UV', 'UVIndex', 2);
  }

  uvAt(vertex: PolygonVertexIndex): Vec2 {
    const base = this.tupleAt(vertex);
    return { x: this.values[base], y: this.values[base + 1] };
  }
}

export class ColorLayer extends TupleLayerElement {
  constructor(node: TreeNode, polygonVertices: PolygonVertices) {
    super(node, polygonVertices, 'Colors', 'ColorIndex', 4);
  }

  colorAt(vertex: PolygonVertexIndex): Rgba {
    const base = this.tupleAt(vertex);
    return {
      r: this.values[base],
      g: this.values[base + 1],
      b: this.values[base + 2],
      a: this.values[base + 3],
    };
  }
}

/**
 * Material assignment. The `Materials` array is itself the lookup: it maps
 * the mapping key (polygon, or 0 for AllSame) to a material slot of the model.
 */
export class MaterialLayer extends LayerElement {
  private readonly materials: Int32Array;

  constructor(node: TreeNode, polygonVertices: PolygonVertices) {
    super(node, polygonVertices, undefined);
    this.materials = readIndexArray(node, 'Materials');
  }

  materialOf(polygon: PolygonIndex): number {
    const first = this.polygonVertices.polygonVertexIndicesOf(polygon)[0];
    const key = this.mappingKeyOf(first);
    if (key >= this.materials.length) {
      throw invalidNodeAttribute(`${this.node.name}/Materials`, `no material entry for mapping key ${key}`, {
        key,
        length: this.materials.length,
      });
    }
    return this.materials[key];
  }
}

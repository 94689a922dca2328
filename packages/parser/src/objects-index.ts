/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Objects index - id lookup over the children of `/Objects`
 *
 * Object nodes look like:
 *   Geometry: 123456, "Cube\x00\x01Geometry", "Mesh" { ... }
 * attribute 0 is the i64 id, 1 the name-and-class string, 2 the subclass.
 */

import { AttributeType, createLogger, isAttributeOf, stringAttribute } from '@fbxdoc/data';
import type { NodeTree, TreeNode } from '@fbxdoc/data';
import type { DocumentContext } from './context.js';
import { ObjectProperties } from './object-properties.js';
import { PropertiesNodeId } from './properties-node.js';

const log = createLogger('ObjectsIndex');

/** Separator between name and class in binary object names */
const BINARY_NAME_SEPARATOR = '\u0000\u0001';
/** ASCII files write "Class::Name" instead */
const ASCII_NAME_SEPARATOR = '::';

/**
 * Native type names of property templates, keyed by "Class/Subclass" or
 * by class alone
 */
const NATIVE_TYPENAMES: Record<string, string> = {
  'Geometry/Mesh': 'FbxMesh',
  'Geometry/Shape': 'FbxShape',
  'Geometry/NurbsCurve': 'FbxNurbsCurve',
  'NodeAttribute/Camera': 'FbxCamera',
  'NodeAttribute/Light': 'FbxLight',
  'NodeAttribute/LimbNode': 'FbxSkeleton',
  'NodeAttribute/Null': 'FbxNull',
  Model: 'FbxNode',
  Material: 'FbxSurfacePhong',
  Texture: 'FbxFileTexture',
  Video: 'FbxVideo',
  AnimationStack: 'FbxAnimStack',
  AnimationLayer: 'FbxAnimLayer',
  AnimationCurveNode: 'FbxAnimCurveNode',
};

export interface ObjectNameAndClass {
  name: string;
  className: string | undefined;
}

export function getObjectNameAndClass(raw: string): ObjectNameAndClass {
  const binary = raw.indexOf(BINARY_NAME_SEPARATOR);
  if (binary >= 0) {
    return { name: raw.slice(0, binary), className: raw.slice(binary + BINARY_NAME_SEPARATOR.length) };
  }
  const ascii = raw.indexOf(ASCII_NAME_SEPARATOR);
  if (ascii >= 0) {
    return { name: raw.slice(ascii + ASCII_NAME_SEPARATOR.length), className: raw.slice(0, ascii) };
  }
  return { name: raw, className: undefined };
}

export function nativeTypenameOf(className: string, subclass: string | undefined): string | undefined {
  if (subclass !== undefined) {
    const bySubclass = NATIVE_TYPENAMES[`${className}/${subclass}`];
    if (bySubclass !== undefined) return bySubclass;
  }
  return Object.hasOwn(NATIVE_TYPENAMES, className) ? NATIVE_TYPENAMES[className] : undefined;
}

export class ObjectHandle {
  constructor(
    readonly id: bigint,
    readonly node: TreeNode,
    private readonly context: DocumentContext
  ) {}

  /** Node name, e.g. "Geometry", "Model" */
  get className(): string {
    return this.node.name;
  }

  /** e.g. "Mesh" for geometry, "LimbNode" for skeleton models */
  get subclass(): string | undefined {
    return stringAttribute(this.node.attributes, 2);
  }

  get name(): string {
    return getObjectNameAndClass(stringAttribute(this.node.attributes, 1) ?? '').name;
  }

  /**
   * Direct `Properties70` over the class template. The template is looked
   * up by `nativeTypename`, or by the known name for this class when omitted.
   */
  properties(nativeTypename?: string): ObjectProperties {
    const directNode = this.node.firstChildByName('Properties70');
    const direct = directNode ? new PropertiesNodeId(directNode.id) : undefined;
    const typename = nativeTypename ?? nativeTypenameOf(this.className, this.subclass);
    const defaults =
      typename === undefined ? undefined : this.context.definitionsCache.propsNodeId(this.className, typename);
    return new ObjectProperties(direct, defaults, this.context);
  }
}

export class ObjectsIndex {
  private constructor(private readonly byId: ReadonlyMap<bigint, TreeNode>) {}

  static fromTree(tree: NodeTree): ObjectsIndex {
    const byId = new Map<bigint, TreeNode>();
    const objects = tree.root().firstChildByName('Objects');
    if (!objects) {
      log.debug('No Objects node');
      return new ObjectsIndex(byId);
    }

    for (const child of objects.children()) {
      const idAttribute = child.attributes[0];
      if (!isAttributeOf(idAttribute, AttributeType.I64)) {
        log.warn('Skipping object node without an i64 id', { operation: 'fromTree', objectClass: child.name });
        continue;
      }
      if (byId.has(idAttribute.value)) {
        log.warn('Duplicate object id, keeping the first node', {
          operation: 'fromTree',
          objectId: idAttribute.value,
          objectClass: child.name,
        });
        continue;
      }
      byId.set(idAttribute.value, child);
    }

    log.debug(`Indexed ${byId.size} objects`);
    return new ObjectsIndex(byId);
  }

  get size(): number {
    return this.byId.size;
  }

  node(id: bigint): TreeNode | undefined {
    return this.byId.get(id);
  }

  ids(): IterableIterator<bigint> {
    return this.byId.keys();
  }
}

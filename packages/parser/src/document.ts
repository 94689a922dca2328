/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * FBX document - typed view over a decoded node tree
 *
 * Everything is built from the tree up front (definitions cache, objects
 * index); the document is read-only afterwards. Property indices and mesh
 * geometry are derived on first access and memoised.
 */

import { createLogger, nodeNotFound } from '@fbxdoc/data';
import type { NodeTree } from '@fbxdoc/data';
import { MeshGeometry } from '@fbxdoc/geometry';
import type { DocumentContext } from './context.js';
import { DefinitionsCache } from './definitions-cache.js';
import { GlobalSettings } from './global-settings.js';
import { ObjectProperties } from './object-properties.js';
import { ObjectHandle, ObjectsIndex } from './objects-index.js';
import { PropertiesNode } from './properties-node.js';
import type { PropertiesNodeId } from './properties-node.js';

const log = createLogger('Document');

export interface LoadProgress {
  phase: 'definitions' | 'objects';
  percent: number;
}

export interface LoadOptions {
  onProgress?: (progress: LoadProgress) => void;
}

export class FbxDocument implements DocumentContext {
  private readonly propertiesNodes = new Map<number, PropertiesNode>();
  private readonly meshes = new Map<bigint, MeshGeometry>();

  private constructor(
    readonly tree: NodeTree,
    readonly definitionsCache: DefinitionsCache,
    readonly objectsIndex: ObjectsIndex
  ) {}

  static load(tree: NodeTree, options: LoadOptions = {}): FbxDocument {
    options.onProgress?.({ phase: 'definitions', percent: 0 });
    const definitionsCache = DefinitionsCache.fromTree(tree);
    options.onProgress?.({ phase: 'definitions', percent: 100 });

    options.onProgress?.({ phase: 'objects', percent: 0 });
    const objectsIndex = ObjectsIndex.fromTree(tree);
    options.onProgress?.({ phase: 'objects', percent: 100 });

    log.info(`Loaded document: ${definitionsCache.size} templates, ${objectsIndex.size} objects`);
    return new FbxDocument(tree, definitionsCache, objectsIndex);
  }

  propertiesNode(id: PropertiesNodeId): PropertiesNode {
    const cached = this.propertiesNodes.get(id.nodeId.value);
    if (cached) return cached;

    const node = this.tree.node(id.nodeId);
    if (!node) {
      throw nodeNotFound(`#${id.nodeId.value}`);
    }
    const propertiesNode = new PropertiesNode(node);
    this.propertiesNodes.set(id.nodeId.value, propertiesNode);
    return propertiesNode;
  }

  globalSettings(): GlobalSettings {
    return GlobalSettings.fromDocument(this);
  }

  /** Properties of an arbitrary node, with the template of (className, subclassName) as fallback */
  objectProperties(direct: PropertiesNodeId | undefined, className: string, subclassName: string): ObjectProperties {
    return new ObjectProperties(direct, this.definitionsCache.propsNodeId(className, subclassName), this);
  }

  object(id: bigint): ObjectHandle | undefined {
    const node = this.objectsIndex.node(id);
    return node ? new ObjectHandle(id, node, this) : undefined;
  }

  *objects(): IterableIterator<ObjectHandle> {
    for (const id of this.objectsIndex.ids()) {
      const handle = this.object(id);
      if (handle) yield handle;
    }
  }

  /** Mesh of a `Geometry` object of subclass `Mesh`; throws NodeNotFound otherwise */
  meshGeometry(id: bigint): MeshGeometry {
    const cached = this.meshes.get(id);
    if (cached) return cached;

    const object = this.object(id);
    if (!object || object.className !== 'Geometry' || object.subclass !== 'Mesh') {
      throw nodeNotFound(`/Objects/Geometry(${id}, Mesh)`);
    }
    const mesh = MeshGeometry.fromNode(object.node);
    this.meshes.set(id, mesh);
    return mesh;
  }
}

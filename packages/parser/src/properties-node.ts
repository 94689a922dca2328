/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Property store - one `Properties70` node and its `P` entries
 *
 * Each entry is a `P` node whose attributes are:
 *   [0] name, [1] type name, [2] label, [3] flags, [4..] value
 * e.g. `P: "UnitScaleFactor", "double", "Number", "", 100`
 */

import { NodeId, createLogger, stringAttribute } from '@fbxdoc/data';
import type { NodeAttribute, TreeNode } from '@fbxdoc/data';
import type { PropertyLoader } from './property-loaders.js';

const log = createLogger('Properties');

/** Index of the first value attribute of a `P` node */
export const PROPERTY_VALUE_OFFSET = 4;

/** Opaque handle of a node that holds `P` entries */
export class PropertiesNodeId {
  private readonly space = 'properties' as const;

  constructor(readonly nodeId: NodeId) {}

  equals(other: PropertiesNodeId): boolean {
    return this.nodeId.equals(other.nodeId);
  }

  toString(): string {
    return `PropertiesNodeId(${this.nodeId.value})`;
  }
}

export class PropertyHandle {
  constructor(readonly node: TreeNode) {}

  get name(): string {
    return stringAttribute(this.node.attributes, 0) ?? '';
  }

  /** Declared type, e.g. "int", "double", "Vector3D", "enum" */
  get typeName(): string {
    return stringAttribute(this.node.attributes, 1) ?? '';
  }

  get label(): string {
    return stringAttribute(this.node.attributes, 2) ?? '';
  }

  /** Flag letters, e.g. "A" (animatable), "U" (user defined) */
  get flags(): string {
    return stringAttribute(this.node.attributes, 3) ?? '';
  }

  get valueAttributes(): readonly NodeAttribute[] {
    return this.node.attributes.slice(PROPERTY_VALUE_OFFSET);
  }

  value<T>(loader: PropertyLoader<T>): T {
    return loader.load(this);
  }
}

export class PropertiesNode {
  private readonly byName = new Map<string, PropertyHandle>();

  constructor(readonly node: TreeNode) {
    for (const child of node.childrenByName('P')) {
      const name = stringAttribute(child.attributes, 0);
      if (name === undefined) {
        log.warn('Skipping P entry without a name', { data: { nodeId: child.id.value } });
        continue;
      }
      if (this.byName.has(name)) {
        log.warn(`Duplicate property "${name}", keeping the first entry`, { data: { nodeId: node.id.value } });
        continue;
      }
      this.byName.set(name, new PropertyHandle(child));
    }
  }

  get id(): PropertiesNodeId {
    return new PropertiesNodeId(this.node.id);
  }

  get size(): number {
    return this.byName.size;
  }

  get(name: string): PropertyHandle | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  names(): string[] {
    return Array.from(this.byName.keys());
  }
}

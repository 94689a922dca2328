/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Tree builders shared by the parser tests
 */

import { MemoryTreeBuilder, attr, node, stringAttribute } from '@fbxdoc/data';
import type { NodeAttribute, NodeInit, NodeTree, TreeNode } from '@fbxdoc/data';
import { PropertiesNode } from '../src/index.js';
import type { DocumentContext, PropertyHandle } from '../src/index.js';

/** A `P` entry: name, type name, empty label and flags, then the values */
export function p(name: string, typeName: string, ...values: NodeAttribute[]): NodeInit {
  return node('P', [attr.string(name), attr.string(typeName), attr.string(''), attr.string(''), ...values]);
}

export function properties70(...entries: NodeInit[]): NodeInit {
  return node('Properties70', [], entries);
}

export function treeOf(...inits: NodeInit[]): NodeTree {
  return new MemoryTreeBuilder().add(...inits).build();
}

/** The top-level nodes of a freshly built tree */
export function topLevel(...inits: NodeInit[]): readonly TreeNode[] {
  return treeOf(...inits).root().children();
}

export function handleOf(entry: NodeInit): PropertyHandle {
  const [props] = topLevel(properties70(entry));
  const name = stringAttribute(entry.attributes ?? [], 0);
  const handle = name === undefined ? undefined : new PropertiesNode(props).get(name);
  if (!handle) {
    throw new Error('test entry has no name');
  }
  return handle;
}

/** Context that builds a fresh PropertiesNode on every request */
export function contextOf(tree: NodeTree): Pick<DocumentContext, 'propertiesNode'> {
  return {
    propertiesNode(id) {
      const found = tree.node(id.nodeId);
      if (!found) {
        throw new Error(`no node ${id}`);
      }
      return new PropertiesNode(found);
    },
  };
}

function entryName(entry: NodeInit): string | undefined {
  return stringAttribute(entry.attributes ?? [], 0);
}

/**
 * GlobalSettings node with the usual Y-up, right-handed, centimeter layout.
 * `overrides` replace the default entries of the same name; names in `omit`
 * are dropped.
 */
export function globalSettings(overrides: NodeInit[] = [], omit: string[] = []): NodeInit {
  const replaced = new Set([...overrides.map(entryName), ...omit]);
  const defaults = [
    p('UpAxis', 'int', attr.i32(1)),
    p('UpAxisSign', 'int', attr.i32(1)),
    p('FrontAxis', 'int', attr.i32(2)),
    p('FrontAxisSign', 'int', attr.i32(1)),
    p('CoordAxis', 'int', attr.i32(0)),
    p('CoordAxisSign', 'int', attr.i32(1)),
    p('OriginalUpAxis', 'int', attr.i32(2)),
    p('OriginalUpAxisSign', 'int', attr.i32(1)),
    p('UnitScaleFactor', 'double', attr.f64(1)),
  ].filter(entry => !replaced.has(entryName(entry)));
  return node('GlobalSettings', [], [node('Version', [attr.i32(1000)]), properties70(...defaults, ...overrides)]);
}

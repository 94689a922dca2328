/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Tests for the property template cache
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { attr, node } from '@fbxdoc/data';
import type { NodeInit, NodeTree, TreeNode } from '@fbxdoc/data';
import { DefinitionsCache } from '../src/index.js';
import { p, properties70, treeOf } from './helpers.js';

afterEach(() => {
  vi.restoreAllMocks();
});

function objectType(className: string, ...templates: NodeInit[]): NodeInit {
  return node('ObjectType', [attr.string(className)], [node('Count', [attr.i32(1)]), ...templates]);
}

function template(name: string, ...entries: NodeInit[]): NodeInit {
  return node('PropertyTemplate', [attr.string(name)], [properties70(...entries)]);
}

/** Properties70 node under Definitions/ObjectType[typeIndex]/PropertyTemplate[templateIndex] */
function templateProps(tree: NodeTree, typeIndex: number, templateIndex = 0): TreeNode | undefined {
  return tree
    .root()
    .firstChildByName('Definitions')
    ?.childrenByName('ObjectType')
    [typeIndex]?.childrenByName('PropertyTemplate')
    [templateIndex]?.firstChildByName('Properties70');
}

describe('DefinitionsCache', () => {
  const tree = treeOf(
    node('Definitions', [], [
      node('Version', [attr.i32(100)]),
      objectType('Model', template('FbxNode', p('Visibility', 'Visibility', attr.f64(1)))),
      objectType('Geometry', template('FbxMesh', p('Primary Visibility', 'bool', attr.i32(1)))),
    ])
  );
  const cache = DefinitionsCache.fromTree(tree);

  it('should map (class, subclass) to the template properties', () => {
    expect(cache.size).toBe(2);
    expect(cache.propsNodeId('Model', 'FbxNode')?.nodeId).toEqual(templateProps(tree, 0)?.id);
    expect(cache.propsNodeId('Geometry', 'FbxMesh')?.nodeId).toEqual(templateProps(tree, 1)?.id);
  });

  it('should return the same id on every lookup', () => {
    expect(cache.propsNodeId('Model', 'FbxNode')).toBe(cache.propsNodeId('Model', 'FbxNode'));
  });

  it('should return undefined for unknown pairs', () => {
    expect(cache.propsNodeId('Model', 'FbxMesh')).toBeUndefined();
    expect(cache.propsNodeId('Material', 'FbxSurfacePhong')).toBeUndefined();
  });

  it('should list its entries', () => {
    expect(Array.from(cache.entries(), e => `${e.className}/${e.subclassName}`)).toEqual([
      'Model/FbxNode',
      'Geometry/FbxMesh',
    ]);
  });

  it('should be empty without a Definitions node', () => {
    expect(DefinitionsCache.fromTree(treeOf(node('Objects'))).size).toBe(0);
    expect(DefinitionsCache.empty().propsNodeId('Model', 'FbxNode')).toBeUndefined();
  });

  it('should keep the first of duplicate templates', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const duplicated = treeOf(
      node('Definitions', [], [
        objectType('Model', template('FbxNode', p('A', 'int', attr.i32(1)))),
        objectType('Model', template('FbxNode', p('A', 'int', attr.i32(2)))),
      ])
    );
    const first = DefinitionsCache.fromTree(duplicated);
    expect(first.size).toBe(1);
    expect(first.propsNodeId('Model', 'FbxNode')?.nodeId).toEqual(templateProps(duplicated, 0)?.id);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should skip unnamed object types and templates without properties', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const partial = treeOf(
      node('Definitions', [], [
        node('ObjectType', [], [template('FbxNode')]),
        objectType('Material', node('PropertyTemplate', [attr.string('FbxSurfacePhong')])),
        objectType('Texture', node('PropertyTemplate', [], [properties70()])),
      ])
    );
    const cache = DefinitionsCache.fromTree(partial);
    expect(cache.size).toBe(0);
    expect(warn).toHaveBeenCalledTimes(2);
  });
});

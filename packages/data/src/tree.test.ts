/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { AttributeType, attr, attributeTypeName, stringAttribute } from './attributes.js';
import { MemoryTreeBuilder, NodeId, node } from './tree.js';

describe('MemoryTreeBuilder', () => {
  const tree = new MemoryTreeBuilder()
    .add(
      node('FBXHeaderExtension', [], [node('FBXVersion', [attr.i32(7400)])]),
      node('GlobalSettings', [], [node('Version', [attr.i32(1000)]), node('Properties70')])
    )
    .build();

  it('should assign ids in depth-first pre-order from an implicit root', () => {
    const root = tree.root();
    expect(root.id.value).toBe(0);
    expect(root.name).toBe('');

    const [header, settings] = root.children();
    expect(header.id.value).toBe(1);
    expect(header.children()[0].id.value).toBe(2);
    expect(settings.id.value).toBe(3);
    expect(settings.children().map(child => child.id.value)).toEqual([4, 5]);
  });

  it('should resolve nodes by id', () => {
    expect(tree.node(new NodeId(4))?.name).toBe('Version');
    expect(tree.node(new NodeId(42))).toBeUndefined();
  });

  it('should find children by name', () => {
    const settings = tree.root().firstChildByName('GlobalSettings');
    expect(settings?.firstChildByName('Properties70')?.id.value).toBe(5);
    expect(settings?.firstChildByName('Missing')).toBeUndefined();
    expect(tree.root().childrenByName('GlobalSettings')).toHaveLength(1);
  });

  it('should link parents', () => {
    const version = tree.node(new NodeId(2));
    expect(version?.parent()?.name).toBe('FBXHeaderExtension');
    expect(tree.root().parent()).toBeUndefined();
  });

  it('should keep attributes as given', () => {
    const version = tree.node(new NodeId(2));
    expect(version?.attributes).toEqual([{ type: AttributeType.I32, value: 7400 }]);
  });

  it('should give every build its own nodes', () => {
    const builder = new MemoryTreeBuilder().add(node('A'));
    const first = builder.build();
    const second = builder.build();
    expect(first.root()).not.toBe(second.root());
    expect(second.root().children()).toHaveLength(1);
  });
});

describe('attributes', () => {
  it('should build typed arrays from plain arrays', () => {
    const positions = attr.f64Array([0, 1, 2]);
    expect(positions.type).toBe(AttributeType.F64Array);
    expect(positions.value).toBeInstanceOf(Float64Array);

    const indices = attr.i32Array([0, 1, -3]);
    expect(indices.value).toEqual(Int32Array.from([0, 1, -3]));
  });

  it('should round f32 values to single precision', () => {
    expect(attr.f32(0.1).value).toBe(Math.fround(0.1));
  });

  it('should name attribute types', () => {
    expect(attributeTypeName(AttributeType.I64)).toBe('i64');
    expect(attributeTypeName(AttributeType.F32Array)).toBe('f32[]');
  });

  it('should read string attributes by position', () => {
    const attributes = [attr.string('UpAxis'), attr.i32(1)];
    expect(stringAttribute(attributes, 0)).toBe('UpAxis');
    expect(stringAttribute(attributes, 1)).toBeUndefined();
    expect(stringAttribute(attributes, 2)).toBeUndefined();
  });
});

/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Node tree contract filled by the binary decoder, plus an in-memory
 * implementation for data that is already decoded.
 */

import type { NodeAttribute } from './attributes.js';

/** Opaque handle of a node inside one tree */
export class NodeId {
  private readonly space = 'node' as const;

  constructor(readonly value: number) {}

  equals(other: NodeId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return `NodeId(${this.value})`;
  }
}

export interface TreeNode {
  readonly id: NodeId;
  readonly name: string;
  readonly attributes: readonly NodeAttribute[];
  parent(): TreeNode | undefined;
  children(): readonly TreeNode[];
  childrenByName(name: string): TreeNode[];
  firstChildByName(name: string): TreeNode | undefined;
}

export interface NodeTree {
  /** Implicit root; its children are the top-level nodes of the file */
  root(): TreeNode;
  node(id: NodeId): TreeNode | undefined;
}

export interface NodeInit {
  name: string;
  attributes?: readonly NodeAttribute[];
  children?: readonly NodeInit[];
}

/** Shorthand for a NodeInit */
export function node(name: string, attributes: readonly NodeAttribute[] = [], children: readonly NodeInit[] = []): NodeInit {
  return { name, attributes, children };
}

class MemoryNode implements TreeNode {
  readonly childNodes: MemoryNode[] = [];

  constructor(
    readonly id: NodeId,
    readonly name: string,
    readonly attributes: readonly NodeAttribute[],
    private readonly parentNode: MemoryNode | undefined
  ) {}

  parent(): TreeNode | undefined {
    return this.parentNode;
  }

  children(): readonly TreeNode[] {
    return this.childNodes;
  }

  childrenByName(name: string): TreeNode[] {
    return this.childNodes.filter(child => child.name === name);
  }

  firstChildByName(name: string): TreeNode | undefined {
    return this.childNodes.find(child => child.name === name);
  }
}

class MemoryTree implements NodeTree {
  constructor(private readonly nodes: readonly MemoryNode[]) {}

  root(): TreeNode {
    return this.nodes[0];
  }

  node(id: NodeId): TreeNode | undefined {
    return this.nodes[id.value];
  }
}

/**
 * Builds a NodeTree from node descriptions. Ids are assigned in depth-first
 * pre-order, the implicit root being 0.
 */
export class MemoryTreeBuilder {
  private inits: NodeInit[] = [];

  add(...inits: NodeInit[]): this {
    this.inits.push(...inits);
    return this;
  }

  build(): NodeTree {
    const nodes: MemoryNode[] = [];
    const root = new MemoryNode(new NodeId(0), '', [], undefined);
    nodes.push(root);

    const attach = (init: NodeInit, parent: MemoryNode) => {
      const created = new MemoryNode(new NodeId(nodes.length), init.name, init.attributes ?? [], parent);
      nodes.push(created);
      parent.childNodes.push(created);
      for (const child of init.children ?? []) {
        attach(child, created);
      }
    };

    for (const init of this.inits) {
      attach(init, root);
    }
    return new MemoryTree(nodes);
  }
}

/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { NodeTree } from '@fbxdoc/data';
import type { DefinitionsCache } from './definitions-cache.js';
import type { PropertiesNode, PropertiesNodeId } from './properties-node.js';

/** What property facades need from the loaded document */
export interface DocumentContext {
  readonly tree: NodeTree;
  readonly definitionsCache: DefinitionsCache;
  propertiesNode(id: PropertiesNodeId): PropertiesNode;
}

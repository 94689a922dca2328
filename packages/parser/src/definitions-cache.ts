/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Definitions cache - property templates per (class, subclass)
 *
 * Filled once from:
 *
 *   Definitions {
 *     ObjectType: "Geometry" {
 *       PropertyTemplate: "FbxMesh" {
 *         Properties70 { P: ... }
 *       }
 *     }
 *   }
 *
 * A class without a template is a normal outcome; callers decide whether
 * that matters.
 */

import { createLogger, stringAttribute } from '@fbxdoc/data';
import type { NodeTree } from '@fbxdoc/data';
import { PropertiesNodeId } from './properties-node.js';

const log = createLogger('DefinitionsCache');

export interface PropertyTemplateEntry {
  className: string;
  subclassName: string;
  propsNodeId: PropertiesNodeId;
}

export class DefinitionsCache {
  private constructor(private readonly templates: ReadonlyMap<string, ReadonlyMap<string, PropertiesNodeId>>) {}

  static empty(): DefinitionsCache {
    return new DefinitionsCache(new Map());
  }

  static fromTree(tree: NodeTree): DefinitionsCache {
    const definitions = tree.root().firstChildByName('Definitions');
    if (!definitions) {
      log.debug('No Definitions node, property templates are unavailable');
      return DefinitionsCache.empty();
    }

    const templates = new Map<string, Map<string, PropertiesNodeId>>();
    let count = 0;

    for (const objectType of definitions.childrenByName('ObjectType')) {
      const className = stringAttribute(objectType.attributes, 0);
      if (className === undefined) {
        log.warn('Skipping ObjectType without a class name', { operation: 'fromTree' });
        continue;
      }

      for (const template of objectType.childrenByName('PropertyTemplate')) {
        const subclassName = stringAttribute(template.attributes, 0);
        if (subclassName === undefined) {
          log.warn(`Skipping PropertyTemplate without a name under "${className}"`, { operation: 'fromTree' });
          continue;
        }
        const props = template.firstChildByName('Properties70');
        if (!props) continue;

        let bySubclass = templates.get(className);
        if (!bySubclass) {
          bySubclass = new Map();
          templates.set(className, bySubclass);
        }
        if (bySubclass.has(subclassName)) {
          log.warn(`Duplicate property template "${className}/${subclassName}", keeping the first one`, {
            operation: 'fromTree',
          });
          continue;
        }
        bySubclass.set(subclassName, new PropertiesNodeId(props.id));
        count++;
      }
    }

    log.debug(`Cached ${count} property templates for ${templates.size} classes`);
    return new DefinitionsCache(templates);
  }

  /** Properties node of the template, or undefined when the document has none */
  propsNodeId(className: string, subclassName: string): PropertiesNodeId | undefined {
    return this.templates.get(className)?.get(subclassName);
  }

  get size(): number {
    let size = 0;
    for (const bySubclass of this.templates.values()) {
      size += bySubclass.size;
    }
    return size;
  }

  *entries(): IterableIterator<PropertyTemplateEntry> {
    for (const [className, bySubclass] of this.templates) {
      for (const [subclassName, propsNodeId] of bySubclass) {
        yield { className, subclassName, propsNodeId };
      }
    }
  }
}

/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Object properties - an object's own properties over its class template
 *
 * Lookup walks an ordered list of scopes: the object's direct
 * `Properties70` first, then the class default from the definitions cache.
 * Either scope may be absent.
 */

import { propertyNotFound } from '@fbxdoc/data';
import type { DocumentContext } from './context.js';
import type { PropertyLoader } from './property-loaders.js';
import type { PropertiesNode, PropertiesNodeId, PropertyHandle } from './properties-node.js';

export class ObjectProperties {
  /** Lookup scopes in priority order */
  readonly scopes: readonly PropertiesNode[];

  constructor(
    readonly direct: PropertiesNodeId | undefined,
    readonly defaults: PropertiesNodeId | undefined,
    context: Pick<DocumentContext, 'propertiesNode'>
  ) {
    const scopes: PropertiesNode[] = [];
    for (const id of [direct, defaults]) {
      if (id !== undefined) {
        scopes.push(context.propertiesNode(id));
      }
    }
    this.scopes = scopes;
  }

  get(key: string): PropertyHandle | undefined {
    for (const scope of this.scopes) {
      const property = scope.get(key);
      if (property) return property;
    }
    return undefined;
  }

  has(key: string): boolean {
    return this.scopes.some(scope => scope.has(key));
  }

  /** Load a property value; throws PropertyNotFound or PropertyTypeMismatch */
  value<T>(key: string, loader: PropertyLoader<T>): T {
    const property = this.get(key);
    if (!property) {
      throw propertyNotFound(key);
    }
    return property.value(loader);
  }

  /** Like value(), but undefined when neither scope has the key */
  optionalValue<T>(key: string, loader: PropertyLoader<T>): T | undefined {
    return this.get(key)?.value(loader);
  }

  /** Property names visible through this view, direct scope first */
  names(): string[] {
    const seen = new Set<string>();
    for (const scope of this.scopes) {
      for (const name of scope.names()) {
        seen.add(name);
      }
    }
    return Array.from(seen);
  }
}

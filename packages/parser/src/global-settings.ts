/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Document-wide settings from the top-level `GlobalSettings` node
 */

import { nodeNotFound } from '@fbxdoc/data';
import { AxisSystem, decodeSignedAxis } from './axis.js';
import type { SignedAxis } from './axis.js';
import type { DocumentContext } from './context.js';
import { ObjectProperties } from './object-properties.js';
import { PropertiesNodeId } from './properties-node.js';
import { loaders } from './property-loaders.js';
import { UnitScaleFactor } from './unit-scale.js';

export const GLOBAL_SETTINGS_CLASS = 'GlobalSettings';
/** Native type name used for the template; files rarely carry one */
export const GLOBAL_SETTINGS_NATIVE_TYPENAME = 'FbxGlobalSettings';

export class GlobalSettings {
  private constructor(private readonly props: ObjectProperties) {}

  /** Throws NodeNotFound when the document has no `/GlobalSettings` */
  static fromDocument(context: DocumentContext): GlobalSettings {
    const node = context.tree.root().firstChildByName('GlobalSettings');
    if (!node) {
      throw nodeNotFound('/GlobalSettings');
    }
    const directNode = node.firstChildByName('Properties70');
    const direct = directNode ? new PropertiesNodeId(directNode.id) : undefined;
    const defaults = context.definitionsCache.propsNodeId(GLOBAL_SETTINGS_CLASS, GLOBAL_SETTINGS_NATIVE_TYPENAME);
    return new GlobalSettings(new ObjectProperties(direct, defaults, context));
  }

  axisSystem(): AxisSystem {
    return AxisSystem.require(this.upAxis(), this.frontAxis(), this.rightAxis());
  }

  upAxis(): SignedAxis {
    return this.signedAxis('Up');
  }

  frontAxis(): SignedAxis {
    return this.signedAxis('Front');
  }

  /** Stored as the "coord axis" */
  rightAxis(): SignedAxis {
    return this.signedAxis('Coord');
  }

  /** Up axis of the application that originally authored the file */
  originalUpAxis(): SignedAxis {
    return this.signedAxis('OriginalUp');
  }

  unitScaleFactor(): UnitScaleFactor {
    return UnitScaleFactor.create(this.unitScaleFactorRaw());
  }

  unitScaleFactorRaw(): number {
    return this.props.value('UnitScaleFactor', loaders.f64);
  }

  /** For properties without a typed accessor here */
  rawProperties(): ObjectProperties {
    return this.props;
  }

  private signedAxis(axisName: 'Up' | 'Front' | 'Coord' | 'OriginalUp'): SignedAxis {
    const code = this.props.value(`${axisName}Axis`, loaders.i32);
    const sign = this.props.value(`${axisName}AxisSign`, loaders.i32);
    return decodeSignedAxis(axisName, code, sign);
  }
}

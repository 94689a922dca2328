/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @fbxdoc/parser - object and property model of an FBX 7.x document
 */

export { FbxDocument } from './document.js';
export type { LoadOptions, LoadProgress } from './document.js';
export type { DocumentContext } from './context.js';
export { DefinitionsCache } from './definitions-cache.js';
export type { PropertyTemplateEntry } from './definitions-cache.js';
export { PropertiesNode, PropertiesNodeId, PropertyHandle, PROPERTY_VALUE_OFFSET } from './properties-node.js';
export {
  loaders,
  BoolLoader,
  IntegerLoader,
  BigIntLoader,
  FloatLoader,
  StringLoader,
  BinaryLoader,
  Float64VectorLoader,
} from './property-loaders.js';
export type { PropertyLoader } from './property-loaders.js';
export { ObjectProperties } from './object-properties.js';
export { ObjectHandle, ObjectsIndex, getObjectNameAndClass, nativeTypenameOf } from './objects-index.js';
export type { ObjectNameAndClass } from './objects-index.js';
export { Axis, SignedAxis, Handedness, AxisSystem, axisOf, signOf, unitVector, decodeSignedAxis } from './axis.js';
export { UnitScaleFactor, classifyFloat } from './unit-scale.js';
export type { FloatClass } from './unit-scale.js';
export { GlobalSettings, GLOBAL_SETTINGS_CLASS, GLOBAL_SETTINGS_NATIVE_TYPENAME } from './global-settings.js';

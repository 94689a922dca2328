/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @fbxdoc/data - node tree contract, attribute types, errors and logging
 */

export { AttributeType, attr, attributeTypeName, isAttributeOf, stringAttribute } from './attributes.js';
export type { NodeAttribute, AttributeOf } from './attributes.js';
export { NodeId, MemoryTreeBuilder, node } from './tree.js';
export type { TreeNode, NodeTree, NodeInit } from './tree.js';
export {
  FbxDocumentError,
  InvariantError,
  assertInvariant,
  isFbxDocumentError,
  nodeNotFound,
  propertyNotFound,
  propertyTypeMismatch,
  invalidEnumValue,
  invalidNumericValue,
  malformedIndexBuffer,
  invalidNodeAttribute,
} from './errors.js';
export type { FbxErrorKind } from './errors.js';
export { createLogger, logger, isDebugEnabled, formatContext } from './logger.js';
export type { Logger, LogContext, LogLevel } from './logger.js';

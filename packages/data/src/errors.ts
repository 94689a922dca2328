/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Error taxonomy for the document model
 *
 * FbxDocumentError covers problems in the loaded data. InvariantError is
 * reserved for states the library itself rules out; seeing one is a bug here,
 * not a malformed file.
 */

export type FbxErrorKind =
  | 'NodeNotFound'
  | 'PropertyNotFound'
  | 'PropertyTypeMismatch'
  | 'InvalidEnumValue'
  | 'InvalidNumericValue'
  | 'MalformedIndexBuffer'
  | 'InvalidNodeAttribute';

/** Error thrown for missing or malformed document data */
export class FbxDocumentError extends Error {
  constructor(
    public readonly kind: FbxErrorKind,
    message: string,
    public readonly details: Readonly<Record<string, unknown>> = {}
  ) {
    super(message);
    this.name = 'FbxDocumentError';
  }
}

/** Error thrown when an internal guarantee does not hold */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

export function assertInvariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}

export function isFbxDocumentError(error: unknown, kind?: FbxErrorKind): error is FbxDocumentError {
  return error instanceof FbxDocumentError && (kind === undefined || error.kind === kind);
}

export function nodeNotFound(path: string): FbxDocumentError {
  return new FbxDocumentError('NodeNotFound', `expected \`${path}\` node but not found`, { path });
}

export function propertyNotFound(key: string): FbxDocumentError {
  return new FbxDocumentError('PropertyNotFound', `expected \`${key}\` property but not found`, { key });
}

export function propertyTypeMismatch(key: string, expected: string, actual: string): FbxDocumentError {
  return new FbxDocumentError(
    'PropertyTypeMismatch',
    `property \`${key}\` has an incompatible type: expected ${expected} but got ${actual}`,
    { key, expected, actual }
  );
}

export function invalidEnumValue(key: string, expected: string, actual: unknown): FbxDocumentError {
  return new FbxDocumentError(
    'InvalidEnumValue',
    `invalid \`${key}\` property value: expected ${expected} but got ${String(actual)}`,
    { key, expected, actual }
  );
}

export function invalidNumericValue(message: string, value: number): FbxDocumentError {
  return new FbxDocumentError('InvalidNumericValue', message, { value });
}

export function malformedIndexBuffer(message: string, details: Record<string, unknown>): FbxDocumentError {
  return new FbxDocumentError('MalformedIndexBuffer', message, details);
}

export function invalidNodeAttribute(node: string, message: string, details: Record<string, unknown> = {}): FbxDocumentError {
  return new FbxDocumentError('InvalidNodeAttribute', `\`${node}\`: ${message}`, { node, ...details });
}

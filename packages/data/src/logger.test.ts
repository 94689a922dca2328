/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, formatContext, logger } from './logger.js';

describe('formatContext', () => {
  it('should join the context parts', () => {
    expect(formatContext({ component: 'ObjectsIndex' })).toBe('[ObjectsIndex]');
    expect(
      formatContext({ component: 'ObjectsIndex', operation: 'fromTree', objectId: 42n, objectClass: 'Geometry' })
    ).toBe('[ObjectsIndex] fromTree #42 (Geometry)');
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('should always print warnings with the component prefix', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('DefinitionsCache').warn('Duplicate template', { operation: 'fromTree' });
    expect(warn).toHaveBeenCalledWith('[DefinitionsCache] fromTree Duplicate template');
  });

  it('should pass context data along', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('Properties').warn('Skipping entry', { data: { nodeId: 3 } });
    expect(warn).toHaveBeenCalledWith('[Properties] Skipping entry', { nodeId: 3 });
  });

  it('should format errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('Mesh').error('Failed', 'boom');
    expect(error).toHaveBeenCalledWith('[Mesh] Failed:', 'boom');
  });

  it('should keep debug output quiet unless FBX_DEBUG is set', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.stubEnv('FBX_DEBUG', 'false');
    createLogger('Mesh').debug('Decoded mesh');
    expect(debug).not.toHaveBeenCalled();

    vi.stubEnv('FBX_DEBUG', 'true');
    createLogger('Mesh').debug('Decoded mesh', { polygons: 2 });
    expect(debug).toHaveBeenCalledWith('[Mesh] Decoded mesh', { polygons: 2 });
  });

  it('should print info and recovered errors only in debug mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.stubEnv('FBX_DEBUG', 'true');
    createLogger('Document').info('Loaded document', { objectClass: 'Geometry' });
    createLogger('Document').caught('Skipped object', 'bad id');
    expect(log).toHaveBeenCalledWith('[Document] (Geometry) Loaded document');
    expect(debug).toHaveBeenCalledWith('[Document] Skipped object (recovered):', 'bad id');
  });
});

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log once without a bound component', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logger.warn('Tree', 'Unexpected root');
    expect(warn).toHaveBeenCalledWith('[Tree] Unexpected root');
  });
});

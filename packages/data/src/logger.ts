/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Document logger - console logging shared by the data, geometry and parser packages
 *
 * Levels:
 * - error / warn: always printed
 * - info / debug / caught: printed only when debug output is enabled
 *
 * Debug output is enabled with FBX_DEBUG=true in the environment.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Component name (e.g. 'DefinitionsCache', 'ObjectsIndex') */
  component: string;
  /** Operation being performed (e.g. 'fromTree', 'meshGeometry') */
  operation?: string;
  /** FBX object id, when the message is about one object */
  objectId?: bigint;
  /** Object class (node name), e.g. 'Geometry' */
  objectClass?: string;
  /** Extra values printed after the message */
  data?: Record<string, unknown>;
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, data?: unknown, ctx?: Partial<LogContext>): void;
  caught(message: string, error: unknown, ctx?: Partial<LogContext>): void;
}

export function isDebugEnabled(): boolean {
  if (typeof process !== 'undefined' && process.env) {
    return process.env.FBX_DEBUG === 'true';
  }
  return false;
}

export function formatContext(ctx: LogContext): string {
  const parts = [`[${ctx.component}]`];
  if (ctx.operation) parts.push(ctx.operation);
  if (ctx.objectId !== undefined) parts.push(`#${ctx.objectId}`);
  if (ctx.objectClass) parts.push(`(${ctx.objectClass})`);
  return parts.join(' ');
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

type ConsoleSink = (...args: unknown[]) => void;

function emit(sink: ConsoleSink, line: string, extra: unknown[], data: unknown): void {
  if (data !== undefined) {
    sink(line, ...extra, data);
  } else {
    sink(line, ...extra);
  }
}

/**
 * Create a logger bound to one component
 */
export function createLogger(component: string): Logger {
  const prefix = (ctx?: Partial<LogContext>) => formatContext({ ...ctx, component });

  return {
    error(message, error, ctx) {
      if (error !== undefined) {
        emit(console.error, `${prefix(ctx)} ${message}:`, [formatError(error)], ctx?.data);
      } else {
        emit(console.error, `${prefix(ctx)} ${message}`, [], ctx?.data);
      }
    },

    warn(message, ctx) {
      emit(console.warn, `${prefix(ctx)} ${message}`, [], ctx?.data);
    },

    info(message, ctx) {
      if (!isDebugEnabled()) return;
      emit(console.log, `${prefix(ctx)} ${message}`, [], ctx?.data);
    },

    debug(message, data, ctx) {
      if (!isDebugEnabled()) return;
      emit(console.debug, `${prefix(ctx)} ${message}`, [], data);
    },

    /** For errors that were handled and recovered from */
    caught(message, error, ctx) {
      if (!isDebugEnabled()) return;
      emit(console.debug, `${prefix(ctx)} ${message} (recovered):`, [formatError(error)], ctx?.data);
    },
  };
}

/**
 * One-off logging without keeping a logger instance
 */
export const logger = {
  error(component: string, message: string, error?: unknown) {
    createLogger(component).error(message, error);
  },
  warn(component: string, message: string) {
    createLogger(component).warn(message);
  },
  info(component: string, message: string) {
    createLogger(component).info(message);
  },
  debug(component: string, message: string, data?: unknown) {
    createLogger(component).debug(message, data);
  },
};

/**
 * Default ILogger backed by the `debug` package.
 *
 * Enable output with the DEBUG environment variable:
 *   DEBUG=bugtrail:*                 # everything
 *   DEBUG=bugtrail:loop:*            # the agent loop, all levels
 *   DEBUG=bugtrail:*:warn,bugtrail:*:error
 *
 * Namespaces are `bugtrail:<namespace>:<level>`.
 */

import createDebug, { type Debugger } from 'debug';
import type { ILogger } from '@bugtrail/agent-sdk';

export const LOG_PREFIX = 'bugtrail';

type Level = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  /** Replace the output of every level (defaults to stderr); disables colors */
  write?: (line: string) => void;
  /** Force the levels on or off regardless of DEBUG */
  enabled?: boolean;
}

export function createLogger(namespace: string, options: LoggerOptions = {}): ILogger {
  const levels: Record<Level, Debugger> = {
    debug: createDebug(`${LOG_PREFIX}:${namespace}:debug`),
    info: createDebug(`${LOG_PREFIX}:${namespace}:info`),
    warn: createDebug(`${LOG_PREFIX}:${namespace}:warn`),
    error: createDebug(`${LOG_PREFIX}:${namespace}:error`),
  };

  const { write, enabled } = options;
  for (const instance of Object.values(levels)) {
    if (enabled !== undefined) {instance.enabled = enabled;}
    if (write) {
      instance.useColors = false;
      instance.log = (...args: unknown[]) => write(args.map(String).join(' '));
    }
  }

  const emit = (level: Level, message: string, meta?: Record<string, unknown>): void => {
    const line = meta && Object.keys(meta).length > 0 ? `${message} ${serialize(meta)}` : message;
    // debug treats %x sequences as format directives
    levels[level](line.replace(/%/g, '%%'));
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, error, meta) => {
      emit('error', message, error ? { ...meta, error: error.message } : meta);
    },
  };
}

function serialize(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return '[unserializable]';
  }
}

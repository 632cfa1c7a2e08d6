import type { GcovsmithConfig } from '../types/config.js';

type Level = 'info' | 'debug' | 'warn' | 'error' | 'success';

const MARKERS: Record<Level, string> = {
  info: '',
  debug: '',
  warn: '⚠ ',
  error: '✗ ',
  success: '✓ ',
};

let debugMode = false;
let jsonMode = false;

export function initLogger(config: Partial<Pick<GcovsmithConfig, 'debug'>>): void {
  debugMode = config.debug || process.env.GCOVSMITH_DEBUG === 'true';
  jsonMode = process.env.GCOVSMITH_OUTPUT === 'json';
}

// Looked up per call so replaced console methods are honoured
function sink(level: Level): (...data: unknown[]) => void {
  switch (level) {
    case 'debug':
      return console.debug;
    case 'warn':
      return console.warn;
    case 'error':
      return console.error;
    case 'info':
    case 'success':
      return console.log;
  }
}

function emit(level: Level, message: string, args: unknown[], fields: Record<string, number> = {}): void {
  const write = sink(level);
  if (jsonMode) {
    write(JSON.stringify({ level, ...fields, message, ...(args.length > 0 ? { details: args } : {}) }));
    return;
  }
  const prefix = level === 'debug' ? '[gcovsmith:debug]' : '[gcovsmith]';
  write(`${prefix} ${MARKERS[level]}${message}`, ...args);
}

export function info(message: string, ...args: unknown[]): void {
  emit('info', message, args);
}

export function debug(message: string, ...args: unknown[]): void {
  if (debugMode) {
    emit('debug', message, args);
  }
}

export function warn(message: string, ...args: unknown[]): void {
  emit('warn', message, args);
}

export function error(message: string, ...args: unknown[]): void {
  emit('error', message, args);
}

export function success(message: string, ...args: unknown[]): void {
  emit('success', message, args);
}

/** Numbered pipeline step, e.g. `Step 3/7: Checking Gcov compatibility` */
export function progress(step: number, total: number, message: string, ...args: unknown[]): void {
  if (jsonMode) {
    emit('info', message, args, { step, total });
  } else {
    emit('info', `Step ${step}/${total}: ${message}`, args);
  }
}

/**
 * Message text of an unknown thrown value.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

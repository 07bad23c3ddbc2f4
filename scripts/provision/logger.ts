import fs from 'node:fs';
import path from 'node:path';

import { errorMessage } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Pino-compatible (levels-only) surface:
// - logger.info('msg')
// - logger.info({ key: 'value' }, 'msg')
export type ProvisionLogger = {
  debug: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
  info: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
  warn: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
  error: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
};

function normalizeArgs(
  objOrMsg?: Record<string, unknown> | string,
  msg?: string
): { obj: Record<string, unknown>; msg: string } {
  if (typeof objOrMsg === 'string') {
    return { obj: {}, msg: objOrMsg };
  }
  return { obj: objOrMsg ?? {}, msg: msg ?? '' };
}

function levelToNumber(level: LogLevel): number {
  // Align with pino numeric levels.
  switch (level) {
    case 'debug':
      return 20;
    case 'info':
      return 30;
    case 'warn':
      return 40;
    case 'error':
      return 50;
  }
}

/**
 * JSON-lines logger appending to `filePath`.
 *
 * The directory is created on the first write, not up front, so an aborted
 * preflight leaves nothing behind but the log. If the file cannot be written
 * (for example when run without root and the home directory is not ours),
 * a single warning goes to stderr and file logging is switched off.
 */
export function createProvisionLogger(filePath: string): ProvisionLogger {
  let dirReady = false;
  let disabled = false;

  const write = (level: LogLevel, objOrMsg?: Record<string, unknown> | string, msg?: string): void => {
    if (disabled) return;
    const { obj, msg: normalizedMsg } = normalizeArgs(objOrMsg, msg);
    const line = {
      level: levelToNumber(level),
      time: Date.now(),
      msg: normalizedMsg,
      ...obj
    };
    try {
      if (!dirReady) {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        dirReady = true;
      }
      fs.appendFileSync(filePath, JSON.stringify(line) + '\n', 'utf8');
    } catch (e) {
      disabled = true;
      console.warn(`Log file ${filePath} is not writable (${errorMessage(e)}); continuing without file log`);
    }
  };

  return {
    debug: (objOrMsg, msg) => write('debug', objOrMsg, msg),
    info: (objOrMsg, msg) => write('info', objOrMsg, msg),
    warn: (objOrMsg, msg) => write('warn', objOrMsg, msg),
    error: (objOrMsg, msg) => write('error', objOrMsg, msg)
  };
}

/** Logger that drops everything. */
export function createSilentLogger(): ProvisionLogger {
  const noop = (): void => undefined;
  return { debug: noop, info: noop, warn: noop, error: noop };
}

type BufferedEntry = {
  level: LogLevel;
  objOrMsg?: Record<string, unknown> | string;
  msg?: string;
};

/**
 * Keeps entries in memory until `flushTo` replays them into another logger.
 * Whatever is never flushed is dropped without touching the disk.
 */
export function createBufferedLogger(): ProvisionLogger & { flushTo: (target: ProvisionLogger) => void } {
  const entries: BufferedEntry[] = [];
  const hold =
    (level: LogLevel) =>
    (objOrMsg?: Record<string, unknown> | string, msg?: string): void => {
      entries.push({ level, objOrMsg, msg });
    };

  return {
    debug: hold('debug'),
    info: hold('info'),
    warn: hold('warn'),
    error: hold('error'),
    flushTo(target) {
      for (const entry of entries.splice(0)) {
        target[entry.level](entry.objOrMsg, entry.msg);
      }
    }
  };
}

/* Lightweight structured logger with step timing */
import { performance } from 'perf_hooks';
import fs from 'fs';
import path from 'path';

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = 'json' | 'pretty';
export type LogMeta = Record<string, unknown>;

export const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';
let currentFormat: LogFormat = process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json';

export function setLogLevel(l: LogLevel) {
  currentLevel = l;
}

export function setLogFormat(f: LogFormat) {
  currentFormat = f;
}

function ts() { return new Date().toISOString(); }

export interface StepTimer {
  end: (extra?: LogMeta) => void;
}

function color(level: LogLevel, s: string) {
  if (currentFormat !== 'pretty') return s;
  const map: Record<LogLevel, string> = {
    debug: '\u001b[90m',
    info: '\u001b[36m',
    warn: '\u001b[33m',
    error: '\u001b[31m',
  };
  const reset = '\u001b[0m';
  return map[level] + s + reset;
}

let logFileFd: number | null = null;

/** Mirror every emitted line (as JSON) into `filePath`, appending. */
export function setLogFile(filePath: string) {
  closeLogFile();
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    logFileFd = fs.openSync(filePath, 'a');
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error('Failed to open log file', filePath, e);
  }
}

export function closeLogFile() {
  if (logFileFd !== null) {
    fs.closeSync(logFileFd);
    logFileFd = null;
  }
}

export function log(level: LogLevel, msg: string, meta?: LogMeta) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  const payload = { t: ts(), level, msg, ...(meta || {}) };
  const json = JSON.stringify(payload);
  if (currentFormat === 'json') {
    // eslint-disable-next-line no-console
    console.log(json);
  } else {
    const base = `${payload.t} ${level.toUpperCase()} ${msg}`;
    const metaStr = meta && Object.keys(meta).length ? ' ' + JSON.stringify(meta) : '';
    // eslint-disable-next-line no-console
    console.log(color(level, base) + metaStr);
  }
  if (logFileFd !== null) {
    fs.writeSync(logFileFd, json + '\n');
  }
}

export function debug(msg: string, meta?: LogMeta) {
  log("debug", msg, meta);
}
export function info(msg: string, meta?: LogMeta) {
  log("info", msg, meta);
}
export function warn(msg: string, meta?: LogMeta) {
  log("warn", msg, meta);
}
export function error(msg: string, meta?: LogMeta) {
  log("error", msg, meta);
}

export function startStep(name: string, meta?: LogMeta): StepTimer {
  const start = performance.now();
  debug(`start:${name}`, meta);
  return {
    end: (extra?: LogMeta) => {
      const durMs = performance.now() - start;
      info(`end:${name}`, { ms: Math.round(durMs), ...meta, ...extra });
    },
  };
}

/**
 * Keep the lines of a JSON log at or above `minLevel`. Lines that are not
 * JSON log entries pass through unchanged.
 */
export function filterLogLines(lines: string[], minLevel: LogLevel): string[] {
  const minOrder = LEVEL_ORDER[minLevel];
  const out: string[] = [];
  for (const raw of lines) {
    const line = raw.trim();
    if (!line) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      out.push(line);
      continue;
    }
    const level =
      typeof parsed === 'object' && parsed !== null && 'level' in parsed ? parsed.level : undefined;
    if (!isLogLevel(level) || LEVEL_ORDER[level] >= minOrder) {
      out.push(line);
    }
  }
  return out;
}

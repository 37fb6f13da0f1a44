/* Structured logger with step timing */
import { performance } from 'perf_hooks';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';
const format: 'json' | 'pretty' = process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json';

export function setLogLevel(l: LogLevel) {
  currentLevel = l;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function color(level: LogLevel, s: string) {
  if (format !== 'pretty') return s;
  const map: Record<LogLevel, string> = {
    debug: '\u001b[90m',
    info: '\u001b[36m',
    warn: '\u001b[33m',
    error: '\u001b[31m',
  };
  return map[level] + s + '\u001b[0m';
}

export function log(level: LogLevel, msg: string, meta?: LogMeta) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  const t = new Date().toISOString();
  if (format === 'json') {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ t, level, msg, ...(meta || {}) }));
    return;
  }
  const metaStr = meta && Object.keys(meta).length ? ' ' + JSON.stringify(meta) : '';
  // eslint-disable-next-line no-console
  console.log(color(level, `${t} ${level.toUpperCase()} ${msg}`) + metaStr);
}

export function debug(msg: string, meta?: LogMeta) {
  log('debug', msg, meta);
}
export function info(msg: string, meta?: LogMeta) {
  log('info', msg, meta);
}
export function warn(msg: string, meta?: LogMeta) {
  log('warn', msg, meta);
}
export function error(msg: string, meta?: LogMeta) {
  log('error', msg, meta);
}

export interface StepTimer {
  end: (extra?: LogMeta) => number;
}

export function startStep(name: string, meta?: LogMeta): StepTimer {
  const start = performance.now();
  debug(`start:${name}`, meta);
  return {
    end: (extra) => {
      const ms = Math.round(performance.now() - start);
      info(`end:${name}`, { ms, ...meta, ...extra });
      return ms;
    },
  };
}

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

const isTest = process.env.NODE_ENV === 'test';
const consoleEnabled = isTest ? false : process.env.LOG_CONSOLE !== '0';
const fileEnabled = isTest ? false : process.env.LOG_TO_FILE !== '0';
const logFile = process.env.LOG_FILE ?? 'logs/service.log';
let fileReady = false;

type Level = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

function pad(num: number, size = 2) {
  return num.toString().padStart(size, '0');
}

function localTs() {
  const d = new Date();
  const yyyy = d.getFullYear();
  const MM = pad(d.getMonth() + 1);
  const dd = pad(d.getDate());
  const HH = pad(d.getHours());
  const mm = pad(d.getMinutes());
  const ss = pad(d.getSeconds());
  const ms = pad(d.getMilliseconds(), 3);
  return `${yyyy}-${MM}-${dd} ${HH}:${mm}:${ss}.${ms}`;
}

function color(level: Level) {
  const reset = '\x1b[0m';
  const colors: Record<Level, string> = {
    INFO: '\x1b[34m',
    DEBUG: '\x1b[95m',
    WARN: '\x1b[33m',
    ERROR: '\x1b[31m'
  };
  return `${colors[level]}[${level}]${reset}`;
}

// Errors don't survive JSON.stringify, so flatten them first.
function stringify(v: unknown): string {
  if (typeof v === 'string') return v;
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return JSON.stringify(v);
  } catch {
    return String(v);
  }
}

function writeFileLog(level: Level, args: unknown[]) {
  if (!fileEnabled) return;
  if (!fileReady) {
    mkdirSync(dirname(logFile), { recursive: true });
    fileReady = true;
  }
  const msg = args.map(stringify).join(' ');
  appendFileSync(logFile, `[${localTs()}] [${level}] ${msg}\n`, 'utf8');
}

function emit(level: Level, sink: (...data: unknown[]) => void, args: unknown[]) {
  if (consoleEnabled) sink(`[${localTs()}] ${color(level)}`, ...args);
  writeFileLog(level, args);
}

export const logger = {
  info: (...args: unknown[]) => emit('INFO', console.log, args),
  warn: (...args: unknown[]) => emit('WARN', console.warn, args),
  error: (...args: unknown[]) => emit('ERROR', console.error, args),
  debug: (...args: unknown[]) => emit('DEBUG', console.log, args)
};

/**
 * Component logger for the null-modem harness.
 *
 * Lines read `<ts> [LEVEL] [component] msg key=value`, or JSON with
 * NULLMODEM_LOG_JSON=1. NULLMODEM_LOG_FILE redirects them to a file.
 * Session lines go out under the `null_modem` component and can be teed
 * into the run's result transcript with `teeLogger`.
 */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

// Configuration getters - read env at runtime so the CLI can set
// NULLMODEM_LOG_FILE after imports complete
function getLogFile(): string | undefined {
  return process.env.NULLMODEM_LOG_FILE || undefined;
}

function getLogLevel(): LogLevel {
  const level = (process.env.NULLMODEM_LOG_LEVEL ?? 'INFO').toUpperCase();
  return isLogLevel(level) ? level : 'INFO';
}

function isLogJson(): boolean {
  return process.env.NULLMODEM_LOG_JSON === '1';
}

// Track which log directories we've already created
const createdLogDirs = new Set<string>();

function ensureLogDir(logFile: string): void {
  const logDir = path.dirname(logFile);
  if (!createdLogDirs.has(logDir) && !fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
    createdLogDirs.add(logDir);
  }
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getLogLevel()];
}

export function formatEntry(entry: LogEntry, json: boolean = isLogJson()): string {
  if (json) {
    return JSON.stringify(entry);
  }
  const { ts, level, component, msg, ...extra } = entry;
  const extraStr = Object.keys(extra).length > 0
    ? ' ' + Object.entries(extra).map(([k, v]) => `${k}=${String(v)}`).join(' ')
    : '';
  return `${ts} [${level}] [${component}] ${msg}${extraStr}`;
}

function log(level: LogLevel, component: string, msg: string, extra?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    ts: new Date().toISOString(),
    level,
    component,
    msg,
    ...extra,
  };

  const formatted = formatEntry(entry);

  const logFile = getLogFile();
  if (logFile) {
    ensureLogDir(logFile);
    fs.appendFileSync(logFile, formatted + '\n');
    return;
  }

  if (level === 'ERROR' || level === 'WARN') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}

/**
 * Create a logger for a specific component.
 * @param component - Component name (e.g., 'listener', 'channel', 'null_modem')
 */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, extra) => log('DEBUG', component, msg, extra),
    info: (msg, extra) => log('INFO', component, msg, extra),
    warn: (msg, extra) => log('WARN', component, msg, extra),
    error: (msg, extra) => log('ERROR', component, msg, extra),
  };
}

/** Receives every call made on a teed logger. */
export type LogSink = (level: LogLevel, msg: string, extra?: Record<string, unknown>) => void;

/**
 * Result-transcript form of a log call: warnings and errors keep their
 * level as a prefix, everything else is the bare message.
 */
export function transcriptLine(level: LogLevel, msg: string): string {
  switch (level) {
    case 'WARN':
      return `WARNING: ${msg}`;
    case 'ERROR':
      return `ERROR: ${msg}`;
    default:
      return msg;
  }
}

/** Forward to `logger` and hand each call to `sink`, whatever the level threshold. */
export function teeLogger(logger: Logger, sink: LogSink): Logger {
  const tee = (level: LogLevel, forward: Logger['info']): Logger['info'] => (msg, extra) => {
    sink(level, msg, extra);
    forward(msg, extra);
  };
  return {
    debug: tee('DEBUG', (msg, extra) => logger.debug(msg, extra)),
    info: tee('INFO', (msg, extra) => logger.info(msg, extra)),
    warn: tee('WARN', (msg, extra) => logger.warn(msg, extra)),
    error: tee('ERROR', (msg, extra) => logger.error(msg, extra)),
  };
}

// Pre-created loggers for common components
export const listenerLog = createLogger('listener');
export const channelLog = createLogger('channel');
export const sessionLog = createLogger('null_modem');

export default createLogger;

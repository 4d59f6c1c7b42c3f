/**
 * Lightweight logger for the gateway client.
 *
 * - Text or JSON lines (JSON is easy to filter with jq)
 * - Defaults read from GWLINK_LOG_LEVEL / GWLINK_LOG_JSON / GWLINK_LOG_FILE
 * - Owners may pass explicit settings, which win over the environment
 */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogSettings {
  level?: LogLevel;
  json?: boolean;
  /** Append to this file instead of writing to the console */
  file?: string;
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
  [key: string]: unknown;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  switch ((value ?? '').toUpperCase()) {
    case 'DEBUG':
      return 'DEBUG';
    case 'INFO':
      return 'INFO';
    case 'WARN':
      return 'WARN';
    case 'ERROR':
      return 'ERROR';
    default:
      return fallback;
  }
}

// Read env at call time so settings applied after import still take effect
function resolveSettings(settings: LogSettings): Required<Omit<LogSettings, 'file'>> & { file?: string } {
  return {
    level: settings.level ?? parseLogLevel(process.env.GWLINK_LOG_LEVEL),
    json: settings.json ?? process.env.GWLINK_LOG_JSON === '1',
    file: settings.file ?? process.env.GWLINK_LOG_FILE,
  };
}

const createdLogDirs = new Set<string>();

function ensureLogDir(logFile: string): void {
  const logDir = path.dirname(logFile);
  if (!createdLogDirs.has(logDir) && !fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
    createdLogDirs.add(logDir);
  }
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

export function formatEntry(entry: LogEntry, json: boolean): string {
  if (json) {
    return JSON.stringify(entry, (_key, value: unknown) => (value instanceof Error ? value.message : value));
  }
  const { ts, level, component, msg, ...extra } = entry;
  const extraStr = Object.keys(extra).length > 0
    ? ' ' + Object.entries(extra).map(([k, v]) => `${k}=${formatValue(v)}`).join(' ')
    : '';
  return `${ts} [${level}] [${component}] ${msg}${extraStr}`;
}

function log(
  settings: LogSettings,
  level: LogLevel,
  component: string,
  msg: string,
  extra?: Record<string, unknown>,
): void {
  const resolved = resolveSettings(settings);
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[resolved.level]) return;

  const entry: LogEntry = {
    ts: new Date().toISOString(),
    level,
    component,
    msg,
    ...extra,
  };

  const formatted = formatEntry(entry, resolved.json);

  if (resolved.file) {
    ensureLogDir(resolved.file);
    fs.appendFileSync(resolved.file, formatted + '\n');
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
 * @param component - Component name (e.g., 'session', 'reassembly', 'transport')
 * @param settings - Explicit settings; unset fields fall back to the environment
 */
export function createLogger(component: string, settings: LogSettings = {}): Logger {
  return {
    debug: (msg, extra) => log(settings, 'DEBUG', component, msg, extra),
    info: (msg, extra) => log(settings, 'INFO', component, msg, extra),
    warn: (msg, extra) => log(settings, 'WARN', component, msg, extra),
    error: (msg, extra) => log(settings, 'ERROR', component, msg, extra),
  };
}

export default createLogger;

/**
 * Logger Utility
 * Category-tagged console logging with timestamps and session IDs
 * Optionally appends to a daily file under LOG_DIR
 */

import * as fs from 'fs';
import * as path from 'path';
import { ENV } from '../config/env.js';

const LOG_DIR = ENV.LOG_DIR;
const LOG_FILE = LOG_DIR
  ? path.join(LOG_DIR, `drumwatch-${new Date().toISOString().slice(0, 10)}.log`)
  : null;

// Ensure log directory exists
let fileEnabled = LOG_FILE !== null;
if (fileEnabled) {
  try {
    if (!fs.existsSync(LOG_DIR)) {
      fs.mkdirSync(LOG_DIR, { recursive: true });
    }
  } catch (e) {
    console.error('Failed to create log directory:', e);
    fileEnabled = false;
  }
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  level: LogLevel;
  category: string;
  message: string;
  data?: unknown;
  ts: number;
  sessionId?: string;
}

type LogListener = (entry: LogEntry) => void;
const listeners: Set<LogListener> = new Set();

export function addLogListener(listener: LogListener): () => void {
  listeners.add(listener);
  return () => listeners.delete(listener);
}

function formatTime(ts: number): string {
  const d = new Date(ts);
  return d.toISOString().slice(11, 23); // HH:mm:ss.SSS
}

// Simplify data for logging (truncate long base64 strings, flatten errors)
export function simplifyData(data: unknown): unknown {
  if (data === undefined || data === null) return data;

  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }

  if (typeof data === 'string') {
    if (data.length > 100 && /^[A-Za-z0-9+/=]+$/.test(data)) {
      return `[base64 ${data.length} chars]`;
    }
    return data.length > 500 ? data.slice(0, 500) + '...' : data;
  }

  if (ArrayBuffer.isView(data)) {
    return `[${data.constructor.name} ${data.byteLength} bytes]`;
  }

  if (typeof data === 'object') {
    if (Array.isArray(data)) {
      return data.slice(0, 10).map(simplifyData);
    }
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (key === 'audio' && typeof value === 'string' && value.length > 50) {
        result[key] = `[base64 ${value.length} chars]`;
      } else {
        result[key] = simplifyData(value);
      }
    }
    return result;
  }

  return data;
}

function emit(entry: LogEntry): void {
  const prefix = `[${formatTime(entry.ts)}] [${entry.level}] [${entry.category}]`;
  const sessionInfo = entry.sessionId ? ` (${entry.sessionId})` : '';

  const logFn = entry.level === 'ERROR' ? console.error :
                entry.level === 'WARN' ? console.warn :
                console.log;

  const simplifiedData = simplifyData(entry.data);

  if (simplifiedData !== undefined) {
    logFn(`${prefix}${sessionInfo} ${entry.message}`, simplifiedData);
  } else {
    logFn(`${prefix}${sessionInfo} ${entry.message}`);
  }

  if (fileEnabled && LOG_FILE) {
    try {
      const dataStr = simplifiedData !== undefined ? ` ${JSON.stringify(simplifiedData)}` : '';
      fs.appendFileSync(LOG_FILE, `${prefix}${sessionInfo} ${entry.message}${dataStr}\n`);
    } catch (e) {
      fileEnabled = false;
      console.error('Failed to write log file, file logging disabled:', e);
    }
  }

  listeners.forEach(l => l({ ...entry, data: simplifiedData }));
}

export function debug(category: string, message: string, data?: unknown, sessionId?: string): void {
  if (!ENV.DEBUG) return;
  emit({ level: 'DEBUG', category, message, data, ts: Date.now(), sessionId });
}

export function info(category: string, message: string, data?: unknown, sessionId?: string): void {
  emit({ level: 'INFO', category, message, data, ts: Date.now(), sessionId });
}

export function warn(category: string, message: string, data?: unknown, sessionId?: string): void {
  emit({ level: 'WARN', category, message, data, ts: Date.now(), sessionId });
}

export function error(category: string, message: string, data?: unknown, sessionId?: string): void {
  emit({ level: 'ERROR', category, message, data, ts: Date.now(), sessionId });
}

export const logger = { debug, info, warn, error, addLogListener };

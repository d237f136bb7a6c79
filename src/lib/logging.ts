/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogEntry = {
  id: string;
  level: LogLevel;
  message: string;
  timestamp: string;
  details?: unknown;
};

export type LogListener = (entry: LogEntry) => void;

const MAX_STACK_LINES = 30;
const MAX_STACK_CHARS = 3000;
const MAX_LOGS = 500;

let logs: LogEntry[] = [];
let debugLoggingEnabled = false;
const listeners = new Set<LogListener>();

export const setDebugLoggingEnabled = (enabled: boolean) => {
  debugLoggingEnabled = enabled;
};

export const isDebugLoggingEnabled = () => debugLoggingEnabled;

export const subscribeToLogs = (listener: LogListener) => {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
};

export const addLog = (level: LogLevel, message: string, details?: unknown) => {
  if (level === 'debug' && !debugLoggingEnabled) return;
  const entry: LogEntry = {
    id: randomUUID(),
    level,
    message,
    timestamp: new Date().toISOString(),
    details,
  };
  logs = [entry, ...logs].slice(0, MAX_LOGS);
  listeners.forEach((listener) => listener(entry));
};

export const addErrorLog = (message: string, details?: unknown) => {
  addLog('error', message, details);
};

const trimStack = (stack?: string | null) => {
  if (!stack) return null;
  let lines = stack.split('\n');
  if (lines.length > MAX_STACK_LINES) {
    lines = [...lines.slice(0, MAX_STACK_LINES), '... (stack truncated)'];
  }
  let result = lines.join('\n');
  if (result.length > MAX_STACK_CHARS) {
    result = `${result.slice(0, MAX_STACK_CHARS)}... (stack truncated)`;
  }
  return result;
};

export const buildErrorLogDetails = (
  error: Error,
  details: Record<string, unknown> = {},
): Record<string, unknown> & {
  error: { name: string; message: string; stack: string | null };
  errorName: string;
  errorStack: string | null;
} => ({
  ...details,
  error: {
    name: error.name,
    message: typeof details.error === 'string' ? details.error : error.message,
    stack: trimStack(error.stack),
  },
  errorName: error.name,
  errorStack: trimStack(error.stack),
});

export const getLogs = (): LogEntry[] => [...logs];

export const getProblemLogs = (): LogEntry[] =>
  getLogs().filter((entry) => entry.level === 'warn' || entry.level === 'error');

export const getErrorLogs = (): LogEntry[] => getLogs().filter((entry) => entry.level === 'error');

export const clearLogs = () => {
  logs = [];
};

export const formatLogsForShare = (entries: LogEntry[]) =>
  entries
    .map((entry) => {
      const details = entry.details ? `\n${JSON.stringify(entry.details, null, 2)}` : '';
      return `[${entry.timestamp}] ${entry.level.toUpperCase()} - ${entry.message}${details}`;
    })
    .join('\n\n');

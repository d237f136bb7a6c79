import { addLog, isDebugLoggingEnabled, type LogLevel } from '@/lib/logging';

type LoggerDetails = Record<string, unknown>;

type LoggerOptions = {
    details?: LoggerDetails;
    component?: string;
    includeConsole?: boolean;
};

let consoleEnabled = true;

export const setLoggerConsoleEnabled = (enabled: boolean) => {
    consoleEnabled = enabled;
};

const normalizeError = (error: unknown) => {
    if (error instanceof Error) {
        return {
            name: error.name,
            message: error.message,
            stack: error.stack,
        };
    }
    if (typeof error === 'string') {
        return {
            name: 'Error',
            message: error,
            stack: null,
        };
    }
    return null;
};

const toLogDetails = (details: LoggerDetails = {}, component?: string) => {
    const merged: LoggerDetails = {
        component: component ?? null,
        ...details,
    };

    if ('error' in merged) {
        const normalized = normalizeError(merged.error);
        merged.error = normalized ?? merged.error;
    }

    return merged;
};

// One JSON object per line, the shape log shippers pick up from stdout/stderr.
const formatConsoleLine = (level: LogLevel, message: string, details: LoggerDetails) =>
    JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...details,
    });

const writeLog = (level: LogLevel, message: string, options: LoggerOptions = {}) => {
    if (level === 'debug' && !isDebugLoggingEnabled()) return;
    const details = toLogDetails(options.details, options.component);
    addLog(level, message, details);
    if (options.includeConsole === false || !consoleEnabled) return;
    const line = formatConsoleLine(level, message, details);
    if (level === 'warn') {
        console.warn(line);
        return;
    }
    if (level === 'error') {
        console.error(line);
        return;
    }
    if (level === 'info') {
        console.info(line);
        return;
    }
    console.debug(line);
};

export const logger = {
    debug: (message: string, options?: LoggerOptions) => writeLog('debug', message, options),
    info: (message: string, options?: LoggerOptions) => writeLog('info', message, options),
    warn: (message: string, options?: LoggerOptions) => writeLog('warn', message, options),
    error: (message: string, options?: LoggerOptions) => writeLog('error', message, options),
};

/**
 * Stderr logging. Stdout is reserved for the CLI's result line.
 */

export type LogLevel = 'error' | 'warning' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
    error: 0,
    warning: 1,
    info: 2,
    debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

function currentThreshold(): LogLevel {
    const fromEnv = process.env.MD2DOCX_LOG_LEVEL?.toLowerCase();
    return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

function formatArg(arg: unknown): string {
    if (arg instanceof Error) return arg.message;
    if (typeof arg === 'string') return arg;
    return JSON.stringify(arg);
}

export function logToStderr(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] > LEVEL_ORDER[currentThreshold()]) return;
    process.stderr.write(`[${level.toUpperCase()}] ${message}\n`);
}

export const logger = {
    error: (...args: unknown[]) => logToStderr('error', args.map(formatArg).join(' ')),
    warning: (...args: unknown[]) => logToStderr('warning', args.map(formatArg).join(' ')),
    info: (...args: unknown[]) => logToStderr('info', args.map(formatArg).join(' ')),
    debug: (...args: unknown[]) => logToStderr('debug', args.map(formatArg).join(' ')),
};

// src/util/logger.ts
// Console logger for feed-race

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_RANK;
}

function levelFromEnv(): LogLevel {
    const raw = (process.env.LOG_LEVEL ?? '').toLowerCase();
    if (isLogLevel(raw)) return raw;
    return process.env.DEBUG === '1' ? 'debug' : 'info';
}

const threshold: LogLevel = levelFromEnv();

export function isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

export interface Logger {
    trace(...args: unknown[]): void;
    debug(...args: unknown[]): void;
    info(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
    child(prefix: string): Logger;
}

function createLogger(prefixes: string[]): Logger {
    const emit = (level: LogLevel, sink: (...a: unknown[]) => void, args: unknown[]) => {
        if (!isLevelEnabled(level)) return;
        sink(`[${level.toUpperCase()}]`, ...prefixes, ...args);
    };

    return {
        trace: (...args) => emit('trace', console.log, args),
        debug: (...args) => emit('debug', console.log, args),
        info: (...args) => emit('info', console.log, args),
        warn: (...args) => emit('warn', console.warn, args),
        error: (...args) => emit('error', console.error, args),
        child: (prefix) => createLogger([...prefixes, prefix]),
    };
}

export const logger: Logger = createLogger([]);

export default logger;

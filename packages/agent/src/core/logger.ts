export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const DEFAULT_LEVEL: LogLevel = 'warn';

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

// 每次输出时读取 LOG_LEVEL，方便 .env 在模块加载之后才注入
function currentLevel(): LogLevel {
    const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
    return raw && isLogLevel(raw) ? raw : DEFAULT_LEVEL;
}

/**
 * 创建带 `[Tag]` 前缀的日志器。
 * 所有级别都写到 stderr：stdout 只留给 CLI 的查询结果。
 */
export function createLogger(tag: string): Logger {
    const emit = (level: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]) => {
        if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(currentLevel())) return;
        console.error(`[${tag}] ${message}`, ...details);
    };

    return {
        debug: (message, ...details) => emit('debug', message, details),
        info: (message, ...details) => emit('info', message, details),
        warn: (message, ...details) => emit('warn', message, details),
        error: (message, ...details) => emit('error', message, details),
    };
}

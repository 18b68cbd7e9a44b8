import path from 'path';
import winston from 'winston';

const levels = {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    debug: 4,
};

winston.addColors({
    error: 'red',
    warn: 'yellow',
    info: 'green',
    http: 'magenta',
    debug: 'white',
});

export type LogLevel = keyof typeof levels;

export interface LogSettings {
    level: LogLevel;
    dir: string;
    toFile: boolean;
    maxSizeBytes: number;
    maxFiles: number;
}

type Env = Record<string, string | undefined>;

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(levels, value);
}

function boundedInt(raw: string | undefined, fallback: number, min: number): number {
    const parsed = Number(raw);
    return Number.isFinite(parsed) && raw !== undefined && raw.trim() !== '' ? Math.max(min, Math.floor(parsed)) : fallback;
}

/**
 * Logging is configured before the pipeline config is validated, so these
 * settings are read leniently: an unknown level falls back to the default.
 */
export function resolveLogSettings(env: Env = process.env): LogSettings {
    const fallbackLevel: LogLevel = env.NODE_ENV === 'development' ? 'debug' : 'info';
    const requested = (env.LOG_LEVEL || '').trim().toLowerCase();

    return {
        level: isLogLevel(requested) ? requested : fallbackLevel,
        dir: (env.LOG_DIR || '').trim() || 'logs',
        toFile: env.NODE_ENV !== 'test' && env.LOG_TO_FILE !== 'false',
        maxSizeBytes: boundedInt(env.LOG_MAX_SIZE_BYTES, 20 * 1024 * 1024, 1_000_000),
        maxFiles: boundedInt(env.LOG_MAX_FILES, 10, 1),
    };
}

function buildTransports(settings: LogSettings): winston.transport[] {
    // stdout carries CLI results, so console logging goes to stderr.
    const transports: winston.transport[] = [new winston.transports.Console({ stderrLevels: Object.keys(levels) })];
    if (!settings.toFile) {
        return transports;
    }
    const rotation = { maxsize: settings.maxSizeBytes, maxFiles: settings.maxFiles };
    transports.push(
        new winston.transports.File({ filename: path.join(settings.dir, 'error.log'), level: 'error', ...rotation }),
        new winston.transports.File({ filename: path.join(settings.dir, 'all.log'), ...rotation }),
    );
    return transports;
}

const settings = resolveLogSettings();

export const logger = winston.createLogger({
    level: settings.level,
    levels,
    format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
        winston.format.colorize({ all: true }),
        winston.format.printf((info) => `${info.timestamp} ${info.level}: ${info.message}`),
    ),
    transports: buildTransports(settings),
});

export interface ComponentLogger {
    error(message: string): void;
    warn(message: string): void;
    info(message: string): void;
    debug(message: string): void;
}

/** Prefixes every message with `[tag]`, the convention used across the backend. */
export function forComponent(tag: string): ComponentLogger {
    return {
        error: (message) => {
            logger.error(`[${tag}] ${message}`);
        },
        warn: (message) => {
            logger.warn(`[${tag}] ${message}`);
        },
        info: (message) => {
            logger.info(`[${tag}] ${message}`);
        },
        debug: (message) => {
            logger.debug(`[${tag}] ${message}`);
        },
    };
}

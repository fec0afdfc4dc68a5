import winston from 'winston';

/**
 * Campaign Ops - Centralized Logger
 *
 * Transports:
 * - Console: colorized, one line per event
 * - logs/error.log: errors only
 * - logs/combined.log: everything, for reconciling a run after the fact
 *
 * Under NODE_ENV=test the console is silent and no files are written.
 */

const levels = {
    error: 0,
    warn: 1,
    info: 2,
    success: 3,
    debug: 4,
};

export type LogLevel = keyof typeof levels;

const colors = {
    error: 'red',
    warn: 'yellow',
    info: 'blue',
    success: 'green',
    debug: 'white',
};

winston.addColors(colors);

const isTest = process.env.NODE_ENV === 'test';

const consoleFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.colorize({ all: true }),
    winston.format.printf(
        (info) => {
            const emojis: Record<string, string> = {
                error: '❌',
                warn: '⚠️',
                info: 'ℹ️',
                success: '✅',
                debug: '🔍'
            };
            const levelBase = info.level.replace(/\x1B\[[0-9;]*m/g, '').toLowerCase();
            const emoji = emojis[levelBase] || '•';
            return `${emoji} [${info.timestamp}] ${info.level}: ${info.message}`;
        }
    )
);

const fileFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp'] }),
    winston.format.json()
);

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: consoleFormat,
        silent: isTest,
    }),
];

if (!isTest) {
    transports.push(
        new winston.transports.File({ filename: 'logs/error.log', level: 'error', format: fileFormat }),
        new winston.transports.File({ filename: 'logs/combined.log', format: fileFormat }),
    );
}

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    levels,
    transports,
});

export function setLogLevel(level: LogLevel): void {
    logger.level = level;
}

// success is a custom level, so winston's typings have no method for it
export const logSuccess = (message: string, metadata?: Record<string, unknown>) => {
    logger.log('success', message, { metadata });
};

export default logger;

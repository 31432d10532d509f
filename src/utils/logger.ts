import winston from 'winston';
import { config } from '../config/index.js';

/**
 * Cold Email Agent - Centralized Logger
 *
 * Progress and diagnostics go to stderr so that stdout only ever carries the
 * generated email (or its JSON). Set LOG_FILE to also keep a JSON log.
 */

const levels = {
    error: 0,
    warn: 1,
    info: 2,
    success: 3,
    debug: 4,
};

const colors = {
    error: 'red',
    warn: 'yellow',
    info: 'blue',
    success: 'green',
    debug: 'white',
};

winston.addColors(colors);

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

export const logger = winston.createLogger({
    level: config.app.logLevel,
    levels,
    silent: config.app.nodeEnv === 'test',
    transports: [
        new winston.transports.Console({
            format: consoleFormat,
            stderrLevels: Object.keys(levels),
        }),
        ...(config.app.logFile
            ? [new winston.transports.File({ filename: config.app.logFile, format: fileFormat })]
            : []),
    ],
});

// Helper for success messages since it's a custom level
export const logSuccess = (message: string, metadata?: Record<string, unknown>) => {
    logger.log('success', message, { metadata });
};

export default logger;

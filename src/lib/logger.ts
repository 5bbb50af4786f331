// src/lib/logger.ts
// =============================================================================
// LOGGING
// One winston logger per module label. Level and file output default to the
// env config; tests and library callers can pass their own.
// =============================================================================

import * as fs from 'fs';
import * as path from 'path';
import { createLogger as createWinstonLogger, format, transports, type Logger } from 'winston';
import { config } from './config/settings';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
    level?: LogLevel;
    /** Also append to `file` */
    toFile?: boolean;
    file?: string;
}

const DEFAULT_LOG_FILE = path.resolve(process.cwd(), 'logs', 'app.log');

/** `2025-01-01 12:00:00 INFO  [MarketScanner] message {"meta":1}` */
const line = format.printf(({ level, message, label, timestamp, stack, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    const trace = typeof stack === 'string' ? `\n${stack}` : '';
    return `${timestamp} ${level.toUpperCase().padEnd(5)} [${label}] ${message}${extra}${trace}`;
});

function fileTransport(file: string): transports.FileTransportInstance {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    return new transports.File({ filename: file });
}

/**
 * @param label - Module name shown in every line (e.g. 'MarketScanner').
 */
export function createLogger(label: string, options: LoggerOptions = {}): Logger {
    const level = options.level ?? config.log_level;
    const toFile = options.toFile ?? config.logToFile;

    const sinks: Array<transports.ConsoleTransportInstance | transports.FileTransportInstance> = [
        new transports.Console(),
    ];
    if (toFile) sinks.push(fileTransport(options.file ?? DEFAULT_LOG_FILE));

    return createWinstonLogger({
        level,
        format: format.combine(
            format.errors({ stack: true }),
            format.label({ label }),
            format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            format.splat(),
            line
        ),
        transports: sinks,
    });
}

import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Modules may hold the instance from `getLogger()` at load
 * time; `initLogger()` reconfigures that same instance in place.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: pino.Logger | null = null;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

let prettyStream: pino.DestinationStream | null = null;
let jsonStream: pino.DestinationStream | null = null;
let activeStream: pino.DestinationStream = { write: () => undefined };

/**
 * Every log line goes through here, so the output can be switched after creation.
 */
const forwardingStream: pino.DestinationStream = {
    write: (line: string) => activeStream.write(line),
};

function selectStream(jsonLogs: boolean): pino.DestinationStream {
    if (jsonLogs) {
        jsonStream ??= pino.destination(1);
        return jsonStream;
    }
    if (prettyStream === null) {
        const transport: pino.DestinationStream = pino.transport({
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'HH:MM:ss',
                ignore: 'pid,hostname',
            },
        });
        prettyStream = transport;
    }
    return prettyStream;
}

function configure(logger: pino.Logger, level: LogLevel, jsonLogs: boolean): void {
    // Silent loggers never start the pretty transport
    if (level !== 'silent') {
        activeStream = selectStream(jsonLogs);
    }
    logger.level = level;
}

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;
    const logger = getLogger();
    configure(logger, level, jsonLogs);
    return logger;
}

/**
 * Get the logger instance.
 * If not initialized, creates a logger at IMPACT_LOG_LEVEL (default info).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        const level = envLogLevel() ?? 'info';
        loggerInstance = pino({ level }, forwardingStream);
        configure(loggerInstance, level, false);
    }
    return loggerInstance;
}

/**
 * Read IMPACT_LOG_LEVEL, ignoring unknown values.
 */
export function envLogLevel(): LogLevel | undefined {
    const raw = process.env['IMPACT_LOG_LEVEL'];
    return LOG_LEVELS.find((level) => level === raw);
}

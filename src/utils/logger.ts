import pino from 'pino';
import type { LogLevel } from '../types/index.js';

export interface LoggerOptions {
    level?: LogLevel;
    /** One JSON object per line instead of pino-pretty output */
    jsonLogs?: boolean;
    /** JSON mode only; stderr when omitted */
    destination?: pino.DestinationStream;
}

const STDERR = 2;

/**
 * Process-wide logger, replaced by `initLogger()` once the CLI has resolved
 * its configuration. Everything goes to stderr: stdout carries the report.
 */
let loggerInstance: pino.Logger | null = null;

function baseOptions(level: LogLevel): pino.LoggerOptions {
    return {
        level,
        // call sites log failures under `error`, which pino leaves unserialized
        serializers: { error: pino.stdSerializers.err },
    };
}

export function initLogger(options: LoggerOptions): pino.Logger {
    const { level = 'info', jsonLogs = false, destination } = options;

    loggerInstance = jsonLogs
        ? pino(baseOptions(level), destination ?? pino.destination(STDERR))
        : pino({
              ...baseOptions(level),
              transport: {
                  target: 'pino-pretty',
                  options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname', destination: STDERR },
              },
          });

    return loggerInstance;
}

/**
 * The current logger; an info-level pretty logger until `initLogger()` runs.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({});
    }
    return loggerInstance;
}

/**
 * Structured Logging Utility using Pino
 *
 * Provides a singleton logger instance with environment-aware configuration.
 * In development: pretty-printed colored output
 * In production: JSON lines for log aggregation
 * Under test: silent unless LOG_LEVEL is set explicitly
 *
 * Environment Variables:
 * - LOG_LEVEL: minimum log level (default: 'debug' dev, 'info' prod)
 * - NODE_ENV: controls output format (pretty vs JSON)
 */

import pino from 'pino';
import type { Request } from 'express';
import '../types/express';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';
const logLevel = process.env.LOG_LEVEL || (isTest ? 'silent' : isProduction ? 'info' : 'debug');

const baseConfig: pino.LoggerOptions = {
    level: logLevel,
    formatters: {
        level: (label) => {
            return { level: label };
        },
    },
    serializers: {
        err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin: () => ({
        service: 'covenant-ledger-api',
        environment: process.env.NODE_ENV || 'unknown',
        version: process.env.npm_package_version || '1.0.0'
    }),
};

const developmentConfig: pino.LoggerOptions = {
    ...baseConfig,
    transport: {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname',
            singleLine: false,
            messageFormat: '{msg}',
        },
    },
};

// Worker-thread transports would keep the test runner alive, so tests and
// production write raw JSON to stdout.
export const logger = pino(
    isProduction || isTest ? baseConfig : developmentConfig,
);

export type Logger = pino.Logger;

/**
 * Create a child logger with bound context (parcelId, operation, ...)
 */
export function createLogger(context: Record<string, unknown> = {}): Logger {
    return logger.child(context);
}

/**
 * Create a child logger from an Express request: request id, method and url.
 */
export function createLoggerWithReq(req: Request): Logger {
    const context: Record<string, unknown> = {};

    if (req.id) {
        context.reqId = req.id;
    }
    if (req.method) {
        context.method = req.method;
    }
    if (req.originalUrl || req.url) {
        context.url = req.originalUrl || req.url;
    }

    return logger.child(context);
}

export default logger;

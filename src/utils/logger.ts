import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

// Extend Winston logger type
interface ExtendedLogger extends winston.Logger {
    logError: (error: unknown, context?: string, additionalData?: Record<string, unknown>) => void;
}

// Type guard for checking if object is an Error
const isError = (obj: unknown): obj is Error => obj instanceof Error;

const isRecord = (obj: unknown): obj is Record<string, unknown> =>
    typeof obj === 'object' && obj !== null && !Array.isArray(obj);

// Drops empty values so the file lines only carry metadata that was actually set
const cleanMetadata = (obj: unknown, visited = new WeakSet<object>()): unknown => {
    if (!isRecord(obj)) {
        return obj;
    }

    if (visited.has(obj)) {
        return '[Circular Reference]';
    }
    visited.add(obj);

    const cleaned: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
        const cleanedValue = cleanMetadata(value, visited);
        if (cleanedValue !== undefined) {
            cleaned[key] = cleanedValue;
        }
    }
    return Object.keys(cleaned).length > 0 ? cleaned : undefined;
};

// Message formatting function
const formatMessage = (message: unknown): string => {
    if (message === undefined || message === null) {
        return '';
    }
    // If message is an Error object, extract the error details
    if (isError(message)) {
        return `${message.name}: ${message.message}`;
    }
    if (typeof message === 'string') {
        return message;
    }
    try {
        return JSON.stringify(message);
    } catch {
        return String(message);
    }
};

// Printf format for file transports: level, message, cleaned metadata, stack
const enhancedPrintFormat = (info: winston.Logform.TransformableInfo): string => {
    const { level, message, timestamp, stack, error, ...metadata } = info;

    const safeLevel = level.toUpperCase().padEnd(7);
    const safeTimestamp = typeof timestamp === 'string' ? timestamp : new Date().toISOString();

    let errorStack = typeof stack === 'string' ? stack : undefined;
    let safeMessage = formatMessage(message);
    if (isError(error)) {
        safeMessage = `${safeMessage} ${error.name}: ${error.message}`.trim();
        errorStack = errorStack || error.stack;
    } else if (error !== undefined) {
        metadata.error = error;
    }

    // Main message format - timestamp and level are always included
    let log = `${safeTimestamp} ${safeLevel}: ${safeMessage}`;

    const cleanedMetadata = cleanMetadata(metadata);
    if (isRecord(cleanedMetadata)) {
        log += `\n${JSON.stringify(cleanedMetadata, null, 2)}`;
    }

    if (errorStack) {
        log += `\n${errorStack}`;
    }

    return log;
};

// Create custom format with enhanced error handling
const customFormat = winston.format.combine(
    winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss.SSS'
    }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(enhancedPrintFormat)
);

// Define custom levels and colors
const levels = {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    verbose: 4,
    debug: 5
};

const colors = {
    error: 'red',
    warn: 'yellow',
    info: 'green',
    http: 'magenta',
    verbose: 'cyan',
    debug: 'blue'
};

// Set Winston color scheme
winston.addColors(colors);

const nodeEnv = process.env.NODE_ENV || 'development';
const logToFile = process.env.LOG_TO_FILE
    ? process.env.LOG_TO_FILE === 'true'
    : nodeEnv !== 'test';
const logDir = process.env.LOG_DIR || 'logs';

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.timestamp({
                format: 'YYYY-MM-DD HH:mm:ss.SSS'
            }),
            winston.format.colorize({ all: true }),
            winston.format.printf(info => `${info.timestamp} ${info.level.padEnd(7)}: ${formatMessage(info.message)}`)
        ),
        handleExceptions: true,
        handleRejections: true
    })
];

// Rotating file transports for errors and for all logs
if (logToFile) {
    transports.push(
        new DailyRotateFile({
            filename: `${logDir}/error-%DATE%.log`,
            datePattern: 'YYYY-MM-DD',
            level: 'error',
            maxFiles: '14d',
            maxSize: '20m',
            zippedArchive: true,
            format: customFormat,
            handleExceptions: true,
            handleRejections: true
        }),
        new DailyRotateFile({
            filename: `${logDir}/combined-%DATE%.log`,
            datePattern: 'YYYY-MM-DD',
            maxFiles: '14d',
            maxSize: '20m',
            zippedArchive: true,
            format: customFormat
        })
    );
}

// Create logger
const baseLogger = winston.createLogger({
    level: process.env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),
    levels,
    defaultMeta: {
        service: 'activities-service',
        environment: nodeEnv
    },
    format: winston.format.combine(
        winston.format.timestamp({
            format: 'YYYY-MM-DD HH:mm:ss.SSS'
        }),
        winston.format.errors({ stack: true })
    ),
    transports,
    exitOnError: false
});

// Enhanced error logging helper
const logError = (error: unknown, context: string = '', additionalData: Record<string, unknown> = {}): void => {
    let errorName = 'Error';
    let errorMessage: string;
    let errorStack: string | undefined;

    if (isError(error)) {
        errorName = error.name;
        errorMessage = error.message;
        errorStack = error.stack;
    } else if (typeof error === 'string') {
        errorMessage = error;
    } else {
        errorMessage = formatMessage(error);
    }

    baseLogger.error(`${context ? context + ': ' : ''}${errorName}: ${errorMessage}`, {
        error: {
            error_name: errorName,
            error_message: errorMessage,
            context,
            ...additionalData
        },
        stack: errorStack
    });
};

// Add logError to the logger
const logger: ExtendedLogger = Object.assign(baseLogger, { logError });

export { logger };
export type { ExtendedLogger };

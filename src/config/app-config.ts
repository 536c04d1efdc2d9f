import { logger } from '../utils/logger';

export interface AppConfig {
    port: number;
    nodeEnv: string;
    staticDir: string;
    maxUploadBytes: number;
    rateLimitWindowMs: number;
    rateLimitMax: number;
    allowedOrigins: string[] | '*';
}

const DEFAULT_PORT = 8000;
const DEFAULT_MAX_UPLOAD_MB = 10;
const DEFAULT_RATE_LIMIT_WINDOW_MS = 5 * 60 * 1000;
const DEFAULT_RATE_LIMIT_MAX = 200;

/**
 * Reads a positive integer from the environment, falling back to the default
 * (with a warning) when the value is set but unusable.
 */
function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        logger.warn(`[Config] Invalid ${key}="${raw}", using default ${fallback}`);
        return fallback;
    }
    return value;
}

function readAllowedOrigins(env: NodeJS.ProcessEnv, nodeEnv: string): string[] | '*' {
    if (nodeEnv !== 'production') {
        return '*';
    }
    return (env.ALLOWED_ORIGINS || '')
        .split(',')
        .map(origin => origin.trim())
        .filter(origin => origin.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const nodeEnv = env.NODE_ENV || 'development';

    return {
        port: readPositiveInt(env, 'PORT', DEFAULT_PORT),
        nodeEnv,
        staticDir: env.STATIC_DIR || 'static',
        maxUploadBytes: readPositiveInt(env, 'MAX_UPLOAD_SIZE_MB', DEFAULT_MAX_UPLOAD_MB) * 1024 * 1024,
        rateLimitWindowMs: readPositiveInt(env, 'RATE_LIMIT_WINDOW_MS', DEFAULT_RATE_LIMIT_WINDOW_MS),
        rateLimitMax: readPositiveInt(env, 'RATE_LIMIT_MAX', DEFAULT_RATE_LIMIT_MAX),
        allowedOrigins: readAllowedOrigins(env, nodeEnv)
    };
}

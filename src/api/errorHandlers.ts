import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { InvalidArgumentError, ServiceError } from '../types/errors';
import { logger } from '../utils/logger';

// 4xx status carried by errors raised inside Express and body-parser
const clientErrorStatus = (err: unknown): number | undefined => {
    if (typeof err !== 'object' || err === null) {
        return undefined;
    }
    const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
    return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
};

/**
 * Generic error handler for API routes
 * Transforms errors into appropriate HTTP responses
 */
export const createErrorHandler = (nodeEnv: string) =>
    (err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof InvalidArgumentError) {
            logger.warn(`[API] ${req.method} ${req.originalUrl} rejected: ${err.message}`);
            return res.status(err.statusCode).json({
                status: 'error',
                error: err.message,
                details: err.details
            });
        }

        if (err instanceof ServiceError) {
            logger.warn(`[API] ${req.method} ${req.originalUrl} rejected: ${err.message}`);
            return res.status(err.statusCode).json({
                status: 'error',
                error: err.message
            });
        }

        if (err instanceof MulterError) {
            logger.warn(`[API] Upload rejected: ${err.code} ${err.message}`);
            return res.status(422).json({
                status: 'error',
                error: err.message,
                details: [{ field: err.field ?? 'file', location: 'form', message: err.message }]
            });
        }

        // Malformed JSON body from express.json()
        if (err instanceof SyntaxError && 'body' in err) {
            return res.status(400).json({
                status: 'error',
                error: 'Malformed request body'
            });
        }

        const status = clientErrorStatus(err);
        if (status !== undefined) {
            const message = err instanceof Error ? err.message : 'Request rejected';
            logger.warn(`[API] ${req.method} ${req.originalUrl} rejected with ${status}: ${message}`);
            return res.status(status).json({
                status: 'error',
                error: message
            });
        }

        logger.logError(err, '[API Error]', { method: req.method, url: req.originalUrl });

        return res.status(500).json({
            status: 'error',
            error: 'Internal server error',
            message: nodeEnv === 'production' || !(err instanceof Error)
                ? 'An unexpected error occurred'
                : err.message
        });
    };

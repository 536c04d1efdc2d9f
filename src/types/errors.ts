import { FieldIssue } from './validation';

/**
 * Base class for errors the API turns into a client-facing response.
 * Anything else reaching the error handler is treated as a 500.
 */
export abstract class ServiceError extends Error {
    public abstract readonly statusCode: number;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class NotFoundError extends ServiceError {
    public readonly statusCode = 404;
}

// Sent as HTTP 400
export class ConflictError extends ServiceError {
    public readonly statusCode = 400;
}

export class InvalidArgumentError extends ServiceError {
    public readonly statusCode = 422;
    public readonly details: FieldIssue[];

    constructor(message: string, details: FieldIssue[] = []) {
        super(message);
        this.details = details;
    }
}

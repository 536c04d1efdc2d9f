import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Async handler wrapper for express route handlers
 * Forwards thrown errors and rejected promises to the error handler
 * @param fn Express route handler function
 */
export const asyncHandler = (
    fn: (req: Request, res: Response, next: NextFunction) => unknown
): RequestHandler => (req, res, next) => {
    new Promise(resolve => resolve(fn(req, res, next))).catch(next);
};

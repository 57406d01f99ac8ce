import { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

interface ErrorResponse {
    error: string;
    message?: string;
    field?: string;
    requestId?: string;
    stack?: string;
}

function statusOf(err: Error): number {
    if (err instanceof AppError) {
        return err.status;
    }
    // body-parser and friends set `status` on their own errors
    if ('status' in err && typeof err.status === 'number') {
        return err.status;
    }
    if ('statusCode' in err && typeof err.statusCode === 'number') {
        return err.statusCode;
    }
    return 500;
}

export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
) => {
    const requestId = req.id;
    const statusCode = statusOf(err);

    const log = req.log ?? logger;
    const context = { err, requestId, path: req.path, method: req.method, status: statusCode };
    if (statusCode >= 500) {
        log.error(context, err.message || 'Unhandled error');
    } else {
        log.warn(context, err.message);
    }

    const isDevelopment = process.env.NODE_ENV === 'development';
    const isTest = process.env.NODE_ENV === 'test';

    if (err.message === 'Not allowed by CORS') {
        return res.status(403).json({
            error: 'Forbidden',
            message: 'Origin not allowed by CORS policy',
            requestId
        });
    }

    // Never leak internals of a server fault outside development
    if (statusCode >= 500 && !isDevelopment && !isTest) {
        return res.status(statusCode).json({
            error: 'Internal server error',
            requestId
        });
    }

    const errorResponse: ErrorResponse = {
        error: err.name || 'Internal Server Error',
        message: err.message,
    };

    if ('field' in err && typeof err.field === 'string') {
        errorResponse.field = err.field;
    }
    if (requestId) {
        errorResponse.requestId = requestId;
    }
    if (isDevelopment && err.stack) {
        errorResponse.stack = err.stack;
    }

    res.status(statusCode).json(errorResponse);
};

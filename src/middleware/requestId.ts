/**
 * Request ID Middleware
 *
 * Tags every request with an id (taken from `x-request-id` when the caller
 * sends one) and attaches a child logger carrying it.
 */

import { v4 as uuidv4 } from 'uuid';
import { Request, Response, NextFunction } from 'express';
import { createLogger } from '../utils/logger';

const REQUEST_ID_HEADER = 'x-request-id';

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction) {
    const incoming = req.headers[REQUEST_ID_HEADER];
    const requestId = typeof incoming === 'string' && incoming.length > 0 ? incoming : uuidv4();

    req.id = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);
    req.log = createLogger({ reqId: requestId });

    next();
}

export default requestIdMiddleware;

import type { Logger } from 'pino';

// Request fields set by requestIdMiddleware
declare global {
    namespace Express {
        interface Request {
            id?: string;
            log?: Logger;
        }
    }
}

export {};

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';

import type { CampusConfig } from './config/campusConfig';
import type { Database } from './db';
import { ParcelService } from './services/parcelService';
import { ReportService } from './services/reportService';

import { createParcelRoutes } from './routes/parcels';
import { createEnforcementRoutes } from './routes/enforcement';
import { createSettlementRoutes } from './routes/settlements';
import { createDashboardRoutes } from './routes/dashboard';
import { createRateRoutes } from './routes/rates';

import { errorHandler } from './middleware/errorHandler';
import requestIdMiddleware from './middleware/requestId';
import metricsMiddleware, { healthEndpoint, metricsEndpoint } from './middleware/metricsMiddleware';
import { logger } from './utils/logger';

export interface AppContext {
    db: Database;
    config: CampusConfig;
}

/**
 * Wire services, middleware and routers around one database and config.
 */
export function createApp({ db, config }: AppContext): express.Express {
    const app = express();
    const parcels = new ParcelService(db, config);
    const reports = new ReportService(db, config, parcels);

    app.use(helmet());
    app.use(express.json({ limit: '1mb' }));

    // Must run before CORS so rejected origins still carry a request id
    app.use(requestIdMiddleware);
    app.use(metricsMiddleware);

    const allowedOrigins = [
        'http://localhost:3000',
        'http://localhost:5173',
        process.env.FRONTEND_URL
    ].filter((origin): origin is string => Boolean(origin));

    app.use(cors({
        origin: (origin, callback) => {
            // Same-origin and server-to-server requests carry no Origin header
            if (!origin || allowedOrigins.includes(origin)) {
                callback(null, true);
            } else {
                logger.warn({ origin }, `CORS blocked origin: ${origin}`);
                callback(new Error('Not allowed by CORS'));
            }
        }
    }));

    app.use('/api/', rateLimit({
        windowMs: 15 * 60 * 1000,
        max: 1000,
        standardHeaders: true,
        legacyHeaders: false,
    }));

    app.get('/health', healthEndpoint);
    app.get('/metrics', metricsEndpoint);

    app.use('/api/parcels', createParcelRoutes(parcels, reports));
    app.use('/api/enforcement', createEnforcementRoutes(db, parcels));
    app.use('/api/settlements', createSettlementRoutes(parcels));
    app.use('/api/dashboard', createDashboardRoutes(reports));
    app.use('/api/rates', createRateRoutes(reports));

    app.use(errorHandler);

    return app;
}

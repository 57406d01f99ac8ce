import { Router, Request, Response, NextFunction } from 'express';
import type { ReportService } from '../services/reportService';

export function createRateRoutes(reports: ReportService): Router {
    const router = Router();

    router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await reports.listRates());
        } catch (err) {
            next(err);
        }
    });

    return router;
}

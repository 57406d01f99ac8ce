import { Router, Request, Response, NextFunction } from 'express';
import { validate, commonValidations } from '../middleware/validationMiddleware';
import { formatCalendarDate } from '../services/deadlineService';
import type { ReportService } from '../services/reportService';

// ?today= pins the reference date; defaults to the server's calendar day
function todayOf(req: Request): string {
    return typeof req.query.today === 'string' ? req.query.today : formatCalendarDate(new Date());
}

export function createDashboardRoutes(reports: ReportService): Router {
    const router = Router();

    router.get('/', validate([commonValidations.todayQuery]), async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await reports.dashboard(todayOf(req)));
        } catch (err) {
            next(err);
        }
    });

    router.get('/pro-rata', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await reports.proRataTable());
        } catch (err) {
            next(err);
        }
    });

    router.get('/deadlines', validate([commonValidations.todayQuery]), async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await reports.upcomingDeadlines(todayOf(req)));
        } catch (err) {
            next(err);
        }
    });

    return router;
}

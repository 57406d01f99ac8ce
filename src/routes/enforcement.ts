import { Router, Request, Response, NextFunction } from 'express';
import { body, query } from 'express-validator';
import type { Database } from '../db';
import { validate, commonValidations } from '../middleware/validationMiddleware';
import { listTimeline } from '../services/auditService';
import type { ParcelService } from '../services/parcelService';
import { buildPaginatedResponse, getPaginationParams } from '../utils/pagination';

export function createEnforcementRoutes(db: Database, parcels: ParcelService): Router {
    const router = Router();

    // GET /api/enforcement?parcelId=3&page=1&limit=50 (newest first)
    router.get('/',
        validate([
            query('parcelId').optional().isInt({ min: 1 }).withMessage('parcelId must be a positive integer'),
        ]),
        async (req: Request, res: Response, next: NextFunction) => {
            const pagination = getPaginationParams(req);
            const parcelId = typeof req.query.parcelId === 'string' ? Number(req.query.parcelId) : undefined;
            try {
                const { entries, totalCount } = await listTimeline(db, {
                    parcelId,
                    limit: pagination.limit,
                    offset: pagination.offset,
                });
                res.json(buildPaginatedResponse(entries, totalCount, pagination));
            } catch (err) {
                next(err);
            }
        });

    router.post('/',
        validate([
            body('parcelId')
                .optional({ values: 'null' })
                .isInt({ min: 1 })
                .withMessage('parcelId must be a positive integer or null')
                .toInt(),
            body('action').isString().trim().notEmpty().withMessage('action is required'),
            commonValidations.optionalText('sentVia'),
            commonValidations.optionalCalendarDate('responseDue'),
            commonValidations.optionalCalendarDate('responseReceived'),
            commonValidations.optionalText('nextStep'),
            commonValidations.optionalText('attorney'),
            body('cost').optional({ values: 'null' }).isFloat({ min: 0 }).withMessage('cost must be a non-negative number').toFloat(),
            commonValidations.optionalText('notes'),
        ]),
        async (req: Request, res: Response, next: NextFunction) => {
            const { parcelId, action, sentVia, responseDue, responseReceived, nextStep, attorney, cost, notes } = req.body;
            try {
                const entry = await parcels.recordEnforcementAction({
                    parcelId: typeof parcelId === 'number' ? parcelId : null,
                    action,
                    sentVia,
                    responseDue,
                    responseReceived,
                    nextStep,
                    attorney,
                    cost,
                    notes,
                });
                res.status(201).json(entry);
            } catch (err) {
                next(err);
            }
        });

    return router;
}

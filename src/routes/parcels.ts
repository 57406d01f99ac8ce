import { Router, Request, Response, NextFunction } from 'express';
import { body, query } from 'express-validator';
import { validate, commonValidations } from '../middleware/validationMiddleware';
import type { ParcelService, ParcelOrder } from '../services/parcelService';
import type { ReportService } from '../services/reportService';
import { isParcelStatus } from '../services/stateMachine';
import { ParcelStatus } from '../types';
import { ValidationError } from '../utils/errors';
import { createLoggerWithReq } from '../utils/logger';

function isFieldInput(value: unknown): boolean {
    return value === null || typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

function parseStatusFilter(raw: unknown): ParcelStatus[] {
    if (typeof raw !== 'string' || raw.trim() === '') {
        return [];
    }
    return raw.split(',').map(part => {
        const status = part.trim().toUpperCase();
        if (!isParcelStatus(status)) {
            throw new ValidationError(`Unknown status "${part.trim()}"`, 'status');
        }
        return status;
    });
}

export function createParcelRoutes(parcels: ParcelService, reports: ReportService): Router {
    const router = Router();

    // GET /api/parcels?status=DELINQUENT,DISPUTED&order=area
    router.get('/',
        validate([
            query('order').optional().isIn(['status', 'area']).withMessage('order must be status or area'),
        ]),
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                const statuses = parseStatusFilter(req.query.status);
                const order: ParcelOrder = req.query.order === 'area' ? 'area' : 'status';
                res.json(await parcels.listParcels({ statuses, order }));
            } catch (err) {
                next(err);
            }
        });

    router.get('/nonpayers', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await reports.nonPayers());
        } catch (err) {
            next(err);
        }
    });

    router.get('/vocabulary', (_req: Request, res: Response) => {
        res.json(reports.vocabulary());
    });

    router.get('/research', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await reports.researchTracker());
        } catch (err) {
            next(err);
        }
    });

    router.get('/:id', validate([commonValidations.parcelId]), async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await parcels.getParcel(Number(req.params.id)));
        } catch (err) {
            next(err);
        }
    });

    // PATCH /api/parcels/:id { field, value }
    router.patch('/:id',
        validate([
            commonValidations.parcelId,
            body('field').isString().notEmpty().withMessage('field is required'),
            body('value').custom(isFieldInput).withMessage('value must be text, a number or null'),
        ]),
        async (req: Request, res: Response, next: NextFunction) => {
            const log = createLoggerWithReq(req);
            const { field, value } = req.body;
            try {
                const result = await parcels.updateField(Number(req.params.id), field, value);
                log.info({ parcelId: result.parcel.id, field }, 'Field updated');
                res.json(result);
            } catch (err) {
                next(err);
            }
        });

    router.post('/:id/packet-sent',
        validate([
            commonValidations.parcelId,
            body('sentDate').isString().withMessage('sentDate is required'),
            commonValidations.optionalText('tracking'),
        ]),
        async (req: Request, res: Response, next: NextFunction) => {
            const log = createLoggerWithReq(req);
            const { sentDate, tracking } = req.body;
            try {
                const result = await parcels.markPacketSent(Number(req.params.id), sentDate, tracking);
                log.info({ parcelId: result.parcel.id, sentDate }, 'Packet sent recorded');
                res.status(201).json(result);
            } catch (err) {
                next(err);
            }
        });

    router.put('/:id/research',
        validate([
            commonValidations.parcelId,
            body('fields').isObject().withMessage('fields must be an object'),
            body('fields.*').custom(isFieldInput).withMessage('research values must be text or null'),
        ]),
        async (req: Request, res: Response, next: NextFunction) => {
            try {
                res.json(await parcels.updateResearch(Number(req.params.id), req.body.fields));
            } catch (err) {
                next(err);
            }
        });

    router.post('/:id/verify-address', validate([commonValidations.parcelId]), async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await parcels.markAddressVerified(Number(req.params.id)));
        } catch (err) {
            next(err);
        }
    });

    router.post('/:id/verify-lender', validate([commonValidations.parcelId]), async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await parcels.markLenderVerified(Number(req.params.id)));
        } catch (err) {
            next(err);
        }
    });

    return router;
}

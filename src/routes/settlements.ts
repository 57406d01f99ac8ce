import { Router, Request, Response, NextFunction } from 'express';
import { body } from 'express-validator';
import { validate, commonValidations } from '../middleware/validationMiddleware';
import type { ParcelService, SettlementInput } from '../services/parcelService';
import { ValidationError } from '../utils/errors';

export function createSettlementRoutes(parcels: ParcelService): Router {
    const router = Router();

    /**
     * POST /api/settlements
     * Either `principal` or `parcelId` (whose arrears become the principal).
     */
    router.post('/',
        validate([
            body('principal').optional().isFloat().withMessage('principal must be a number').toFloat(),
            body('parcelId').optional().isInt({ min: 1 }).withMessage('parcelId must be a positive integer').toInt(),
            body('discountPct').isFloat({ min: 0, max: 1 }).withMessage('discountPct must be between 0 and 1').toFloat(),
            commonValidations.nonNegativeNumber('interestRate'),
            commonValidations.integer('termMonths'),
        ]),
        async (req: Request, res: Response, next: NextFunction) => {
            const { principal, parcelId, discountPct, interestRate, termMonths } = req.body;
            try {
                let input: SettlementInput;
                if (typeof parcelId === 'number' && typeof principal === 'number') {
                    throw new ValidationError('Send either principal or parcelId, not both', 'principal');
                } else if (typeof parcelId === 'number') {
                    input = { parcelId };
                } else if (typeof principal === 'number') {
                    input = { principal };
                } else {
                    throw new ValidationError('Either principal or parcelId is required', 'principal');
                }
                res.json(await parcels.computeSettlement(input, { discountPct, interestRate, termMonths }));
            } catch (err) {
                next(err);
            }
        });

    return router;
}

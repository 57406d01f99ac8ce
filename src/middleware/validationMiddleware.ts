import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationChain, body, param, query } from 'express-validator';
import { isCalendarDate } from '../services/deadlineService';

/**
 * Answers 400 with the collected express-validator failures, if any.
 */
export const handleValidationErrors = (req: Request, res: Response, next: NextFunction): void => {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
        res.status(400).json({
            error: 'Validation Error',
            details: errors.array().map(err => ({
                field: err.type === 'field' ? err.path : 'unknown',
                message: err.msg
            }))
        });
        return;
    }
    next();
};

export const validate = (validations: ValidationChain[]) => [
    ...validations,
    handleValidationErrors
];

/**
 * Request-shape rules shared by the routers. Domain rules (status values,
 * money formats, field names) stay in the services.
 */
export const commonValidations = {
    parcelId: param('id')
        .isInt({ min: 1 })
        .withMessage('Parcel id must be a positive integer')
        .toInt(),

    optionalCalendarDate: (fieldName: string) => body(fieldName)
        .optional({ values: 'null' })
        .isString()
        .bail()
        .custom((value: string) => value.trim() === '' || isCalendarDate(value.trim()))
        .withMessage(`${fieldName} must be a YYYY-MM-DD date`),

    todayQuery: query('today')
        .optional()
        .custom((value: string) => isCalendarDate(value))
        .withMessage('today must be a YYYY-MM-DD date'),

    optionalText: (fieldName: string) => body(fieldName)
        .optional({ values: 'null' })
        .isString()
        .withMessage(`${fieldName} must be text`),

    nonNegativeNumber: (fieldName: string) => body(fieldName)
        .isFloat({ min: 0 })
        .withMessage(`${fieldName} must be a non-negative number`)
        .toFloat(),

    integer: (fieldName: string) => body(fieldName)
        .isInt({ min: 0 })
        .withMessage(`${fieldName} must be a non-negative integer`)
        .toInt(),
};

/**
 * Error taxonomy for the enforcement engine.
 *
 * Every error carries the HTTP status the global errorHandler answers with.
 * ValidationError and NotFoundError are raised before any write happens;
 * ConfigurationError only surfaces at startup.
 */

export class AppError extends Error {
    readonly status: number;

    constructor(message: string, status: number) {
        super(message);
        this.name = new.target.name;
        this.status = status;
    }
}

export class ConfigurationError extends AppError {
    constructor(message: string) {
        super(message, 500);
    }
}

export class ValidationError extends AppError {
    readonly field?: string;

    constructor(message: string, field?: string) {
        super(message, 400);
        this.field = field;
    }
}

export class InvalidDateError extends ValidationError {
    constructor(value: string, field?: string) {
        super(`Invalid date "${value}". Use YYYY-MM-DD.`, field);
    }
}

export class NotFoundError extends AppError {
    constructor(entity: string, id: number | string) {
        super(`${entity} ${id} not found`, 404);
    }
}

import { Request } from 'express';

export interface PaginationParams {
    page: number;
    limit: number;
    offset: number;
}

export interface PaginatedResponse<T> {
    data: T[];
    pagination: {
        page: number;
        limit: number;
        totalCount: number;
        totalPages: number;
    };
}

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

function queryInt(value: unknown): number {
    return typeof value === 'string' ? parseInt(value, 10) : NaN;
}

/**
 * Page and limit from the query string. Defaults: page=1, limit=50
 */
export function getPaginationParams(req: Request): PaginationParams {
    const page = Math.max(1, queryInt(req.query.page) || 1);
    const limit = Math.min(MAX_LIMIT, Math.max(1, queryInt(req.query.limit) || DEFAULT_LIMIT));
    const offset = (page - 1) * limit;

    return { page, limit, offset };
}

export function buildPaginatedResponse<T>(
    data: T[],
    totalCount: number,
    params: PaginationParams
): PaginatedResponse<T> {
    return {
        data,
        pagination: {
            page: params.page,
            limit: params.limit,
            totalCount,
            totalPages: Math.ceil(totalCount / params.limit)
        }
    };
}

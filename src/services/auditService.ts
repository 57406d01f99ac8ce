import type { Database, SqlClient } from '../db';
import { EnforcementLogEntry, NewLogEntry, TimelineEntry } from '../types';
import { logger } from '../utils/logger';
import { metrics } from '../utils/metrics';

/*
 * The enforcement log is write-once: this module is the only writer and it
 * only ever INSERTs.
 */

type LogRow = {
    id: number;
    parcel_id: number | null;
    logged_at: Date | string;
    action: string;
    sent_via: string | null;
    response_due: string | null;
    response_received: string | null;
    next_step: string | null;
    attorney: string | null;
    cost: number | null;
    notes: string | null;
};

type TimelineRow = LogRow & {
    parcel_address: string | null;
    parcel_name: string | null;
};

function toIso(value: Date | string): string {
    return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

export function mapLogRow(row: LogRow): EnforcementLogEntry {
    return {
        id: row.id,
        parcelId: row.parcel_id,
        timestamp: toIso(row.logged_at),
        action: row.action,
        sentVia: row.sent_via,
        responseDue: row.response_due,
        responseReceived: row.response_received,
        nextStep: row.next_step,
        attorney: row.attorney,
        cost: row.cost ?? 0,
        notes: row.notes,
    };
}

/**
 * Append one entry inside the caller's transaction.
 */
export async function appendLogEntry(client: SqlClient, entry: NewLogEntry): Promise<EnforcementLogEntry> {
    const result = await client.query<LogRow>(
        `INSERT INTO enforcement_log
            (parcel_id, action, sent_via, response_due, response_received, next_step, attorney, cost, notes)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         RETURNING *`,
        [
            entry.parcelId,
            entry.action,
            entry.sentVia ?? null,
            entry.responseDue ?? null,
            entry.responseReceived ?? null,
            entry.nextStep ?? null,
            entry.attorney ?? null,
            entry.cost ?? 0,
            entry.notes ?? null,
        ]
    );
    metrics.recordAuditEntry();
    logger.debug({ parcelId: entry.parcelId, action: entry.action }, 'Enforcement log entry written');
    return mapLogRow(result.rows[0]);
}

export interface TimelineFilter {
    parcelId?: number;
    limit: number;
    offset: number;
}

/**
 * Newest first, joined with the parcel each entry refers to.
 */
export async function listTimeline(db: Database, filter: TimelineFilter): Promise<{ entries: TimelineEntry[]; totalCount: number }> {
    const params: unknown[] = [];
    let where = '';
    if (filter.parcelId !== undefined) {
        params.push(filter.parcelId);
        where = 'WHERE el.parcel_id = $1';
    }

    const countResult = await db.query<{ count: number | string }>(
        `SELECT COUNT(*) AS count FROM enforcement_log el ${where}`,
        params
    );
    const totalCount = Number(countResult.rows[0].count);

    const result = await db.query<TimelineRow>(
        `SELECT el.*, p.address AS parcel_address, p.business_name AS parcel_name
         FROM enforcement_log el
         LEFT JOIN parcels p ON el.parcel_id = p.id
         ${where}
         ORDER BY el.logged_at DESC, el.id DESC
         LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
        [...params, filter.limit, filter.offset]
    );

    const entries = result.rows.map(row => ({
        ...mapLogRow(row),
        parcelAddress: row.parcel_address,
        parcelName: row.parcel_name,
    }));

    return { entries, totalCount };
}

export async function countLogEntries(db: Database, parcelId?: number): Promise<number> {
    const result = parcelId === undefined
        ? await db.query<{ count: number | string }>('SELECT COUNT(*) AS count FROM enforcement_log')
        : await db.query<{ count: number | string }>(
            'SELECT COUNT(*) AS count FROM enforcement_log WHERE parcel_id = $1',
            [parcelId]
        );
    return Number(result.rows[0].count);
}

import { addDays, differenceInCalendarDays, format, isValid, parse } from 'date-fns';
import type { DeadlineOffsets } from '../config/campusConfig';
import { DeadlineType, EnforcementDeadlines, Urgency } from '../types';
import { ConfigurationError, InvalidDateError } from '../utils/errors';

const DATE_FORMAT = 'yyyy-MM-dd';
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// Reference date for parse(); only its time zone matters
const PARSE_REFERENCE = new Date(2000, 0, 1);

export const URGENT_WITHIN_DAYS = 7;
export const SOON_WITHIN_DAYS = 14;

export const DEADLINE_LABELS: Record<DeadlineType, string> = {
    CURE: '30-Day CURE',
    LIEN: '45-Day LIEN',
    ATTORNEY_REFERRAL: '60-Day ATTORNEY',
};

/**
 * Parse a YYYY-MM-DD calendar date at local midnight.
 * Rejects other layouts and impossible days such as 2026-02-30.
 */
export function parseCalendarDate(value: string, field?: string): Date {
    if (!DATE_PATTERN.test(value)) {
        throw new InvalidDateError(value, field);
    }
    const date = parse(value, DATE_FORMAT, PARSE_REFERENCE);
    if (!isValid(date) || format(date, DATE_FORMAT) !== value) {
        throw new InvalidDateError(value, field);
    }
    return date;
}

export function isCalendarDate(value: string): boolean {
    try {
        parseCalendarDate(value);
        return true;
    } catch {
        return false;
    }
}

export function formatCalendarDate(date: Date): string {
    return format(date, DATE_FORMAT);
}

/**
 * Dates at fixed day offsets from one anchor. Offsets must be strictly
 * increasing so the resulting dates are too.
 */
export function scheduleFromAnchor(anchor: string, offsets: readonly number[]): string[] {
    const anchorDate = parseCalendarDate(anchor);

    for (let i = 1; i < offsets.length; i++) {
        if (offsets[i] <= offsets[i - 1]) {
            throw new ConfigurationError(`Deadline offsets must be strictly increasing: ${offsets.join(', ')}`);
        }
    }

    return offsets.map(days => formatCalendarDate(addDays(anchorDate, days)));
}

/**
 * Cure, lien and attorney-referral dates for a packet sent on `sentDate`.
 */
export function calculateDeadlines(sentDate: string, offsets: DeadlineOffsets): EnforcementDeadlines {
    const [cureDeadline, lienFilingDate, attorneyReferralDate] = scheduleFromAnchor(sentDate, [
        offsets.cure,
        offsets.lien,
        offsets.attorneyReferral,
    ]);
    return { cureDeadline, lienFilingDate, attorneyReferralDate };
}

/** Calendar days from `today` until `deadline`; negative once passed */
export function daysLeft(deadline: string, today: string): number {
    return differenceInCalendarDays(parseCalendarDate(deadline), parseCalendarDate(today));
}

export function classifyUrgency(days: number): Urgency {
    if (days < 0) return 'overdue';
    if (days <= URGENT_WITHIN_DAYS) return 'urgent';
    if (days <= SOON_WITHIN_DAYS) return 'soon';
    return 'normal';
}

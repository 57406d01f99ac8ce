import type { CampusConfig } from '../config/campusConfig';
import { ARREARS_STATUSES, AmountOverride, Parcel, SettlementResult } from '../types';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { currentWeekly, forwardMonthly, historicWeekly } from './prorationService';

/** Principal plus a 40% litigation premium (fees + time) */
export const LITIGATION_MULTIPLIER = 1.40;

/**
 * Map a nullable stored column onto an override.
 *
 * Zero is read as "no override": the ledger has never distinguished a
 * reconciled zero balance from an empty field.
 */
export function overrideFromColumn(value: number | null): AmountOverride {
    if (value === null || value === 0) {
        return { kind: 'computed' };
    }
    return { kind: 'stored', amount: value };
}

type ArrearsInput = Pick<Parcel, 'pastDueBalance' | 'status' | 'sqft'>;
type WeeklyInput = Pick<Parcel, 'weeklyRate' | 'sqft'>;

/**
 * 36-month arrears: a stored balance always wins, otherwise the historic
 * weekly charge over the lookback window for statuses that owe.
 */
export function arrears(config: CampusConfig, parcel: ArrearsInput): number {
    if (parcel.pastDueBalance.kind === 'stored') {
        return parcel.pastDueBalance.amount;
    }
    if (ARREARS_STATUSES.includes(parcel.status)) {
        return historicWeekly(config, parcel.sqft) * config.arrearsWeeks;
    }
    return 0;
}

export function weeklyRate(config: CampusConfig, parcel: WeeklyInput): number {
    if (parcel.weeklyRate.kind === 'stored') {
        return parcel.weeklyRate.amount;
    }
    return currentWeekly(config, parcel.sqft);
}

export function forwardMonthlyFor(config: CampusConfig, parcel: WeeklyInput): number {
    return forwardMonthly(weeklyRate(config, parcel));
}

/**
 * Settlement offer economics with simple (non-compounding) interest
 * prorated over the term.
 */
export function settlement(
    principal: number,
    discountPct: number,
    interestRate: number,
    termMonths: number
): SettlementResult {
    if (!Number.isInteger(termMonths) || termMonths < 0) {
        throw new ValidationError(`Term must be a whole number of months, got ${termMonths}`, 'termMonths');
    }

    const settledAmount = principal * (1 - discountPct);
    const totalWithInterest = settledAmount * (1 + interestRate * (termMonths / 12));
    const litigationEstimate = principal * LITIGATION_MULTIPLIER;

    const termClamped = termMonths === 0;
    if (termClamped) {
        logger.warn({ principal, discountPct, interestRate }, 'Settlement term of 0 months: monthly payments set to 0');
    }

    return {
        settledAmount,
        monthlyNoInterest: termClamped ? 0 : settledAmount / termMonths,
        totalWithInterest,
        monthlyWithInterest: termClamped ? 0 : totalWithInterest / termMonths,
        litigationEstimate,
        savingsVsFull: principal - settledAmount,
        savingsPct: discountPct,
        savingsVsLitigation: litigationEstimate - totalWithInterest,
        termClamped,
    };
}

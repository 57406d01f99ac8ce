import { PARCEL_STATUSES, ParcelStatus, RECOMMENDED_STEPS, RecommendedStep } from '../types';

/**
 * Recommended status paths. Nothing is blocked: disputes reopen, so a move
 * off these paths is applied and flagged in the log instead.
 */
export const RECOMMENDED_TRANSITIONS: Readonly<Record<ParcelStatus, readonly ParcelStatus[]>> = {
    VERIFY: ['CURRENT', 'DELINQUENT', 'RECON'],
    DELINQUENT: ['DISPUTED', 'SETTLED'],
    DISPUTED: ['SETTLED', 'DELINQUENT'],
    RECON: ['DELINQUENT', 'CURRENT'],
    CURRENT: [],
    SETTLED: [],
};

export function isParcelStatus(value: string): value is ParcelStatus {
    return (PARCEL_STATUSES as readonly string[]).includes(value);
}

export function isRecommendedStep(value: string): value is RecommendedStep {
    return (RECOMMENDED_STEPS as readonly string[]).includes(value);
}

export function isRecommendedTransition(from: ParcelStatus, to: ParcelStatus): boolean {
    return from === to || RECOMMENDED_TRANSITIONS[from].includes(to);
}

/**
 * Note recorded with a status change; empty when the move is on a
 * recommended path.
 */
export function describeTransition(from: ParcelStatus, to: ParcelStatus): string | null {
    if (isRecommendedTransition(from, to)) {
        return null;
    }
    return `Off recommended path: ${from} -> ${to}`;
}

import type { CampusConfig } from '../config/campusConfig';
import { ConfigurationError } from '../utils/errors';

/**
 * Average weeks per month used by every legacy figure. Kept at three decimals
 * so forward billing matches the amounts already sent to owners.
 */
export const WEEKS_PER_MONTH = 4.333;

/**
 * Allocate a campus-wide rate to a parcel by floor-area share.
 */
export function prorate(area: number, totalArea: number, rate: number): number {
    if (!(totalArea > 0)) {
        throw new ConfigurationError(`Total campus area must be positive, got ${totalArea}`);
    }
    return rate * (area / totalArea);
}

export function campusShare(config: CampusConfig, area: number): number {
    if (!(config.totalCampusArea > 0)) {
        throw new ConfigurationError(`Total campus area must be positive, got ${config.totalCampusArea}`);
    }
    return area / config.totalCampusArea;
}

/** Weekly charge under the pre-2026 campus rate */
export function historicWeekly(config: CampusConfig, area: number): number {
    return prorate(area, config.totalCampusArea, config.historicWeeklyRate);
}

/** Weekly charge under the current campus rate */
export function currentWeekly(config: CampusConfig, area: number): number {
    return prorate(area, config.totalCampusArea, config.currentWeeklyRate);
}

export function forwardMonthly(weekly: number): number {
    return weekly * WEEKS_PER_MONTH;
}

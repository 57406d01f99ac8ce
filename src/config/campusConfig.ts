import { isCalendarDate } from '../services/deadlineService';
import { ConfigurationError } from '../utils/errors';

export type RateKey =
    | 'HISTORIC_WEEKLY_RATE'
    | 'CURRENT_WEEKLY_RATE'
    | 'TOTAL_CAMPUS_AREA'
    | 'ARREARS_WEEKS'
    | 'CURE_PERIOD_DAYS';

export interface RateScheduleEntry {
    key: RateKey;
    label: string;
    value: number;
    effectiveDate: string;
}

/**
 * Campus declaration figures, oldest first. The rates table is seeded from
 * this list and the engine reads nothing else.
 */
export const DEFAULT_RATE_SCHEDULE: readonly RateScheduleEntry[] = [
    { key: 'CURE_PERIOD_DAYS', label: 'Cure Period (days)', value: 15, effectiveDate: '2011-05-05' },
    { key: 'HISTORIC_WEEKLY_RATE', label: 'Historic Campus Weekly Rate', value: 6069.52, effectiveDate: '2022-12-01' },
    { key: 'TOTAL_CAMPUS_AREA', label: 'Total Campus SqFt', value: 672718, effectiveDate: '2022-12-01' },
    { key: 'ARREARS_WEEKS', label: 'Arrears Period (weeks)', value: 156, effectiveDate: '2022-12-01' },
    { key: 'CURRENT_WEEKLY_RATE', label: 'Current Campus Weekly Rate', value: 9000, effectiveDate: '2026-01-01' },
];

export interface DeadlineOffsets {
    cure: number;
    lien: number;
    attorneyReferral: number;
}

export interface CampusConfig {
    readonly totalCampusArea: number;
    readonly historicWeeklyRate: number;
    readonly currentWeeklyRate: number;
    readonly arrearsWeeks: number;
    readonly curePeriodDays: number;
    readonly deadlineOffsets: Readonly<DeadlineOffsets>;
    /** Hard date by which liens must be filed on non-responders */
    readonly lienDeadline: string;
    readonly defaultAttorney: string;
    readonly rateSchedule: readonly RateScheduleEntry[];
}

export const DEFAULT_DEADLINE_OFFSETS: Readonly<DeadlineOffsets> = Object.freeze({
    cure: 30,
    lien: 45,
    attorneyReferral: 60,
});

const ENV_KEYS: Record<RateKey, string> = {
    HISTORIC_WEEKLY_RATE: 'HISTORIC_WEEKLY_RATE',
    CURRENT_WEEKLY_RATE: 'CURRENT_WEEKLY_RATE',
    TOTAL_CAMPUS_AREA: 'TOTAL_CAMPUS_AREA',
    ARREARS_WEEKS: 'ARREARS_WEEKS',
    CURE_PERIOD_DAYS: 'CURE_PERIOD_DAYS',
};

export interface CampusConfigOverrides {
    rateSchedule?: readonly RateScheduleEntry[];
    deadlineOffsets?: DeadlineOffsets;
    lienDeadline?: string;
    defaultAttorney?: string;
}

function rateValue(schedule: readonly RateScheduleEntry[], key: RateKey): number {
    // Latest effective entry wins
    const entries = schedule
        .filter(entry => entry.key === key)
        .sort((a, b) => a.effectiveDate.localeCompare(b.effectiveDate));
    const latest = entries[entries.length - 1];
    if (!latest) {
        throw new ConfigurationError(`Rate schedule has no ${key} entry`);
    }
    return latest.value;
}

/**
 * Build a frozen configuration from a rate schedule. Fails fast on values the
 * proration model cannot work with.
 */
export function createCampusConfig(overrides: CampusConfigOverrides = {}): CampusConfig {
    const rateSchedule = overrides.rateSchedule ?? DEFAULT_RATE_SCHEDULE;
    const deadlineOffsets = overrides.deadlineOffsets ?? DEFAULT_DEADLINE_OFFSETS;

    const totalCampusArea = rateValue(rateSchedule, 'TOTAL_CAMPUS_AREA');
    const historicWeeklyRate = rateValue(rateSchedule, 'HISTORIC_WEEKLY_RATE');
    const currentWeeklyRate = rateValue(rateSchedule, 'CURRENT_WEEKLY_RATE');
    const arrearsWeeks = rateValue(rateSchedule, 'ARREARS_WEEKS');
    const curePeriodDays = rateValue(rateSchedule, 'CURE_PERIOD_DAYS');

    if (!(totalCampusArea > 0)) {
        throw new ConfigurationError(`Total campus area must be positive, got ${totalCampusArea}`);
    }
    for (const [name, value] of [
        ['Historic weekly rate', historicWeeklyRate],
        ['Current weekly rate', currentWeeklyRate],
    ] as const) {
        if (!Number.isFinite(value) || value < 0) {
            throw new ConfigurationError(`${name} must be a non-negative number, got ${value}`);
        }
    }
    if (!Number.isInteger(arrearsWeeks) || arrearsWeeks < 0) {
        throw new ConfigurationError(`Arrears period must be a whole number of weeks, got ${arrearsWeeks}`);
    }
    const { cure, lien, attorneyReferral } = deadlineOffsets;
    if (!(cure > 0 && cure < lien && lien < attorneyReferral)) {
        throw new ConfigurationError(
            `Deadline offsets must be strictly increasing, got ${cure}/${lien}/${attorneyReferral}`
        );
    }

    const lienDeadline = overrides.lienDeadline ?? '2026-04-01';
    if (!isCalendarDate(lienDeadline)) {
        throw new ConfigurationError(`Lien deadline must be a YYYY-MM-DD date, got "${lienDeadline}"`);
    }

    return Object.freeze({
        totalCampusArea,
        historicWeeklyRate,
        currentWeeklyRate,
        arrearsWeeks,
        curePeriodDays,
        deadlineOffsets: Object.freeze({ ...deadlineOffsets }),
        lienDeadline,
        defaultAttorney: overrides.defaultAttorney ?? 'Counsel of Record',
        rateSchedule: Object.freeze(rateSchedule.map(entry => Object.freeze({ ...entry }))),
    });
}

/**
 * Read overrides from the environment (already populated by dotenv).
 * Overridden rates keep their default label and effective date.
 */
export function loadCampusConfig(env: NodeJS.ProcessEnv = process.env): CampusConfig {
    const rateSchedule = DEFAULT_RATE_SCHEDULE.map(entry => {
        const raw = env[ENV_KEYS[entry.key]];
        if (raw === undefined || raw.trim() === '') {
            return entry;
        }
        const value = Number(raw);
        if (!Number.isFinite(value)) {
            throw new ConfigurationError(`${ENV_KEYS[entry.key]} must be numeric, got "${raw}"`);
        }
        return { ...entry, value };
    });

    return createCampusConfig({
        rateSchedule,
        lienDeadline: env.LIEN_DEADLINE || undefined,
        defaultAttorney: env.DEFAULT_ATTORNEY || undefined,
    });
}

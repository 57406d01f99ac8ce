import type { CampusConfig, RateKey, RateScheduleEntry } from '../config/campusConfig';
import type { Database } from '../db';
import {
    DeadlineType,
    PARCEL_STATUSES,
    ParcelStatus,
    ParcelView,
    ProRataRow,
    RECOMMENDED_STEPS,
    UpcomingDeadline,
    Urgency,
} from '../types';
import { countLogEntries } from './auditService';
import { classifyUrgency, daysLeft, DEADLINE_LABELS } from './deadlineService';
import { ParcelService } from './parcelService';
import { currentWeekly, forwardMonthly } from './prorationService';
import { RECOMMENDED_TRANSITIONS } from './stateMachine';

export const NON_PAYER_STATUSES: readonly ParcelStatus[] = ['DELINQUENT', 'DISPUTED', 'RECON'];

const WEEKS_PER_YEAR = 52;

// Billing gaps within a dollar a week are rounding noise
const VARIANCE_TOLERANCE = 1;

const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);

export interface DashboardSummary {
    today: string;
    counts: {
        total: number;
        current: number;
        delinquent: number;
        disputed: number;
        reconOrVerify: number;
        settled: number;
    };
    campus: {
        totalSqft: number;
        trackedSqft: number;
        trackedShare: number;
    };
    arrears: {
        delinquent: number;
        disputed: number;
        recon: number;
        total: number;
    };
    weekly: {
        campusWeekly: number;
        delinquentWeekly: number;
        delinquentMonthly: number;
    };
    lienDeadline: {
        date: string;
        daysLeft: number;
        urgency: Urgency;
    };
    priority: Array<{
        rank: number;
        id: number;
        businessName: string | null;
        status: ParcelStatus;
        sqft: number;
        arrears: number;
        enforcementStep: string;
        nextAction: string | null;
    }>;
    auditEntries: number;
}

export interface NonPayerReport {
    parcels: ParcelView[];
    totals: {
        count: number;
        sqft: number;
        arrears: number;
        currentWeekly: number;
        forwardMonthly: number;
    };
}

export interface ProRataReport {
    rows: ProRataRow[];
    totals: {
        proRataWeekly: number;
        billedWeekly: number;
        varianceWeekly: number;
        varianceMonthly: number;
        varianceYearly: number;
    };
}

export interface DeadlineReport {
    today: string;
    deadlines: UpcomingDeadline[];
    counts: Record<Urgency, number>;
    hardDeadline: {
        date: string;
        daysLeft: number;
        urgency: Urgency;
    };
    packetsSent: number;
    awaitingPacket: number;
}

export interface ResearchRow {
    id: number;
    businessName: string | null;
    address: string;
    status: ParcelStatus;
    sqft: number;
    countyParcelId: string | null;
    mailingAddress: string | null;
    lenderName: string | null;
    deedOfTrustRef: string | null;
    titleCompany: string | null;
    addressVerified: boolean;
    lenderVerified: boolean;
}

export interface ResearchReport {
    parcels: ResearchRow[];
    total: number;
    addressVerified: number;
    lenderVerified: number;
}

export interface Vocabulary {
    statuses: readonly ParcelStatus[];
    steps: readonly string[];
    recommendedTransitions: Readonly<Record<ParcelStatus, readonly ParcelStatus[]>>;
}

type RateRow = {
    rate_key: RateKey;
    label: string;
    amount: number;
    effective_date: string;
};

const DEADLINE_ORDER: Record<DeadlineType, number> = { CURE: 0, LIEN: 1, ATTORNEY_REFERRAL: 2 };

/**
 * Read-only views over the parcel table. Nothing here writes.
 */
export class ReportService {
    constructor(
        private readonly db: Database,
        private readonly config: CampusConfig,
        private readonly parcels: ParcelService
    ) {}

    async dashboard(today: string): Promise<DashboardSummary> {
        const all = await this.parcels.listParcels();
        const withStatus = (...statuses: ParcelStatus[]) => all.filter(p => statuses.includes(p.status));

        const delinquent = withStatus('DELINQUENT');
        const trackedSqft = sum(all.map(p => p.sqft));
        const delinquentWeekly = sum(delinquent.map(p => p.currentWeekly));
        const lienDays = daysLeft(this.config.lienDeadline, today);

        const priority = all
            .filter(p => p.status !== 'CURRENT' && p.status !== 'SETTLED')
            .sort((a, b) => b.arrears - a.arrears || a.id - b.id)
            .map((p, index) => ({
                rank: index + 1,
                id: p.id,
                businessName: p.businessName,
                status: p.status,
                sqft: p.sqft,
                arrears: p.arrears,
                enforcementStep: p.enforcementStep,
                nextAction: p.nextAction,
            }));

        const arrearsDelinquent = sum(delinquent.map(p => p.arrears));
        const arrearsDisputed = sum(withStatus('DISPUTED').map(p => p.arrears));
        const arrearsRecon = sum(withStatus('RECON').map(p => p.arrears));

        return {
            today,
            counts: {
                total: all.length,
                current: withStatus('CURRENT').length,
                delinquent: delinquent.length,
                disputed: withStatus('DISPUTED').length,
                reconOrVerify: withStatus('RECON', 'VERIFY').length,
                settled: withStatus('SETTLED').length,
            },
            campus: {
                totalSqft: this.config.totalCampusArea,
                trackedSqft,
                trackedShare: trackedSqft / this.config.totalCampusArea,
            },
            arrears: {
                delinquent: arrearsDelinquent,
                disputed: arrearsDisputed,
                recon: arrearsRecon,
                total: arrearsDelinquent + arrearsDisputed + arrearsRecon,
            },
            weekly: {
                campusWeekly: this.config.currentWeeklyRate,
                delinquentWeekly,
                delinquentMonthly: forwardMonthly(delinquentWeekly),
            },
            lienDeadline: {
                date: this.config.lienDeadline,
                daysLeft: lienDays,
                urgency: classifyUrgency(lienDays),
            },
            priority,
            auditEntries: await countLogEntries(this.db),
        };
    }

    async nonPayers(): Promise<NonPayerReport> {
        const parcels = await this.parcels.listParcels({ statuses: NON_PAYER_STATUSES, order: 'area' });
        return {
            parcels,
            totals: {
                count: parcels.length,
                sqft: sum(parcels.map(p => p.sqft)),
                arrears: sum(parcels.map(p => p.arrears)),
                currentWeekly: sum(parcels.map(p => p.currentWeekly)),
                forwardMonthly: sum(parcels.map(p => p.forwardMonthly)),
            },
        };
    }

    /**
     * Pro-rata charge against what each delinquent parcel is actually billed.
     * A parcel without a stored weekly rate counts as billed nothing.
     */
    async proRataTable(): Promise<ProRataReport> {
        const parcels = await this.parcels.listParcels({ statuses: ['DELINQUENT'], order: 'area' });

        const rows: ProRataRow[] = parcels.map(p => {
            const proRataWeekly = currentWeekly(this.config, p.sqft);
            const billedWeekly = p.weeklyRate.kind === 'stored' ? p.weeklyRate.amount : 0;
            const varianceWeekly = proRataWeekly - billedWeekly;
            return {
                id: p.id,
                businessName: p.businessName,
                address: p.address,
                sqft: p.sqft,
                campusShare: p.campusShare,
                proRataWeekly,
                billedWeekly,
                varianceWeekly,
                proRataMonthly: forwardMonthly(proRataWeekly),
                billedMonthly: forwardMonthly(billedWeekly),
                direction: varianceWeekly > VARIANCE_TOLERANCE
                    ? 'higher'
                    : varianceWeekly < -VARIANCE_TOLERANCE ? 'lower' : 'even',
            };
        });

        const varianceWeekly = sum(rows.map(r => r.varianceWeekly));
        return {
            rows,
            totals: {
                proRataWeekly: sum(rows.map(r => r.proRataWeekly)),
                billedWeekly: sum(rows.map(r => r.billedWeekly)),
                varianceWeekly,
                varianceMonthly: forwardMonthly(varianceWeekly),
                varianceYearly: varianceWeekly * WEEKS_PER_YEAR,
            },
        };
    }

    async upcomingDeadlines(today: string): Promise<DeadlineReport> {
        const all = await this.parcels.listParcels();
        const deadlines: UpcomingDeadline[] = [];

        for (const parcel of all) {
            if (!parcel.deadlines || !parcel.datePacketSent) continue;
            const dates: Array<[DeadlineType, string]> = [
                ['CURE', parcel.deadlines.cureDeadline],
                ['LIEN', parcel.deadlines.lienFilingDate],
                ['ATTORNEY_REFERRAL', parcel.deadlines.attorneyReferralDate],
            ];
            for (const [type, date] of dates) {
                const days = daysLeft(date, today);
                deadlines.push({
                    parcelId: parcel.id,
                    businessName: parcel.businessName,
                    address: parcel.address,
                    type,
                    label: DEADLINE_LABELS[type],
                    date,
                    daysLeft: days,
                    urgency: classifyUrgency(days),
                    tracking: parcel.certifiedMailTracking,
                    sent: parcel.datePacketSent,
                });
            }
        }

        deadlines.sort((a, b) =>
            a.date.localeCompare(b.date)
            || a.parcelId - b.parcelId
            || DEADLINE_ORDER[a.type] - DEADLINE_ORDER[b.type]
        );

        const counts: Record<Urgency, number> = { overdue: 0, urgent: 0, soon: 0, normal: 0 };
        for (const deadline of deadlines) {
            counts[deadline.urgency] += 1;
        }

        const hardDays = daysLeft(this.config.lienDeadline, today);
        return {
            today,
            deadlines,
            counts,
            hardDeadline: {
                date: this.config.lienDeadline,
                daysLeft: hardDays,
                urgency: classifyUrgency(hardDays),
            },
            packetsSent: all.filter(p => p.datePacketSent !== null).length,
            awaitingPacket: all.filter(p => p.status === 'DELINQUENT' && p.datePacketSent === null).length,
        };
    }

    async researchTracker(): Promise<ResearchReport> {
        const parcels = (await this.parcels.listParcels({ order: 'area' }))
            .filter(p => p.status !== 'CURRENT');

        const rows: ResearchRow[] = parcels.map(p => ({
            id: p.id,
            businessName: p.businessName,
            address: p.address,
            status: p.status,
            sqft: p.sqft,
            countyParcelId: p.research.countyParcelId,
            mailingAddress: p.research.mailingAddress,
            lenderName: p.research.lenderName,
            deedOfTrustRef: p.research.deedOfTrustRef,
            titleCompany: p.research.titleCompany,
            addressVerified: p.research.addressVerified,
            lenderVerified: p.research.lenderVerified,
        }));

        return {
            parcels: rows,
            total: rows.length,
            addressVerified: rows.filter(r => r.addressVerified).length,
            lenderVerified: rows.filter(r => r.lenderVerified).length,
        };
    }

    async listRates(): Promise<RateScheduleEntry[]> {
        const result = await this.db.query<RateRow>(
            'SELECT rate_key, label, amount, effective_date FROM rates ORDER BY effective_date, id'
        );
        return result.rows.map(row => ({
            key: row.rate_key,
            label: row.label,
            value: Number(row.amount),
            effectiveDate: row.effective_date,
        }));
    }

    vocabulary(): Vocabulary {
        return {
            statuses: PARCEL_STATUSES,
            steps: RECOMMENDED_STEPS,
            recommendedTransitions: RECOMMENDED_TRANSITIONS,
        };
    }
}

// Domain model shared by services and routes

export const PARCEL_STATUSES = ['CURRENT', 'DELINQUENT', 'DISPUTED', 'RECON', 'VERIFY', 'SETTLED'] as const;
export type ParcelStatus = typeof PARCEL_STATUSES[number];

/** Statuses that accrue computed arrears when no balance is stored */
export const ARREARS_STATUSES: readonly ParcelStatus[] = ['DELINQUENT', 'DISPUTED', 'RECON'];

export const RECOMMENDED_STEPS = [
    'Paying',
    'Demand Drafted',
    'Demand Sent',
    'Response Received',
    'In Negotiation',
    'Settlement Agreed',
    'Lien Filed',
    'Attorney Letter Received',
    'Research',
    'Resolved',
] as const;
export type RecommendedStep = typeof RECOMMENDED_STEPS[number];

// Open string: the vocabulary is a suggestion, not a grammar
export type EnforcementStep = RecommendedStep | (string & {});

/**
 * An operator-entered figure that supersedes the formula, or its absence.
 */
export type AmountOverride =
    | { kind: 'stored'; amount: number }
    | { kind: 'computed' };

export interface LenderResearch {
    countyParcelId: string | null;
    mailingAddress: string | null;
    lenderName: string | null;
    lenderAddress: string | null;
    deedOfTrustRef: string | null;
    lenderContact: string | null;
    loanNumber: string | null;
    titleCompany: string | null;
    addressVerified: boolean;
    lenderVerified: boolean;
}

export interface EnforcementDeadlines {
    cureDeadline: string;
    lienFilingDate: string;
    attorneyReferralDate: string;
}

export interface Parcel {
    id: number;
    address: string;
    businessName: string | null;
    sqft: number;
    campusShare: number;
    status: ParcelStatus;
    entityOwner: string | null;
    corporateTarget: string | null;
    pastDueBalance: AmountOverride;
    weeklyRate: AmountOverride;
    certifiedMailTracking: string | null;
    datePacketSent: string | null;
    /** Null until a packet is sent; the three dates are always set together */
    deadlines: EnforcementDeadlines | null;
    enforcementStep: EnforcementStep;
    nextAction: string | null;
    deadline: string | null;
    notes: string | null;
    research: LenderResearch;
}

/** Parcel with the derived figures the report layers display */
export interface ParcelView extends Parcel {
    arrears: number;
    arrearsSource: AmountOverride['kind'];
    currentWeekly: number;
    weeklyRateSource: AmountOverride['kind'];
    forwardMonthly: number;
}

export interface EnforcementLogEntry {
    id: number;
    parcelId: number | null;
    timestamp: string;
    action: string;
    sentVia: string | null;
    responseDue: string | null;
    responseReceived: string | null;
    nextStep: string | null;
    attorney: string | null;
    cost: number;
    notes: string | null;
}

export interface NewLogEntry {
    parcelId: number | null;
    action: string;
    sentVia?: string | null;
    responseDue?: string | null;
    responseReceived?: string | null;
    nextStep?: string | null;
    attorney?: string | null;
    cost?: number;
    notes?: string | null;
}

export interface TimelineEntry extends EnforcementLogEntry {
    parcelAddress: string | null;
    parcelName: string | null;
}

export interface SettlementResult {
    settledAmount: number;
    monthlyNoInterest: number;
    totalWithInterest: number;
    monthlyWithInterest: number;
    litigationEstimate: number;
    savingsVsFull: number;
    savingsPct: number;
    savingsVsLitigation: number;
    /** True when a zero-month term forced both monthly figures to 0 */
    termClamped: boolean;
}

export type Urgency = 'overdue' | 'urgent' | 'soon' | 'normal';

export type DeadlineType = 'CURE' | 'LIEN' | 'ATTORNEY_REFERRAL';

export interface UpcomingDeadline {
    parcelId: number;
    businessName: string | null;
    address: string;
    type: DeadlineType;
    label: string;
    date: string;
    daysLeft: number;
    urgency: Urgency;
    tracking: string | null;
    sent: string;
}

export interface ProRataRow {
    id: number;
    businessName: string | null;
    address: string;
    sqft: number;
    campusShare: number;
    proRataWeekly: number;
    billedWeekly: number;
    /** proRataWeekly - billedWeekly; positive means under-billed */
    varianceWeekly: number;
    proRataMonthly: number;
    billedMonthly: number;
    direction: 'higher' | 'lower' | 'even';
}

import type { CampusConfig } from '../config/campusConfig';
import type { Database, SqlClient } from '../db';
import {
    EnforcementDeadlines,
    EnforcementLogEntry,
    Parcel,
    ParcelStatus,
    ParcelView,
    SettlementResult,
} from '../types';
import { AppError, NotFoundError, ValidationError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { appendLogEntry } from './auditService';
import { arrears, forwardMonthlyFor, overrideFromColumn, settlement, weeklyRate } from './arrearsService';
import { calculateDeadlines, parseCalendarDate } from './deadlineService';
import {
    EDITABLE_FIELDS,
    EditableField,
    FieldInput,
    ResearchField,
    isEditableField,
    isResearchField,
    parseFieldValue,
} from './parcelFields';
import { campusShare } from './prorationService';
import { describeTransition, isParcelStatus, isRecommendedStep } from './stateMachine';

const log = createLogger({ module: 'parcelService' });

export type ParcelRow = {
    id: number;
    address: string;
    business_name: string | null;
    sqft: number;
    pct_campus: number;
    status: string;
    entity_owner: string | null;
    corporate_target: string | null;
    past_due_balance: number | null;
    weekly_rate: number | null;
    certified_mail_tracking: string | null;
    date_packet_sent: string | null;
    cure_deadline: string | null;
    lien_filing_date: string | null;
    attorney_referral_date: string | null;
    enforcement_step: string;
    next_action: string | null;
    deadline: string | null;
    notes: string | null;
    county_parcel_id: string | null;
    mailing_address: string | null;
    lender_name: string | null;
    lender_address: string | null;
    deed_of_trust_ref: string | null;
    lender_contact: string | null;
    loan_number: string | null;
    title_company: string | null;
    address_verified: boolean;
    lender_verified: boolean;
};

export function mapParcelRow(row: ParcelRow): Parcel {
    if (!isParcelStatus(row.status)) {
        throw new AppError(`Parcel ${row.id} has unknown status "${row.status}"`, 500);
    }

    const deadlines: EnforcementDeadlines | null =
        row.cure_deadline && row.lien_filing_date && row.attorney_referral_date
            ? {
                cureDeadline: row.cure_deadline,
                lienFilingDate: row.lien_filing_date,
                attorneyReferralDate: row.attorney_referral_date,
            }
            : null;

    return {
        id: row.id,
        address: row.address,
        businessName: row.business_name,
        sqft: row.sqft,
        campusShare: row.pct_campus,
        status: row.status,
        entityOwner: row.entity_owner,
        corporateTarget: row.corporate_target,
        pastDueBalance: overrideFromColumn(row.past_due_balance),
        weeklyRate: overrideFromColumn(row.weekly_rate),
        certifiedMailTracking: row.certified_mail_tracking,
        datePacketSent: row.date_packet_sent,
        deadlines,
        enforcementStep: row.enforcement_step,
        nextAction: row.next_action,
        deadline: row.deadline,
        notes: row.notes,
        research: {
            countyParcelId: row.county_parcel_id,
            mailingAddress: row.mailing_address,
            lenderName: row.lender_name,
            lenderAddress: row.lender_address,
            deedOfTrustRef: row.deed_of_trust_ref,
            lenderContact: row.lender_contact,
            loanNumber: row.loan_number,
            titleCompany: row.title_company,
            addressVerified: row.address_verified,
            lenderVerified: row.lender_verified,
        },
    };
}

export type ParcelOrder = 'status' | 'area';

export interface ListParcelsOptions {
    statuses?: readonly ParcelStatus[];
    order?: ParcelOrder;
}

export interface MutationResult {
    parcel: ParcelView;
    logEntry: EnforcementLogEntry;
}

export interface PacketSentResult extends MutationResult {
    deadlines: EnforcementDeadlines;
}

export interface RecordActionInput {
    parcelId: number | null;
    action: string;
    sentVia?: string | null;
    responseDue?: string | null;
    responseReceived?: string | null;
    nextStep?: string | null;
    attorney?: string | null;
    cost?: number | null;
    notes?: string | null;
}

export type SettlementInput =
    | { principal: number; parcelId?: undefined }
    | { parcelId: number; principal?: undefined };

export interface SettlementTerms {
    discountPct: number;
    interestRate: number;
    termMonths: number;
}

export interface SettlementQuote {
    principal: number;
    parcelId: number | null;
    discountPct: number;
    interestRate: number;
    termMonths: number;
    result: SettlementResult;
}

const ORDER_CLAUSES: Record<ParcelOrder, string> = {
    status: 'ORDER BY status, id',
    area: 'ORDER BY sqft DESC, id',
};

function optionalDate(value: string | null | undefined, field: string): string | null {
    if (value === undefined || value === null || value.trim() === '') {
        return null;
    }
    parseCalendarDate(value.trim(), field);
    return value.trim();
}

function optionalText(value: string | null | undefined): string | null {
    if (value === undefined || value === null) return null;
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
}

/**
 * Authoritative parcel state. Every mutation validates first, then runs its
 * UPDATE and its log INSERT in one transaction.
 */
export class ParcelService {
    constructor(
        private readonly db: Database,
        private readonly config: CampusConfig
    ) {}

    toView(parcel: Parcel): ParcelView {
        return {
            ...parcel,
            arrears: arrears(this.config, parcel),
            arrearsSource: parcel.pastDueBalance.kind,
            currentWeekly: weeklyRate(this.config, parcel),
            weeklyRateSource: parcel.weeklyRate.kind,
            forwardMonthly: forwardMonthlyFor(this.config, parcel),
        };
    }

    async listParcels(options: ListParcelsOptions = {}): Promise<ParcelView[]> {
        const statuses = options.statuses ?? [];
        const where = statuses.length > 0
            ? `WHERE status IN (${statuses.map((_, i) => `$${i + 1}`).join(', ')})`
            : '';

        const result = await this.db.query<ParcelRow>(
            `SELECT * FROM parcels ${where} ${ORDER_CLAUSES[options.order ?? 'status']}`,
            [...statuses]
        );
        return result.rows.map(row => this.toView(mapParcelRow(row)));
    }

    async getParcel(id: number): Promise<ParcelView> {
        const result = await this.db.query<ParcelRow>('SELECT * FROM parcels WHERE id = $1', [id]);
        if (result.rows.length === 0) {
            throw new NotFoundError('Parcel', id);
        }
        return this.toView(mapParcelRow(result.rows[0]));
    }

    async updateField(id: number, fieldName: string, raw: FieldInput): Promise<MutationResult> {
        if (!isEditableField(fieldName)) {
            throw new ValidationError(`Unknown field "${fieldName}"`, 'field');
        }
        const field: EditableField = fieldName;
        const spec = EDITABLE_FIELDS[field];
        const parsed = parseFieldValue(field, raw);

        return this.db.transaction(async (client) => {
            const before = await this.fetchForUpdate(client, id);

            let row: ParcelRow;
            let notes = 'Changed by operator';

            if (parsed.kind === 'area') {
                const share = campusShare(this.config, parsed.value);
                row = await this.updateRow(client, id, 'sqft = $1, pct_campus = $2', [parsed.value, share]);
                notes = `Was ${before.sqft} sq ft`;
            } else if (parsed.kind === 'status') {
                row = await this.updateRow(client, id, 'status = $1', [parsed.value]);
                notes = describeTransition(before.status, parsed.value) ?? notes;
            } else {
                row = await this.updateRow(client, id, `${spec.column} = $1`, [parsed.value]);
                if (field === 'enforcementStep' && !isRecommendedStep(parsed.display)) {
                    notes = 'Step outside recommended vocabulary';
                }
            }

            const logEntry = await appendLogEntry(client, {
                parcelId: id,
                action: `Updated ${spec.label} to: ${parsed.display}`,
                notes,
            });

            log.info({ parcelId: id, field, value: parsed.display }, 'Parcel field updated');
            return { parcel: this.toView(mapParcelRow(row)), logEntry };
        });
    }

    async markPacketSent(id: number, sentDate: string, tracking?: string | null): Promise<PacketSentResult> {
        const deadlines = calculateDeadlines(sentDate, this.config.deadlineOffsets);
        const { cureDeadline, lienFilingDate, attorneyReferralDate } = deadlines;
        const trackingNumber = optionalText(tracking);

        return this.db.transaction(async (client) => {
            const before = await this.fetchForUpdate(client, id);

            const row = await this.updateRow(
                client,
                id,
                `date_packet_sent = $1,
                 certified_mail_tracking = $2,
                 cure_deadline = $3,
                 lien_filing_date = $4,
                 attorney_referral_date = $5,
                 enforcement_step = 'Demand Sent',
                 next_action = $6`,
                [
                    sentDate,
                    trackingNumber ?? before.certifiedMailTracking,
                    cureDeadline,
                    lienFilingDate,
                    attorneyReferralDate,
                    `Await cure by ${cureDeadline}`,
                ]
            );

            const { cure, lien, attorneyReferral } = this.config.deadlineOffsets;
            const trackingNote = trackingNumber ? `, tracking: ${trackingNumber}` : '';
            const logEntry = await appendLogEntry(client, {
                parcelId: id,
                action: `Demand packet sent on ${sentDate}${trackingNote}`,
                sentVia: 'USPS Certified',
                responseDue: cureDeadline,
                nextStep: `Cure by ${cureDeadline}, lien by ${lienFilingDate}, attorney by ${attorneyReferralDate}`,
                attorney: this.config.defaultAttorney,
                notes: `${cure}-day cure: ${cureDeadline} | ${lien}-day lien: ${lienFilingDate} | ${attorneyReferral}-day attorney: ${attorneyReferralDate}`,
            });

            log.info({ parcelId: id, sentDate, ...deadlines }, 'Packet marked as sent');
            return { parcel: this.toView(mapParcelRow(row)), logEntry, deadlines };
        });
    }

    /**
     * Write several lender/title research fields with a single log entry.
     */
    async updateResearch(id: number, fields: Record<string, FieldInput>): Promise<MutationResult> {
        const entries = Object.entries(fields);
        if (entries.length === 0) {
            throw new ValidationError('No research fields to update', 'fields');
        }

        const updates: Array<{ field: ResearchField; value: string | number | null }> = [];
        for (const [name, raw] of entries) {
            if (!isResearchField(name)) {
                throw new ValidationError(`"${name}" is not a lender/title research field`, name);
            }
            updates.push({ field: name, value: parseFieldValue(name, raw).value });
        }

        const setClause = updates.map((u, i) => `${EDITABLE_FIELDS[u.field].column} = $${i + 1}`).join(', ');
        const columns = updates.map(u => EDITABLE_FIELDS[u.field].column).join(', ');

        return this.db.transaction(async (client) => {
            await this.fetchForUpdate(client, id);
            const row = await this.updateRow(client, id, setClause, updates.map(u => u.value));
            const logEntry = await appendLogEntry(client, {
                parcelId: id,
                action: `Lender research updated: ${columns}`,
                notes: 'Research tracker entry',
            });
            return { parcel: this.toView(mapParcelRow(row)), logEntry };
        });
    }

    markAddressVerified(id: number): Promise<MutationResult> {
        return this.setVerificationFlag(id, 'address_verified', 'Address verified via county records');
    }

    markLenderVerified(id: number): Promise<MutationResult> {
        return this.setVerificationFlag(id, 'lender_verified', 'Lender verified via deed of trust');
    }

    async recordEnforcementAction(input: RecordActionInput): Promise<EnforcementLogEntry> {
        const action = optionalText(input.action);
        if (action === null) {
            throw new ValidationError('Action is required', 'action');
        }
        const responseDue = optionalDate(input.responseDue, 'responseDue');
        const responseReceived = optionalDate(input.responseReceived, 'responseReceived');
        const cost = input.cost ?? 0;
        if (!Number.isFinite(cost) || cost < 0) {
            throw new ValidationError(`Cost must be a non-negative amount, got ${cost}`, 'cost');
        }

        return this.db.transaction(async (client) => {
            if (input.parcelId !== null) {
                await this.fetchForUpdate(client, input.parcelId);
            }
            const entry = await appendLogEntry(client, {
                parcelId: input.parcelId,
                action,
                sentVia: optionalText(input.sentVia),
                responseDue,
                responseReceived,
                nextStep: optionalText(input.nextStep),
                attorney: optionalText(input.attorney) ?? this.config.defaultAttorney,
                cost,
                notes: optionalText(input.notes),
            });
            log.info({ parcelId: input.parcelId, action }, 'Enforcement action recorded');
            return entry;
        });
    }

    /**
     * Settlement terms against an explicit principal or a parcel's arrears.
     */
    async computeSettlement(input: SettlementInput, terms: SettlementTerms): Promise<SettlementQuote> {
        const { discountPct, interestRate, termMonths } = terms;
        if (!Number.isFinite(discountPct) || discountPct < 0 || discountPct > 1) {
            throw new ValidationError(`Discount must be between 0 and 1, got ${discountPct}`, 'discountPct');
        }
        if (!Number.isFinite(interestRate) || interestRate < 0) {
            throw new ValidationError(`Interest rate must be non-negative, got ${interestRate}`, 'interestRate');
        }

        let principal: number;
        let parcelId: number | null = null;
        if (input.parcelId !== undefined) {
            const parcel = await this.getParcel(input.parcelId);
            principal = parcel.arrears;
            parcelId = parcel.id;
        } else {
            principal = input.principal;
            if (!Number.isFinite(principal)) {
                throw new ValidationError(`Invalid principal: ${principal}`, 'principal');
            }
        }

        return {
            principal,
            parcelId,
            discountPct,
            interestRate,
            termMonths,
            result: settlement(principal, discountPct, interestRate, termMonths),
        };
    }

    private async setVerificationFlag(
        id: number,
        column: 'address_verified' | 'lender_verified',
        action: string
    ): Promise<MutationResult> {
        return this.db.transaction(async (client) => {
            await this.fetchForUpdate(client, id);
            const row = await this.updateRow(client, id, `${column} = TRUE`, []);
            const logEntry = await appendLogEntry(client, { parcelId: id, action, notes: 'Research tracker' });
            return { parcel: this.toView(mapParcelRow(row)), logEntry };
        });
    }

    private async fetchForUpdate(client: SqlClient, id: number): Promise<Parcel> {
        const result = await client.query<ParcelRow>('SELECT * FROM parcels WHERE id = $1', [id]);
        if (result.rows.length === 0) {
            throw new NotFoundError('Parcel', id);
        }
        return mapParcelRow(result.rows[0]);
    }

    private async updateRow(client: SqlClient, id: number, setClause: string, values: unknown[]): Promise<ParcelRow> {
        const result = await client.query<ParcelRow>(
            `UPDATE parcels SET ${setClause} WHERE id = $${values.length + 1} RETURNING *`,
            [...values, id]
        );
        return result.rows[0];
    }
}

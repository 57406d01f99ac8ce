import { ParcelStatus } from '../types';
import { ValidationError } from '../utils/errors';
import { parseCalendarDate } from './deadlineService';
import { isParcelStatus } from './stateMachine';

type FieldKind = 'text' | 'requiredText' | 'status' | 'area' | 'money' | 'date';

interface FieldSpec {
    column: string;
    label: string;
    kind: FieldKind;
}

/**
 * Attributes `updateField` may write. Packet and deadline columns are absent
 * on purpose: only markPacketSent sets them, and always together.
 */
export const EDITABLE_FIELDS = {
    status: { column: 'status', label: 'Status', kind: 'status' },
    enforcementStep: { column: 'enforcement_step', label: 'Enforcement Step', kind: 'requiredText' },
    nextAction: { column: 'next_action', label: 'Next Action', kind: 'text' },
    deadline: { column: 'deadline', label: 'Deadline', kind: 'date' },
    corporateTarget: { column: 'corporate_target', label: 'Corporate Target', kind: 'text' },
    entityOwner: { column: 'entity_owner', label: 'Entity/Owner', kind: 'text' },
    notes: { column: 'notes', label: 'Notes', kind: 'text' },
    businessName: { column: 'business_name', label: 'Business Name', kind: 'text' },
    address: { column: 'address', label: 'Address', kind: 'requiredText' },
    sqft: { column: 'sqft', label: 'Square Footage', kind: 'area' },
    pastDueBalance: { column: 'past_due_balance', label: 'Past Due Balance', kind: 'money' },
    weeklyRate: { column: 'weekly_rate', label: 'Weekly Rate', kind: 'money' },
    certifiedMailTracking: { column: 'certified_mail_tracking', label: 'Certified Mail Tracking', kind: 'text' },
    countyParcelId: { column: 'county_parcel_id', label: 'County Parcel ID', kind: 'text' },
    mailingAddress: { column: 'mailing_address', label: 'Mailing Address', kind: 'text' },
    lenderName: { column: 'lender_name', label: 'Lender Name', kind: 'text' },
    lenderAddress: { column: 'lender_address', label: 'Lender Address', kind: 'text' },
    deedOfTrustRef: { column: 'deed_of_trust_ref', label: 'Deed of Trust Ref', kind: 'text' },
    lenderContact: { column: 'lender_contact', label: 'Lender Contact', kind: 'text' },
    loanNumber: { column: 'loan_number', label: 'Loan Number', kind: 'text' },
    titleCompany: { column: 'title_company', label: 'Title Company', kind: 'text' },
} as const satisfies Record<string, FieldSpec>;

export type EditableField = keyof typeof EDITABLE_FIELDS;

export const RESEARCH_FIELDS = [
    'countyParcelId',
    'mailingAddress',
    'lenderName',
    'lenderAddress',
    'deedOfTrustRef',
    'lenderContact',
    'loanNumber',
    'titleCompany',
] as const satisfies readonly EditableField[];

export type ResearchField = typeof RESEARCH_FIELDS[number];

export function isEditableField(name: string): name is EditableField {
    return Object.prototype.hasOwnProperty.call(EDITABLE_FIELDS, name);
}

export function isResearchField(name: string): name is ResearchField {
    return (RESEARCH_FIELDS as readonly string[]).includes(name);
}

export type FieldInput = string | number | null;

export type ParsedField =
    | { kind: 'status'; value: ParcelStatus; display: string }
    | { kind: 'area'; value: number; display: string }
    | { kind: 'value'; value: string | number | null; display: string };

function parseText(field: EditableField, raw: FieldInput, required: boolean): string | null {
    if (raw === null) {
        if (required) throw new ValidationError(`${EDITABLE_FIELDS[field].label} cannot be empty`, field);
        return null;
    }
    if (typeof raw !== 'string') {
        throw new ValidationError(`${EDITABLE_FIELDS[field].label} must be text`, field);
    }
    const trimmed = raw.trim();
    if (trimmed === '') {
        if (required) throw new ValidationError(`${EDITABLE_FIELDS[field].label} cannot be empty`, field);
        return null;
    }
    return trimmed;
}

// Upper bound of the INTEGER column
export const MAX_AREA = 2147483647;

/** Non-negative whole square feet; thousands separators allowed */
export function parseArea(raw: FieldInput, field: string = 'sqft'): number {
    let value: number;
    if (typeof raw === 'number') {
        value = raw;
    } else {
        const cleaned = (raw ?? '').trim().replace(/,/g, '');
        if (!/^\d+$/.test(cleaned)) {
            throw new ValidationError(`Invalid square footage: "${raw ?? ''}"`, field);
        }
        value = Number(cleaned);
    }
    if (!Number.isSafeInteger(value) || value < 0 || value > MAX_AREA) {
        throw new ValidationError(`Invalid square footage: ${raw}`, field);
    }
    return value;
}

/** Dollar amount; `$` and thousands separators allowed, sign kept */
export function parseMoney(raw: string | number, field: string): number {
    if (typeof raw === 'number') {
        if (Number.isFinite(raw)) return raw;
        throw new ValidationError(`Invalid amount: ${raw}`, field);
    }
    const cleaned = raw.trim().replace(/[$,]/g, '');
    if (!/^-?\d+(\.\d+)?$/.test(cleaned)) {
        throw new ValidationError(`Invalid amount: "${raw}"`, field);
    }
    return Number(cleaned);
}

/**
 * Validate and normalize an operator-supplied value. Throws before anything
 * is written.
 */
export function parseFieldValue(field: EditableField, raw: FieldInput): ParsedField {
    const spec: FieldSpec = EDITABLE_FIELDS[field];

    switch (spec.kind) {
        case 'status': {
            const value = typeof raw === 'string' ? raw.trim().toUpperCase() : '';
            if (!isParcelStatus(value)) {
                throw new ValidationError(`Invalid status "${raw ?? ''}"`, field);
            }
            return { kind: 'status', value, display: value };
        }
        case 'area': {
            const value = parseArea(raw, field);
            return { kind: 'area', value, display: String(value) };
        }
        case 'money': {
            // null clears the override
            if (raw === null) {
                return { kind: 'value', value: null, display: '(cleared)' };
            }
            const value = parseMoney(raw, field);
            return { kind: 'value', value, display: String(value) };
        }
        case 'date': {
            const text = parseText(field, raw, false);
            if (text !== null) {
                parseCalendarDate(text, field);
            }
            return { kind: 'value', value: text, display: text ?? '(cleared)' };
        }
        case 'requiredText':
        case 'text': {
            const text = parseText(field, raw, spec.kind === 'requiredText');
            return { kind: 'value', value: text, display: text ?? '(cleared)' };
        }
    }
}

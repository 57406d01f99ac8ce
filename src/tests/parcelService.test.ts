import type { Database } from '../db';
import { countLogEntries, listTimeline } from '../services/auditService';
import { ParcelService } from '../services/parcelService';
import { InvalidDateError, NotFoundError, ValidationError } from '../utils/errors';
import { createTestDb, insertParcel, testConfig } from './helpers/testDb';

describe('ParcelService', () => {
    let db: Database;
    let service: ParcelService;

    beforeEach(async () => {
        db = await createTestDb();
        service = new ParcelService(db, testConfig);
    });

    describe('getParcel', () => {
        it('should attach the derived figures', async () => {
            const id = await insertParcel(db, { sqft: 10000, status: 'DELINQUENT' });
            const parcel = await service.getParcel(id);

            expect(parcel.arrears).toBeCloseTo(14074.91876239, 6);
            expect(parcel.arrearsSource).toBe('computed');
            expect(parcel.currentWeekly).toBeCloseTo(133.78562786, 6);
            expect(parcel.forwardMonthly).toBeCloseTo(579.69312550, 6);
            expect(parcel.deadlines).toBeNull();
            expect(parcel.research.addressVerified).toBe(false);
        });

        it('should treat a stored zero balance as no override', async () => {
            const id = await insertParcel(db, { sqft: 10000, pastDueBalance: 0 });
            const parcel = await service.getParcel(id);

            expect(parcel.pastDueBalance).toEqual({ kind: 'computed' });
            expect(parcel.arrears).toBeCloseTo(14074.91876239, 6);
        });

        it('should return a negative stored balance verbatim', async () => {
            const id = await insertParcel(db, { pastDueBalance: -500 });
            expect((await service.getParcel(id)).arrears).toBe(-500);
        });

        it('should throw NotFoundError for an unknown id', async () => {
            await expect(service.getParcel(999)).rejects.toThrow(NotFoundError);
        });
    });

    describe('listParcels', () => {
        beforeEach(async () => {
            await insertParcel(db, { address: 'A', sqft: 5000, status: 'VERIFY' });
            await insertParcel(db, { address: 'B', sqft: 20000, status: 'CURRENT' });
            await insertParcel(db, { address: 'C', sqft: 12000, status: 'DELINQUENT' });
            await insertParcel(db, { address: 'D', sqft: 8000, status: 'DELINQUENT' });
        });

        it('should order by status then id by default', async () => {
            const parcels = await service.listParcels();
            expect(parcels.map(p => p.address)).toEqual(['B', 'C', 'D', 'A']);
        });

        it('should order by area descending', async () => {
            const parcels = await service.listParcels({ order: 'area' });
            expect(parcels.map(p => p.address)).toEqual(['B', 'C', 'D', 'A']);
            expect(parcels.map(p => p.sqft)).toEqual([20000, 12000, 8000, 5000]);
        });

        it('should filter by status', async () => {
            const parcels = await service.listParcels({ statuses: ['DELINQUENT', 'VERIFY'], order: 'area' });
            expect(parcels.map(p => p.address)).toEqual(['C', 'D', 'A']);
        });

        it('should return the same result twice without writing', async () => {
            const first = await service.listParcels();
            const second = await service.listParcels();

            expect(second).toEqual(first);
            expect(await countLogEntries(db)).toBe(0);
        });
    });

    describe('updateField', () => {
        it('should log an on-path status change', async () => {
            const id = await insertParcel(db, { status: 'DELINQUENT' });
            const { parcel, logEntry } = await service.updateField(id, 'status', 'settled');

            expect(parcel.status).toBe('SETTLED');
            expect(logEntry.action).toBe('Updated Status to: SETTLED');
            expect(logEntry.notes).toBe('Changed by operator');
            expect(logEntry.parcelId).toBe(id);
        });

        it('should apply and flag an off-path status change', async () => {
            const id = await insertParcel(db, { status: 'CURRENT' });
            const { parcel, logEntry } = await service.updateField(id, 'status', 'DELINQUENT');

            expect(parcel.status).toBe('DELINQUENT');
            expect(logEntry.notes).toBe('Off recommended path: CURRENT -> DELINQUENT');
        });

        it('should accept an enforcement step outside the vocabulary and note it', async () => {
            const id = await insertParcel(db);

            const custom = await service.updateField(id, 'enforcementStep', 'Mediation Scheduled');
            expect(custom.parcel.enforcementStep).toBe('Mediation Scheduled');
            expect(custom.logEntry.notes).toBe('Step outside recommended vocabulary');

            const known = await service.updateField(id, 'enforcementStep', 'Lien Filed');
            expect(known.logEntry.notes).toBe('Changed by operator');
        });

        it('should recompute campus share with the area', async () => {
            const id = await insertParcel(db, { sqft: 10000 });
            const { parcel, logEntry } = await service.updateField(id, 'sqft', '12,000');

            expect(parcel.sqft).toBe(12000);
            expect(parcel.campusShare).toBeCloseTo(0.01783808, 8);
            expect(logEntry.action).toBe('Updated Square Footage to: 12000');
            expect(logEntry.notes).toBe('Was 10000 sq ft');
        });

        it('should store a money override', async () => {
            const id = await insertParcel(db);
            const { parcel, logEntry } = await service.updateField(id, 'pastDueBalance', '$1,250.50');

            expect(parcel.pastDueBalance).toEqual({ kind: 'stored', amount: 1250.5 });
            expect(parcel.arrears).toBe(1250.5);
            expect(logEntry.action).toBe('Updated Past Due Balance to: 1250.5');
        });

        it('should clear a money override', async () => {
            const id = await insertParcel(db, { weeklyRate: 75 });
            const { parcel, logEntry } = await service.updateField(id, 'weeklyRate', null);

            expect(parcel.weeklyRateSource).toBe('computed');
            expect(logEntry.action).toBe('Updated Weekly Rate to: (cleared)');
        });

        it('should leave the parcel and the log untouched on an unparseable number', async () => {
            const id = await insertParcel(db, { pastDueBalance: 800 });

            await expect(service.updateField(id, 'pastDueBalance', 'abc')).rejects.toThrow(ValidationError);

            expect((await service.getParcel(id)).arrears).toBe(800);
            expect(await countLogEntries(db, id)).toBe(0);
        });

        it('should reject unknown and protected fields', async () => {
            const id = await insertParcel(db);

            await expect(service.updateField(id, 'favouriteColour', 'red')).rejects.toThrow('Unknown field "favouriteColour"');
            await expect(service.updateField(id, 'cureDeadline', '2026-01-01')).rejects.toThrow(ValidationError);
            expect(await countLogEntries(db)).toBe(0);
        });

        it('should reject an invalid status', async () => {
            const id = await insertParcel(db);
            await expect(service.updateField(id, 'status', 'PAID')).rejects.toThrow(ValidationError);
        });

        it('should reject an impossible follow-up date', async () => {
            const id = await insertParcel(db);
            await expect(service.updateField(id, 'deadline', '2026-02-30')).rejects.toThrow(InvalidDateError);
        });

        it('should throw NotFoundError for an unknown parcel', async () => {
            await expect(service.updateField(42, 'notes', 'hello')).rejects.toThrow('Parcel 42 not found');
            expect(await countLogEntries(db)).toBe(0);
        });

        it('should reject an area beyond the column range without writing', async () => {
            const id = await insertParcel(db, { sqft: 10000 });

            await expect(service.updateField(id, 'sqft', '9007199254740993')).rejects.toThrow(ValidationError);
            await expect(service.updateField(id, 'sqft', '3000000000')).rejects.toThrow(ValidationError);

            expect((await service.getParcel(id)).sqft).toBe(10000);
            expect(await countLogEntries(db)).toBe(0);
        });
    });

    describe('markPacketSent', () => {
        it('should set the packet date, all three deadlines and one log entry', async () => {
            const id = await insertParcel(db);
            const { parcel, logEntry, deadlines } = await service.markPacketSent(id, '2026-01-01', 'TRK-0001');

            expect(deadlines).toEqual({
                cureDeadline: '2026-01-31',
                lienFilingDate: '2026-02-15',
                attorneyReferralDate: '2026-03-02',
            });
            expect(parcel.deadlines).toEqual(deadlines);
            expect(parcel.datePacketSent).toBe('2026-01-01');
            expect(parcel.certifiedMailTracking).toBe('TRK-0001');
            expect(parcel.enforcementStep).toBe('Demand Sent');
            expect(parcel.nextAction).toBe('Await cure by 2026-01-31');

            expect(logEntry).toMatchObject({
                parcelId: id,
                action: 'Demand packet sent on 2026-01-01, tracking: TRK-0001',
                sentVia: 'USPS Certified',
                responseDue: '2026-01-31',
                nextStep: 'Cure by 2026-01-31, lien by 2026-02-15, attorney by 2026-03-02',
                attorney: 'Counsel of Record',
                notes: '30-day cure: 2026-01-31 | 45-day lien: 2026-02-15 | 60-day attorney: 2026-03-02',
            });
            expect(await countLogEntries(db, id)).toBe(1);
        });

        it('should keep the existing tracking number when none is given', async () => {
            const id = await insertParcel(db, { certifiedMailTracking: 'TRK-OLD' });
            const { parcel, logEntry } = await service.markPacketSent(id, '2026-02-10');

            expect(parcel.certifiedMailTracking).toBe('TRK-OLD');
            expect(logEntry.action).toBe('Demand packet sent on 2026-02-10');
            expect(parcel.deadlines?.attorneyReferralDate).toBe('2026-04-11');
        });

        it('should reject a malformed date before writing anything', async () => {
            const id = await insertParcel(db);

            await expect(service.markPacketSent(id, '01/15/2026')).rejects.toThrow(InvalidDateError);

            const parcel = await service.getParcel(id);
            expect(parcel.datePacketSent).toBeNull();
            expect(parcel.deadlines).toBeNull();
            expect(await countLogEntries(db)).toBe(0);
        });

        it('should throw NotFoundError for an unknown parcel', async () => {
            await expect(service.markPacketSent(7, '2026-01-01')).rejects.toThrow(NotFoundError);
            expect(await countLogEntries(db)).toBe(0);
        });
    });

    describe('lender research', () => {
        it('should update several fields with one log entry', async () => {
            const id = await insertParcel(db);
            const { parcel, logEntry } = await service.updateResearch(id, {
                lenderName: 'First Test Bank',
                loanNumber: ' LN-100 ',
            });

            expect(parcel.research.lenderName).toBe('First Test Bank');
            expect(parcel.research.loanNumber).toBe('LN-100');
            expect(logEntry.action).toBe('Lender research updated: lender_name, loan_number');
            expect(await countLogEntries(db, id)).toBe(1);
        });

        it('should reject fields outside the research set', async () => {
            const id = await insertParcel(db);
            await expect(service.updateResearch(id, { status: 'CURRENT' })).rejects.toThrow(ValidationError);
            await expect(service.updateResearch(id, {})).rejects.toThrow('No research fields to update');
        });

        it('should mark address and lender as verified', async () => {
            const id = await insertParcel(db);

            const address = await service.markAddressVerified(id);
            expect(address.parcel.research.addressVerified).toBe(true);
            expect(address.logEntry.action).toBe('Address verified via county records');

            const lender = await service.markLenderVerified(id);
            expect(lender.parcel.research.lenderVerified).toBe(true);
            expect(await countLogEntries(db, id)).toBe(2);
        });
    });

    describe('recordEnforcementAction', () => {
        it('should record a campus-wide entry with the default attorney', async () => {
            const entry = await service.recordEnforcementAction({
                parcelId: null,
                action: 'Board briefed on campaign',
                responseDue: '2026-03-01',
            });

            expect(entry).toMatchObject({
                parcelId: null,
                action: 'Board briefed on campaign',
                responseDue: '2026-03-01',
                attorney: 'Counsel of Record',
                cost: 0,
            });
        });

        it('should record a parcel entry with a cost', async () => {
            const id = await insertParcel(db);
            await service.recordEnforcementAction({ parcelId: id, action: 'Lien filed', cost: 125, attorney: 'Test Counsel' });

            const { entries } = await listTimeline(db, { parcelId: id, limit: 50, offset: 0 });
            expect(entries).toHaveLength(1);
            expect(entries[0]).toMatchObject({ action: 'Lien filed', cost: 125, attorney: 'Test Counsel' });
        });

        it('should validate before writing', async () => {
            await expect(service.recordEnforcementAction({ parcelId: null, action: '  ' })).rejects.toThrow('Action is required');
            await expect(service.recordEnforcementAction({ parcelId: null, action: 'Paid fee', cost: -1 }))
                .rejects.toThrow(ValidationError);
            await expect(service.recordEnforcementAction({ parcelId: null, action: 'Call', responseDue: 'Friday' }))
                .rejects.toThrow(InvalidDateError);
            await expect(service.recordEnforcementAction({ parcelId: 99, action: 'Call' })).rejects.toThrow(NotFoundError);
            expect(await countLogEntries(db)).toBe(0);
        });
    });

    describe('computeSettlement', () => {
        const terms = { discountPct: 0.35, interestRate: 0.02, termMonths: 36 };

        it('should price an explicit principal', async () => {
            const quote = await service.computeSettlement({ principal: 100000 }, terms);

            expect(quote.parcelId).toBeNull();
            expect(quote.result.settledAmount).toBeCloseTo(65000, 6);
            expect(quote.result.savingsVsLitigation).toBeCloseTo(71100, 6);
        });

        it('should use a parcel\'s arrears as the principal', async () => {
            const id = await insertParcel(db, { pastDueBalance: 20000 });
            const quote = await service.computeSettlement({ parcelId: id }, terms);

            expect(quote.principal).toBe(20000);
            expect(quote.parcelId).toBe(id);
            expect(quote.result.settledAmount).toBeCloseTo(13000, 6);
        });

        it('should reject out-of-range terms and unknown parcels', async () => {
            await expect(service.computeSettlement({ principal: 1000 }, { ...terms, discountPct: 1.5 }))
                .rejects.toThrow(ValidationError);
            await expect(service.computeSettlement({ principal: 1000 }, { ...terms, interestRate: -0.1 }))
                .rejects.toThrow(ValidationError);
            await expect(service.computeSettlement({ parcelId: 404 }, terms)).rejects.toThrow(NotFoundError);
        });
    });
});

/**
 * HTTP API Tests
 *
 * Full app over an in-process database seeded with the fictional campus.
 */

import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../app';
import type { Database } from '../db';
import { createSeededDb, testConfig } from './helpers/testDb';

describe('Ledger API', () => {
    let db: Database;
    let app: Express;

    beforeEach(async () => {
        db = await createSeededDb();
        app = createApp({ db, config: testConfig });
    });

    describe('GET /api/parcels', () => {
        it('should list every parcel with derived figures', async () => {
            const response = await request(app).get('/api/parcels');

            expect(response.status).toBe(200);
            expect(response.body).toHaveLength(14);
            expect(response.body[0].status).toBe('CURRENT');
            expect(typeof response.body[0].arrears).toBe('number');
        });

        it('should filter by status and order by area', async () => {
            const response = await request(app).get('/api/parcels?status=disputed,RECON&order=area');

            expect(response.status).toBe(200);
            expect(response.body.map((p: { businessName: string }) => p.businessName)).toEqual([
                'Commerce Business Center',
                'Riverside Properties',
            ]);
        });

        it('should reject an unknown status filter', async () => {
            const response = await request(app).get('/api/parcels?status=PAID');

            expect(response.status).toBe(400);
            expect(response.body).toMatchObject({ error: 'ValidationError', message: 'Unknown status "PAID"', field: 'status' });
        });
    });

    describe('GET /api/parcels/:id', () => {
        it('should return 404 for an unknown parcel', async () => {
            const response = await request(app).get('/api/parcels/999');

            expect(response.status).toBe(404);
            expect(response.body).toMatchObject({ error: 'NotFoundError', message: 'Parcel 999 not found' });
            expect(typeof response.body.requestId).toBe('string');
        });

        it('should reject a non-numeric id', async () => {
            const response = await request(app).get('/api/parcels/abc');

            expect(response.status).toBe(400);
            expect(response.body.error).toBe('Validation Error');
            expect(response.body.details[0]).toEqual({ field: 'id', message: 'Parcel id must be a positive integer' });
        });
    });

    describe('PATCH /api/parcels/:id', () => {
        it('should update a field and return the log entry', async () => {
            const response = await request(app)
                .patch('/api/parcels/6')
                .send({ field: 'pastDueBalance', value: '$42,000' });

            expect(response.status).toBe(200);
            expect(response.body.parcel.arrears).toBe(42000);
            expect(response.body.logEntry.action).toBe('Updated Past Due Balance to: 42000');
        });

        it('should answer 400 without writing for an unparseable value', async () => {
            const response = await request(app)
                .patch('/api/parcels/6')
                .send({ field: 'sqft', value: 'big' });

            expect(response.status).toBe(400);
            expect(response.body).toMatchObject({ error: 'ValidationError', message: 'Invalid square footage: "big"' });

            const timeline = await request(app).get('/api/enforcement?parcelId=6');
            expect(timeline.body.pagination.totalCount).toBe(0);
        });

        it('should require a field name', async () => {
            const response = await request(app).patch('/api/parcels/6').send({ value: 'x' });
            expect(response.status).toBe(400);
            expect(response.body.error).toBe('Validation Error');
        });
    });

    describe('POST /api/parcels/:id/packet-sent', () => {
        it('should schedule the deadlines', async () => {
            const response = await request(app)
                .post('/api/parcels/7/packet-sent')
                .send({ sentDate: '2026-01-01', tracking: 'TRK-7' });

            expect(response.status).toBe(201);
            expect(response.body.deadlines).toEqual({
                cureDeadline: '2026-01-31',
                lienFilingDate: '2026-02-15',
                attorneyReferralDate: '2026-03-02',
            });
            expect(response.body.parcel.enforcementStep).toBe('Demand Sent');
        });

        it('should reject a malformed date', async () => {
            const response = await request(app)
                .post('/api/parcels/7/packet-sent')
                .send({ sentDate: '1/1/26' });

            expect(response.status).toBe(400);
            expect(response.body).toMatchObject({
                error: 'InvalidDateError',
                message: 'Invalid date "1/1/26". Use YYYY-MM-DD.',
            });
        });
    });

    describe('research tracker', () => {
        it('should update research fields and verification flags', async () => {
            const update = await request(app)
                .put('/api/parcels/12/research')
                .send({ fields: { countyParcelId: 'CP-0012', titleCompany: 'Sample Title Co' } });

            expect(update.status).toBe(200);
            expect(update.body.parcel.research.countyParcelId).toBe('CP-0012');

            const verify = await request(app).post('/api/parcels/12/verify-lender');
            expect(verify.status).toBe(200);
            expect(verify.body.parcel.research.lenderVerified).toBe(true);

            const tracker = await request(app).get('/api/parcels/research');
            expect(tracker.body.lenderVerified).toBe(1);
        });
    });

    it('should serve the enforcement vocabulary', async () => {
        const response = await request(app).get('/api/parcels/vocabulary');

        expect(response.status).toBe(200);
        expect(response.body.statuses).toEqual(['CURRENT', 'DELINQUENT', 'DISPUTED', 'RECON', 'VERIFY', 'SETTLED']);
        expect(response.body.steps).toContain('Demand Sent');
        expect(response.body.recommendedTransitions.VERIFY).toEqual(['CURRENT', 'DELINQUENT', 'RECON']);
    });

    it('should total the non-payers', async () => {
        const response = await request(app).get('/api/parcels/nonpayers');

        expect(response.status).toBe(200);
        expect(response.body.totals.count).toBe(8);
    });

    describe('/api/enforcement', () => {
        it('should record an action and show it first on the timeline', async () => {
            const created = await request(app)
                .post('/api/enforcement')
                .send({ parcelId: 6, action: 'Phone call with owner', cost: '15.5', notes: 'Promised a reply' });

            expect(created.status).toBe(201);
            expect(created.body).toMatchObject({ parcelId: 6, cost: 15.5, attorney: 'Counsel of Record' });

            const timeline = await request(app).get('/api/enforcement?limit=2');
            expect(timeline.status).toBe(200);
            expect(timeline.body.pagination).toEqual({ page: 1, limit: 2, totalCount: 3, totalPages: 2 });
            expect(timeline.body.data[0]).toMatchObject({
                action: 'Phone call with owner',
                parcelName: 'Orchard Senior Living',
            });
        });

        it('should reject a negative cost', async () => {
            const response = await request(app)
                .post('/api/enforcement')
                .send({ parcelId: null, action: 'Courier', cost: -3 });

            expect(response.status).toBe(400);
            expect(response.body.details).toEqual([{ field: 'cost', message: 'cost must be a non-negative number' }]);
        });

        it('should answer 404 for an unknown parcel', async () => {
            const response = await request(app)
                .post('/api/enforcement')
                .send({ parcelId: 500, action: 'Call' });

            expect(response.status).toBe(404);
        });
    });

    describe('POST /api/settlements', () => {
        it('should price a settlement from a principal', async () => {
            const response = await request(app)
                .post('/api/settlements')
                .send({ principal: 100000, discountPct: 0.35, interestRate: 0.02, termMonths: 36 });

            expect(response.status).toBe(200);
            expect(response.body.result.settledAmount).toBeCloseTo(65000, 6);
            expect(response.body.result.monthlyWithInterest).toBeCloseTo(1913.8889, 3);
            expect(response.body.result.termClamped).toBe(false);
        });

        it('should price a settlement from a parcel\'s arrears', async () => {
            const response = await request(app)
                .post('/api/settlements')
                .send({ parcelId: 12, discountPct: 0, interestRate: 0, termMonths: 0 });

            expect(response.status).toBe(200);
            expect(response.body.principal).toBeCloseTo(60522.15068, 4);
            expect(response.body.result.termClamped).toBe(true);
            expect(response.body.result.monthlyNoInterest).toBe(0);
        });

        it('should require a principal or a parcel', async () => {
            const response = await request(app)
                .post('/api/settlements')
                .send({ discountPct: 0.1, interestRate: 0.02, termMonths: 12 });

            expect(response.status).toBe(400);
            expect(response.body.message).toBe('Either principal or parcelId is required');
        });

        it('should refuse a principal and a parcel together', async () => {
            const response = await request(app)
                .post('/api/settlements')
                .send({ principal: 5000, parcelId: 12, discountPct: 0.1, interestRate: 0.02, termMonths: 12 });

            expect(response.status).toBe(400);
            expect(response.body.message).toBe('Send either principal or parcelId, not both');
            expect(response.body.field).toBe('principal');
        });
    });

    describe('/api/dashboard', () => {
        it('should summarise the campaign for a given day', async () => {
            const response = await request(app).get('/api/dashboard?today=2026-03-01');

            expect(response.status).toBe(200);
            expect(response.body.counts.total).toBe(14);
            expect(response.body.lienDeadline.daysLeft).toBe(31);
        });

        it('should reject a malformed reference date', async () => {
            const response = await request(app).get('/api/dashboard?today=tomorrow');
            expect(response.status).toBe(400);
        });

        it('should serve the pro-rata table', async () => {
            const response = await request(app).get('/api/dashboard/pro-rata');

            expect(response.status).toBe(200);
            expect(response.body.rows).toHaveLength(6);
        });

        it('should list upcoming deadlines', async () => {
            await request(app).post('/api/parcels/6/packet-sent').send({ sentDate: '2026-01-01' });

            const response = await request(app).get('/api/dashboard/deadlines?today=2026-02-10');

            expect(response.status).toBe(200);
            expect(response.body.counts).toEqual({ overdue: 1, urgent: 1, soon: 0, normal: 1 });
        });
    });

    it('should serve the rate schedule', async () => {
        const response = await request(app).get('/api/rates');

        expect(response.status).toBe(200);
        expect(response.body).toHaveLength(5);
    });

    it('should report health and metrics', async () => {
        const health = await request(app).get('/health');
        expect([200, 503]).toContain(health.status);
        expect(health.body.alerts).toHaveProperty('highErrorRate');

        const metrics = await request(app).get('/metrics');
        expect(metrics.status).toBe(200);
        expect(metrics.body).toHaveProperty('ledger');
    });
});

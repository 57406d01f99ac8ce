import { CampusConfig, loadCampusConfig } from '../config/campusConfig';
import { campusShare } from '../services/prorationService';
import { isParcelStatus } from '../services/stateMachine';
import { ConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { createPool, Database, SqlClient } from './index';
import { applySchema } from './init';
import seedData from './seedData.json';

/**
 * Insert the fictional campus, its rate schedule and the opening log
 * entries. Expects empty tables.
 */
export async function seedDatabase(client: SqlClient, config: CampusConfig): Promise<void> {
    for (const parcel of seedData.parcels) {
        if (!isParcelStatus(parcel.status)) {
            throw new ConfigurationError(`Seed parcel "${parcel.address}" has unknown status ${parcel.status}`);
        }
        await client.query(
            `INSERT INTO parcels
                (address, business_name, sqft, pct_campus, status, entity_owner, corporate_target,
                 enforcement_step, next_action, deadline, notes)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
            [
                parcel.address,
                parcel.businessName,
                parcel.sqft,
                campusShare(config, parcel.sqft),
                parcel.status,
                parcel.entityOwner,
                parcel.corporateTarget,
                parcel.enforcementStep,
                parcel.nextAction,
                parcel.deadline,
                parcel.notes,
            ]
        );
    }

    for (const rate of config.rateSchedule) {
        await client.query(
            'INSERT INTO rates (rate_key, label, amount, effective_date) VALUES ($1, $2, $3, $4)',
            [rate.key, rate.label, rate.value, rate.effectiveDate]
        );
    }

    for (const entry of seedData.log) {
        await client.query(
            `INSERT INTO enforcement_log (parcel_id, action, sent_via, response_due, next_step, attorney, notes)
             VALUES (NULL, $1, $2, $3, $4, $5, $6)`,
            [entry.action, entry.sentVia, entry.responseDue, entry.nextStep, config.defaultAttorney, entry.notes]
        );
    }
}

async function seed() {
    if (process.env.NODE_ENV === 'production') {
        throw new Error('Seeding is not allowed in production');
    }

    const config = loadCampusConfig();
    const db = new Database(createPool());

    try {
        await applySchema(db);
        logger.info('Seeding database...');
        await db.transaction(async (client) => {
            await client.query('TRUNCATE enforcement_log, parcels, rates RESTART IDENTITY CASCADE');
            await seedDatabase(client, config);
        });
        logger.info({ parcels: seedData.parcels.length, logEntries: seedData.log.length }, 'Seeding complete');
    } finally {
        await db.end();
    }
}

if (require.main === module) {
    seed().catch((err: unknown) => {
        logger.fatal({ err }, 'Seeding failed');
        process.exit(1);
    });
}

import fs from 'fs';
import path from 'path';
import { createPool, Database } from './index';
import { logger } from '../utils/logger';

export function readSchemaStatements(): string[] {
    const schemaPath = path.join(__dirname, 'schema.sql');
    const schemaSql = fs.readFileSync(schemaPath, 'utf8');

    return schemaSql
        .split(';')
        .map(statement => statement.trim())
        .filter(statement => statement.length > 0);
}

/**
 * Create the ledger tables if they do not exist yet.
 */
export async function applySchema(db: Database): Promise<void> {
    const client = await db.getClient();
    try {
        for (const statement of readSchemaStatements()) {
            await client.query(statement);
        }
    } finally {
        client.release();
    }
}

async function initDb() {
    const db = new Database(createPool());
    try {
        logger.info('Running schema.sql...');
        await applySchema(db);
        logger.info('Database initialized successfully.');
    } finally {
        await db.end();
    }
}

if (require.main === module) {
    initDb().catch((err: unknown) => {
        logger.fatal({ err }, 'Error initializing database');
        process.exit(1);
    });
}

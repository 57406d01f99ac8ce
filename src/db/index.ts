import { Pool, QueryResult, QueryResultRow } from 'pg';
import dotenv from 'dotenv';
import { metrics } from '../utils/metrics';
import { logger } from '../utils/logger';

dotenv.config();

/**
 * Build the connection pool from the environment.
 * DATABASE_URL wins over the discrete DB_* settings.
 */
export function createPool(env: NodeJS.ProcessEnv = process.env): Pool {
    const connectionString = env.DATABASE_URL;

    // rejectUnauthorized can be relaxed for self-signed development certs
    const rejectUnauthorized = env.DB_SSL_REJECT_UNAUTHORIZED !== 'false';

    const pool = new Pool(
        connectionString
            ? {
                connectionString,
                ssl: {
                    rejectUnauthorized
                }
            }
            : {
                host: env.DB_HOST,
                port: parseInt(env.DB_PORT || '5432'),
                database: env.DB_NAME,
                user: env.DB_USER,
                password: env.DB_PASSWORD,
            }
    );

    logger.debug({
        connectionString: connectionString ? '***' : undefined,
        host: env.DB_HOST,
        port: env.DB_PORT,
        database: env.DB_NAME,
        user: env.DB_USER,
    }, 'DB connection config');

    pool.on('error', (err) => {
        logger.fatal({ err }, 'Unexpected error on idle client');
        process.exit(-1);
    });

    return pool;
}

/** What the services issue statements through: a pooled client or the pool itself */
export interface SqlClient {
    query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>>;
}

export interface TransactionClient extends SqlClient {
    release(): void;
}

/** The slice of pg's Pool the Database wrapper needs */
export interface ConnectionPool extends SqlClient {
    connect(): Promise<TransactionClient>;
    end(): Promise<void>;
}

/**
 * Thin wrapper over the pool: timed queries and the transaction boundary
 * every parcel mutation and its log entry share.
 */
export class Database {
    constructor(private readonly pool: ConnectionPool) {}

    query<R extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []): Promise<QueryResult<R>> {
        const startTime = Date.now();
        const queryType = extractQueryType(text);

        return this.pool.query<R>(text, params)
            .then(result => {
                metrics.recordDbQuery(Date.now() - startTime, queryType);
                return result;
            })
            .catch((error: unknown) => {
                metrics.recordDbQuery(Date.now() - startTime, queryType);
                throw error;
            });
    }

    getClient(): Promise<TransactionClient> {
        return this.pool.connect();
    }

    /**
     * Run `callback` between BEGIN and COMMIT; any throw rolls back and is
     * rethrown unchanged.
     */
    async transaction<T>(callback: (client: SqlClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();
        const transactionStart = Date.now();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');

            metrics.recordDbQuery(Date.now() - transactionStart, 'TRANSACTION');

            return result;
        } catch (error) {
            await client.query('ROLLBACK');
            metrics.recordRollback();
            throw error;
        } finally {
            client.release();
        }
    }

    end(): Promise<void> {
        return this.pool.end();
    }
}

/**
 * SQL statement type, for categorizing query metrics
 */
export function extractQueryType(sql: string): string {
    const trimmed = sql.trim().toUpperCase();

    for (const type of ['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'BEGIN', 'COMMIT', 'ROLLBACK', 'CREATE', 'ALTER', 'DROP']) {
        if (trimmed.startsWith(type)) return type;
    }

    return 'OTHER';
}

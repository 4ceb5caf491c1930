import { Pool, PoolClient } from 'pg';
import { appConfig } from './config';
import Logger from './utils/logger';

export type Row = Record<string, unknown>;

export type QueryRows = {
    rows: Row[];
    rowCount: number;
};

export interface Queryable {
    query(queryText: string, params?: unknown[]): Promise<QueryRows>;
}

/**
 * What services depend on. `transaction` hands the callback a connection
 * that stays checked out until COMMIT or ROLLBACK.
 */
export interface DatabaseClient extends Queryable {
    transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T>;
}

let pool: Pool | null = null;

// Created on first use so importing a service never opens a connection
const getPool = (): Pool => {
    if (!pool) {
        const { host, name, user, password, port } = appConfig.database;
        pool = new Pool({
            host,
            database: name,
            user,
            password,
            port,
            max: 20,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 10000,
        });
        pool.on('error', (error) => {
            Logger.error('Idle client error', 'Database', error);
        });
    }
    return pool;
};

export const closePool = async (): Promise<void> => {
    if (pool) {
        await pool.end();
        pool = null;
    }
};

class TransactionScope implements Queryable {
    constructor(
        private readonly connection: PoolClient,
        private readonly context: string,
    ) {}

    public async query(queryText: string, params?: unknown[]): Promise<QueryRows> {
        Logger.debug(`Executing query: ${queryText}`, this.context, params);
        const result = await this.connection.query(queryText, params);
        return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    }
}

export class Client implements DatabaseClient {
    private context: string;

    constructor() {
        this.context = 'Client';
    }

    public async query(queryText: string, params?: unknown[]): Promise<QueryRows> {
        const methodContext = this.context + ' - query';
        Logger.debug(`Executing query: ${queryText}`, methodContext, params);
        const result = await getPool().query(queryText, params);
        return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    }

    public async transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
        const methodContext = this.context + ' - transaction';
        const connection = await getPool().connect();
        try {
            await connection.query('BEGIN');
            const result = await work(
                new TransactionScope(connection, methodContext),
            );
            await connection.query('COMMIT');
            return result;
        } catch (error) {
            try {
                await connection.query('ROLLBACK');
            } catch (rollbackError) {
                Logger.error(
                    'Error during rollback',
                    methodContext,
                    rollbackError,
                );
            }
            throw error;
        } finally {
            connection.release();
        }
    }
}

import { DatabaseClient, Queryable, QueryRows, Row } from '../../src/database';

type Handler = {
    pattern: RegExp;
    respond: (params: unknown[]) => Row[];
    rowCount?: number;
};

export type RecordedQuery = {
    text: string;
    params: unknown[];
    inTransaction: boolean;
};

/**
 * In-process stand-in for Postgres: each query is answered by the first
 * handler whose pattern matches the SQL text. Unmatched queries return no
 * rows. Transactions run against the same client and nothing is rolled
 * back; each recorded query notes whether a transaction was open.
 */
export class ScriptedClient implements DatabaseClient {
    public readonly queries: RecordedQuery[] = [];
    public transactions = 0;
    private handlers: Handler[] = [];
    private openTransactions = 0;

    public on(pattern: RegExp, rows: Row[] | ((params: unknown[]) => Row[]), rowCount?: number): this {
        const respond = typeof rows === 'function' ? rows : () => rows;
        this.handlers.push({ pattern, respond, rowCount });
        return this;
    }

    public async query(queryText: string, params: unknown[] = []): Promise<QueryRows> {
        this.queries.push({ text: queryText, params, inTransaction: this.openTransactions > 0 });
        const handler = this.handlers.find((candidate) => candidate.pattern.test(queryText));
        const rows = handler ? handler.respond(params) : [];
        return { rows, rowCount: handler?.rowCount ?? rows.length };
    }

    public async transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
        this.transactions += 1;
        this.openTransactions += 1;
        try {
            return await work(this);
        } finally {
            this.openTransactions -= 1;
        }
    }

    public matching(pattern: RegExp): RecordedQuery[] {
        return this.queries.filter((query) => pattern.test(query.text));
    }
}

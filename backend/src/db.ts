import { Client, types, type QueryResult, type QueryResultRow } from 'pg';

const DATE_OID = 1082;

// DATE columns stay calendar strings rather than local-midnight Date objects
types.setTypeParser(DATE_OID, (value: string) => value);

export type Database = {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
  withTransaction<T>(fn: () => Promise<T>): Promise<T>;
  close(): Promise<void>;
};

/**
 * Opens the single connection a load pass works on. The caller owns it and
 * must close it when the pass ends.
 */
export async function connectDatabase(connectionString: string): Promise<Database> {
  const client = new Client({ connectionString });
  await client.connect();

  return {
    query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
      return client.query<T>(text, params);
    },

    async withTransaction<T>(fn: () => Promise<T>): Promise<T> {
      await client.query('begin');
      try {
        const result = await fn();
        await client.query('commit');
        return result;
      } catch (error) {
        await client.query('rollback');
        throw error;
      }
    },

    async close(): Promise<void> {
      await client.end();
    },
  };
}

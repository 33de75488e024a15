import { DatabaseError } from 'pg';
import { constraintViolation, malformedRow } from '../errors.js';
import type { FieldValue, FieldValues, StoredRow } from '../types/loader.js';
import type { RecordStore } from './record-store.js';

// SQLSTATE classes: 22 data exception, 23 integrity constraint violation
const DATA_EXCEPTION_CLASS = '22';
const INTEGRITY_CLASS = '23';

/**
 * Row-level LoadErrors for database errors caused by the row's own values.
 * Anything else is returned unchanged.
 */
export function translateDatabaseError(table: string, error: unknown): unknown {
  if (!(error instanceof DatabaseError) || !error.code) return error;
  if (error.code.startsWith(INTEGRITY_CLASS)) {
    return constraintViolation(table, error.detail ?? error.message, {
      code: error.code,
      constraint: error.constraint,
    });
  }
  if (error.code.startsWith(DATA_EXCEPTION_CLASS)) {
    return malformedRow(`${table}: ${error.message}`, { code: error.code, column: error.column });
  }
  return error;
}

/** The part of a database connection the store needs. */
export type Queryable = {
  query(text: string, params?: unknown[]): Promise<{ rows: StoredRow[] }>;
  withTransaction<T>(fn: () => Promise<T>): Promise<T>;
};

function buildWhere(match: FieldValues, firstParam: number): { clause: string; values: FieldValue[] } {
  const conditions: string[] = [];
  const values: FieldValue[] = [];
  for (const [column, value] of Object.entries(match)) {
    if (value === null) {
      conditions.push(`${column} is null`);
    } else {
      values.push(value);
      conditions.push(`${column} = $${firstParam + values.length - 1}`);
    }
  }
  if (!conditions.length) {
    throw new Error('a match needs at least one column');
  }
  return { clause: conditions.join(' and '), values };
}

export class PgStore implements RecordStore {
  private readonly db: Queryable;

  constructor(db: Queryable) {
    this.db = db;
  }

  async insert(table: string, idColumn: string, fields: FieldValues): Promise<number> {
    const columns = Object.keys(fields);
    const values = Object.values(fields);
    const text = columns.length
      ? `insert into ${table} (${columns.join(', ')}) values (${values.map((_, index) => `$${index + 1}`).join(', ')}) returning ${idColumn}`
      : `insert into ${table} default values returning ${idColumn}`;

    const { rows } = await this.execute(table, text, values);
    const id = Number(rows[0]?.[idColumn]);
    if (!Number.isSafeInteger(id)) {
      throw new Error(`${table}: insert did not return ${idColumn}`);
    }
    return id;
  }

  async update(table: string, match: FieldValues, fields: FieldValues): Promise<void> {
    const entries = Object.entries(fields);
    if (entries.length === 0) return;

    const sets = entries.map(([column], index) => `${column} = $${index + 1}`);
    const where = buildWhere(match, entries.length + 1);
    await this.execute(table, `update ${table} set ${sets.join(', ')} where ${where.clause}`, [
      ...entries.map(([, value]) => value),
      ...where.values,
    ]);
  }

  async findOne(table: string, match: FieldValues): Promise<StoredRow | undefined> {
    const where = buildWhere(match, 1);
    const { rows } = await this.execute(table, `select * from ${table} where ${where.clause} limit 1`, where.values);
    return rows[0];
  }

  async findAll(table: string, orderBy: string): Promise<StoredRow[]> {
    const { rows } = await this.execute(table, `select * from ${table} order by ${orderBy}`, []);
    return rows;
  }

  withTransaction<T>(fn: () => Promise<T>): Promise<T> {
    return this.db.withTransaction(fn);
  }

  private async execute(table: string, text: string, values: FieldValue[]): Promise<{ rows: StoredRow[] }> {
    try {
      return await this.db.query(text, values);
    } catch (error) {
      throw translateDatabaseError(table, error);
    }
  }
}

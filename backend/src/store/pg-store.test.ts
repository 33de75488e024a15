import { DatabaseError } from 'pg';
import { describe, expect, it } from 'vitest';
import { LoadError } from '../errors.js';
import type { StoredRow } from '../types/loader.js';
import { PgStore, translateDatabaseError, type Queryable } from './pg-store.js';

type Call = { text: string; params: unknown[] | undefined };

class FakeDatabase implements Queryable {
  readonly calls: Call[] = [];
  rows: StoredRow[] = [];
  failure: Error | null = null;
  transactions = 0;

  async query(text: string, params?: unknown[]): Promise<{ rows: StoredRow[] }> {
    this.calls.push({ text, params });
    if (this.failure) throw this.failure;
    return { rows: this.rows };
  }

  async withTransaction<T>(fn: () => Promise<T>): Promise<T> {
    this.transactions += 1;
    return fn();
  }
}

function integrityError(code: string, detail: string): DatabaseError {
  const error = new DatabaseError('insert or update violates a constraint', 0, 'error');
  error.code = code;
  error.detail = detail;
  error.constraint = 'ss_t_grades_school_id_fkey';
  return error;
}

describe('PgStore', () => {
  it('inserts with positional parameters and returns the generated id', async () => {
    const db = new FakeDatabase();
    db.rows = [{ school_id: 7 }];
    const store = new PgStore(db);

    const id = await store.insert('ss_t_schools', 'school_id', { school_name: 'Test Valley School', is_active: true });

    expect(id).toBe(7);
    expect(db.calls).toEqual([
      {
        text: 'insert into ss_t_schools (school_name, is_active) values ($1, $2) returning school_id',
        params: ['Test Valley School', true],
      },
    ]);
  });

  it('inserts default values when there are no fields', async () => {
    const db = new FakeDatabase();
    db.rows = [{ school_id: '8' }];

    expect(await new PgStore(db).insert('ss_t_schools', 'school_id', {})).toBe(8);
    expect(db.calls[0]?.text).toBe('insert into ss_t_schools default values returning school_id');
  });

  it('updates the given fields of the matching row', async () => {
    const db = new FakeDatabase();
    await new PgStore(db).update('ss_t_students', { student_id: 4 }, { mobile_number: '9000000199', guardian_name: null });

    expect(db.calls).toEqual([
      {
        text: 'update ss_t_students set mobile_number = $1, guardian_name = $2 where student_id = $3',
        params: ['9000000199', null, 4],
      },
    ]);
  });

  it('skips an update with nothing to change', async () => {
    const db = new FakeDatabase();
    await new PgStore(db).update('ss_t_students', { student_id: 4 }, {});
    expect(db.calls).toEqual([]);
  });

  it('matches null values with "is null"', async () => {
    const db = new FakeDatabase();
    db.rows = [{ timetable_id: 3 }];

    const row = await new PgStore(db).findOne('ss_t_timetable', { grade_id: 1, subject_id: null });

    expect(row).toEqual({ timetable_id: 3 });
    expect(db.calls[0]).toEqual({
      text: 'select * from ss_t_timetable where grade_id = $1 and subject_id is null limit 1',
      params: [1],
    });
  });

  it('reads whole tables in id order', async () => {
    const db = new FakeDatabase();
    await new PgStore(db).findAll('ss_t_grades', 'grade_id');
    expect(db.calls[0]).toEqual({ text: 'select * from ss_t_grades order by grade_id', params: [] });
  });

  it('runs work inside the connection transaction', async () => {
    const db = new FakeDatabase();
    const result = await new PgStore(db).withTransaction(async () => 'done');
    expect(result).toBe('done');
    expect(db.transactions).toBe(1);
  });

  it('maps integrity errors to constraint violations', async () => {
    const db = new FakeDatabase();
    db.failure = integrityError('23503', 'Key (school_id)=(99) is not present in table "ss_t_schools".');

    const attempt = new PgStore(db).insert('ss_t_grades', 'grade_id', { school_id: 99, grade_name: 'Grade 9' });

    await expect(attempt).rejects.toBeInstanceOf(LoadError);
    await expect(attempt).rejects.toMatchObject({
      kind: 'constraint_violation',
      message: 'ss_t_grades: Key (school_id)=(99) is not present in table "ss_t_schools".',
      details: { code: '23503', constraint: 'ss_t_grades_school_id_fkey' },
    });
  });

  it('maps data exceptions from a row value to malformed rows', async () => {
    const db = new FakeDatabase();
    const failure = new DatabaseError('value too long for type character varying(50)', 0, 'error');
    failure.code = '22001';
    db.failure = failure;

    const attempt = new PgStore(db).insert('ss_t_teachers', 'teacher_id', { first_name: 'x'.repeat(51) });

    await expect(attempt).rejects.toMatchObject({
      kind: 'malformed_row',
      message: 'ss_t_teachers: value too long for type character varying(50)',
      details: { code: '22001' },
    });
  });

  it('rethrows other database errors unchanged', async () => {
    const db = new FakeDatabase();
    const failure = integrityError('42P01', 'relation does not exist');
    db.failure = failure;

    await expect(new PgStore(db).findAll('ss_t_missing', 'id')).rejects.toBe(failure);
  });

  it('leaves errors that are not from the database alone', () => {
    const failure = new Error('connection reset');
    expect(translateDatabaseError('ss_t_schools', failure)).toBe(failure);
  });
});

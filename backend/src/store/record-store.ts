import type { FieldValues, StoredRow } from '../types/loader.js';

/**
 * Row-level access to the school schema. Table and column names come from the
 * entity catalog, never from workbook input.
 */
export interface RecordStore {
  insert(table: string, idColumn: string, fields: FieldValues): Promise<number>;
  update(table: string, match: FieldValues, fields: FieldValues): Promise<void>;
  findOne(table: string, match: FieldValues): Promise<StoredRow | undefined>;
  findAll(table: string, orderBy: string): Promise<StoredRow[]>;
  withTransaction<T>(fn: () => Promise<T>): Promise<T>;
}

import { promises as fsp } from 'node:fs';
import * as XLSX from 'xlsx';
import { malformedRow, sheetNotFound } from '../errors.js';
import type { CellValue, RowRecord } from '../types/loader.js';

export type SheetRow = {
  // 1-based position among the data rows; the header row is not counted
  rowIndex: number;
  record: RowRecord;
};

function toCellValue(value: unknown): CellValue {
  if (value == null) return null;
  if (value instanceof Date) return value;
  if (typeof value === 'string') return value.trim().length ? value : null;
  if (typeof value === 'number') return Number.isNaN(value) ? null : value;
  if (typeof value === 'boolean') return value;
  return String(value);
}

export class SheetReader {
  private readonly workbook: XLSX.WorkBook;

  constructor(workbook: XLSX.WorkBook) {
    this.workbook = workbook;
  }

  // date cells stay serial numbers; normalize turns them into days in UTC
  static fromBuffer(buffer: Buffer): SheetReader {
    return new SheetReader(XLSX.read(buffer, { type: 'buffer', cellDates: false }));
  }

  static async fromFile(filePath: string): Promise<SheetReader> {
    const buffer = await fsp.readFile(filePath);
    return SheetReader.fromBuffer(buffer);
  }

  sheetNames(): string[] {
    return [...this.workbook.SheetNames];
  }

  hasSheet(sheetName: string): boolean {
    return this.workbook.SheetNames.includes(sheetName) && this.workbook.Sheets[sheetName] !== undefined;
  }

  /**
   * Rows of a sheet as records holding every expected field. Iterating the
   * result again walks the worksheet again.
   */
  read(sheetName: string, fields: readonly string[]): Iterable<SheetRow> {
    const sheet = this.workbook.Sheets[sheetName];
    if (!this.workbook.SheetNames.includes(sheetName) || !sheet) {
      throw sheetNotFound(sheetName);
    }

    return {
      *[Symbol.iterator]() {
        const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: null, raw: true });
        let rowIndex = 0;
        for (const raw of rows) {
          rowIndex += 1;
          const record: RowRecord = {};
          for (const [key, value] of Object.entries(raw)) {
            record[key] = toCellValue(value);
          }
          for (const field of fields) {
            if (!(field in record)) {
              record[field] = null;
            }
          }
          yield { rowIndex, record };
        }
      },
    };
  }
}

export function assertMandatory(row: SheetRow, fields: readonly string[]): void {
  for (const field of fields) {
    if (row.record[field] == null) {
      throw malformedRow(`row ${row.rowIndex}: missing value for mandatory field ${field}`, {
        rowIndex: row.rowIndex,
        field,
      });
    }
  }
}

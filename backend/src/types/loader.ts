export type EntityType =
  | 'school'
  | 'grade'
  | 'section'
  | 'subject'
  | 'teacher'
  | 'student'
  | 'teacherSubject'
  | 'teacherGradeSection'
  | 'timeslot'
  | 'timetableEntry'
  | 'attendanceRecord'
  | 'homework'
  | 'classDiaryEntry'
  | 'feesSummary'
  | 'installment'
  | 'salaryStructure'
  | 'payslip';

/** Raw value of a spreadsheet cell after the sheet has been read. */
export type CellValue = string | number | boolean | Date | null;

/** Canonical value written to, and compared against, the store. */
export type FieldValue = string | number | boolean | null;

export type RowRecord = Record<string, CellValue>;

export type FieldValues = Record<string, FieldValue>;

export type NaturalKey = readonly FieldValue[];

export type StoredRow = Record<string, unknown>;

export type ColumnType = 'text' | 'integer' | 'decimal' | 'date' | 'time' | 'boolean';

export type ColumnDefinition = {
  name: string;
  type: ColumnType;
  required?: boolean;
  // blank cells are neither written nor compared, leaving the store default in place
  hasDefault?: boolean;
  values?: readonly string[];
  // other headers accepted for the column
  aliases?: readonly string[];
};

export type ReferenceDefinition = {
  entity: EntityType;
  // id column on the child; also the context name later references can use
  column: string;
  // child fields, in the order of the parent's natural key
  key: readonly string[];
  optional?: boolean;
  fallbackToPrimary?: boolean;
  contextOnly?: boolean;
  // field holding the parent's hint number, used when the key is incomplete
  hintField?: string;
};

export type EntityDefinition = {
  type: EntityType;
  sheet: string;
  table: string;
  idColumn: string;
  required: boolean;
  columns: readonly ColumnDefinition[];
  references: readonly ReferenceDefinition[];
  naturalKey: readonly string[];
  /** Field numbering the record within the workbook, so other sheets can refer to it by that number. */
  hintField?: string;
};

export type UpsertOutcome = 'inserted' | 'updated' | 'unchanged';

export type UpsertResult = {
  id: number;
  outcome: UpsertOutcome;
};

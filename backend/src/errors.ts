export type LoadErrorKind =
  | 'sheet_not_found'
  | 'malformed_row'
  | 'unresolved_reference'
  | 'constraint_violation';

export class LoadError extends Error {
  readonly kind: LoadErrorKind;
  readonly details?: unknown;

  constructor(kind: LoadErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = 'LoadError';
    this.kind = kind;
    this.details = details;
  }

  /** Fatal errors stop the whole pass; everything else is recorded against a single row. */
  get fatal(): boolean {
    return this.kind === 'sheet_not_found';
  }
}

export function isLoadError(error: unknown): error is LoadError {
  return error instanceof LoadError;
}

export function sheetNotFound(sheet: string): LoadError {
  return new LoadError('sheet_not_found', `sheet "${sheet}" not found in workbook`, { sheet });
}

export function malformedRow(message: string, details?: unknown): LoadError {
  return new LoadError('malformed_row', message, details);
}

export function unresolvedReference(entity: string, key: readonly unknown[]): LoadError {
  return new LoadError('unresolved_reference', `no ${entity} registered for key ${JSON.stringify(key)}`, {
    entity,
    key,
  });
}

export function constraintViolation(table: string, message: string, details?: unknown): LoadError {
  return new LoadError('constraint_violation', `${table}: ${message}`, details);
}

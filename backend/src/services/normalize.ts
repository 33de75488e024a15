import { isLoadError, malformedRow } from '../errors.js';
import type { ColumnDefinition, ColumnType, FieldValue } from '../types/loader.js';

type ColumnShape = Pick<ColumnDefinition, 'name' | 'type' | 'values'>;

const DECIMAL_SCALE = 2;
const SECONDS_PER_DAY = 86_400;
// day zero of spreadsheet date serials (1900 date system, leap-year bug included)
const SERIAL_EPOCH = Date.UTC(1899, 11, 30);

const TRUE_WORDS = new Set(['true', '1', 'yes', 'y', 'on']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'n', 'off']);

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function isBlank(value: unknown): boolean {
  if (value == null) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return value.trim().length === 0;
  return false;
}

function invalid(column: ColumnShape, value: unknown): never {
  const shown = value instanceof Date ? value.toISOString() : JSON.stringify(value);
  throw malformedRow(`${column.name}: expected ${column.type}, got ${shown}`, { column: column.name, value });
}

function formatLocalDate(value: Date): string {
  return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
}

function normalizeText(column: ColumnShape, value: unknown): string {
  let result: string;
  if (value instanceof Date) {
    result = formatLocalDate(value);
  } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    result = String(value).trim();
  } else {
    return invalid(column, value);
  }
  if (column.values && !column.values.includes(result)) {
    throw malformedRow(`${column.name}: "${result}" is not one of ${column.values.join(', ')}`, {
      column: column.name,
      value,
    });
  }
  return result;
}

function normalizeInteger(column: ColumnShape, value: unknown): number {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : Number.NaN;
  if (!Number.isSafeInteger(parsed)) {
    return invalid(column, value);
  }
  return parsed;
}

// adds one to a string of decimal digits
function incrementDigits(digits: string): string {
  const out = digits.split('');
  for (let index = out.length - 1; index >= 0; index -= 1) {
    if (out[index] === '9') {
      out[index] = '0';
      continue;
    }
    out[index] = String(Number(out[index]) + 1);
    return out.join('');
  }
  return `1${out.join('')}`;
}

/** Fixed-scale decimal text, rounded half away from zero on the digits themselves. */
export function toDecimalString(value: number | string, scale = DECIMAL_SCALE): string | null {
  const raw = typeof value === 'number' ? String(value) : value.trim();
  const match = /^([-+]?)(\d*)(?:\.(\d*))?$/.exec(raw);
  if (!match || (!match[2] && !match[3])) return null;

  let whole = match[2] || '0';
  let fraction = match[3] ?? '';
  if (fraction.length > scale) {
    let digits = whole + fraction.slice(0, scale);
    if (Number(fraction.charAt(scale)) >= 5) {
      digits = incrementDigits(digits);
    }
    whole = digits.slice(0, digits.length - scale);
    fraction = digits.slice(digits.length - scale);
  }
  fraction = fraction.padEnd(scale, '0');
  whole = whole.replace(/^0+(?=\d)/, '');
  const sign = match[1] === '-' && /[1-9]/.test(whole + fraction) ? '-' : '';
  return scale > 0 ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
}

function normalizeDecimal(column: ColumnShape, value: unknown): string {
  if (typeof value !== 'number' && typeof value !== 'string') return invalid(column, value);
  if (typeof value === 'number' && !Number.isFinite(value)) return invalid(column, value);
  return toDecimalString(value) ?? invalid(column, value);
}

function normalizeDate(column: ColumnShape, value: unknown): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return invalid(column, value);
    return formatLocalDate(value);
  }
  if (typeof value === 'number') {
    const date = new Date(SERIAL_EPOCH + Math.round(value) * SECONDS_PER_DAY * 1000);
    return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  }
  if (typeof value === 'string') {
    const match = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/.exec(value.trim());
    if (match) {
      const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
      const probe = new Date(Date.UTC(year, month - 1, day));
      if (probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day) {
        return `${match[1]}-${match[2]}-${match[3]}`;
      }
    }
  }
  return invalid(column, value);
}

function normalizeTime(column: ColumnShape, value: unknown): string {
  let hours: number;
  let minutes: number;
  let seconds: number;
  if (value instanceof Date) {
    [hours, minutes, seconds] = [value.getHours(), value.getMinutes(), value.getSeconds()];
  } else if (typeof value === 'number' && value >= 0) {
    const total = Math.round((value % 1) * SECONDS_PER_DAY) % SECONDS_PER_DAY;
    [hours, minutes, seconds] = [Math.floor(total / 3600), Math.floor((total % 3600) / 60), total % 60];
  } else if (typeof value === 'string') {
    const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(value.trim());
    if (!match) return invalid(column, value);
    [hours, minutes, seconds] = [Number(match[1]), Number(match[2]), Number(match[3] ?? '0')];
  } else {
    return invalid(column, value);
  }
  if (hours > 23 || minutes > 59 || seconds > 59) return invalid(column, value);
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

function normalizeBoolean(column: ColumnShape, value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number' && (value === 0 || value === 1)) return value === 1;
  if (typeof value === 'string') {
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
  }
  return invalid(column, value);
}

const NORMALIZERS: Record<ColumnType, (column: ColumnShape, value: unknown) => FieldValue> = {
  text: normalizeText,
  integer: normalizeInteger,
  decimal: normalizeDecimal,
  date: normalizeDate,
  time: normalizeTime,
  boolean: normalizeBoolean,
};

/**
 * Converts a cell or stored value into its canonical form for the column type.
 * Blank input yields null; anything that cannot be converted throws a malformed-row error.
 */
export function normalizeField(column: ColumnShape, value: unknown): FieldValue {
  if (isBlank(value)) return null;
  return NORMALIZERS[column.type](column, value);
}

/** Compares a stored value with an already normalized one. */
export function sameValue(column: ColumnShape, stored: unknown, incoming: FieldValue): boolean {
  try {
    return normalizeField(column, stored) === incoming;
  } catch (error) {
    if (isLoadError(error)) return false;
    throw error;
  }
}

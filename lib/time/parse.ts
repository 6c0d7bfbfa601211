/**
 * Month-key validation plus the tolerant parser used for raw source cells.
 */

import { toIsoDate, type IsoDate, type MonthKey } from '@/lib/time';

const ISO_MONTH_REGEX = /^(\d{4})-(\d{2})$/;
const YMD_REGEX = /^(\d{4})[-./](\d{1,2})[-./](\d{1,2})(?:[ T].*)?$/;
const MDY_REGEX = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s.*)?$/;
const COMPACT_REGEX = /^(\d{4})(\d{2})(\d{2})$/;
const NUMERIC_REGEX = /^\d+(\.\d+)?$/;

/** Excel serial day 25569 is 1970-01-01. */
const EXCEL_EPOCH_OFFSET = 25569;
const EXCEL_SERIAL_MIN = 1;
const EXCEL_SERIAL_MAX = 60000;

export class InvalidMonthKeyError extends Error {
  constructor(public readonly input: string) {
    super(`Invalid month key (expected YYYY-MM, month 01-12): ${input}`);
    this.name = 'InvalidMonthKeyError';
  }
}

/** Trimmed "YYYY-MM" with month 01-12, or InvalidMonthKeyError. */
export function parseMonthKeyOrThrow(input: string): MonthKey {
  const trimmed = typeof input === 'string' ? input.trim() : String(input);
  const match = trimmed.match(ISO_MONTH_REGEX);
  const month = match ? Number(match[2]) : 0;
  if (!match || month < 1 || month > 12) throw new InvalidMonthKeyError(trimmed);
  return trimmed;
}

function isValidYmd(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12) return false;
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day >= 1 && day <= lastDay;
}

function ymd(year: number, month: number, day: number): IsoDate | null {
  if (!isValidYmd(year, month, day)) return null;
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function fromExcelSerial(serial: number): IsoDate | null {
  if (serial < EXCEL_SERIAL_MIN || serial > EXCEL_SERIAL_MAX) return null;
  return toIsoDate(new Date(Math.round((serial - EXCEL_EPOCH_OFFSET) * 86400) * 1000));
}

function fromCompact(text: string): IsoDate | null {
  const compact = text.match(COMPACT_REGEX);
  return compact ? ymd(Number(compact[1]), Number(compact[2]), Number(compact[3])) : null;
}

/**
 * Tolerant parse of a raw source cell into YYYY-MM-DD.
 * Accepts Date objects, Excel serial numbers, ISO-like "YYYY-MM-DD" / "YYYY.MM.DD" / "YYYY/MM/DD",
 * US "MM/DD/YYYY" and compact "YYYYMMDD" as text or as a number. Returns null for blanks and anything else.
 */
export function parseFlexibleDate(v: unknown): IsoDate | null {
  if (v == null) return null;
  if (v instanceof Date) {
    return Number.isNaN(v.getTime()) ? null : toIsoDate(v);
  }
  if (typeof v === 'number') {
    if (!Number.isFinite(v)) return null;
    if (Number.isInteger(v) && v > EXCEL_SERIAL_MAX) return fromCompact(String(v));
    return fromExcelSerial(v);
  }
  if (typeof v !== 'string') return null;
  const trimmed = v.trim();
  if (!trimmed) return null;

  const iso = trimmed.match(YMD_REGEX);
  if (iso) return ymd(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  const us = trimmed.match(MDY_REGEX);
  if (us) return ymd(Number(us[3]), Number(us[1]), Number(us[2]));
  if (COMPACT_REGEX.test(trimmed)) return fromCompact(trimmed);
  if (NUMERIC_REGEX.test(trimmed)) return fromExcelSerial(Number(trimmed));
  return null;
}

/**
 * Month discovery. Scans a source directory, reads the month token out of each file name and
 * returns the ascending, de-duplicated month keys inside [windowStart, windowEnd].
 * Month names come from the vocabulary table; nothing here knows a fixed calendar range.
 */

import { readdir } from 'fs/promises';
import path from 'path';
import { DEFAULT_VOCABULARY, lookupMonthName, type Vocabulary } from '@/lib/config/vocabulary';
import { DataLoadError } from '@/lib/errors';
import { compareMonthKeys, monthKeyFromParts, monthKeyParts, type MonthKey } from '@/lib/time';
import { parseMonthKeyOrThrow } from '@/lib/time/parse';

export const SOURCE_EXTENSIONS = ['.csv', '.xlsx', '.xlsm'];

export class UnrecognizedMonthTokenError extends Error {
  constructor(
    public readonly fileName: string,
    public readonly token: string
  ) {
    super(`No month name found in source file "${fileName}" (token "${token}")`);
    this.name = 'UnrecognizedMonthTokenError';
  }
}

export type SourceKind = 'employees' | 'attendance';

export type MonthSourceFile = {
  fileName: string;
  kind: SourceKind;
};

export type MonthWindow = {
  months: MonthKey[];
  /** Source files per resolved month, in file-name order. */
  sources: Map<MonthKey, MonthSourceFile[]>;
  errors: UnrecognizedMonthTokenError[];
};

export type ResolveMonthWindowOptions = {
  vocabulary?: Vocabulary;
};

const YEAR_MONTH_REGEX = /(?:^|[^\d])(\d{4})[-_](\d{1,2})(?:[^\d]|$)/;
const YEAR_REGEX = /^(19|20)\d{2}$/;

function tokenize(baseName: string): string[] {
  return baseName
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

export function classifySource(fileName: string): SourceKind {
  return fileName.toLowerCase().includes('attendance') ? 'attendance' : 'employees';
}

function isSourceFile(fileName: string): boolean {
  if (fileName.startsWith('.') || fileName.startsWith('~$')) return false;
  return SOURCE_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

/**
 * Month key for one file name, or an UnrecognizedMonthTokenError.
 * A month name wins over a numeric YYYY_MM pair. Without a year in the name, the year is the first one placing the month at or after windowStart.
 */
export function monthKeyFromFileName(
  fileName: string,
  windowStart: MonthKey,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY
): MonthKey | UnrecognizedMonthTokenError {
  const baseName = path.basename(fileName, path.extname(fileName));
  const tokens = tokenize(baseName);

  let month: number | undefined;
  for (const t of tokens) {
    month = lookupMonthName(vocabulary, t);
    if (month != null) break;
  }
  if (month == null) {
    const numeric = baseName.match(YEAR_MONTH_REGEX);
    const numericMonth = numeric ? Number(numeric[2]) : 0;
    if (numeric && numericMonth >= 1 && numericMonth <= 12) return monthKeyFromParts(Number(numeric[1]), numericMonth);
    const lastWord = tokens.filter((t) => !YEAR_REGEX.test(t)).pop() ?? baseName;
    return new UnrecognizedMonthTokenError(fileName, lastWord);
  }

  const yearToken = tokens.find((t) => YEAR_REGEX.test(t));
  if (yearToken) return monthKeyFromParts(Number(yearToken), month);

  const start = monthKeyParts(windowStart);
  return monthKeyFromParts(month >= start.month ? start.year : start.year + 1, month);
}

/** Pure core of resolveMonthWindow: works on a list of file names. */
export function resolveMonthKeysFromNames(
  fileNames: readonly string[],
  windowStart: MonthKey,
  windowEnd: MonthKey,
  options: ResolveMonthWindowOptions = {}
): MonthWindow {
  const start = parseMonthKeyOrThrow(windowStart);
  const end = parseMonthKeyOrThrow(windowEnd);
  const vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY;

  const sources = new Map<MonthKey, MonthSourceFile[]>();
  const errors: UnrecognizedMonthTokenError[] = [];

  for (const fileName of Array.from(fileNames).filter(isSourceFile).sort()) {
    const result = monthKeyFromFileName(fileName, start, vocabulary);
    if (result instanceof UnrecognizedMonthTokenError) {
      console.warn('[resolveMonthWindow]', result.message);
      errors.push(result);
      continue;
    }
    if (compareMonthKeys(result, start) < 0 || compareMonthKeys(result, end) > 0) continue;
    const list = sources.get(result) ?? [];
    list.push({ fileName, kind: classifySource(fileName) });
    sources.set(result, list);
  }

  const months = Array.from(sources.keys()).sort(compareMonthKeys);
  const ordered = new Map<MonthKey, MonthSourceFile[]>();
  for (const m of months) ordered.set(m, sources.get(m) ?? []);
  return { months, sources: ordered, errors };
}

/**
 * Resolve the month window from the files in sourceDirectory.
 * Throws DataLoadError when the directory cannot be read.
 */
export async function resolveMonthWindow(
  sourceDirectory: string,
  windowStart: MonthKey,
  windowEnd: MonthKey,
  options: ResolveMonthWindowOptions = {}
): Promise<MonthWindow> {
  let fileNames: string[];
  try {
    fileNames = await readdir(sourceDirectory);
  } catch (e) {
    throw new DataLoadError(`Cannot read source directory ${sourceDirectory}`, sourceDirectory, e);
  }
  return resolveMonthKeysFromNames(fileNames, windowStart, windowEnd, options);
}

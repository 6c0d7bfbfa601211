/**
 * Month discovery from source file names: month tokens, year inference, window bounds and
 * unrecognized files.
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { DataLoadError } from '@/lib/errors';
import {
  monthKeyFromFileName,
  resolveMonthKeysFromNames,
  resolveMonthWindow,
  UnrecognizedMonthTokenError,
} from '@/lib/window/resolveMonthWindow';

const FILES = [
  'basic manpower data july.xlsx',
  'attendance data july.csv',
  'basic manpower data august.xlsx',
  'basic manpower data september.xlsx',
  'readme.txt',
  '~$basic manpower data july.xlsx',
  'notes month.xlsx',
];

describe('monthKeyFromFileName', () => {
  it('reads English month names and infers the year from the window start', () => {
    expect(monthKeyFromFileName('basic manpower data july.xlsx', '2025-07')).toBe('2025-07');
    expect(monthKeyFromFileName('basic manpower data january.xlsx', '2025-07')).toBe('2026-01');
  });

  it('uses a year token when present', () => {
    expect(monthKeyFromFileName('data 2026 march.xlsx', '2025-07')).toBe('2026-03');
  });

  it('accepts YYYY_MM and YYYY-MM pairs', () => {
    expect(monthKeyFromFileName('hr_2025_09.xlsx', '2025-07')).toBe('2025-09');
    expect(monthKeyFromFileName('export 2025-10.csv', '2025-07')).toBe('2025-10');
  });

  it('prefers the month name over a numeric year and sequence suffix', () => {
    expect(monthKeyFromFileName('basic manpower data september 2025_1.xlsx', '2025-07')).toBe('2025-09');
    expect(monthKeyFromFileName('attendance data october_2025-02.csv', '2025-07')).toBe('2025-10');
  });

  it('reads Korean month tokens', () => {
    expect(monthKeyFromFileName('8월 인사 데이터.xlsx', '2025-07')).toBe('2025-08');
  });

  it('returns an UnrecognizedMonthTokenError naming the file and token', () => {
    const result = monthKeyFromFileName('notes month.xlsx', '2025-07');
    expect(result).toBeInstanceOf(UnrecognizedMonthTokenError);
    if (result instanceof UnrecognizedMonthTokenError) {
      expect(result.fileName).toBe('notes month.xlsx');
      expect(result.token).toBe('month');
    }
  });
});

describe('resolveMonthKeysFromNames', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
  });

  it('returns ascending months inside the window with their classified sources', () => {
    const window = resolveMonthKeysFromNames(FILES, '2025-07', '2025-08');
    expect(window.months).toEqual(['2025-07', '2025-08']);
    expect(window.sources.get('2025-07')).toEqual([
      { fileName: 'attendance data july.csv', kind: 'attendance' },
      { fileName: 'basic manpower data july.xlsx', kind: 'employees' },
    ]);
    expect(window.sources.get('2025-08')).toEqual([{ fileName: 'basic manpower data august.xlsx', kind: 'employees' }]);
    expect(window.sources.has('2025-09')).toBe(false);
  });

  it('records and logs unrecognized files without stopping', () => {
    const window = resolveMonthKeysFromNames(FILES, '2025-07', '2025-12');
    expect(window.months).toEqual(['2025-07', '2025-08', '2025-09']);
    expect(window.errors.map((e) => e.fileName)).toEqual(['notes month.xlsx']);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('is deterministic regardless of input order', () => {
    const a = resolveMonthKeysFromNames(FILES, '2025-07', '2025-12');
    const b = resolveMonthKeysFromNames(FILES.slice().reverse(), '2025-07', '2025-12');
    expect(b.months).toEqual(a.months);
    expect(Array.from(b.sources.entries())).toEqual(Array.from(a.sources.entries()));
  });

  it('yields an empty sequence for empty input', () => {
    const window = resolveMonthKeysFromNames([], '2025-07', '2025-12');
    expect(window.months).toEqual([]);
    expect(window.sources.size).toBe(0);
    expect(window.errors).toEqual([]);
  });
});

describe('resolveMonthWindow', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'hr-window-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists the directory and resolves months', async () => {
    await writeFile(path.join(dir, 'basic manpower data august.xlsx'), '');
    await writeFile(path.join(dir, 'basic manpower data july.xlsx'), '');
    const window = await resolveMonthWindow(dir, '2025-07', '2025-12');
    expect(window.months).toEqual(['2025-07', '2025-08']);
  });

  it('throws DataLoadError for a missing directory', async () => {
    await expect(resolveMonthWindow(path.join(dir, 'missing'), '2025-07', '2025-12')).rejects.toBeInstanceOf(
      DataLoadError
    );
  });
});

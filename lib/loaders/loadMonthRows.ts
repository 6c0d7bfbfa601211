/**
 * Read one month's source files (xlsx, xlsm or csv) into raw rows for loadRecordStore.
 * Columns are located by header text; English, Vietnamese and Korean export headers are accepted.
 * Cell values are passed through untouched: normalization and validation happen in the record store.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import * as XLSX from 'xlsx';
import { DataLoadError } from '@/lib/errors';
import type { RawAttendanceRow, RawEmployeeRow } from '@/lib/records/types';
import type { MonthSourceFile } from '@/lib/window/resolveMonthWindow';

export type MonthRows = {
  employees: RawEmployeeRow[];
  attendance: RawAttendanceRow[];
};

function normalizeHeader(v: unknown): string {
  return String(v ?? '').trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Exact header match first, then a header that contains a candidate. Blank headers never match. */
export function findCol(header: unknown[], ...candidates: string[]): number {
  const lower = header.map(normalizeHeader);
  for (const c of candidates) {
    const i = lower.indexOf(c);
    if (i >= 0) return i;
  }
  for (const c of candidates) {
    const i = lower.findIndex((h) => h !== '' && h.includes(c));
    if (i >= 0) return i;
  }
  return -1;
}

function isBlankRow(row: unknown[]): boolean {
  return row.every((c) => c == null || String(c).trim() === '');
}

function at(row: unknown[], col: number): unknown {
  return col >= 0 ? row[col] : undefined;
}

/** Header row is the first non-blank row; data rows follow it. */
function splitHeader(rows: unknown[][]): { header: unknown[]; body: unknown[][] } {
  const start = rows.findIndex((r) => !isBlankRow(r));
  if (start < 0) return { header: [], body: [] };
  return { header: rows[start], body: rows.slice(start + 1).filter((r) => !isBlankRow(r)) };
}

export function parseEmployeeSheet(rows: unknown[][], source = 'employees'): RawEmployeeRow[] {
  const { header, body } = splitHeader(rows);
  if (body.length === 0) return [];

  const idCol = findCol(header, 'employee no', 'employee id', 'emp no', 'empid', 'id no', 'id', '사번', 'mã nhân viên');
  if (idCol < 0) throw new DataLoadError(`No employee id column in ${source}`, source);
  const nameCol = findCol(header, 'full name', 'employee name', 'name', '이름', 'họ tên');
  const positionCol = findCol(header, 'qip position 1st name', 'position', '직급', 'chức vụ');
  const teamCol = findCol(header, 'team', 'team name', '팀', 'bộ phận');
  const roleTypeCol = findCol(header, 'role type std', 'role type', '직원 type');
  const joinCol = findCol(header, 'entrance date', 'join date', 'hire date', '입사일', 'ngày vào làm');
  const resignCol = findCol(header, 'stop working date', 'resignation date', '퇴사일', 'ngày nghỉ việc');
  const assignCol = findCol(header, 'assignment date', 'assigned date', '배정일');
  const managerCol = findCol(header, 'manager id', 'direct boss id', 'boss id');
  const rateCol = findCol(header, 'attendance rate', '출근율');
  const workingDaysCol = findCol(header, 'actual working days', 'actual work days', 'working days', '근무일수');
  const trainingCol = findCol(header, 'training participation', 'training');
  const feedbackCol = findCol(header, 'mentor feedback', 'feedback');

  return body.map((row) => ({
    id: at(row, idCol),
    name: at(row, nameCol),
    position: at(row, positionCol),
    team: at(row, teamCol),
    roleType: at(row, roleTypeCol),
    joinDate: at(row, joinCol),
    resignationDate: at(row, resignCol),
    assignmentDate: at(row, assignCol),
    managerId: at(row, managerCol),
    attendanceRate: at(row, rateCol),
    actualWorkingDays: at(row, workingDaysCol),
    trainingParticipationPct: at(row, trainingCol),
    mentorFeedback: at(row, feedbackCol),
  }));
}

export function parseAttendanceSheet(rows: unknown[][], source = 'attendance'): RawAttendanceRow[] {
  const { header, body } = splitHeader(rows);
  if (body.length === 0) return [];

  const idCol = findCol(header, 'id no', 'employee no', 'employee id', 'empid', 'id', '사번');
  if (idCol < 0) throw new DataLoadError(`No employee id column in ${source}`, source);
  const dateCol = findCol(header, 'work date', 'date', '근무일자', 'ngày');
  const statusCol = findCol(header, 'compadd', 'status', '상태', 'trạng thái');
  const hoursCol = findCol(header, 'worked hours', 'working hours', 'work time', 'hours', '근무시간');
  const reasonCol = findCol(header, 'reason description', 'reason', '사유', 'lý do');

  return body.map((row) => ({
    employeeId: at(row, idCol),
    workDate: at(row, dateCol),
    status: at(row, statusCol),
    workedHours: at(row, hoursCol),
    reason: at(row, reasonCol),
  }));
}

/**
 * First sheet as a row matrix. CSV text is kept as text so dates are not reinterpreted in local
 * time; workbook dates arrive as serial numbers.
 */
export function readSheetRows(buffer: Buffer, fileName: string): unknown[][] {
  let workbook: XLSX.WorkBook;
  try {
    const isCsv = path.extname(fileName).toLowerCase() === '.csv';
    workbook = XLSX.read(buffer, { type: 'buffer', raw: isCsv, cellDates: false });
  } catch (e) {
    throw new DataLoadError(`Cannot parse ${fileName}`, fileName, e);
  }
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName != null ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) throw new DataLoadError(`No worksheet in ${fileName}`, fileName);
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '', raw: true });
}

/** Reads every file of one month, in the order given, and concatenates rows per kind. */
export async function loadMonthRows(directory: string, sources: readonly MonthSourceFile[]): Promise<MonthRows> {
  const out: MonthRows = { employees: [], attendance: [] };
  for (const source of sources) {
    const filePath = path.join(directory, source.fileName);
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (e) {
      throw new DataLoadError(`Cannot read ${filePath}`, source.fileName, e);
    }
    const rows = readSheetRows(buffer, source.fileName);
    if (source.kind === 'attendance') {
      out.attendance.push(...parseAttendanceSheet(rows, source.fileName));
    } else {
      out.employees.push(...parseEmployeeSheet(rows, source.fileName));
    }
  }
  return out;
}

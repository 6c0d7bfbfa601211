/**
 * RecordStore: normalized, read-only view of one month's employee and attendance rows.
 * Validation problems become ErrorFindings; load never throws for bad data, only for unreadable input.
 */

import { DEFAULT_POLICY, type HrPolicy } from '@/lib/config/policy';
import { DEFAULT_VOCABULARY, type Vocabulary } from '@/lib/config/vocabulary';
import { DataLoadError } from '@/lib/errors';
import { getBusinessDaysInMonth, getMonthEndDate, type MonthKey } from '@/lib/time';
import { parseFlexibleDate } from '@/lib/time/parse';
import {
  cellToNumber,
  cellToString,
  classifyAttendanceStatus,
  isKnownPosition,
  lookupTeam,
  parseMentorFeedback,
  parseRoleType,
} from './normalize';
import type {
  AttendanceRecord,
  EmployeeRecord,
  ErrorFinding,
  FindingCategory,
  FindingSeverity,
  RawAttendanceRow,
  RawEmployeeRow,
} from './types';

const EMPTY_ATTENDANCE: readonly AttendanceRecord[] = Object.freeze([]);

export class RecordStore {
  constructor(
    public readonly month: MonthKey,
    private readonly employeesById: ReadonlyMap<string, EmployeeRecord>,
    private readonly attendanceById: ReadonlyMap<string, readonly AttendanceRecord[]>,
    public readonly loadFindings: readonly ErrorFinding[]
  ) {}

  /** Employees in source order. */
  get employees(): EmployeeRecord[] {
    return Array.from(this.employeesById.values());
  }

  get attendance(): AttendanceRecord[] {
    return Array.from(this.attendanceById.values()).flat();
  }

  get size(): number {
    return this.employeesById.size;
  }

  employee(id: string): EmployeeRecord | undefined {
    return this.employeesById.get(id);
  }

  attendanceFor(id: string): readonly AttendanceRecord[] {
    return this.attendanceById.get(id) ?? EMPTY_ATTENDANCE;
  }
}

export type LoadRecordStoreOptions = {
  vocabulary?: Vocabulary;
  policy?: HrPolicy;
};

export type LoadRecordStoreResult = {
  store: RecordStore;
  findings: ErrorFinding[];
};

export function loadRecordStore(
  month: MonthKey,
  rawEmployeeRows: readonly RawEmployeeRow[],
  rawAttendanceRows: readonly RawAttendanceRow[],
  options: LoadRecordStoreOptions = {}
): LoadRecordStoreResult {
  if (!Array.isArray(rawEmployeeRows)) {
    throw new DataLoadError(`Employee rows for ${month} are not a row list`, month);
  }
  if (!Array.isArray(rawAttendanceRows)) {
    throw new DataLoadError(`Attendance rows for ${month} are not a row list`, month);
  }
  const vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY;
  const policy = options.policy ?? DEFAULT_POLICY;
  const monthEnd = getMonthEndDate(month);
  const businessDays = getBusinessDaysInMonth(month, policy.workWeekDays);

  const findings: ErrorFinding[] = [];
  const add = (
    severity: FindingSeverity,
    category: FindingCategory,
    employeeIds: string[],
    description: string,
    detail: ErrorFinding['detail'] = {}
  ) => {
    findings.push({ severity, category, month, employeeIds, description, detail });
  };

  const employees = new Map<string, EmployeeRecord>();

  rawEmployeeRows.forEach((row, index) => {
    const rowNumber = index + 1;
    const id = cellToString(row.id);
    const name = cellToString(row.name);
    if (!id) {
      add('critical', 'missing-employee-id', [], 'Employee row has no employee id', { row: rowNumber, name });
      return;
    }
    if (employees.has(id)) {
      add('critical', 'duplicate-employee-id', [id], `Duplicate employee id ${id}`, { row: rowNumber, name });
      return;
    }

    const dates: Record<'joinDate' | 'resignationDate' | 'assignmentDate', string | null> = {
      joinDate: parseFlexibleDate(row.joinDate),
      resignationDate: parseFlexibleDate(row.resignationDate),
      assignmentDate: parseFlexibleDate(row.assignmentDate),
    };
    for (const field of ['joinDate', 'resignationDate', 'assignmentDate'] as const) {
      const raw = cellToString(row[field]);
      if (dates[field] == null && (raw !== '' || field === 'joinDate')) {
        add('critical', 'invalid-date', [id], `${field} is missing or unreadable`, { field, value: raw });
      }
    }
    const { joinDate, resignationDate, assignmentDate } = dates;
    if (joinDate && resignationDate && resignationDate < joinDate) {
      add('critical', 'temporal-inconsistency', [id], 'Resignation date is before join date', {
        rule: 'resignation-before-join',
        joinDate,
        resignationDate,
      });
    }
    if (joinDate && assignmentDate && assignmentDate < joinDate) {
      add('critical', 'temporal-inconsistency', [id], 'Assignment date is before join date', {
        rule: 'assignment-before-join',
        joinDate,
        assignmentDate,
      });
    }
    if (joinDate && joinDate > monthEnd) {
      add('critical', 'temporal-inconsistency', [id], 'Join date is after the end of the loaded month', {
        rule: 'join-after-month-end',
        joinDate,
        monthEnd,
      });
    }

    const positionText = cellToString(row.position);
    if (!positionText || !isKnownPosition(vocabulary, positionText)) {
      add('warning', 'unknown-position', [id], positionText ? 'Position is not in the position vocabulary' : 'Position is missing', {
        position: positionText,
      });
    }

    const teamLookup = lookupTeam(vocabulary, row.team);
    let team: string | null = null;
    switch (teamLookup.kind) {
      case 'missing':
        add('warning', 'team-missing', [id], 'Team assignment is missing');
        break;
      case 'synonym':
        team = teamLookup.team;
        add('warning', 'team-not-normalized', [id], `Team "${teamLookup.raw}" is a synonym of ${teamLookup.team}`, {
          raw: teamLookup.raw,
          team: teamLookup.team,
        });
        break;
      case 'unknown':
        team = teamLookup.team;
        add('info', 'unknown-team', [id], `Team ${teamLookup.team} is not a known team`, { team: teamLookup.team });
        break;
      case 'canonical':
        team = teamLookup.team;
        break;
    }

    const reportedAttendanceRate = cellToNumber(row.attendanceRate);
    if (reportedAttendanceRate != null && (reportedAttendanceRate < 0 || reportedAttendanceRate > 100)) {
      add('warning', 'attendance-range', [id], 'Attendance rate is outside 0-100', {
        rule: 'attendance-rate',
        value: reportedAttendanceRate,
      });
    }
    const actualWorkingDays = cellToNumber(row.actualWorkingDays);
    if (actualWorkingDays != null && actualWorkingDays > businessDays) {
      add('warning', 'attendance-range', [id], 'Working days exceed the business days of the month', {
        rule: 'working-days',
        value: actualWorkingDays,
        businessDays,
      });
    }

    const managerId = cellToString(row.managerId);
    employees.set(
      id,
      Object.freeze({
        id,
        name,
        position: positionText || null,
        team,
        roleType: parseRoleType(row.roleType),
        joinDate,
        resignationDate,
        assignmentDate,
        managerId: managerId || null,
        reportedAttendanceRate,
        actualWorkingDays,
        trainingParticipationPct: cellToNumber(row.trainingParticipationPct),
        mentorFeedback: parseMentorFeedback(row.mentorFeedback),
      })
    );
  });

  const attendance = new Map<string, AttendanceRecord[]>();
  const orphans = new Map<string, number>();
  const unknownStatuses = new Map<string, Set<string>>();
  const afterResignation = new Map<string, { count: number; firstDate: string }>();

  rawAttendanceRows.forEach((row, index) => {
    const employeeId = cellToString(row.employeeId);
    const employee = employees.get(employeeId);
    if (!employee) {
      orphans.set(employeeId, (orphans.get(employeeId) ?? 0) + 1);
      return;
    }
    const workDate = parseFlexibleDate(row.workDate);
    const status = classifyAttendanceStatus(vocabulary, row.status, row.reason);
    const workedHours = cellToNumber(row.workedHours) ?? 0;

    if (status === 'unknown') {
      const rawStatus = cellToString(row.status);
      const ids = unknownStatuses.get(rawStatus) ?? new Set<string>();
      ids.add(employeeId);
      unknownStatuses.set(rawStatus, ids);
    }
    if (workedHours < 0) {
      add('warning', 'attendance-range', [employeeId], 'Worked time is negative', {
        rule: 'worked-time',
        value: workedHours,
        row: index + 1,
      });
    }
    if (workDate && employee.resignationDate && workDate > employee.resignationDate) {
      const cur = afterResignation.get(employeeId);
      if (!cur) afterResignation.set(employeeId, { count: 1, firstDate: workDate });
      else {
        cur.count++;
        if (workDate < cur.firstDate) cur.firstDate = workDate;
      }
    }

    const list = attendance.get(employeeId) ?? [];
    list.push(Object.freeze({ employeeId, workDate, status, workedHours, reason: cellToString(row.reason) }));
    attendance.set(employeeId, list);
  });

  for (const [employeeId, records] of Array.from(attendance.entries())) {
    const workedDays = new Set(
      records.filter((r) => r.status === 'present' && r.workDate).map((r) => r.workDate)
    ).size;
    if (workedDays > businessDays) {
      add('warning', 'attendance-range', [employeeId], 'Attended days exceed the business days of the month', {
        rule: 'working-days',
        value: workedDays,
        businessDays,
      });
    }
  }
  for (const [employeeId, info] of Array.from(afterResignation.entries())) {
    const employee = employees.get(employeeId);
    add('warning', 'attendance-after-resignation', [employeeId], 'Attendance recorded after the resignation date', {
      resignationDate: employee?.resignationDate ?? null,
      firstDate: info.firstDate,
      count: info.count,
    });
  }
  for (const [employeeId, count] of Array.from(orphans.entries())) {
    add(
      'warning',
      'orphaned-attendance',
      employeeId ? [employeeId] : [],
      employeeId ? `Attendance for unknown employee ${employeeId} dropped` : 'Attendance rows without employee id dropped',
      { count }
    );
  }
  for (const [rawStatus, ids] of Array.from(unknownStatuses.entries())) {
    add('info', 'unknown-attendance-status', Array.from(ids), `Unrecognized attendance status "${rawStatus}"`, {
      status: rawStatus,
    });
  }

  const frozenFindings = Object.freeze(findings.slice());
  const store = new RecordStore(month, employees, attendance, frozenFindings);
  return { store, findings };
}

/**
 * Record types for one month snapshot: raw input rows, normalized records and validation findings.
 * No I/O here; the loader produces raw rows, loadRecordStore normalizes them.
 */

import type { IsoDate, MonthKey } from '@/lib/time';

export type MentorFeedback = 'positive' | 'neutral' | 'negative';

export const ROLE_TYPES = ['TYPE-1', 'TYPE-2', 'TYPE-3'] as const;

export type RoleType = (typeof ROLE_TYPES)[number];

/** Group label for employees without a team. */
export const UNASSIGNED_TEAM = 'UNASSIGNED';

/** One employee row as supplied by the loader. Cells are untyped spreadsheet values. */
export type RawEmployeeRow = {
  id: unknown;
  name?: unknown;
  position?: unknown;
  team?: unknown;
  roleType?: unknown;
  joinDate?: unknown;
  resignationDate?: unknown;
  assignmentDate?: unknown;
  managerId?: unknown;
  attendanceRate?: unknown;
  actualWorkingDays?: unknown;
  trainingParticipationPct?: unknown;
  mentorFeedback?: unknown;
};

export type RawAttendanceRow = {
  employeeId: unknown;
  workDate?: unknown;
  status?: unknown;
  workedHours?: unknown;
  reason?: unknown;
};

export type EmployeeRecord = {
  readonly id: string;
  readonly name: string;
  readonly position: string | null;
  /** Canonical team name, null when the source row has none. */
  readonly team: string | null;
  readonly roleType: RoleType | null;
  readonly joinDate: IsoDate | null;
  readonly resignationDate: IsoDate | null;
  readonly assignmentDate: IsoDate | null;
  readonly managerId: string | null;
  readonly reportedAttendanceRate: number | null;
  readonly actualWorkingDays: number | null;
  readonly trainingParticipationPct: number | null;
  readonly mentorFeedback: MentorFeedback | null;
};

export type AttendanceStatus =
  | 'present'
  | 'absence-authorized'
  | 'absence-unauthorized'
  | 'maternity-leave'
  | 'unknown';

export type AttendanceRecord = {
  readonly employeeId: string;
  readonly workDate: IsoDate | null;
  readonly status: AttendanceStatus;
  readonly workedHours: number;
  readonly reason: string;
};

export type FindingSeverity = 'critical' | 'warning' | 'info';

export type FindingCategory =
  | 'temporal-inconsistency'
  | 'invalid-date'
  | 'missing-employee-id'
  | 'duplicate-employee-id'
  | 'unknown-position'
  | 'team-missing'
  | 'team-not-normalized'
  | 'unknown-team'
  | 'attendance-range'
  | 'attendance-after-resignation'
  | 'orphaned-attendance'
  | 'unknown-attendance-status'
  | 'metric-calculation';

export type ErrorFinding = {
  severity: FindingSeverity;
  category: FindingCategory;
  month: MonthKey;
  employeeIds: string[];
  description: string;
  detail: Record<string, string | number | null>;
};

export const FINDING_SEVERITIES: readonly FindingSeverity[] = ['critical', 'warning', 'info'];

export function isAbsence(status: AttendanceStatus): boolean {
  return (
    status === 'absence-authorized' ||
    status === 'absence-unauthorized' ||
    status === 'maternity-leave'
  );
}

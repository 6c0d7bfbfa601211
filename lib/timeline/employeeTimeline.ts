/**
 * Employee timelines: per employee, one entry per month of the window.
 * An employee without a record in a month gets the NOT_IN_DATASET sentinel, which is distinct
 * from an in-dataset month with zero activity. Tenure is measured to each month's end date.
 */

import { DEFAULT_POLICY, type HrPolicy } from '@/lib/config/policy';
import {
  hiredInMonth,
  isActiveAtMonthEnd,
  isPostAssignmentResignation,
  resignedInMonth,
  tenureDaysAtMonthEnd,
} from '@/lib/metrics/employeeStatus';
import { ratePct } from '@/lib/metrics/metricEngine';
import type { RecordStore } from '@/lib/records/recordStore';
import { isAbsence, type EmployeeRecord, type FindingCategory, type MentorFeedback } from '@/lib/records/types';
import type { MonthKey } from '@/lib/time';

export type NotInDatasetEntry = { readonly kind: 'not-in-dataset' };

export type InDatasetEntry = {
  readonly kind: 'in-dataset';
  readonly team: string | null;
  readonly position: string | null;
  /** Employed at month end. */
  readonly active: boolean;
  readonly hiredThisMonth: boolean;
  readonly resignedThisMonth: boolean;
  readonly postAssignmentResignation: boolean;
  readonly tenureDays: number | null;
  /** From attendance records, else the reported rate when within 0-100, else null. */
  readonly attendanceRate: number | null;
  readonly attendanceRecords: number;
  readonly workedHours: number;
  readonly absences: number;
  readonly unauthorizedAbsences: number;
  readonly perfectAttendance: boolean;
  readonly trainingParticipationPct: number | null;
  readonly mentorFeedback: MentorFeedback | null;
  readonly findingCategories: readonly FindingCategory[];
};

export type TimelineEntry = NotInDatasetEntry | InDatasetEntry;

export type EmployeeTimeline = ReadonlyMap<MonthKey, TimelineEntry>;

export const NOT_IN_DATASET: NotInDatasetEntry = Object.freeze({ kind: 'not-in-dataset' });

export function isInDataset(entry: TimelineEntry | undefined): entry is InDatasetEntry {
  return entry?.kind === 'in-dataset';
}

function findingCategoriesByEmployee(store: RecordStore): Map<string, FindingCategory[]> {
  const out = new Map<string, FindingCategory[]>();
  for (const f of store.loadFindings) {
    for (const id of f.employeeIds) {
      const list = out.get(id) ?? [];
      if (!list.includes(f.category)) list.push(f.category);
      out.set(id, list);
    }
  }
  return out;
}

export function buildTimelineEntry(
  employee: EmployeeRecord,
  store: RecordStore,
  policy: HrPolicy,
  findingCategories: readonly FindingCategory[] = []
): InDatasetEntry {
  const month = store.month;
  const records = store.attendanceFor(employee.id);
  const absences = records.filter((r) => isAbsence(r.status)).length;
  const unauthorizedAbsences = records.filter((r) => r.status === 'absence-unauthorized').length;
  const workedHours = records.reduce((sum, r) => sum + (r.workedHours > 0 ? r.workedHours : 0), 0);
  const reported = employee.reportedAttendanceRate;
  const attendanceRate =
    records.length > 0
      ? ratePct(records.length - absences, records.length)
      : reported != null && reported >= 0 && reported <= 100
        ? reported
        : null;
  const active = isActiveAtMonthEnd(employee, month);

  return Object.freeze({
    kind: 'in-dataset',
    team: employee.team,
    position: employee.position,
    active,
    hiredThisMonth: hiredInMonth(employee, month),
    resignedThisMonth: resignedInMonth(employee, month),
    postAssignmentResignation: isPostAssignmentResignation(employee, month, policy),
    tenureDays: tenureDaysAtMonthEnd(employee, month),
    attendanceRate,
    attendanceRecords: records.length,
    workedHours: Math.round(workedHours * 100) / 100,
    absences,
    unauthorizedAbsences,
    perfectAttendance: active && records.length > 0 && absences === 0,
    trainingParticipationPct: employee.trainingParticipationPct,
    mentorFeedback: employee.mentorFeedback,
    findingCategories: Object.freeze(findingCategories.slice()),
  });
}

/**
 * Build timelines for every employee seen in any store. Stores must be in ascending month order;
 * every timeline has exactly one entry per store month.
 */
export function buildEmployeeTimelines(
  stores: readonly RecordStore[],
  policy: HrPolicy = DEFAULT_POLICY
): Map<string, EmployeeTimeline> {
  const employeeIds: string[] = [];
  const seen = new Set<string>();
  for (const store of stores) {
    for (const e of store.employees) {
      if (!seen.has(e.id)) {
        seen.add(e.id);
        employeeIds.push(e.id);
      }
    }
  }

  const timelines = new Map<string, Map<MonthKey, TimelineEntry>>();
  for (const id of employeeIds) timelines.set(id, new Map());

  for (const store of stores) {
    const categories = findingCategoriesByEmployee(store);
    for (const id of employeeIds) {
      const employee = store.employee(id);
      const entry = employee ? buildTimelineEntry(employee, store, policy, categories.get(id)) : NOT_IN_DATASET;
      timelines.get(id)?.set(store.month, entry);
    }
  }
  return timelines;
}

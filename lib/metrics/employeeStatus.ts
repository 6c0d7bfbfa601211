/**
 * Per-employee status as of a month: activity, tenure and in-month events.
 * Shared by the metric engine and the timeline builder so both count the same people.
 */

import type { HrPolicy } from '@/lib/config/policy';
import type { EmployeeRecord } from '@/lib/records/types';
import { daysBetween, getMonthEndDate, getMonthStartDate, isDateInMonth, type MonthKey } from '@/lib/time';

/** Employed on the given date: joined on or before it and not resigned before it. */
export function isEmployedOn(employee: EmployeeRecord, date: string): boolean {
  if (!employee.joinDate || employee.joinDate > date) return false;
  return !employee.resignationDate || employee.resignationDate >= date;
}

/** Active at month end: joined by month end and not resigned on or before it. */
export function isActiveAtMonthEnd(employee: EmployeeRecord, month: MonthKey): boolean {
  const monthEnd = getMonthEndDate(month);
  if (!employee.joinDate || employee.joinDate > monthEnd) return false;
  return !employee.resignationDate || employee.resignationDate > monthEnd;
}

export function isEmployedAtMonthStart(employee: EmployeeRecord, month: MonthKey): boolean {
  return isEmployedOn(employee, getMonthStartDate(month));
}

/** Tenure in days at month end, or at resignation when that comes first. Null without a join date. */
export function tenureDaysAtMonthEnd(employee: EmployeeRecord, month: MonthKey): number | null {
  if (!employee.joinDate) return null;
  const monthEnd = getMonthEndDate(month);
  const until =
    employee.resignationDate && employee.resignationDate < monthEnd ? employee.resignationDate : monthEnd;
  return Math.max(0, daysBetween(employee.joinDate, until));
}

export function hiredInMonth(employee: EmployeeRecord, month: MonthKey): boolean {
  return employee.joinDate != null && isDateInMonth(employee.joinDate, month);
}

export function resignedInMonth(employee: EmployeeRecord, month: MonthKey): boolean {
  return employee.resignationDate != null && isDateInMonth(employee.resignationDate, month);
}

/**
 * Resigned this month shortly after being put on the line.
 * Anchored at the assignment date when there is one (0 to under postAssignmentMaxDays), otherwise
 * at the join date: more than postAssignmentMinDays and at most postAssignmentMaxDays.
 */
export function isPostAssignmentResignation(employee: EmployeeRecord, month: MonthKey, policy: HrPolicy): boolean {
  if (!resignedInMonth(employee, month) || !employee.resignationDate) return false;
  if (employee.assignmentDate) {
    const days = daysBetween(employee.assignmentDate, employee.resignationDate);
    return days >= 0 && days < policy.postAssignmentMaxDays;
  }
  if (!employee.joinDate) return false;
  const days = daysBetween(employee.joinDate, employee.resignationDate);
  return days > policy.postAssignmentMinDays && days <= policy.postAssignmentMaxDays;
}

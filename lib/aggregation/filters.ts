/**
 * Composable employee predicates for AggregationIndex.filter.
 * All predicates are pure; month-dependent ones take the month they look at.
 */

import { UNASSIGNED_TEAM } from '@/lib/records/types';
import type { MonthKey } from '@/lib/time';
import { isInDataset, type InDatasetEntry } from '@/lib/timeline/employeeTimeline';
import type { AggregationIndex, EmployeePredicate } from './aggregationIndex';
import type { RiskBand } from './riskScore';
import type { AwardTier } from './tenureTier';

export const EMPLOYEE_FLAGS = [
  'in_dataset',
  'active',
  'hired_this_month',
  'resigned_this_month',
  'post_assignment_resignation',
  'under_new_hire_tenure',
  'long_term',
  'perfect_attendance',
  'has_absence',
  'has_unauthorized_absence',
  'has_data_error',
] as const;

export type EmployeeFlag = (typeof EMPLOYEE_FLAGS)[number];

export function isEmployeeFlag(v: unknown): v is EmployeeFlag {
  return typeof v === 'string' && EMPLOYEE_FLAGS.some((f) => f === v);
}

export const allOf =
  (...predicates: EmployeePredicate[]): EmployeePredicate =>
  (employee, timeline) =>
    predicates.every((p) => p(employee, timeline));

export const anyOf =
  (...predicates: EmployeePredicate[]): EmployeePredicate =>
  (employee, timeline) =>
    predicates.some((p) => p(employee, timeline));

export const not =
  (predicate: EmployeePredicate): EmployeePredicate =>
  (employee, timeline) =>
    !predicate(employee, timeline);

/** Case-insensitive match on id, name, position or team. */
export function matchesSearchText(text: string): EmployeePredicate {
  const needle = text.trim().toLowerCase();
  return (employee) => {
    if (!needle) return true;
    return [employee.id, employee.name, employee.position ?? '', employee.team ?? '']
      .some((field) => field.toLowerCase().includes(needle));
  };
}

/** Team as of the given month (employees absent that month never match). */
export function inTeam(team: string, month: MonthKey): EmployeePredicate {
  return (_employee, timeline) => {
    const entry = timeline.get(month);
    return isInDataset(entry) && (entry.team ?? UNASSIGNED_TEAM) === team;
  };
}

export function hasAwardTier(index: AggregationIndex, tier: AwardTier, month: MonthKey): EmployeePredicate {
  return (employee) => index.tenureAwardTier(employee.id, month) === tier;
}

export function inRiskBand(index: AggregationIndex, band: RiskBand, month: MonthKey): EmployeePredicate {
  return (employee) => index.riskBand(employee.id, month) === band;
}

function flagHolds(flag: EmployeeFlag, entry: InDatasetEntry, index: AggregationIndex): boolean {
  switch (flag) {
    case 'in_dataset':
      return true;
    case 'active':
      return entry.active;
    case 'hired_this_month':
      return entry.hiredThisMonth;
    case 'resigned_this_month':
      return entry.resignedThisMonth;
    case 'post_assignment_resignation':
      return entry.postAssignmentResignation;
    case 'under_new_hire_tenure':
      return entry.active && entry.tenureDays != null && entry.tenureDays < index.policy.newHireTenureDays;
    case 'long_term':
      return entry.active && entry.tenureDays != null && entry.tenureDays >= index.policy.longTermTenureDays;
    case 'perfect_attendance':
      return entry.perfectAttendance;
    case 'has_absence':
      return entry.absences > 0;
    case 'has_unauthorized_absence':
      return entry.unauthorizedAbsences > 0;
    case 'has_data_error':
      return entry.findingCategories.length > 0;
  }
}

/** Timeline flag as of the given month; never true for a month the employee is not in the dataset. */
export function hasFlag(index: AggregationIndex, flag: EmployeeFlag, month: MonthKey): EmployeePredicate {
  return (_employee, timeline) => {
    const entry = timeline.get(month);
    return isInDataset(entry) && flagHolds(flag, entry, index);
  };
}

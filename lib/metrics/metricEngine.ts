/**
 * Metric engine: fixed per-month metric schema computed from one RecordStore.
 * Rates are percentages with one decimal over the current month's records only; a zero
 * denominator yields 0. Attendance-based rates count only records of employees active at
 * month end. A metric that throws degrades to 0 and is reported as a finding.
 */

import { DEFAULT_POLICY, type HrPolicy } from '@/lib/config/policy';
import type { RecordStore } from '@/lib/records/recordStore';
import {
  isAbsence,
  ROLE_TYPES,
  UNASSIGNED_TEAM,
  type AttendanceRecord,
  type EmployeeRecord,
  type ErrorFinding,
  type RoleType,
} from '@/lib/records/types';
import type { MonthKey } from '@/lib/time';
import {
  hiredInMonth,
  isActiveAtMonthEnd,
  isEmployedAtMonthStart,
  isPostAssignmentResignation,
  resignedInMonth,
  tenureDaysAtMonthEnd,
} from './employeeStatus';

export const METRIC_KEYS = [
  'total_employees',
  'absence_rate',
  'absence_rate_excl_maternity',
  'unauthorized_absence_rate',
  'attendance_rate',
  'resignation_rate',
  'retention_rate',
  'recent_hires',
  'recent_resignations',
  'under_60_days',
  'post_assignment_resignations',
  'perfect_attendance',
  'long_term_employees',
  'average_tenure_days',
  'tenure_under_1yr',
  'tenure_1_to_3yr',
  'tenure_3_to_5yr',
  'tenure_over_5yr',
  'type1_count',
  'type2_count',
  'type3_count',
  'maternity_leave_count',
  'data_errors',
] as const;

export type MetricKey = (typeof METRIC_KEYS)[number];

export type MetricUnit = 'count' | 'percent' | 'days';

export const METRIC_UNITS: Record<MetricKey, MetricUnit> = {
  total_employees: 'count',
  absence_rate: 'percent',
  absence_rate_excl_maternity: 'percent',
  unauthorized_absence_rate: 'percent',
  attendance_rate: 'percent',
  resignation_rate: 'percent',
  retention_rate: 'percent',
  recent_hires: 'count',
  recent_resignations: 'count',
  under_60_days: 'count',
  post_assignment_resignations: 'count',
  perfect_attendance: 'count',
  long_term_employees: 'count',
  average_tenure_days: 'days',
  tenure_under_1yr: 'count',
  tenure_1_to_3yr: 'count',
  tenure_3_to_5yr: 'count',
  tenure_over_5yr: 'count',
  type1_count: 'count',
  type2_count: 'count',
  type3_count: 'count',
  maternity_leave_count: 'count',
  data_errors: 'count',
};

export function isMetricKey(v: unknown): v is MetricKey {
  return typeof v === 'string' && METRIC_KEYS.some((k) => k === v);
}

export type MetricValues = Record<MetricKey, number>;

const ZERO_VALUES: MetricValues = {
  total_employees: 0,
  absence_rate: 0,
  absence_rate_excl_maternity: 0,
  unauthorized_absence_rate: 0,
  attendance_rate: 0,
  resignation_rate: 0,
  retention_rate: 0,
  recent_hires: 0,
  recent_resignations: 0,
  under_60_days: 0,
  post_assignment_resignations: 0,
  perfect_attendance: 0,
  long_term_employees: 0,
  average_tenure_days: 0,
  tenure_under_1yr: 0,
  tenure_1_to_3yr: 0,
  tenure_3_to_5yr: 0,
  tenure_over_5yr: 0,
  type1_count: 0,
  type2_count: 0,
  type3_count: 0,
  maternity_leave_count: 0,
  data_errors: 0,
};

export function emptyMetricValues(): MetricValues {
  return { ...ZERO_VALUES };
}

/** Rates that are also computed per team and per role type. */
export const GROUP_RATE_KEYS = ['resignation_rate', 'absence_rate_excl_maternity', 'unauthorized_absence_rate'] as const;

export type GroupRateKey = (typeof GROUP_RATE_KEYS)[number];

export function isGroupRateKey(v: unknown): v is GroupRateKey {
  return typeof v === 'string' && GROUP_RATE_KEYS.some((k) => k === v);
}

export const GROUP_DIMENSIONS = ['team', 'role_type'] as const;

export type GroupDimension = (typeof GROUP_DIMENSIONS)[number];

export function isGroupDimension(v: unknown): v is GroupDimension {
  return typeof v === 'string' && GROUP_DIMENSIONS.some((d) => d === v);
}

export type GroupRates = {
  readonly group: string;
  /** Members active at month end. */
  readonly headcount: number;
  readonly rates: Readonly<Record<GroupRateKey, number>>;
};

export type MetricSnapshot = {
  readonly month: MonthKey;
  readonly values: Readonly<MetricValues>;
  /** Teams sorted by name; role types always TYPE-1..TYPE-3. */
  readonly groups: Readonly<Record<GroupDimension, readonly GroupRates[]>>;
  /** Findings raised while computing (metric failures); load findings stay on the store. */
  readonly findings: readonly ErrorFinding[];
};

export class MetricCalculationError extends Error {
  constructor(
    public readonly metric: MetricKey,
    public readonly month: MonthKey,
    public readonly cause?: unknown
  ) {
    super(`Metric ${metric} failed for ${month}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'MetricCalculationError';
  }
}

export type MetricContext = {
  store: RecordStore;
  month: MonthKey;
  policy: HrPolicy;
  /** Employees active at month end. */
  active: EmployeeRecord[];
  /** Attendance records of the active employees. */
  activeAttendance: AttendanceRecord[];
};

export type MetricCalculator = (ctx: MetricContext) => number;

/** Percentage with one decimal; 0 when the denominator is 0. */
export function ratePct(numerator: number, denominator: number): number {
  if (!denominator) return 0;
  return Math.round((numerator / denominator) * 1000) / 10;
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

function countWhere<T>(list: readonly T[], predicate: (item: T) => boolean): number {
  let n = 0;
  for (const item of list) if (predicate(item)) n++;
  return n;
}

function attendanceOf(store: RecordStore, employees: readonly EmployeeRecord[]): AttendanceRecord[] {
  return employees.flatMap((e) => store.attendanceFor(e.id));
}

function absenceRateOf(records: readonly AttendanceRecord[]): number {
  return ratePct(countWhere(records, (r) => isAbsence(r.status)), records.length);
}

function absenceRateExclMaternityOf(records: readonly AttendanceRecord[]): number {
  const maternity = countWhere(records, (r) => r.status === 'maternity-leave');
  const absences = countWhere(records, (r) => isAbsence(r.status));
  return ratePct(absences - maternity, records.length - maternity);
}

function unauthorizedRateOf(records: readonly AttendanceRecord[]): number {
  return ratePct(countWhere(records, (r) => r.status === 'absence-unauthorized'), records.length);
}

/** Average of month-start and month-end headcount. */
function averageHeadcount(employees: readonly EmployeeRecord[], activeCount: number, month: MonthKey): number {
  return (countWhere(employees, (e) => isEmployedAtMonthStart(e, month)) + activeCount) / 2;
}

function resignationRateOf(employees: readonly EmployeeRecord[], activeCount: number, month: MonthKey): number {
  return ratePct(countWhere(employees, (e) => resignedInMonth(e, month)), averageHeadcount(employees, activeCount, month));
}

function perfectAttendance(ctx: MetricContext): number {
  return countWhere(ctx.active, (e) => {
    const records = ctx.store.attendanceFor(e.id);
    return records.length > 0 && !records.some((r) => isAbsence(r.status));
  });
}

function activeTenures(ctx: MetricContext): number[] {
  return ctx.active.map((e) => tenureDaysAtMonthEnd(e, ctx.month)).filter((t): t is number => t != null);
}

function averageTenureDays(ctx: MetricContext): number {
  const tenures = activeTenures(ctx);
  if (tenures.length === 0) return 0;
  return round1(tenures.reduce((a, b) => a + b, 0) / tenures.length);
}

/** Active employees whose tenure at month end falls in [minDays, maxDays). */
function tenureBucket(minDays: number, maxDays: number): MetricCalculator {
  return (ctx) => countWhere(activeTenures(ctx), (t) => t >= minDays && t < maxDays);
}

function roleTypeCount(roleType: RoleType): MetricCalculator {
  return (ctx) => countWhere(ctx.active, (e) => e.roleType === roleType);
}

export const METRIC_CALCULATORS: Record<MetricKey, MetricCalculator> = {
  total_employees: (ctx) => ctx.active.length,
  absence_rate: (ctx) => absenceRateOf(ctx.activeAttendance),
  absence_rate_excl_maternity: (ctx) => absenceRateExclMaternityOf(ctx.activeAttendance),
  unauthorized_absence_rate: (ctx) => unauthorizedRateOf(ctx.activeAttendance),
  attendance_rate: (ctx) => (ctx.activeAttendance.length ? round1(100 - absenceRateOf(ctx.activeAttendance)) : 0),
  resignation_rate: (ctx) => resignationRateOf(ctx.store.employees, ctx.active.length, ctx.month),
  retention_rate: (ctx) => {
    const employees = ctx.store.employees;
    if (averageHeadcount(employees, ctx.active.length, ctx.month) === 0) return 0;
    return round1(100 - resignationRateOf(employees, ctx.active.length, ctx.month));
  },
  recent_hires: (ctx) => countWhere(ctx.store.employees, (e) => hiredInMonth(e, ctx.month)),
  recent_resignations: (ctx) => countWhere(ctx.store.employees, (e) => resignedInMonth(e, ctx.month)),
  under_60_days: (ctx) =>
    countWhere(ctx.active, (e) => {
      const tenure = tenureDaysAtMonthEnd(e, ctx.month);
      return tenure != null && tenure < ctx.policy.newHireTenureDays;
    }),
  post_assignment_resignations: (ctx) =>
    countWhere(ctx.store.employees, (e) => isPostAssignmentResignation(e, ctx.month, ctx.policy)),
  perfect_attendance: perfectAttendance,
  long_term_employees: (ctx) =>
    countWhere(ctx.active, (e) => {
      const tenure = tenureDaysAtMonthEnd(e, ctx.month);
      return tenure != null && tenure >= ctx.policy.longTermTenureDays;
    }),
  average_tenure_days: averageTenureDays,
  tenure_under_1yr: tenureBucket(0, 365),
  tenure_1_to_3yr: tenureBucket(365, 1095),
  tenure_3_to_5yr: tenureBucket(1095, 1825),
  tenure_over_5yr: tenureBucket(1825, Infinity),
  type1_count: roleTypeCount('TYPE-1'),
  type2_count: roleTypeCount('TYPE-2'),
  type3_count: roleTypeCount('TYPE-3'),
  maternity_leave_count: (ctx) =>
    new Set(ctx.store.attendance.filter((r) => r.status === 'maternity-leave').map((r) => r.employeeId)).size,
  data_errors: (ctx) => ctx.store.loadFindings.length,
};

function groupRatesOf(store: RecordStore, group: string, members: readonly EmployeeRecord[], month: MonthKey): GroupRates {
  const active = members.filter((e) => isActiveAtMonthEnd(e, month));
  const records = attendanceOf(store, active);
  return Object.freeze({
    group,
    headcount: active.length,
    rates: Object.freeze({
      resignation_rate: resignationRateOf(members, active.length, month),
      absence_rate_excl_maternity: absenceRateExclMaternityOf(records),
      unauthorized_absence_rate: unauthorizedRateOf(records),
    }),
  });
}

function computeGroups(store: RecordStore, month: MonthKey): Record<GroupDimension, readonly GroupRates[]> {
  const byTeam = new Map<string, EmployeeRecord[]>();
  for (const e of store.employees) {
    const team = e.team ?? UNASSIGNED_TEAM;
    byTeam.set(team, [...(byTeam.get(team) ?? []), e]);
  }
  const teams = Array.from(byTeam.keys()).sort();
  return {
    team: Object.freeze(teams.map((team) => groupRatesOf(store, team, byTeam.get(team) ?? [], month))),
    role_type: Object.freeze(
      ROLE_TYPES.map((t) => groupRatesOf(store, t, store.employees.filter((e) => e.roleType === t), month))
    ),
  };
}

export type ComputeMetricOptions = {
  policy?: HrPolicy;
  /** Replace individual calculators (e.g. a stricter definition for one run). */
  calculators?: Partial<Record<MetricKey, MetricCalculator>>;
};

/** The returned snapshot is frozen. */
export function computeMetricSnapshot(store: RecordStore, options: ComputeMetricOptions = {}): MetricSnapshot {
  const policy = options.policy ?? DEFAULT_POLICY;
  const month = store.month;
  const active = store.employees.filter((e) => isActiveAtMonthEnd(e, month));
  const ctx: MetricContext = { store, month, policy, active, activeAttendance: attendanceOf(store, active) };

  const values = emptyMetricValues();
  const findings: ErrorFinding[] = [];
  for (const key of METRIC_KEYS) {
    const calculate = options.calculators?.[key] ?? METRIC_CALCULATORS[key];
    try {
      const value = calculate(ctx);
      if (!Number.isFinite(value)) throw new Error(`non-finite value ${value}`);
      values[key] = value;
    } catch (e) {
      const err = new MetricCalculationError(key, month, e);
      console.warn('[computeMetricSnapshot]', err.message);
      findings.push({
        severity: 'warning',
        category: 'metric-calculation',
        month,
        employeeIds: [],
        description: err.message,
        detail: { metric: key },
      });
    }
  }
  return Object.freeze({
    month,
    values: Object.freeze(values),
    groups: Object.freeze(computeGroups(store, month)),
    findings: Object.freeze(findings),
  });
}

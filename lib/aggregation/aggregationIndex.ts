/**
 * AggregationIndex: read-only query facade over the run's metric snapshots and employee timelines.
 * Built once after every month is computed; never mutates what it was given.
 */

import { DEFAULT_POLICY, type HrPolicy } from '@/lib/config/policy';
import type { GroupDimension, GroupRateKey, MetricKey, MetricSnapshot, MetricValues } from '@/lib/metrics/metricEngine';
import type { RecordStore } from '@/lib/records/recordStore';
import { UNASSIGNED_TEAM, type EmployeeRecord, type ErrorFinding } from '@/lib/records/types';
import type { MonthKey } from '@/lib/time';
import { isInDataset, NOT_IN_DATASET, type EmployeeTimeline, type InDatasetEntry, type TimelineEntry } from '@/lib/timeline/employeeTimeline';
import { computeRiskScore, riskBandFromScore, type RiskBand } from './riskScore';
import { awardTierFromTenure, type AwardTier } from './tenureTier';

export const EMPLOYEE_METRIC_KEYS = [
  'attendance_rate',
  'worked_hours',
  'absences',
  'unauthorized_absences',
  'tenure_days',
  'training_participation',
  'risk_score',
] as const;

export type EmployeeMetricKey = (typeof EMPLOYEE_METRIC_KEYS)[number];

export function isEmployeeMetricKey(v: unknown): v is EmployeeMetricKey {
  return typeof v === 'string' && EMPLOYEE_METRIC_KEYS.some((k) => k === v);
}

export type MonthOverMonthDelta = {
  current: number;
  previous: number;
  absolute: number;
  /** One-decimal percentage string; undefined when the previous value is 0. */
  percentage: string | undefined;
};

export type TeamAggregate = {
  team: string;
  /** One decimal; null when no member has a value. */
  average: number | null;
  count: number;
};

export type GroupRateAggregate = {
  group: string;
  value: number;
  /** Members active at month end. */
  headcount: number;
};

export type EmployeePredicate = (employee: EmployeeRecord, timeline: EmployeeTimeline) => boolean;

export type AggregationIndexInput = {
  months: readonly MonthKey[];
  snapshots: readonly MetricSnapshot[];
  stores: readonly RecordStore[];
  timelines: ReadonlyMap<string, EmployeeTimeline>;
  policy?: HrPolicy;
};

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

export class AggregationIndex {
  readonly months: readonly MonthKey[];
  readonly policy: HrPolicy;
  private readonly snapshots: ReadonlyMap<MonthKey, MetricSnapshot>;
  private readonly stores: ReadonlyMap<MonthKey, RecordStore>;
  private readonly timelines: ReadonlyMap<string, EmployeeTimeline>;
  /** Latest record per employee across the window. */
  private readonly latestRecords: ReadonlyMap<string, EmployeeRecord>;

  constructor(input: AggregationIndexInput) {
    this.months = Object.freeze(input.months.slice());
    this.policy = input.policy ?? DEFAULT_POLICY;
    this.snapshots = new Map(input.snapshots.map((s) => [s.month, s]));
    this.stores = new Map(input.stores.map((s) => [s.month, s]));
    this.timelines = input.timelines;

    const latest = new Map<string, EmployeeRecord>();
    for (const month of this.months) {
      const store = this.stores.get(month);
      if (!store) continue;
      for (const e of store.employees) latest.set(e.id, e);
    }
    this.latestRecords = latest;
  }

  hasMonth(month: MonthKey): boolean {
    return this.months.includes(month);
  }

  metricValues(month: MonthKey): Readonly<MetricValues> | undefined {
    return this.snapshots.get(month)?.values;
  }

  /** One value per resolved month, in window order. Months without a snapshot read as 0. */
  trend(metric: MetricKey): number[] {
    return this.months.map((m) => this.snapshots.get(m)?.values[metric] ?? 0);
  }

  /**
   * current − previous for the month before targetMonth. Undefined for the first month of the
   * window and for months outside it.
   */
  monthOverMonthDelta(metric: MetricKey, targetMonth: MonthKey): MonthOverMonthDelta | undefined {
    const idx = this.months.indexOf(targetMonth);
    if (idx <= 0) return undefined;
    const current = this.snapshots.get(targetMonth)?.values[metric] ?? 0;
    const previous = this.snapshots.get(this.months[idx - 1])?.values[metric] ?? 0;
    const absolute = round1(current - previous);
    const percentage = previous !== 0 ? (((current - previous) / Math.abs(previous)) * 100).toFixed(1) : undefined;
    return { current, previous, absolute, percentage };
  }

  /** Employee ids in first-seen order. */
  employeeIds(): string[] {
    return Array.from(this.timelines.keys());
  }

  /** Record for the given month, or the latest one in the window when month is omitted. */
  employee(employeeId: string, month?: MonthKey): EmployeeRecord | undefined {
    if (month) return this.stores.get(month)?.employee(employeeId);
    return this.latestRecords.get(employeeId);
  }

  timeline(employeeId: string): EmployeeTimeline | undefined {
    return this.timelines.get(employeeId);
  }

  entry(employeeId: string, month: MonthKey): TimelineEntry {
    return this.timelines.get(employeeId)?.get(month) ?? NOT_IN_DATASET;
  }

  private inDataset(employeeId: string, month: MonthKey): InDatasetEntry | undefined {
    const entry = this.entry(employeeId, month);
    return isInDataset(entry) ? entry : undefined;
  }

  /** Per-employee value for one month; null when not in the dataset or the value is unknown. */
  employeeMetric(employeeId: string, metric: EmployeeMetricKey, month: MonthKey): number | null {
    const entry = this.inDataset(employeeId, month);
    if (!entry) return null;
    switch (metric) {
      case 'attendance_rate':
        return entry.attendanceRate;
      case 'worked_hours':
        return entry.workedHours;
      case 'absences':
        return entry.absences;
      case 'unauthorized_absences':
        return entry.unauthorizedAbsences;
      case 'tenure_days':
        return entry.tenureDays;
      case 'training_participation':
        return entry.trainingParticipationPct;
      case 'risk_score':
        return this.riskScore(employeeId, month);
    }
  }

  /**
   * Average of an employee metric per team over employees active at the end of targetMonth.
   * Teams with no members that month do not appear.
   */
  teamAggregate(metric: EmployeeMetricKey, targetMonth: MonthKey): TeamAggregate[] {
    const groups = new Map<string, { sum: number; valued: number; count: number }>();
    for (const id of this.employeeIds()) {
      const entry = this.inDataset(id, targetMonth);
      if (!entry || !entry.active) continue;
      const team = entry.team ?? UNASSIGNED_TEAM;
      const group = groups.get(team) ?? { sum: 0, valued: 0, count: 0 };
      group.count++;
      const value = this.employeeMetric(id, metric, targetMonth);
      if (value != null) {
        group.sum += value;
        group.valued++;
      }
      groups.set(team, group);
    }
    return Array.from(groups.entries())
      .filter(([, g]) => g.count > 0)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([team, g]) => ({
        team,
        average: g.valued > 0 ? round1(g.sum / g.valued) : null,
        count: g.count,
      }));
  }

  /** Active members per team or role type, in the snapshot's group order. */
  groupHeadcounts(dimension: GroupDimension, month: MonthKey): Array<{ group: string; headcount: number }> {
    const groups = this.snapshots.get(month)?.groups[dimension] ?? [];
    return groups.map((g) => ({ group: g.group, headcount: g.headcount }));
  }

  /** A rate computed per team or per role type, in the snapshot's group order. */
  groupRates(dimension: GroupDimension, metric: GroupRateKey, month: MonthKey): GroupRateAggregate[] {
    const groups = this.snapshots.get(month)?.groups[dimension] ?? [];
    return groups.map((g) => ({ group: g.group, value: g.rates[metric], headcount: g.headcount }));
  }

  tenureAwardTier(employeeId: string, targetMonth: MonthKey): AwardTier {
    const entry = this.inDataset(employeeId, targetMonth);
    return awardTierFromTenure(entry?.tenureDays ?? null, this.policy.awardTiers);
  }

  /** Heuristic 0..100 attrition risk; null when the employee is not in the dataset that month. */
  riskScore(employeeId: string, targetMonth: MonthKey): number | null {
    const entry = this.inDataset(employeeId, targetMonth);
    if (!entry) return null;
    return computeRiskScore(
      {
        attendanceRate: entry.attendanceRate,
        trainingParticipationPct: entry.trainingParticipationPct,
        mentorFeedback: entry.mentorFeedback,
        unauthorizedAbsences: entry.unauthorizedAbsences,
      },
      this.policy.risk
    );
  }

  riskBand(employeeId: string, targetMonth: MonthKey): RiskBand | null {
    const score = this.riskScore(employeeId, targetMonth);
    return score == null ? null : riskBandFromScore(score, this.policy.risk);
  }

  /** Ids (first-seen order) whose latest record and timeline satisfy the predicate. */
  filter(predicate: EmployeePredicate): string[] {
    const out: string[] = [];
    for (const [id, timeline] of Array.from(this.timelines.entries())) {
      const employee = this.latestRecords.get(id);
      if (employee && predicate(employee, timeline)) out.push(id);
    }
    return out;
  }

  /** Load and calculation findings, in month order then discovery order. */
  findings(month?: MonthKey): ErrorFinding[] {
    const months = month ? this.months.filter((m) => m === month) : this.months;
    const out: ErrorFinding[] = [];
    for (const m of months) {
      out.push(...(this.stores.get(m)?.loadFindings ?? []));
      out.push(...(this.snapshots.get(m)?.findings ?? []));
    }
    return out;
  }
}

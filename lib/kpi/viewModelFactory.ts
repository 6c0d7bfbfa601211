/**
 * ViewModelFactory: turns declarative section configs into renderer-agnostic view models.
 *
 * The table is validated once when the factory is created. Each section type has one pure
 * handler; dispatch is a closed switch, so a new section type fails to compile until handled.
 */

import {
  allOf,
  hasAwardTier,
  hasFlag,
  inRiskBand,
  inTeam,
  matchesSearchText,
} from '@/lib/aggregation/filters';
import type { AggregationIndex, EmployeePredicate } from '@/lib/aggregation/aggregationIndex';
import { AWARD_TIERS } from '@/lib/aggregation/tenureTier';
import { METRIC_UNITS } from '@/lib/metrics/metricEngine';
import { FINDING_SEVERITIES } from '@/lib/records/types';
import type { MonthKey } from '@/lib/time';
import { isInDataset } from '@/lib/timeline/employeeTimeline';
import { ConfigurationError, parseKpiTable } from './parseKpiTable';
import type {
  BreakdownItem,
  ComparisonChartSection,
  ComparisonChartViewModel,
  EmployeeColumnKey,
  EmployeeFilterConfig,
  EmployeeTableSection,
  EmployeeTableViewModel,
  HeatmapSection,
  HeatmapViewModel,
  KpiDefinition,
  KpiViewModel,
  SectionConfig,
  SortDirection,
  StatSummarySection,
  StatSummaryViewModel,
  TableCell,
  TimelineSection,
  TimelineViewModel,
  TrendChartSection,
  TrendChartViewModel,
  ViewModel,
} from './types';

export const COLUMN_LABELS: Record<EmployeeColumnKey, string> = {
  id: 'Employee ID',
  name: 'Name',
  position: 'Position',
  team: 'Team',
  join_date: 'Join Date',
  resignation_date: 'Resignation Date',
  assignment_date: 'Assignment Date',
  tenure_days: 'Tenure (days)',
  attendance_rate: 'Attendance Rate (%)',
  worked_hours: 'Worked Hours',
  absences: 'Absences',
  unauthorized_absences: 'Unauthorized Absences',
  award_tier: 'Award Tier',
  risk_score: 'Risk Score',
  risk_band: 'Risk Band',
  finding_categories: 'Data Issues',
};

/** Window months up to and including the target month. */
function monthsThrough(index: AggregationIndex, month: MonthKey): MonthKey[] {
  return index.months.filter((m) => m <= month);
}

/** Null and undefined sort last in both directions. */
function compareNullable(a: TableCell, b: TableCell, direction: SortDirection): number {
  if (a == null && b == null) return 0;
  if (a == null) return 1;
  if (b == null) return -1;
  const cmp = typeof a === 'number' && typeof b === 'number' ? a - b : String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0;
  return direction === 'asc' ? cmp : -cmp;
}

export function buildEmployeePredicate(
  index: AggregationIndex,
  filter: EmployeeFilterConfig | undefined,
  month: MonthKey
): EmployeePredicate {
  const predicates: EmployeePredicate[] = [hasFlag(index, 'in_dataset', month)];
  for (const flag of filter?.flags ?? []) predicates.push(hasFlag(index, flag, month));
  if (filter?.team) predicates.push(inTeam(filter.team, month));
  if (filter?.tier) predicates.push(hasAwardTier(index, filter.tier, month));
  if (filter?.riskBand) predicates.push(inRiskBand(index, filter.riskBand, month));
  if (filter?.search) predicates.push(matchesSearchText(filter.search));
  return allOf(...predicates);
}

function statBreakdown(section: StatSummarySection, index: AggregationIndex, month: MonthKey): BreakdownItem[] {
  switch (section.breakdown) {
    case 'award_tier': {
      const active = index.filter(hasFlag(index, 'active', month));
      return AWARD_TIERS.map((tier) => ({
        label: tier,
        count: active.filter((id) => index.tenureAwardTier(id, month) === tier).length,
      }));
    }
    case 'finding_severity': {
      const findings = index.findings(month);
      return FINDING_SEVERITIES.map((severity) => ({
        label: severity,
        count: findings.filter((f) => f.severity === severity).length,
      }));
    }
    case 'team':
      return index.teamAggregate('tenure_days', month).map((t) => ({ label: t.team, count: t.count }));
    case 'role_type':
      return index.groupHeadcounts('role_type', month).map((g) => ({ label: g.group, count: g.headcount }));
    case undefined:
      return [];
  }
}

export function buildStatSummary(
  section: StatSummarySection,
  index: AggregationIndex,
  month: MonthKey
): StatSummaryViewModel {
  return {
    type: section.type,
    title: section.title,
    metric: section.metric,
    unit: METRIC_UNITS[section.metric],
    value: index.metricValues(month)?.[section.metric] ?? 0,
    delta: index.monthOverMonthDelta(section.metric, month) ?? null,
    breakdown: statBreakdown(section, index, month),
  };
}

export function buildTrendChart(
  section: TrendChartSection,
  index: AggregationIndex,
  month: MonthKey
): TrendChartViewModel {
  const labels = monthsThrough(index, month);
  return {
    type: section.type,
    title: section.title,
    labels,
    series: section.metrics.map((key) => {
      const all = index.trend(key);
      return { key, unit: METRIC_UNITS[key], values: all.slice(0, labels.length) };
    }),
  };
}

export function buildComparisonChart(
  section: ComparisonChartSection,
  index: AggregationIndex,
  month: MonthKey
): ComparisonChartViewModel {
  const sort = section.sort;
  if (section.groupBy === undefined) {
    const teams = index.teamAggregate(section.metric, month);
    if (sort) teams.sort((a, b) => compareNullable(a.average, b.average, sort));
    return {
      type: section.type,
      title: section.title,
      metric: section.metric,
      groupBy: 'team',
      labels: teams.map((t) => t.team),
      values: teams.map((t) => t.average),
      counts: teams.map((t) => t.count),
    };
  }
  const groups = index.groupRates(section.groupBy, section.metric, month);
  if (sort) groups.sort((a, b) => compareNullable(a.value, b.value, sort));
  return {
    type: section.type,
    title: section.title,
    metric: section.metric,
    groupBy: section.groupBy,
    labels: groups.map((g) => g.group),
    values: groups.map((g) => g.value),
    counts: groups.map((g) => g.headcount),
  };
}

function employeeCell(
  column: EmployeeColumnKey,
  employeeId: string,
  index: AggregationIndex,
  month: MonthKey
): TableCell {
  const employee = index.employee(employeeId, month);
  const entry = index.entry(employeeId, month);
  switch (column) {
    case 'id':
      return employeeId;
    case 'name':
      return employee?.name ?? null;
    case 'position':
      return employee?.position ?? null;
    case 'team':
      return employee?.team ?? null;
    case 'join_date':
      return employee?.joinDate ?? null;
    case 'resignation_date':
      return employee?.resignationDate ?? null;
    case 'assignment_date':
      return employee?.assignmentDate ?? null;
    case 'tenure_days':
      return index.employeeMetric(employeeId, 'tenure_days', month);
    case 'attendance_rate':
      return index.employeeMetric(employeeId, 'attendance_rate', month);
    case 'worked_hours':
      return index.employeeMetric(employeeId, 'worked_hours', month);
    case 'absences':
      return index.employeeMetric(employeeId, 'absences', month);
    case 'unauthorized_absences':
      return index.employeeMetric(employeeId, 'unauthorized_absences', month);
    case 'award_tier':
      return index.tenureAwardTier(employeeId, month);
    case 'risk_score':
      return index.riskScore(employeeId, month);
    case 'risk_band':
      return index.riskBand(employeeId, month);
    case 'finding_categories':
      return isInDataset(entry) ? entry.findingCategories.join(', ') : null;
  }
}

export function buildEmployeeTable(
  section: EmployeeTableSection,
  index: AggregationIndex,
  month: MonthKey
): EmployeeTableViewModel {
  const ids = index.filter(buildEmployeePredicate(index, section.filter, month));
  const sortBy = section.sortBy;
  if (sortBy) {
    const direction = section.sortDirection ?? 'asc';
    const keyed = ids.map((id) => ({ id, key: employeeCell(sortBy, id, index, month) }));
    keyed.sort((a, b) => compareNullable(a.key, b.key, direction));
    ids.splice(0, ids.length, ...keyed.map((k) => k.id));
  }
  const visible = section.limit != null ? ids.slice(0, section.limit) : ids;

  return {
    type: section.type,
    title: section.title,
    columns: section.columns.map((key) => ({ key, label: COLUMN_LABELS[key] })),
    rows: visible.map((id) => {
      const row: Record<string, TableCell> = {};
      for (const column of section.columns) row[column] = employeeCell(column, id, index, month);
      return row;
    }),
    total: ids.length,
  };
}

export function buildTimeline(section: TimelineSection, index: AggregationIndex, month: MonthKey): TimelineViewModel {
  const labels = monthsThrough(index, month);
  const ids = index.filter(buildEmployeePredicate(index, section.filter, month));
  const visible = section.limit != null ? ids.slice(0, section.limit) : ids;
  return {
    type: section.type,
    title: section.title,
    metric: section.metric,
    labels,
    series: visible.map((employeeId) => ({
      employeeId,
      name: index.employee(employeeId, month)?.name ?? '',
      values: labels.map((m) => index.employeeMetric(employeeId, section.metric, m)),
    })),
  };
}

export function buildHeatmap(section: HeatmapSection, index: AggregationIndex, month: MonthKey): HeatmapViewModel {
  const columns = monthsThrough(index, month);
  const byMonth = columns.map((m) => new Map(index.teamAggregate(section.metric, m).map((t) => [t.team, t.average])));
  const teams = new Set<string>();
  for (const aggregates of byMonth) for (const team of Array.from(aggregates.keys())) teams.add(team);
  const rows = Array.from(teams).sort();
  return {
    type: section.type,
    title: section.title,
    metric: section.metric,
    rows,
    columns,
    cells: rows.map((team) => byMonth.map((aggregates) => aggregates.get(team) ?? null)),
  };
}

function assertNever(value: never): never {
  throw new ConfigurationError(`Unhandled section ${JSON.stringify(value)}`);
}

/** Dispatch on section.type only. */
export function materializeSection(section: SectionConfig, index: AggregationIndex, month: MonthKey): ViewModel {
  switch (section.type) {
    case 'stat_summary':
      return buildStatSummary(section, index, month);
    case 'trend_chart':
      return buildTrendChart(section, index, month);
    case 'comparison_chart':
      return buildComparisonChart(section, index, month);
    case 'employee_table':
      return buildEmployeeTable(section, index, month);
    case 'timeline':
      return buildTimeline(section, index, month);
    case 'heatmap':
      return buildHeatmap(section, index, month);
    default:
      return assertNever(section);
  }
}

export type ViewModelFactory = {
  readonly kpis: readonly KpiDefinition[];
  materialize(section: SectionConfig, index: AggregationIndex, month: MonthKey): ViewModel;
  materializeKpi(kpiId: string, index: AggregationIndex, month: MonthKey): KpiViewModel;
  materializeAll(index: AggregationIndex, month: MonthKey): KpiViewModel[];
};

/** Validates the whole table now; a bad entry throws ConfigurationError before any month is rendered. */
export function createViewModelFactory(table: unknown): ViewModelFactory {
  const kpis = Object.freeze(parseKpiTable(table));

  function requireMonth(index: AggregationIndex, month: MonthKey): void {
    if (!index.hasMonth(month)) {
      throw new ConfigurationError(`Month ${month} is not in the resolved window [${index.months.join(', ')}]`);
    }
  }

  function renderKpi(kpi: KpiDefinition, index: AggregationIndex, month: MonthKey): KpiViewModel {
    return {
      id: kpi.id,
      title: kpi.title,
      month,
      sections: kpi.sections.map((section) => materializeSection(section, index, month)),
    };
  }

  return {
    kpis,
    materialize(section, index, month) {
      requireMonth(index, month);
      return materializeSection(section, index, month);
    },
    materializeKpi(kpiId, index, month) {
      requireMonth(index, month);
      const kpi = kpis.find((k) => k.id === kpiId);
      if (!kpi) throw new ConfigurationError(`Unknown KPI id "${kpiId}"`);
      return renderKpi(kpi, index, month);
    },
    materializeAll(index, month) {
      requireMonth(index, month);
      return kpis.map((kpi) => renderKpi(kpi, index, month));
    },
  };
}

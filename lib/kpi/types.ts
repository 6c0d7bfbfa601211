/**
 * Declarative KPI configuration and the renderer-agnostic view models built from it.
 * SectionConfig is pure data; which KPI a section belongs to never changes how it is built.
 */

import type { EmployeeFlag } from '@/lib/aggregation/filters';
import type { EmployeeMetricKey, MonthOverMonthDelta } from '@/lib/aggregation/aggregationIndex';
import type { RiskBand } from '@/lib/aggregation/riskScore';
import type { AwardTier } from '@/lib/aggregation/tenureTier';
import type { GroupDimension, GroupRateKey, MetricKey, MetricUnit } from '@/lib/metrics/metricEngine';
import type { MonthKey } from '@/lib/time';

export const SECTION_TYPES = [
  'stat_summary',
  'trend_chart',
  'comparison_chart',
  'employee_table',
  'timeline',
  'heatmap',
] as const;

export type SectionType = (typeof SECTION_TYPES)[number];

export const EMPLOYEE_COLUMNS = [
  'id',
  'name',
  'position',
  'team',
  'join_date',
  'resignation_date',
  'assignment_date',
  'tenure_days',
  'attendance_rate',
  'worked_hours',
  'absences',
  'unauthorized_absences',
  'award_tier',
  'risk_score',
  'risk_band',
  'finding_categories',
] as const;

export type EmployeeColumnKey = (typeof EMPLOYEE_COLUMNS)[number];

export type SummaryBreakdown = 'award_tier' | 'finding_severity' | 'team' | 'role_type';

export type SortDirection = 'asc' | 'desc';

/** All fields combine with AND. Flags are evaluated for the target month. */
export type EmployeeFilterConfig = {
  flags?: EmployeeFlag[];
  team?: string;
  tier?: AwardTier;
  riskBand?: RiskBand;
  search?: string;
};

export type StatSummarySection = {
  type: 'stat_summary';
  title: string;
  metric: MetricKey;
  breakdown?: SummaryBreakdown;
};

export type TrendChartSection = {
  type: 'trend_chart';
  title: string;
  metrics: MetricKey[];
};

/** Without groupBy: team averages of an employee metric. With groupBy: a rate computed per group. */
export type ComparisonChartSection =
  | {
      type: 'comparison_chart';
      title: string;
      metric: EmployeeMetricKey;
      groupBy?: undefined;
      sort?: SortDirection;
    }
  | {
      type: 'comparison_chart';
      title: string;
      metric: GroupRateKey;
      groupBy: GroupDimension;
      sort?: SortDirection;
    };

export type EmployeeTableSection = {
  type: 'employee_table';
  title: string;
  columns: EmployeeColumnKey[];
  filter?: EmployeeFilterConfig;
  sortBy?: EmployeeColumnKey;
  sortDirection?: SortDirection;
  limit?: number;
};

export type TimelineSection = {
  type: 'timeline';
  title: string;
  metric: EmployeeMetricKey;
  filter?: EmployeeFilterConfig;
  limit?: number;
};

export type HeatmapSection = {
  type: 'heatmap';
  title: string;
  metric: EmployeeMetricKey;
};

export type SectionConfig =
  | StatSummarySection
  | TrendChartSection
  | ComparisonChartSection
  | EmployeeTableSection
  | TimelineSection
  | HeatmapSection;

export type KpiDefinition = {
  id: string;
  title: string;
  sections: SectionConfig[];
};

export type BreakdownItem = { label: string; count: number };

export type StatSummaryViewModel = {
  type: 'stat_summary';
  title: string;
  metric: MetricKey;
  unit: MetricUnit;
  value: number;
  delta: MonthOverMonthDelta | null;
  breakdown: BreakdownItem[];
};

export type TrendChartViewModel = {
  type: 'trend_chart';
  title: string;
  labels: MonthKey[];
  series: Array<{ key: MetricKey; unit: MetricUnit; values: number[] }>;
};

export type ComparisonChartViewModel = {
  type: 'comparison_chart';
  title: string;
  metric: EmployeeMetricKey | GroupRateKey;
  groupBy: GroupDimension;
  labels: string[];
  values: Array<number | null>;
  counts: number[];
};

export type TableCell = string | number | null;

export type EmployeeTableViewModel = {
  type: 'employee_table';
  title: string;
  columns: Array<{ key: EmployeeColumnKey; label: string }>;
  rows: Array<Record<string, TableCell>>;
  /** Matching employees before the limit is applied. */
  total: number;
};

export type TimelineViewModel = {
  type: 'timeline';
  title: string;
  metric: EmployeeMetricKey;
  labels: MonthKey[];
  series: Array<{ employeeId: string; name: string; values: Array<number | null> }>;
};

export type HeatmapViewModel = {
  type: 'heatmap';
  title: string;
  metric: EmployeeMetricKey;
  rows: string[];
  columns: MonthKey[];
  cells: Array<Array<number | null>>;
};

export type ViewModel =
  | StatSummaryViewModel
  | TrendChartViewModel
  | ComparisonChartViewModel
  | EmployeeTableViewModel
  | TimelineViewModel
  | HeatmapViewModel;

export type KpiViewModel = {
  id: string;
  title: string;
  month: MonthKey;
  sections: ViewModel[];
};

/**
 * Batch run: resolve months → load rows → record stores → metric snapshots → timelines →
 * aggregation index → view models for every KPI at the target month.
 */

import { DEFAULT_POLICY, type HrPolicy } from '@/lib/config/policy';
import { DEFAULT_VOCABULARY, type Vocabulary } from '@/lib/config/vocabulary';
import { DataLoadError } from '@/lib/errors';
import { AggregationIndex } from '@/lib/aggregation/aggregationIndex';
import { getDefaultKpiTable } from '@/lib/kpi/kpiTable';
import type { KpiViewModel } from '@/lib/kpi/types';
import { createViewModelFactory } from '@/lib/kpi/viewModelFactory';
import { loadMonthRows, type MonthRows } from '@/lib/loaders/loadMonthRows';
import { computeMetricSnapshot, type MetricSnapshot } from '@/lib/metrics/metricEngine';
import { loadRecordStore, type RecordStore } from '@/lib/records/recordStore';
import type { ErrorFinding } from '@/lib/records/types';
import type { MonthKey } from '@/lib/time';
import { parseMonthKeyOrThrow } from '@/lib/time/parse';
import { buildEmployeeTimelines, type EmployeeTimeline } from '@/lib/timeline/employeeTimeline';
import {
  resolveMonthWindow,
  type MonthSourceFile,
  type UnrecognizedMonthTokenError,
} from '@/lib/window/resolveMonthWindow';

export type AssembleOptions = {
  vocabulary?: Vocabulary;
  policy?: HrPolicy;
  /** KPI table as parsed JSON; defaults to config/kpi-sections.json. */
  kpiTable?: unknown;
};

export type RunPipelineOptions = AssembleOptions & {
  sourceDirectory: string;
  windowStart: MonthKey;
  targetMonth: MonthKey;
  /** Replaces the spreadsheet loader, e.g. for a different storage backend. */
  loadRows?: (directory: string, sources: readonly MonthSourceFile[]) => Promise<MonthRows>;
};

export type RunResult = {
  targetMonth: MonthKey;
  months: MonthKey[];
  stores: RecordStore[];
  snapshots: MetricSnapshot[];
  timelines: Map<string, EmployeeTimeline>;
  index: AggregationIndex;
  kpis: KpiViewModel[];
  /** Load findings then calculation findings, month by month. */
  findings: ErrorFinding[];
  unrecognizedFiles: UnrecognizedMonthTokenError[];
};

/**
 * Everything after loading. rowsByMonth must hold every month to include, in any order;
 * months are processed ascending.
 */
export function assembleRun(
  rowsByMonth: ReadonlyMap<MonthKey, MonthRows>,
  targetMonth: MonthKey,
  options: AssembleOptions = {},
  unrecognizedFiles: UnrecognizedMonthTokenError[] = []
): RunResult {
  const policy = options.policy ?? DEFAULT_POLICY;
  const vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY;
  const factory = createViewModelFactory(options.kpiTable ?? getDefaultKpiTable());

  const months = Array.from(rowsByMonth.keys()).sort();
  if (!months.includes(targetMonth)) {
    throw new DataLoadError(`No source data for target month ${targetMonth}`, targetMonth);
  }

  const stores: RecordStore[] = [];
  const snapshots: MetricSnapshot[] = [];
  for (const month of months) {
    const rows = rowsByMonth.get(month) ?? { employees: [], attendance: [] };
    const { store } = loadRecordStore(month, rows.employees, rows.attendance, { vocabulary, policy });
    stores.push(store);
    snapshots.push(computeMetricSnapshot(store, { policy }));
  }

  const timelines = buildEmployeeTimelines(stores, policy);
  const index = new AggregationIndex({ months, snapshots, stores, timelines, policy });

  return {
    targetMonth,
    months,
    stores,
    snapshots,
    timelines,
    index,
    kpis: factory.materializeAll(index, targetMonth),
    findings: index.findings(),
    unrecognizedFiles,
  };
}

export async function runPipeline(options: RunPipelineOptions): Promise<RunResult> {
  const windowStart = parseMonthKeyOrThrow(options.windowStart);
  const targetMonth = parseMonthKeyOrThrow(options.targetMonth);
  if (targetMonth < windowStart) {
    throw new DataLoadError(`Target month ${targetMonth} is before window start ${windowStart}`, targetMonth);
  }
  const loadRows = options.loadRows ?? loadMonthRows;

  const window = await resolveMonthWindow(options.sourceDirectory, windowStart, targetMonth, {
    vocabulary: options.vocabulary,
  });
  if (window.months.length === 0) {
    throw new DataLoadError(`No source files between ${windowStart} and ${targetMonth}`, options.sourceDirectory);
  }

  const loaded = await Promise.all(
    window.months.map(async (month) => {
      const sources = window.sources.get(month) ?? [];
      if (!sources.some((s) => s.kind === 'employees')) {
        throw new DataLoadError(`No employee file for ${month}`, month);
      }
      return [month, await loadRows(options.sourceDirectory, sources)] as const;
    })
  );

  const rowsByMonth = new Map<MonthKey, MonthRows>(loaded);
  console.log('[runPipeline]', `loaded ${rowsByMonth.size} month(s): ${window.months.join(', ')}`);
  return assembleRun(rowsByMonth, targetMonth, options, window.errors);
}

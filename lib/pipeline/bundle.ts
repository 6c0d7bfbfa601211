/**
 * RunBundle: the single JSON document a run produces. Maps are flattened into plain objects
 * keyed by month or employee id; key order follows the resolved month order.
 */

import type { KpiViewModel } from '@/lib/kpi/types';
import type { GroupDimension, GroupRates, MetricValues } from '@/lib/metrics/metricEngine';
import type { ErrorFinding } from '@/lib/records/types';
import type { MonthKey } from '@/lib/time';
import type { EmployeeTimeline, TimelineEntry } from '@/lib/timeline/employeeTimeline';
import type { RunResult } from './runPipeline';

export type RunBundle = {
  generatedFor: MonthKey;
  months: MonthKey[];
  metrics: Record<MonthKey, MetricValues>;
  /** Per-team and per-role-type rates for each month. */
  groupRates: Record<MonthKey, Record<GroupDimension, GroupRates[]>>;
  timelines: Record<string, Record<MonthKey, TimelineEntry>>;
  findings: ErrorFinding[];
  kpis: KpiViewModel[];
  /** Source files skipped because no month could be read from their names. */
  unrecognizedFiles: Array<{ fileName: string; token: string }>;
};

function timelineToObject(timeline: EmployeeTimeline): Record<MonthKey, TimelineEntry> {
  const out: Record<MonthKey, TimelineEntry> = {};
  for (const [month, entry] of Array.from(timeline.entries())) out[month] = entry;
  return out;
}

export function serializeBundle(result: RunResult): RunBundle {
  const metrics: Record<MonthKey, MetricValues> = {};
  const groupRates: Record<MonthKey, Record<GroupDimension, GroupRates[]>> = {};
  for (const snapshot of result.snapshots) {
    metrics[snapshot.month] = { ...snapshot.values };
    groupRates[snapshot.month] = { team: snapshot.groups.team.slice(), role_type: snapshot.groups.role_type.slice() };
  }

  const timelines: Record<string, Record<MonthKey, TimelineEntry>> = {};
  for (const [id, timeline] of Array.from(result.timelines.entries())) timelines[id] = timelineToObject(timeline);

  return {
    generatedFor: result.targetMonth,
    months: result.months.slice(),
    metrics,
    groupRates,
    timelines,
    findings: result.findings.slice(),
    kpis: result.kpis,
    unrecognizedFiles: result.unrecognizedFiles.map((e) => ({ fileName: e.fileName, token: e.token })),
  };
}

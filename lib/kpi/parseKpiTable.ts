/**
 * Validates the KPI table (usually config/kpi-sections.json) into typed definitions.
 * Any unknown section type or key fails here, at assembly time, with the KPI id and section index.
 */

import { isEmployeeFlag, type EmployeeFlag } from '@/lib/aggregation/filters';
import { isEmployeeMetricKey, type EmployeeMetricKey } from '@/lib/aggregation/aggregationIndex';
import { RISK_BANDS, type RiskBand } from '@/lib/aggregation/riskScore';
import { AWARD_TIERS, type AwardTier } from '@/lib/aggregation/tenureTier';
import { isGroupDimension, isGroupRateKey, isMetricKey, type MetricKey } from '@/lib/metrics/metricEngine';
import {
  EMPLOYEE_COLUMNS,
  SECTION_TYPES,
  type EmployeeColumnKey,
  type EmployeeFilterConfig,
  type KpiDefinition,
  type SectionConfig,
  type SectionType,
  type SortDirection,
  type SummaryBreakdown,
} from './types';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly kpiId?: string,
    public readonly sectionIndex?: number
  ) {
    const where =
      kpiId != null ? ` (KPI "${kpiId}"${sectionIndex != null ? `, section ${sectionIndex}` : ''})` : '';
    super(message + where);
    this.name = 'ConfigurationError';
  }
}

type Fail = (message: string) => never;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isSectionType(v: unknown): v is SectionType {
  return typeof v === 'string' && SECTION_TYPES.some((t) => t === v);
}

function isColumnKey(v: unknown): v is EmployeeColumnKey {
  return typeof v === 'string' && EMPLOYEE_COLUMNS.some((c) => c === v);
}

function isAwardTier(v: unknown): v is AwardTier {
  return typeof v === 'string' && AWARD_TIERS.some((t) => t === v);
}

function isRiskBand(v: unknown): v is RiskBand {
  return typeof v === 'string' && RISK_BANDS.some((b) => b === v);
}

function isBreakdown(v: unknown): v is SummaryBreakdown {
  return v === 'award_tier' || v === 'finding_severity' || v === 'team' || v === 'role_type';
}

function isSortDirection(v: unknown): v is SortDirection {
  return v === 'asc' || v === 'desc';
}

function requireString(raw: Record<string, unknown>, key: string, fail: Fail): string {
  const v = raw[key];
  if (typeof v !== 'string' || !v.trim()) fail(`"${key}" must be a non-empty string`);
  return v;
}

function requireMetric(raw: Record<string, unknown>, key: string, fail: Fail): MetricKey {
  const v = raw[key];
  if (!isMetricKey(v)) fail(`Unknown metric key ${JSON.stringify(v)}`);
  return v;
}

function requireEmployeeMetric(raw: Record<string, unknown>, fail: Fail): EmployeeMetricKey {
  const v = raw.metric;
  if (!isEmployeeMetricKey(v)) fail(`Unknown employee metric key ${JSON.stringify(v)}`);
  return v;
}

function optionalLimit(raw: Record<string, unknown>, fail: Fail): number | undefined {
  const v = raw.limit;
  if (v === undefined) return undefined;
  if (typeof v !== 'number' || !Number.isInteger(v) || v <= 0) fail('"limit" must be a positive integer');
  return v;
}

function optionalSort(raw: Record<string, unknown>, key: string, fail: Fail): SortDirection | undefined {
  const v = raw[key];
  if (v === undefined) return undefined;
  if (!isSortDirection(v)) fail(`"${key}" must be "asc" or "desc"`);
  return v;
}

function parseFilter(raw: unknown, fail: Fail): EmployeeFilterConfig | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) fail('"filter" must be an object');
  const filter: EmployeeFilterConfig = {};
  if (raw.flags !== undefined) {
    if (!Array.isArray(raw.flags)) fail('"filter.flags" must be an array');
    const flags: EmployeeFlag[] = [];
    for (const f of raw.flags) {
      if (!isEmployeeFlag(f)) fail(`Unknown employee flag ${JSON.stringify(f)}`);
      flags.push(f);
    }
    filter.flags = flags;
  }
  if (raw.team !== undefined) filter.team = requireString(raw, 'team', fail);
  if (raw.search !== undefined) filter.search = requireString(raw, 'search', fail);
  if (raw.tier !== undefined) {
    if (!isAwardTier(raw.tier)) fail(`Unknown award tier ${JSON.stringify(raw.tier)}`);
    filter.tier = raw.tier;
  }
  if (raw.riskBand !== undefined) {
    if (!isRiskBand(raw.riskBand)) fail(`Unknown risk band ${JSON.stringify(raw.riskBand)}`);
    filter.riskBand = raw.riskBand;
  }
  return filter;
}

export function parseSection(raw: unknown, fail: Fail): SectionConfig {
  if (!isRecord(raw)) fail('Section must be an object');
  const type = raw.type;
  if (!isSectionType(type)) fail(`Unknown section type ${JSON.stringify(type)}`);
  const title = requireString(raw, 'title', fail);

  switch (type) {
    case 'stat_summary': {
      const breakdown = raw.breakdown;
      if (breakdown !== undefined && !isBreakdown(breakdown)) fail(`Unknown breakdown ${JSON.stringify(breakdown)}`);
      return { type, title, metric: requireMetric(raw, 'metric', fail), breakdown };
    }
    case 'trend_chart': {
      const metrics = raw.metrics;
      if (!Array.isArray(metrics) || metrics.length === 0) fail('"metrics" must be a non-empty array');
      const keys: MetricKey[] = [];
      for (const m of metrics) {
        if (!isMetricKey(m)) fail(`Unknown metric key ${JSON.stringify(m)}`);
        keys.push(m);
      }
      return { type, title, metrics: keys };
    }
    case 'comparison_chart': {
      const sort = optionalSort(raw, 'sort', fail);
      const groupBy = raw.groupBy;
      if (groupBy === undefined) return { type, title, metric: requireEmployeeMetric(raw, fail), sort };
      if (!isGroupDimension(groupBy)) fail(`Unknown group dimension ${JSON.stringify(groupBy)}`);
      const metric = raw.metric;
      if (!isGroupRateKey(metric)) fail(`Unknown group rate key ${JSON.stringify(metric)}`);
      return { type, title, metric, groupBy, sort };
    }
    case 'employee_table': {
      const columns = raw.columns;
      if (!Array.isArray(columns) || columns.length === 0) fail('"columns" must be a non-empty array');
      const keys: EmployeeColumnKey[] = [];
      for (const c of columns) {
        if (!isColumnKey(c)) fail(`Unknown column ${JSON.stringify(c)}`);
        keys.push(c);
      }
      const sortBy = raw.sortBy;
      if (sortBy !== undefined && !isColumnKey(sortBy)) fail(`Unknown sort column ${JSON.stringify(sortBy)}`);
      return {
        type,
        title,
        columns: keys,
        filter: parseFilter(raw.filter, fail),
        sortBy,
        sortDirection: optionalSort(raw, 'sortDirection', fail),
        limit: optionalLimit(raw, fail),
      };
    }
    case 'timeline':
      return {
        type,
        title,
        metric: requireEmployeeMetric(raw, fail),
        filter: parseFilter(raw.filter, fail),
        limit: optionalLimit(raw, fail),
      };
    case 'heatmap':
      return { type, title, metric: requireEmployeeMetric(raw, fail) };
  }
}

/** Accepts either an array of KPI definitions or `{ kpis: [...] }`. */
export function parseKpiTable(raw: unknown): KpiDefinition[] {
  const list = isRecord(raw) ? raw.kpis : raw;
  if (!Array.isArray(list)) throw new ConfigurationError('KPI table must be an array of KPI definitions');

  const ids = new Set<string>();
  return list.map((kpiRaw: unknown, kpiIndex: number) => {
    const kpiFail: Fail = (message) => {
      throw new ConfigurationError(message, isRecord(kpiRaw) && typeof kpiRaw.id === 'string' ? kpiRaw.id : `#${kpiIndex}`);
    };
    if (!isRecord(kpiRaw)) kpiFail('KPI definition must be an object');
    const id = requireString(kpiRaw, 'id', kpiFail);
    if (ids.has(id)) kpiFail(`Duplicate KPI id "${id}"`);
    ids.add(id);
    const title = requireString(kpiRaw, 'title', kpiFail);
    const sections = kpiRaw.sections;
    if (!Array.isArray(sections) || sections.length === 0) kpiFail('"sections" must be a non-empty array');

    return {
      id,
      title,
      sections: sections.map((sectionRaw: unknown, sectionIndex: number) =>
        parseSection(sectionRaw, (message) => {
          throw new ConfigurationError(message, id, sectionIndex);
        })
      ),
    };
  });
}
